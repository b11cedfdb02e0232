import type { Rgba } from "./types.js";

export const TRANSPARENT: Rgba = Object.freeze({ r: 0, g: 0, b: 0, a: 0 });

function channel(value: number): number {
  return Math.min(255, Math.max(0, Math.round(value)));
}

export function rgba(r: number, g: number, b: number, a = 255): Rgba {
  return Object.freeze({ r: channel(r), g: channel(g), b: channel(b), a: channel(a) });
}

export function isRgba(value: unknown): value is Rgba {
  if (!value || typeof value !== "object") return false;
  if (!("r" in value && "g" in value && "b" in value && "a" in value)) return false;
  return [value.r, value.g, value.b, value.a].every(
    (c) => typeof c === "number" && Number.isInteger(c) && c >= 0 && c <= 255
  );
}

export function rgbaEquals(a: Rgba, b: Rgba): boolean {
  return a.r === b.r && a.g === b.g && a.b === b.b && a.a === b.a;
}

export function withAlpha(color: Rgba, alpha: number): Rgba {
  return rgba(color.r, color.g, color.b, alpha);
}

/**
 * Alpha-weighted mean of the colours; channel sums are truncated, as is the
 * resulting alpha (total alpha over the number of colours).
 */
export function averageColors(colors: readonly Rgba[]): Rgba {
  let totalRed = 0;
  let totalGreen = 0;
  let totalBlue = 0;
  let totalAlpha = 0;
  for (const color of colors) {
    totalRed += color.r * color.a;
    totalGreen += color.g * color.a;
    totalBlue += color.b * color.a;
    totalAlpha += color.a;
  }
  if (totalAlpha === 0 || colors.length === 0) {
    return TRANSPARENT;
  }
  return rgba(
    Math.trunc(totalRed / totalAlpha),
    Math.trunc(totalGreen / totalAlpha),
    Math.trunc(totalBlue / totalAlpha),
    Math.trunc(totalAlpha / colors.length)
  );
}

/** Composites `source` over `dest`, weighting channels by relative alpha. */
export function blendColors(dest: Rgba, source: Rgba): Rgba {
  if (source.a === 0) return dest;
  if (dest.a === 0) return source;
  const weight = source.a / (source.a + dest.a);
  return rgba(
    dest.r + (source.r - dest.r) * weight,
    dest.g + (source.g - dest.g) * weight,
    dest.b + (source.b - dest.b) * weight,
    Math.max(source.a, dest.a)
  );
}
