export type Vec3Tuple = readonly [number, number, number];

export interface Vec3Like {
  x: number;
  y: number;
  z: number;
}

export interface Rgba {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
}

export interface CanonicalHashResult {
  sha256: string;
  canonicalBytes: Uint8Array;
}
