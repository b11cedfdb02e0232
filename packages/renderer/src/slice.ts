import { PNG } from "pngjs";
import {
  FloatAttribute,
  RgbaAttribute,
  SharedObjectSetAttribute,
  type Attribute
} from "@metavoxel/attributes";
import type { MetavoxelData } from "@metavoxel/metavoxels";

export interface SliceOptions {
  /** Height of the XZ plane; defaults to the middle of the data. */
  y?: number;
  resolution?: number;
}

export interface Slice {
  width: number;
  height: number;
  /** RGBA, row-major, rows running along z. */
  pixels: Uint8Array;
}

const DEFAULT_RESOLUTION = 64;

function grey(value: number): [number, number, number, number] {
  const level = Math.round(Math.min(1, Math.max(0, value)) * 255);
  return [level, level, level, 255];
}

function sampler(data: MetavoxelData, attribute: Attribute): (x: number, y: number, z: number) => ArrayLike<number> {
  if (attribute instanceof RgbaAttribute) {
    return (x, y, z) => {
      const c = data.getValue(attribute, { x, y, z });
      return [c.r, c.g, c.b, c.a];
    };
  }
  if (attribute instanceof FloatAttribute) {
    return (x, y, z) => grey(data.getValue(attribute, { x, y, z }));
  }
  if (attribute instanceof SharedObjectSetAttribute) {
    return (x, y, z) => (data.getValue(attribute, { x, y, z }).size > 0 ? [255, 255, 255, 255] : [0, 0, 0, 0]);
  }
  throw new Error(`Cannot render attribute "${attribute.name}" of kind ${attribute.kind}`);
}

/** Samples one horizontal cross-section at pixel centres. */
export function sampleSlice(data: MetavoxelData, attribute: Attribute, options: SliceOptions = {}): Slice {
  const resolution = options.resolution ?? DEFAULT_RESOLUTION;
  if (!Number.isInteger(resolution) || resolution < 1) {
    throw new Error(`Slice resolution must be a positive integer, got ${resolution}`);
  }
  const min = data.getMinimum();
  const y = options.y ?? 0;
  const step = data.getSize() / resolution;
  const sample = sampler(data, attribute);
  const pixels = new Uint8Array(resolution * resolution * 4);

  for (let row = 0; row < resolution; row++) {
    const z = min.z + (row + 0.5) * step;
    for (let col = 0; col < resolution; col++) {
      const x = min.x + (col + 0.5) * step;
      pixels.set(sample(x, y, z), (row * resolution + col) * 4);
    }
  }
  return { width: resolution, height: resolution, pixels };
}

export function renderSlicePng(data: MetavoxelData, attribute: Attribute, options: SliceOptions = {}): Buffer {
  const slice = sampleSlice(data, attribute, options);
  const png = new PNG({ width: slice.width, height: slice.height });
  png.data = Buffer.from(slice.pixels);
  return PNG.sync.write(png);
}
