import { Box3, Vector3 } from "three";
import { rgba, rgbaEquals, toVector3, type ByteWriter, type Rgba, type Vec3Like, type Vec3Tuple } from "@metavoxel/core";
import { Spanner, type SpannerOptions } from "./spanner.js";
import type { Material } from "./material.js";

export const HEIGHT_MAXIMUM = 0xffff;
const DEFAULT_HEIGHTFIELD_COLOR = rgba(255, 255, 255);
const MATERIAL_LIMIT = 0xff;

export interface HeightfieldOptions extends SpannerOptions {
  /** Minimum corner of the heightfield's bounds. */
  translation: Vec3Like | Vec3Tuple;
  /** Extent along x; y and z extents are `scale * aspectY` and `scale * aspectZ`. */
  scale: number;
  aspectY?: number;
  aspectZ?: number;
  /** Samples per row; rows run along z. */
  width: number;
  /** Row-major 16-bit heights, 0 marking a hole. */
  heights: Uint16Array;
  /** Four bytes (RGBA) per sample. */
  colors?: Uint8Array;
  /** One byte per sample: 0 for none, otherwise 1 + index into `materials`. */
  materialIndices?: Uint8Array;
  materials?: readonly Material[];
}

interface Grids {
  heights: Uint16Array;
  colors?: Uint8Array;
  materialIndices?: Uint8Array;
  materials: readonly Material[];
}

export class Heightfield extends Spanner {
  public readonly type = "heightfield";
  public readonly translation: Vector3;
  public readonly scale: number;
  public readonly aspectY: number;
  public readonly aspectZ: number;
  public readonly width: number;
  public readonly length: number;
  public readonly heights: Uint16Array;
  public readonly colors?: Uint8Array;
  public readonly materialIndices?: Uint8Array;
  public readonly materials: readonly Material[];
  private readonly box: Box3;

  public constructor(options: HeightfieldOptions) {
    super(options);
    const samples = options.heights.length;
    if (!Number.isInteger(options.width) || options.width < 2) {
      throw new Error(`Heightfield width must be an integer of at least 2, got ${options.width}`);
    }
    if (samples % options.width !== 0 || samples / options.width < 2) {
      throw new Error(`Heightfield of width ${options.width} cannot hold ${samples} samples`);
    }
    if (!Number.isFinite(options.scale) || options.scale <= 0) {
      throw new Error(`Heightfield scale must be positive, got ${options.scale}`);
    }
    if (options.colors && options.colors.length !== samples * 4) {
      throw new Error(`Heightfield colours must hold ${samples * 4} bytes, got ${options.colors.length}`);
    }
    const materials = options.materials ?? [];
    if (options.materialIndices) {
      if (options.materialIndices.length !== samples) {
        throw new Error(`Heightfield material indices must hold ${samples} entries, got ${options.materialIndices.length}`);
      }
      if (options.materialIndices.some((index) => index > materials.length)) {
        throw new Error("Heightfield material index out of range");
      }
    }
    this.translation = toVector3(options.translation);
    this.scale = options.scale;
    this.aspectY = options.aspectY ?? 1;
    this.aspectZ = options.aspectZ ?? 1;
    this.width = options.width;
    this.length = samples / options.width;
    this.heights = options.heights;
    this.colors = options.colors;
    this.materialIndices = options.materialIndices;
    this.materials = materials;
    this.box = new Box3(
      this.translation.clone(),
      this.translation.clone().add(new Vector3(this.scale, this.scale * this.aspectY, this.scale * this.aspectZ))
    );
  }

  public get bounds(): Box3 {
    return this.box.clone();
  }

  private get stepX(): number {
    return this.scale / (this.width - 1);
  }

  private get stepZ(): number {
    return (this.scale * this.aspectZ) / (this.length - 1);
  }

  private get extentY(): number {
    return this.scale * this.aspectY;
  }

  private sampleIndex(x: number, z: number): number | undefined {
    const { min, max } = this.box;
    if (x < min.x || x > max.x || z < min.z || z > max.z) {
      return undefined;
    }
    const i = Math.round((x - min.x) / this.stepX);
    const j = Math.round((z - min.z) / this.stepZ);
    return j * this.width + i;
  }

  private surfaceY(raw: number): number {
    return this.translation.y + (raw / HEIGHT_MAXIMUM) * this.extentY;
  }

  /** Surface height at (x, z), or undefined over a hole or outside. */
  public heightAt(x: number, z: number): number | undefined {
    const index = this.sampleIndex(x, z);
    if (index === undefined) return undefined;
    const raw = this.heights[index] ?? 0;
    return raw === 0 ? undefined : this.surfaceY(raw);
  }

  public containsPoint(point: Vector3): boolean {
    const top = this.heightAt(point.x, point.z);
    return top !== undefined && point.y >= this.translation.y && point.y <= top;
  }

  public colorAt(point: Vector3): Rgba {
    const index = this.sampleIndex(point.x, point.z);
    if (index === undefined || !this.colors) {
      return DEFAULT_HEIGHTFIELD_COLOR;
    }
    return this.sampleColor(this.colors, index);
  }

  private sampleColor(colors: Uint8Array, index: number): Rgba {
    const o = index * 4;
    return rgba(colors[o] ?? 0, colors[o + 1] ?? 0, colors[o + 2] ?? 0, colors[o + 3] ?? 0);
  }

  public override paintHeight(position: Vector3, radius: number, height: number): Spanner {
    const squaredRadius = radius * radius;
    if (squaredRadius <= 0) return this;
    const scaledHeight = (height * HEIGHT_MAXIMUM) / this.extentY;
    const heights = Uint16Array.from(this.heights);
    let changed = false;

    for (let j = 0; j < this.length; j++) {
      const dz = this.translation.z + j * this.stepZ - position.z;
      for (let i = 0; i < this.width; i++) {
        const index = j * this.width + i;
        const current = heights[index] ?? 0;
        if (current === 0) continue;
        const dx = this.translation.x + i * this.stepX - position.x;
        const distanceSquared = dx * dx + dz * dz;
        if (distanceSquared > squaredRadius) continue;
        // height falls off quadratically towards the rim
        const delta = (scaledHeight * (squaredRadius - distanceSquared)) / squaredRadius;
        const next = Math.min(HEIGHT_MAXIMUM, Math.max(1, Math.round(current + delta)));
        if (next !== current) {
          heights[index] = next;
          changed = true;
        }
      }
    }
    return changed ? this.withGrids({ ...this.grids(), heights }) : this;
  }

  public override setMaterial(shape: Spanner, material: Material, color: Rgba, paint: boolean): Spanner {
    if (!shape.bounds.intersectsBox(this.bounds)) return this;

    const heights = Uint16Array.from(this.heights);
    const colors = this.colors ? Uint8Array.from(this.colors) : undefined;
    const materialIndices = this.materialIndices ? Uint8Array.from(this.materialIndices) : undefined;
    let materials = this.materials;
    let materialIndex = materials.indexOf(material) + 1;
    let changed = false;

    const ensureColors = (): Uint8Array => {
      return colors ?? fillColors(heights.length, DEFAULT_HEIGHTFIELD_COLOR);
    };
    let colorGrid = colors;
    let indexGrid = materialIndices;

    for (let j = 0; j < this.length; j++) {
      const z = this.translation.z + j * this.stepZ;
      for (let i = 0; i < this.width; i++) {
        const index = j * this.width + i;
        const raw = heights[index] ?? 0;
        const x = this.translation.x + i * this.stepX;
        const surface = new Vector3(x, raw === 0 ? this.translation.y : this.surfaceY(raw), z);
        if (!shape.containsPoint(surface)) continue;

        if (!paint && color.a === 0) {
          if (raw === 0) continue;
          heights[index] = 0;
          if (colorGrid) colorGrid.fill(0, index * 4, index * 4 + 4);
          if (indexGrid) indexGrid[index] = 0;
          changed = true;
          continue;
        }
        if (paint && raw === 0) continue;

        if (materialIndex === 0) {
          if (materials.length >= MATERIAL_LIMIT) {
            throw new Error(`Heightfield cannot reference more than ${MATERIAL_LIMIT} materials`);
          }
          materials = [...materials, material];
          materialIndex = materials.length;
        }
        colorGrid ??= ensureColors();
        indexGrid ??= new Uint8Array(heights.length);
        if (!rgbaEquals(this.sampleColor(colorGrid, index), color)) {
          colorGrid.set([color.r, color.g, color.b, color.a], index * 4);
          changed = true;
        }
        if (indexGrid[index] !== materialIndex) {
          indexGrid[index] = materialIndex;
          changed = true;
        }
      }
    }
    if (!changed) return this;
    return this.withGrids({ heights, colors: colorGrid, materialIndices: indexGrid, materials });
  }

  private grids(): Grids {
    return {
      heights: this.heights,
      colors: this.colors,
      materialIndices: this.materialIndices,
      materials: this.materials
    };
  }

  private withGrids(grids: Grids): Heightfield {
    return new Heightfield({
      registry: this.registry,
      placementGranularity: this.placementGranularity,
      id: this.id,
      translation: this.translation,
      scale: this.scale,
      aspectY: this.aspectY,
      aspectZ: this.aspectZ,
      width: this.width,
      ...grids
    });
  }

  public override encode(writer: ByteWriter): void {
    super.encode(writer);
    writer.writeU32LE(this.width);
    writer.writeBytes(new Uint8Array(this.heights.buffer, this.heights.byteOffset, this.heights.byteLength));
    writer.writeBytes(this.colors ?? new Uint8Array(0));
    writer.writeBytes(this.materialIndices ?? new Uint8Array(0));
    writer.writeU32LE(this.materials.length);
    for (const material of this.materials) {
      material.encode(writer);
    }
  }
}

function fillColors(samples: number, color: Rgba): Uint8Array {
  const out = new Uint8Array(samples * 4);
  for (let i = 0; i < samples; i++) {
    out.set([color.r, color.g, color.b, color.a], i * 4);
  }
  return out;
}
