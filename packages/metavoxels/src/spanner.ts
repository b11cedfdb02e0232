import type { Box3, Vector3 } from "three";
import {
  VERTEX_COUNT,
  blendColors,
  boxLongestSide,
  boxVertex,
  overlapFraction,
  withAlpha,
  type ByteWriter,
  type Rgba
} from "@metavoxel/core";
import {
  SharedObject,
  type Attribute,
  type AttributeRegistry,
  type FloatAttribute,
  type RgbaAttribute
} from "@metavoxel/attributes";
import type { Material } from "./material.js";
import type { MetavoxelInfo } from "./visitor.js";

export type SpannerType = "sphere" | "cuboid" | "heightfield";

export interface SpannerOptions {
  registry: AttributeRegistry;
  placementGranularity?: number;
  /** Keeps an existing id, as a replacement instance does. */
  id?: number;
}

/**
 * A shared spatial object that voxelizes itself into the octree. Mutations
 * (`paintHeight`, `setMaterial`) return a replacement instance, or `this`
 * when nothing changed; callers store whatever comes back.
 */
export abstract class Spanner extends SharedObject {
  public readonly registry: AttributeRegistry;
  public readonly placementGranularity: number;
  protected readonly colorAttribute: RgbaAttribute;
  protected readonly maskAttribute: FloatAttribute;

  protected constructor(options: SpannerOptions) {
    super(options.id);
    const granularity = options.placementGranularity ?? 0;
    if (!Number.isFinite(granularity) || granularity < 0) {
      throw new Error(`Spanner placement granularity must be a non-negative number, got ${granularity}`);
    }
    this.registry = options.registry;
    this.placementGranularity = granularity;
    this.colorAttribute = options.registry.getSpannerColorAttribute();
    this.maskAttribute = options.registry.getSpannerMaskAttribute();
  }

  public abstract readonly type: SpannerType;

  public abstract get bounds(): Box3;

  public abstract containsPoint(point: Vector3): boolean;

  public abstract colorAt(point: Vector3): Rgba;

  /** Attributes this spanner writes when voxelized. */
  public get attributes(): readonly Attribute[] {
    return [this.colorAttribute, this.maskAttribute];
  }

  /**
   * Writes this spanner's contribution to the node. Returns true when the
   * node straddles the surface and should be subdivided further; `force`
   * takes the best guess at the current size instead.
   */
  public blendAttributeValues(info: MetavoxelInfo, force = false): boolean {
    const bounds = info.getBounds();
    // nodes that only touch a face share no volume with the shape
    const overlap = overlapFraction(bounds, this.bounds);
    if (overlap === 0) {
      return false;
    }
    let pointsWithin = 0;
    for (let i = 0; i < VERTEX_COUNT; i++) {
      if (this.containsPoint(boxVertex(bounds, i))) {
        pointsWithin++;
      }
    }
    const color = this.colorAt(info.getCenter());
    if (pointsWithin === VERTEX_COUNT) {
      info.setOutput(this.colorAttribute, color);
      info.setOutput(this.maskAttribute, 1);
      return false;
    }
    if (force || info.isLeaf || info.size <= this.placementGranularity) {
      const coverage = this.estimateCoverage(pointsWithin, overlap, info.size);
      if (coverage > 0) {
        const partial = withAlpha(color, Math.trunc(color.a * coverage));
        info.setOutput(this.colorAttribute, blendColors(info.getCurrent(this.colorAttribute), partial));
        info.setOutput(this.maskAttribute, Math.max(info.getCurrent(this.maskAttribute), coverage));
      }
      return false;
    }
    return true;
  }

  /**
   * Share of the node taken up by the shape, from the corners inside it. A
   * shape narrower than the node can slip between its corners; it then
   * counts by how much of the node its bounds fill.
   */
  protected estimateCoverage(pointsWithin: number, boundsOverlap: number, nodeSize: number): number {
    if (pointsWithin > 0) {
      return pointsWithin / VERTEX_COUNT;
    }
    return boxLongestSide(this.bounds) < nodeSize ? boundsOverlap : 0;
  }

  public paintHeight(_position: Vector3, _radius: number, _height: number): Spanner {
    return this;
  }

  public setMaterial(_shape: Spanner, _material: Material, _color: Rgba, _paint: boolean): Spanner {
    return this;
  }

  public override encode(writer: ByteWriter): void {
    super.encode(writer);
    writer.writeString(this.type);
    writer.writeF64LE(this.placementGranularity);
    for (const v of [this.bounds.min, this.bounds.max]) {
      writer.writeF64LE(v.x);
      writer.writeF64LE(v.y);
      writer.writeF64LE(v.z);
    }
  }
}
