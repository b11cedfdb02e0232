import { Box3, Vector3 } from "three";
import { rgba, rgbaEquals, toVector3, type ByteWriter, type Rgba, type Vec3Like, type Vec3Tuple } from "@metavoxel/core";
import { Spanner, type SpannerOptions } from "./spanner.js";
import type { Material } from "./material.js";

const DEFAULT_PRIMITIVE_COLOR = rgba(255, 255, 255);

export interface PrimitiveOptions extends SpannerOptions {
  color?: Rgba;
}

/** Uniformly coloured shapes; material edits recolour them. */
abstract class PrimitiveSpanner extends Spanner {
  public readonly color: Rgba;

  protected constructor(options: PrimitiveOptions) {
    super(options);
    this.color = options.color ?? DEFAULT_PRIMITIVE_COLOR;
  }

  protected abstract withColor(color: Rgba): Spanner;

  public colorAt(_point: Vector3): Rgba {
    return this.color;
  }

  public override setMaterial(shape: Spanner, _material: Material, color: Rgba, paint: boolean): Spanner {
    if (!shape.bounds.intersectsBox(this.bounds)) return this;
    if (color.a === 0 && !paint) return this;
    if (rgbaEquals(color, this.color)) return this;
    return this.withColor(color);
  }

  public override encode(writer: ByteWriter): void {
    super.encode(writer);
    writer.writeU8(this.color.r);
    writer.writeU8(this.color.g);
    writer.writeU8(this.color.b);
    writer.writeU8(this.color.a);
  }
}

export interface SphereOptions extends PrimitiveOptions {
  center: Vec3Like | Vec3Tuple;
  radius: number;
}

export class Sphere extends PrimitiveSpanner {
  public readonly type = "sphere";
  public readonly center: Vector3;
  public readonly radius: number;
  private readonly box: Box3;

  public constructor(options: SphereOptions) {
    super(options);
    if (!Number.isFinite(options.radius) || options.radius <= 0) {
      throw new Error(`Sphere radius must be positive, got ${options.radius}`);
    }
    this.center = toVector3(options.center);
    this.radius = options.radius;
    this.box = new Box3(
      this.center.clone().subScalar(this.radius),
      this.center.clone().addScalar(this.radius)
    );
  }

  public get bounds(): Box3 {
    return this.box.clone();
  }

  public containsPoint(point: Vector3): boolean {
    return point.distanceTo(this.center) <= this.radius;
  }

  protected withColor(color: Rgba): Spanner {
    return new Sphere({
      registry: this.registry,
      placementGranularity: this.placementGranularity,
      id: this.id,
      center: this.center,
      radius: this.radius,
      color
    });
  }
}

export interface CuboidOptions extends PrimitiveOptions {
  minimum: Vec3Like | Vec3Tuple;
  maximum: Vec3Like | Vec3Tuple;
}

export class Cuboid extends PrimitiveSpanner {
  public readonly type = "cuboid";
  private readonly box: Box3;

  public constructor(options: CuboidOptions) {
    super(options);
    this.box = new Box3(toVector3(options.minimum), toVector3(options.maximum));
    if (this.box.isEmpty()) {
      throw new Error("Cuboid minimum must not exceed its maximum");
    }
  }

  public get bounds(): Box3 {
    return this.box.clone();
  }

  public containsPoint(point: Vector3): boolean {
    return this.box.containsPoint(point);
  }

  protected withColor(color: Rgba): Spanner {
    return new Cuboid({
      registry: this.registry,
      placementGranularity: this.placementGranularity,
      id: this.id,
      minimum: this.box.min,
      maximum: this.box.max,
      color
    });
  }
}
