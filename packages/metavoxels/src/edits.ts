import type { Box3, Vector3 } from "three";
import { TRANSPARENT, createBox, overlapFraction, withAlpha, type Rgba, type Vec3Like } from "@metavoxel/core";
import type { OwnedAttributeValue, SharedObjectSetAttribute, WeakSharedObjectHash } from "@metavoxel/attributes";
import type { MetavoxelData } from "./data.js";
import type { Material } from "./material.js";
import { Spanner } from "./spanner.js";
import { DEFAULT_ORDER, MetavoxelVisitor, STOP_RECURSION, type MetavoxelInfo, type VisitResult } from "./visitor.js";

/** Widens the paint query so that neighbouring tiles sharing an edge are touched too. */
export const PAINT_RADIUS_EXTENSION = 1.1;

export interface MetavoxelEdit {
  readonly kind: string;
  apply(data: MetavoxelData, objects: WeakSharedObjectHash): void;
}

class BoxSetVisitor extends MetavoxelVisitor {
  public constructor(private readonly edit: BoxSetEdit) {
    super([], [edit.value.attribute]);
  }

  public visit(info: MetavoxelInfo): VisitResult {
    const overlap = overlapFraction(info.getBounds(), this.edit.region);
    if (overlap === 0) {
      return STOP_RECURSION;
    }
    const { attribute, value } = this.edit.value;
    if (overlap >= 1) {
      info.setOutput(attribute, value);
      return STOP_RECURSION;
    }
    if (info.size <= this.edit.granularity || info.isLeaf) {
      // exactly half counts as covered
      if (overlap >= 0.5) {
        info.setOutput(attribute, value);
      }
      return STOP_RECURSION;
    }
    return DEFAULT_ORDER;
  }
}

/** Paints one value over an axis-aligned region, to within `granularity`. */
export class BoxSetEdit implements MetavoxelEdit {
  public readonly kind = "box-set";

  public constructor(
    public readonly region: Box3,
    public readonly granularity: number,
    public readonly value: OwnedAttributeValue
  ) {}

  public apply(data: MetavoxelData): void {
    if (this.region.isEmpty()) {
      return;
    }
    data.expandToContain(this.region);
    data.guide(new BoxSetVisitor(this));
  }
}

class GlobalSetVisitor extends MetavoxelVisitor {
  public constructor(private readonly value: OwnedAttributeValue) {
    super([], [value.attribute]);
  }

  public visit(info: MetavoxelInfo): VisitResult {
    info.setOutput(this.value.attribute, this.value.value);
    return STOP_RECURSION;
  }
}

/** Replaces an attribute's whole tree with one value. */
export class GlobalSetEdit implements MetavoxelEdit {
  public readonly kind = "global-set";

  public constructor(public readonly value: OwnedAttributeValue) {}

  public apply(data: MetavoxelData): void {
    data.guide(new GlobalSetVisitor(this.value));
  }
}

export class InsertSpannerEdit implements MetavoxelEdit {
  public readonly kind = "insert-spanner";

  public constructor(
    public readonly attribute: SharedObjectSetAttribute,
    public readonly spanner: Spanner
  ) {}

  public apply(data: MetavoxelData, objects: WeakSharedObjectHash): void {
    data.insert(this.attribute, this.spanner);
    objects.register(this.spanner);
  }
}

export class RemoveSpannerEdit implements MetavoxelEdit {
  public readonly kind = "remove-spanner";

  public constructor(
    public readonly attribute: SharedObjectSetAttribute,
    public readonly id: number
  ) {}

  public apply(data: MetavoxelData, objects: WeakSharedObjectHash): void {
    // held here until the re-voxelization below has finished with it
    const spanner = objects.value(this.id);
    if (!(spanner instanceof Spanner)) {
      console.warn(`[metavoxels] remove-spanner: no spanner with id ${this.id}, ignoring`);
      return;
    }
    data.remove(this.attribute, spanner);
  }
}

export class ClearSpannersEdit implements MetavoxelEdit {
  public readonly kind = "clear-spanners";

  public constructor(public readonly attribute: SharedObjectSetAttribute) {}

  public apply(data: MetavoxelData): void {
    data.clear(this.attribute);
  }
}

/** Places another data set with its minimum corner at `minimum`. */
export class SetDataEdit implements MetavoxelEdit {
  public readonly kind = "set-data";

  public constructor(
    public readonly minimum: Vec3Like,
    public readonly data: MetavoxelData,
    public readonly blend = false
  ) {}

  public apply(data: MetavoxelData): void {
    data.set(this.minimum, this.data, this.blend);
  }
}

/** Swaps every spanner touching `box` for whatever `update` returns in its place. */
function replaceIntersecting(
  data: MetavoxelData,
  objects: WeakSharedObjectHash,
  box: Box3,
  update: (spanner: Spanner) => Spanner
): void {
  const attribute = data.registry.getSpannersAttribute();
  for (const spanner of data.getIntersecting(attribute, box)) {
    const replacement = update(spanner);
    if (replacement !== spanner) {
      data.replace(attribute, spanner, replacement);
      objects.register(replacement);
    }
  }
}

export class PaintHeightfieldHeightEdit implements MetavoxelEdit {
  public readonly kind = "paint-height";

  public constructor(
    public readonly position: Vector3,
    public readonly radius: number,
    public readonly height: number
  ) {}

  public apply(data: MetavoxelData, objects: WeakSharedObjectHash): void {
    const extent = this.radius * PAINT_RADIUS_EXTENSION;
    const box = createBox(this.position.clone().subScalar(extent), this.position.clone().addScalar(extent));
    replaceIntersecting(data, objects, box, (spanner) => spanner.paintHeight(this.position, this.radius, this.height));
  }
}

export abstract class MaterialEdit implements MetavoxelEdit {
  public abstract readonly kind: string;

  protected constructor(
    public readonly material: Material,
    public readonly averageColor: Rgba
  ) {}

  public abstract apply(data: MetavoxelData, objects: WeakSharedObjectHash): void;
}

/**
 * Colour a material edit stores: painting is always opaque, and anything
 * under half opacity otherwise becomes fully transparent.
 */
export function effectiveMaterialColor(averageColor: Rgba, paint: boolean): Rgba {
  if (paint) {
    return withAlpha(averageColor, 255);
  }
  return averageColor.a < 128 ? TRANSPARENT : averageColor;
}

/** Applies a material (or carves, when transparent) wherever `spanner` reaches. */
export class HeightfieldMaterialSpannerEdit extends MaterialEdit {
  public readonly kind = "material";

  public constructor(
    public readonly spanner: Spanner,
    material: Material,
    averageColor: Rgba,
    public readonly paint = false
  ) {
    super(material, averageColor);
  }

  public apply(data: MetavoxelData, objects: WeakSharedObjectHash): void {
    const color = effectiveMaterialColor(this.averageColor, this.paint);
    replaceIntersecting(data, objects, this.spanner.bounds, (result) =>
      result.setMaterial(this.spanner, this.material, color, this.paint)
    );
  }
}

class SetSpannerVisitor extends MetavoxelVisitor {
  public constructor(private readonly spanner: Spanner) {
    super(spanner.attributes, spanner.attributes);
  }

  public visit(info: MetavoxelInfo): VisitResult {
    return this.spanner.blendAttributeValues(info) ? DEFAULT_ORDER : STOP_RECURSION;
  }
}

/** Voxelizes a spanner straight into its attributes without adding it to a set. */
export class SetSpannerEdit implements MetavoxelEdit {
  public readonly kind = "set-spanner";

  public constructor(public readonly spanner: Spanner) {}

  public apply(data: MetavoxelData): void {
    data.expandToContain(this.spanner.bounds);
    data.guide(new SetSpannerVisitor(this.spanner));
  }
}

export type AnyMetavoxelEdit =
  | BoxSetEdit
  | GlobalSetEdit
  | InsertSpannerEdit
  | RemoveSpannerEdit
  | ClearSpannersEdit
  | SetDataEdit
  | PaintHeightfieldHeightEdit
  | HeightfieldMaterialSpannerEdit
  | SetSpannerEdit;

export class MetavoxelEditMessage {
  public constructor(public readonly edit: AnyMetavoxelEdit) {}

  public apply(data: MetavoxelData, objects: WeakSharedObjectHash): void {
    const edit: MetavoxelEdit = this.edit;
    edit.apply(data, objects);
  }
}

/** Applies edits one after another, in order. */
export function applyEdits(
  data: MetavoxelData,
  objects: WeakSharedObjectHash,
  edits: Iterable<MetavoxelEdit | MetavoxelEditMessage>
): void {
  for (const edit of edits) {
    edit.apply(data, objects);
  }
}
