import { afterEach, describe, expect, it, vi } from "vitest";
import { Vector3 } from "three";
import { createBox, rgba } from "@metavoxel/core";
import { AttributeRegistry, OwnedAttributeValue, WeakSharedObjectHash } from "@metavoxel/attributes";
import {
  BoxSetEdit,
  ClearSpannersEdit,
  Cuboid,
  GlobalSetEdit,
  Heightfield,
  HeightfieldMaterialSpannerEdit,
  InsertSpannerEdit,
  Material,
  MetavoxelData,
  MetavoxelEditMessage,
  PaintHeightfieldHeightEdit,
  RemoveSpannerEdit,
  SetDataEdit,
  SetSpannerEdit,
  Sphere,
  SpannerUpdateVisitor,
  applyEdits,
  effectiveMaterialColor,
  hashMetavoxelData
} from "../src/index.js";

const red = rgba(255, 0, 0);
const blue = rgba(0, 0, 255);
const transparent = { r: 0, g: 0, b: 0, a: 0 };
const MID = 32768;

function setup(size = 1): { registry: AttributeRegistry; data: MetavoxelData; objects: WeakSharedObjectHash } {
  const registry = new AttributeRegistry();
  return { registry, data: new MetavoxelData(registry, size), objects: new WeakSharedObjectHash() };
}

function flatHeightfield(registry: AttributeRegistry): Heightfield {
  return new Heightfield({
    registry,
    translation: [0, 0, 0],
    scale: 1,
    width: 3,
    heights: new Uint16Array(9).fill(MID)
  });
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("BoxSetEdit", () => {
  it("assigns a node exactly half covered at the granularity limit", () => {
    const { registry, data } = setup();
    const color = registry.getColorAttribute();
    new BoxSetEdit(createBox([0, 0, 0], [0.25, 0.5, 0.5]), 0.5, new OwnedAttributeValue(color, red)).apply(data);
    expect(data.getValue(color, { x: 0.4, y: 0.25, z: 0.25 })).toEqual(red);
    expect(data.getValue(color, { x: -0.1, y: 0.25, z: 0.25 })).toEqual(transparent);
  });

  it("leaves a node under half covered", () => {
    const { registry, data } = setup();
    const color = registry.getColorAttribute();
    new BoxSetEdit(createBox([0, 0, 0], [0.2, 0.5, 0.5]), 0.5, new OwnedAttributeValue(color, red)).apply(data);
    expect(data.getValue(color, { x: 0.1, y: 0.25, z: 0.25 })).toEqual(transparent);
    expect(data.getRoot(color)).toBeUndefined();
  });

  it("reproduces a region at node precision", () => {
    const { registry, data } = setup();
    const color = registry.getColorAttribute();
    new BoxSetEdit(createBox([-0.5, -0.5, -0.5], [0.25, 0, 0]), 0, new OwnedAttributeValue(color, red)).apply(data);
    expect(data.getValue(color, { x: 0.2, y: -0.1, z: -0.1 })).toEqual(red);
    expect(data.getValue(color, { x: -0.4, y: -0.4, z: -0.4 })).toEqual(red);
    expect(data.getValue(color, { x: 0.3, y: -0.1, z: -0.1 })).toEqual(transparent);
    expect(data.getValue(color, { x: 0, y: 0.1, z: 0 })).toEqual(transparent);
  });

  it("grows the bounds to contain the region", () => {
    const { registry, data } = setup();
    const color = registry.getColorAttribute();
    new BoxSetEdit(createBox([1, 1, 1], [1.5, 1.5, 1.5]), 0, new OwnedAttributeValue(color, red)).apply(data);
    expect(data.getSize()).toBe(4);
    expect(data.getValue(color, { x: 1.25, y: 1.25, z: 1.25 })).toEqual(red);
  });
});

describe("GlobalSetEdit", () => {
  it("wins over any earlier structure", () => {
    const { registry, data, objects } = setup();
    const color = registry.getColorAttribute();
    applyEdits(data, objects, [
      new BoxSetEdit(createBox([0, 0, 0], [0.5, 0.5, 0.5]), 0, new OwnedAttributeValue(color, red)),
      new GlobalSetEdit(new OwnedAttributeValue(color, blue))
    ]);
    for (const point of [
      { x: 0.25, y: 0.25, z: 0.25 },
      { x: -0.4, y: 0.1, z: 0.3 },
      { x: 0.5, y: 0.5, z: 0.5 }
    ]) {
      expect(data.getValue(color, point)).toEqual(blue);
    }
    expect(data.countNodes(color)).toBe(1);
  });
});

describe("spanner edits", () => {
  it("finds exactly the inserted spanner", () => {
    const { registry, data, objects } = setup();
    const spanners = registry.getSpannersAttribute();
    const sphere = new Sphere({ registry, center: [0, 0, 0], radius: 0.25 });
    new InsertSpannerEdit(spanners, sphere).apply(data, objects);

    expect(data.getIntersecting(spanners, sphere.bounds)).toEqual([sphere]);
    expect(objects.value(sphere.id)).toBe(sphere);
  });

  it("filters by the spanner's own bounds", () => {
    const { registry, data, objects } = setup();
    const spanners = registry.getSpannersAttribute();
    const low = new Sphere({ registry, center: [-0.25, -0.25, -0.25], radius: 0.1 });
    const high = new Sphere({ registry, center: [0.25, 0.25, 0.25], radius: 0.1 });
    applyEdits(data, objects, [new InsertSpannerEdit(spanners, low), new InsertSpannerEdit(spanners, high)]);

    expect(data.getIntersecting(spanners, low.bounds)).toEqual([low]);
    expect(data.getIntersecting(spanners, data.getBounds())).toHaveLength(2);
  });

  it("finds nothing after removal", () => {
    const { registry, data, objects } = setup();
    const spanners = registry.getSpannersAttribute();
    const sphere = new Sphere({ registry, center: [0, 0, 0], radius: 0.25 });
    applyEdits(data, objects, [new InsertSpannerEdit(spanners, sphere), new RemoveSpannerEdit(spanners, sphere.id)]);
    expect(data.getIntersecting(spanners, sphere.bounds)).toEqual([]);
  });

  it("ignores an unknown id without touching the data", () => {
    const { registry, data, objects } = setup();
    const spanners = registry.getSpannersAttribute();
    new InsertSpannerEdit(spanners, new Sphere({ registry, center: [0, 0, 0], radius: 0.25 })).apply(data, objects);
    const before = hashMetavoxelData(data).sha256;
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    new MetavoxelEditMessage(new RemoveSpannerEdit(spanners, 987654)).apply(data, objects);

    expect(hashMetavoxelData(data).sha256).toBe(before);
    expect(warn).toHaveBeenCalledWith("[metavoxels] remove-spanner: no spanner with id 987654, ignoring");
  });

  it("voxelizes the spanner's colour and coverage", () => {
    const { registry, data, objects } = setup();
    const cuboid = new Cuboid({ registry, minimum: [0, 0, 0], maximum: [0.5, 0.5, 0.5], color: red });
    new InsertSpannerEdit(registry.getSpannersAttribute(), cuboid).apply(data, objects);

    const spannerColor = registry.getSpannerColorAttribute();
    const mask = registry.getSpannerMaskAttribute();
    expect(data.getValue(spannerColor, { x: 0.3, y: 0.3, z: 0.3 })).toEqual(red);
    expect(data.getValue(mask, { x: 0.3, y: 0.3, z: 0.3 })).toBe(1);
    expect(data.getValue(spannerColor, { x: -0.3, y: -0.3, z: -0.3 })).toEqual(transparent);
    expect(data.getValue(mask, { x: -0.3, y: -0.3, z: -0.3 })).toBe(0);
  });

  it("empties the set on clear", () => {
    const { registry, data, objects } = setup();
    const spanners = registry.getSpannersAttribute();
    const sphere = new Sphere({ registry, center: [0, 0, 0], radius: 0.25 });
    applyEdits(data, objects, [new InsertSpannerEdit(spanners, sphere), new ClearSpannersEdit(spanners)]);
    expect(data.getRoot(spanners)).toBeUndefined();
    expect(data.getIntersecting(spanners, data.getBounds())).toEqual([]);
  });
});

describe("spanner voxelization", () => {
  it("writes nothing beside a face it only touches", () => {
    const { registry, data, objects } = setup();
    const cuboid = new Cuboid({ registry, minimum: [0, 0, 0], maximum: [0.5, 0.5, 0.5], color: red });
    new InsertSpannerEdit(registry.getSpannersAttribute(), cuboid).apply(data, objects);

    const spannerColor = registry.getSpannerColorAttribute();
    const mask = registry.getSpannerMaskAttribute();
    expect(data.getValue(mask, { x: -0.1, y: 0.1, z: 0.1 })).toBe(0);
    expect(data.getValue(spannerColor, { x: -0.1, y: 0.1, z: 0.1 })).toEqual(transparent);
    expect(data.getValue(mask, { x: 0.1, y: 0.1, z: 0.1 })).toBe(1);
    expect(data.getValue(spannerColor, { x: 0.1, y: 0.1, z: 0.1 })).toEqual(red);
  });

  it("leaves a trace of a shape smaller than the node it lands in", () => {
    const { registry, data, objects } = setup();
    const spanners = registry.getSpannersAttribute();
    const speck = new Sphere({ registry, center: [0.3, 0.3, 0.3], radius: 0.005 });
    new InsertSpannerEdit(spanners, speck).apply(data, objects);

    // the 1/64 node holding the centre spans 0.296875..0.3125 on each axis
    const center = { x: 0.3, y: 0.3, z: 0.3 };
    expect(data.getValue(registry.getSpannerMaskAttribute(), center)).toBeCloseTo(0.52 ** 3, 6);
    expect(data.getValue(registry.getSpannerColorAttribute(), center)).toEqual({ r: 255, g: 255, b: 255, a: 35 });
    expect(data.getIntersecting(spanners, speck.bounds)).toEqual([speck]);
  });

  it("restores the defaults once the only spanner is removed", () => {
    const { registry, data, objects } = setup();
    const spanners = registry.getSpannersAttribute();
    const sphere = new Sphere({ registry, center: [0, 0, 0], radius: 0.25, color: red });
    applyEdits(data, objects, [new InsertSpannerEdit(spanners, sphere), new RemoveSpannerEdit(spanners, sphere.id)]);

    const spannerColor = registry.getSpannerColorAttribute();
    const mask = registry.getSpannerMaskAttribute();
    expect(data.getValue(mask, { x: 0.05, y: 0.05, z: 0.05 })).toBe(0);
    expect(data.getValue(spannerColor, { x: 0.05, y: 0.05, z: 0.05 })).toEqual(transparent);
    expect(data.countNodes(mask)).toBe(1);
    expect(data.countNodes(spannerColor)).toBe(1);
  });

  it("keeps an overlapping spanner's voxels when another is removed", () => {
    const { registry, data, objects } = setup();
    const spanners = registry.getSpannersAttribute();
    const outer = new Cuboid({ registry, minimum: [0, 0, 0], maximum: [0.5, 0.5, 0.5], color: red });
    const inner = new Cuboid({ registry, minimum: [0.25, 0.25, 0.25], maximum: [0.5, 0.5, 0.5], color: blue });
    applyEdits(data, objects, [
      new InsertSpannerEdit(spanners, outer),
      new InsertSpannerEdit(spanners, inner),
      new RemoveSpannerEdit(spanners, inner.id)
    ]);

    expect(data.getValue(registry.getSpannerColorAttribute(), { x: 0.4, y: 0.4, z: 0.4 })).toEqual(red);
    expect(data.getValue(registry.getSpannerMaskAttribute(), { x: 0.4, y: 0.4, z: 0.4 })).toBe(1);
    expect(data.getIntersecting(spanners, data.getBounds())).toEqual([outer]);
  });
});

describe("SpannerUpdateVisitor", () => {
  const region = createBox([0, 0, 0], [0.5, 0.25, 0.25]);

  function updateFor(multiplier: number, granularity = 0): SpannerUpdateVisitor {
    const registry = new AttributeRegistry({ spanners: { lodThresholdMultiplier: multiplier } });
    return new SpannerUpdateVisitor(region, granularity, registry.getSpannersAttribute(), []);
  }

  it("climbs round(log2(multiplier) - 2) levels for the blend source", () => {
    expect(updateFor(8).steps).toBe(1);
    expect(updateFor(16).steps).toBe(2);
    expect(updateFor(4).steps).toBe(0);
    expect(updateFor(2).steps).toBe(-1);
    expect(updateFor(5.66).steps).toBe(1);
  });

  it("voxelizes at twice the larger of extent and granularity over the multiplier", () => {
    expect(updateFor(8).voxelizationSize).toBe(0.125);
    expect(updateFor(16).voxelizationSize).toBe(0.0625);
    expect(updateFor(8, 1).voxelizationSize).toBe(0.25);
  });

  it("blends the spanners held by the ancestor that many levels up", () => {
    const registry = new AttributeRegistry({ spanners: { lodThresholdMultiplier: 16 } });
    const spanners = registry.getSpannersAttribute();
    const mask = registry.getSpannerMaskAttribute();

    // written at 0.25; two levels up is the root, which holds the cuboid
    const reached = new MetavoxelData(registry);
    const cube = new Cuboid({ registry, minimum: [-0.5, -0.5, -0.5], maximum: [0.5, 0.5, 0.5], placementGranularity: 2 });
    new InsertSpannerEdit(spanners, cube).apply(reached, new WeakSharedObjectHash());
    expect(reached.getValue(mask, { x: 0.1, y: 0.1, z: 0.1 })).toBe(1);

    // written at 0.5; the chain ends above the root, so nothing is blended
    const shallow = new MetavoxelData(registry);
    const coarse = new Cuboid({ registry, minimum: [-0.5, -0.5, -0.5], maximum: [0.5, 0.5, 0.5], placementGranularity: 4 });
    new InsertSpannerEdit(spanners, coarse).apply(shallow, new WeakSharedObjectHash());
    expect(shallow.getValue(mask, { x: 0.1, y: 0.1, z: 0.1 })).toBe(0);
    expect(shallow.getIntersecting(spanners, shallow.getBounds())).toEqual([coarse]);
  });
});

describe("snapshots", () => {
  it("keep their hash while a clone takes spanner edits", () => {
    const { registry, data, objects } = setup();
    const spanners = registry.getSpannersAttribute();
    const field = flatHeightfield(registry);
    new InsertSpannerEdit(spanners, field).apply(data, objects);
    const before = hashMetavoxelData(data).sha256;

    const working = data.clone();
    applyEdits(working, objects, [
      new InsertSpannerEdit(spanners, new Sphere({ registry, center: [-0.5, -0.5, -0.5], radius: 0.25 })),
      new PaintHeightfieldHeightEdit(new Vector3(0.5, 0, 0.5), 0.5, 0.1)
    ]);

    expect(hashMetavoxelData(data).sha256).toBe(before);
    expect(hashMetavoxelData(working).sha256).not.toBe(before);
    expect(data.getIntersecting(spanners, data.getBounds())).toEqual([field]);
    expect(field.heights[4]).toBe(MID);
    const painted = working.getIntersecting(spanners, working.getBounds()).find((s) => s instanceof Heightfield);
    if (!(painted instanceof Heightfield)) throw new Error("expected the painted heightfield");
    expect(painted.id).toBe(field.id);
    expect(painted.heights[4]).toBeGreaterThan(MID);
  });
});

describe("SetSpannerEdit", () => {
  it("writes the shape without registering it", () => {
    const { registry, data, objects } = setup();
    const cuboid = new Cuboid({ registry, minimum: [0, 0, 0], maximum: [0.5, 0.5, 0.5], color: red });
    new SetSpannerEdit(cuboid).apply(data);

    const spannerColor = registry.getSpannerColorAttribute();
    expect(data.getValue(spannerColor, { x: 0.25, y: 0.25, z: 0.25 })).toEqual(red);
    expect(data.getValue(registry.getSpannerMaskAttribute(), { x: 0.25, y: 0.25, z: 0.25 })).toBe(1);
    expect(data.getValue(spannerColor, { x: -0.25, y: -0.25, z: -0.25 })).toEqual(transparent);
    expect(data.getRoot(registry.getSpannersAttribute())).toBeUndefined();
    expect(objects.size).toBe(0);
  });
});

describe("SetDataEdit", () => {
  it("places a snapshot at the given corner", () => {
    const { registry, data, objects } = setup();
    const color = registry.getColorAttribute();
    const source = new MetavoxelData(registry);
    new GlobalSetEdit(new OwnedAttributeValue(color, red)).apply(source);

    new SetDataEdit({ x: 0, y: 0, z: 0 }, source).apply(data);

    expect(data.getSize()).toBe(2);
    expect(data.getValue(color, { x: 0.5, y: 0.5, z: 0.5 })).toEqual(red);
    expect(data.getValue(color, { x: -0.5, y: -0.5, z: -0.5 })).toEqual(transparent);
    expect(objects.size).toBe(0);
  });

  it("blends with what is already there", () => {
    const { registry, data } = setup(2);
    const color = registry.getColorAttribute();
    new GlobalSetEdit(new OwnedAttributeValue(color, blue)).apply(data);
    const source = new MetavoxelData(registry);
    new GlobalSetEdit(new OwnedAttributeValue(color, red)).apply(source);

    new SetDataEdit({ x: 0, y: 0, z: 0 }, source, true).apply(data);

    expect(data.getValue(color, { x: 0.5, y: 0.5, z: 0.5 })).toEqual({ r: 128, g: 0, b: 128, a: 255 });
    expect(data.getValue(color, { x: -0.5, y: -0.5, z: -0.5 })).toEqual(blue);
  });

  it("leaves spanner sets behind", () => {
    const { registry, data, objects } = setup();
    const spanners = registry.getSpannersAttribute();
    const source = new MetavoxelData(registry);
    new InsertSpannerEdit(spanners, new Sphere({ registry, center: [0, 0, 0], radius: 0.25 })).apply(source, objects);

    new SetDataEdit({ x: 0, y: 0, z: 0 }, source).apply(data);

    expect(data.getRoot(spanners)).toBeUndefined();
  });
});

describe("material edits", () => {
  const material = new Material({ name: "granite" });

  it("quantizes the stored colour", () => {
    expect(effectiveMaterialColor(rgba(10, 20, 30, 102), false)).toEqual(transparent);
    expect(effectiveMaterialColor(rgba(10, 20, 30, 153), false)).toEqual({ r: 10, g: 20, b: 30, a: 153 });
    expect(effectiveMaterialColor(rgba(10, 20, 30, 10), true)).toEqual({ r: 10, g: 20, b: 30, a: 255 });
  });

  it("carves holes when the colour is under half opaque", () => {
    const { registry, data, objects } = setup();
    const spanners = registry.getSpannersAttribute();
    const heightfield = flatHeightfield(registry);
    new InsertSpannerEdit(spanners, heightfield).apply(data, objects);

    const brush = new Sphere({ registry, center: [0.5, 0.5, 0.5], radius: 0.6 });
    new HeightfieldMaterialSpannerEdit(brush, material, rgba(10, 20, 30, 102)).apply(data, objects);

    const [result] = data.getIntersecting(spanners, heightfield.bounds);
    if (!(result instanceof Heightfield)) throw new Error("expected the heightfield back");
    expect(result).not.toBe(heightfield);
    expect(result.id).toBe(heightfield.id);
    expect([...result.heights]).toEqual([MID, 0, MID, 0, 0, 0, MID, 0, MID]);
    expect(objects.value(heightfield.id)).toBe(result);
  });

  it("keeps the colour when over half opaque", () => {
    const { registry, data, objects } = setup();
    const spanners = registry.getSpannersAttribute();
    new InsertSpannerEdit(spanners, flatHeightfield(registry)).apply(data, objects);

    const brush = new Sphere({ registry, center: [0.5, 0.5, 0.5], radius: 0.6 });
    new HeightfieldMaterialSpannerEdit(brush, material, rgba(10, 20, 30, 153)).apply(data, objects);

    const [result] = data.getIntersecting(spanners, data.getBounds());
    if (!(result instanceof Heightfield)) throw new Error("expected the heightfield back");
    expect([...(result.colors ?? []).slice(16, 20)]).toEqual([10, 20, 30, 153]);
    expect([...(result.colors ?? []).slice(0, 4)]).toEqual([255, 255, 255, 255]);
    expect([...(result.materialIndices ?? [])]).toEqual([0, 1, 0, 1, 1, 1, 0, 1, 0]);
    expect(result.materials).toEqual([material]);
    expect([...result.heights]).toEqual(new Array(9).fill(MID));
  });
});

describe("PaintHeightfieldHeightEdit", () => {
  it("raises the heightfield under the brush", () => {
    const { registry, data, objects } = setup();
    const spanners = registry.getSpannersAttribute();
    const heightfield = flatHeightfield(registry);
    new InsertSpannerEdit(spanners, heightfield).apply(data, objects);

    new PaintHeightfieldHeightEdit(new Vector3(0.5, 0.5, 0.5), 0.5, 0.25).apply(data, objects);

    const [result] = data.getIntersecting(spanners, heightfield.bounds);
    if (!(result instanceof Heightfield)) throw new Error("expected the heightfield back");
    expect(result.id).toBe(heightfield.id);
    expect([...result.heights]).toEqual([MID, MID, MID, MID, 49152, MID, MID, MID, MID]);
  });
});
