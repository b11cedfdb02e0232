import { describe, expect, it } from "vitest";
import { createBox, rgba } from "@metavoxel/core";
import { AttributeRegistry, OwnedAttributeValue, WeakSharedObjectHash } from "@metavoxel/attributes";
import {
  BoxSetEdit,
  GlobalSetEdit,
  InsertSpannerEdit,
  MetavoxelData,
  Sphere,
  encodeMetavoxelData,
  hashMetavoxelData
} from "../src/index.js";

describe("encodeMetavoxelData", () => {
  it("writes the header for empty data", () => {
    const bytes = encodeMetavoxelData(new MetavoxelData(new AttributeRegistry()));
    expect(bytes.length).toBe(16);
    expect([...bytes.slice(0, 4)]).toEqual([77, 86, 48, 49]);
    expect([...bytes.slice(12, 16)]).toEqual([0, 0, 0, 0]);
  });

  it("treats a default root like an absent one", () => {
    const registry = new AttributeRegistry();
    const data = new MetavoxelData(registry);
    const empty = hashMetavoxelData(data).sha256;
    const color = registry.getColorAttribute();
    new GlobalSetEdit(new OwnedAttributeValue(color, color.defaultValue)).apply(data);
    expect(data.getRoot(color)).toBeDefined();
    expect(hashMetavoxelData(data).sha256).toBe(empty);
  });

  it("does not depend on the order edits touched the attributes", () => {
    const registry = new AttributeRegistry();
    const color = registry.getColorAttribute();
    const mask = registry.getSpannerMaskAttribute();
    const region = createBox([0, 0, 0], [0.5, 0.5, 0.5]);

    const a = new MetavoxelData(registry);
    new BoxSetEdit(region, 0, new OwnedAttributeValue(color, rgba(1, 2, 3))).apply(a);
    new BoxSetEdit(region, 0, new OwnedAttributeValue(mask, 0.5)).apply(a);

    const b = new MetavoxelData(registry);
    new BoxSetEdit(region, 0, new OwnedAttributeValue(mask, 0.5)).apply(b);
    new BoxSetEdit(region, 0, new OwnedAttributeValue(color, rgba(1, 2, 3))).apply(b);

    expect(hashMetavoxelData(a).sha256).toBe(hashMetavoxelData(b).sha256);
    expect(hashMetavoxelData(a).sha256).toMatch(/^[0-9a-f]{64}$/);
  });

  it("changes when a spanner is inserted", () => {
    const registry = new AttributeRegistry();
    const data = new MetavoxelData(registry);
    const before = hashMetavoxelData(data).sha256;
    new InsertSpannerEdit(
      registry.getSpannersAttribute(),
      new Sphere({ registry, center: [0, 0, 0], radius: 0.25 })
    ).apply(data, new WeakSharedObjectHash());
    expect(hashMetavoxelData(data).sha256).not.toBe(before);
  });
});
