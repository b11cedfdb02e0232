import { describe, expect, it } from "vitest";
import { PNG } from "pngjs";
import { createBox, rgba } from "@metavoxel/core";
import { AttributeRegistry, OwnedAttributeValue } from "@metavoxel/attributes";
import { BoxSetEdit, MetavoxelData } from "@metavoxel/metavoxels";
import { renderSlicePng, sampleSlice } from "../src/index.js";

function octantData(): MetavoxelData {
  const registry = new AttributeRegistry();
  const data = new MetavoxelData(registry);
  const region = createBox([0, 0, 0], [0.5, 0.5, 0.5]);
  new BoxSetEdit(region, 0, new OwnedAttributeValue(registry.getColorAttribute(), rgba(255, 0, 0))).apply(data);
  new BoxSetEdit(region, 0, new OwnedAttributeValue(registry.getSpannerMaskAttribute(), 0.5)).apply(data);
  return data;
}

describe("sampleSlice", () => {
  it("samples colours at pixel centres", () => {
    const data = octantData();
    const slice = sampleSlice(data, data.registry.getColorAttribute(), { y: 0.25, resolution: 2 });
    expect(slice.width).toBe(2);
    expect([...slice.pixels]).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 255, 0, 0, 255]);
  });

  it("shows floats as opaque grey levels", () => {
    const data = octantData();
    const slice = sampleSlice(data, data.registry.getSpannerMaskAttribute(), { y: 0.25, resolution: 2 });
    expect([...slice.pixels.slice(0, 4)]).toEqual([0, 0, 0, 255]);
    expect([...slice.pixels.slice(12, 16)]).toEqual([128, 128, 128, 255]);
  });

  it("misses the painted octant below it", () => {
    const data = octantData();
    const slice = sampleSlice(data, data.registry.getColorAttribute(), { y: -0.25, resolution: 2 });
    expect(slice.pixels.every((byte) => byte === 0)).toBe(true);
  });

  it("rejects a zero resolution", () => {
    const data = octantData();
    expect(() => sampleSlice(data, data.registry.getColorAttribute(), { resolution: 0 })).toThrow(
      "Slice resolution must be a positive integer, got 0"
    );
  });
});

describe("renderSlicePng", () => {
  it("encodes the sampled pixels", () => {
    const data = octantData();
    const png = PNG.sync.read(renderSlicePng(data, data.registry.getColorAttribute(), { y: 0.25, resolution: 2 }));
    expect(png.width).toBe(2);
    expect(png.height).toBe(2);
    expect([...png.data.subarray(12, 16)]).toEqual([255, 0, 0, 255]);
  });
});
