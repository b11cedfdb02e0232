import { describe, expect, it } from "vitest";
import { ByteWriter, TRANSPARENT, averageColors, blendColors, hashBytes, isRgba, rgba } from "../src/index.js";

describe("averageColors", () => {
  it("weights channels by alpha and truncates", () => {
    const red = rgba(255, 0, 0);
    const blue = rgba(0, 0, 255);
    expect(averageColors([red, red, red, red, blue, blue, blue, blue])).toEqual({ r: 127, g: 0, b: 127, a: 255 });
  });

  it("ignores the colour of transparent children", () => {
    const children = [rgba(255, 0, 0), ...Array.from({ length: 7 }, () => rgba(0, 255, 0, 0))];
    expect(averageColors(children)).toEqual({ r: 255, g: 0, b: 0, a: 31 });
  });

  it("yields transparent black when nothing is opaque", () => {
    expect(averageColors([TRANSPARENT, rgba(9, 9, 9, 0)])).toEqual(TRANSPARENT);
  });
});

describe("blendColors", () => {
  it("mixes by relative alpha and keeps the larger alpha", () => {
    expect(blendColors(rgba(0, 0, 255), rgba(255, 0, 0))).toEqual({ r: 128, g: 0, b: 128, a: 255 });
    expect(blendColors(rgba(0, 0, 255, 64), TRANSPARENT)).toEqual({ r: 0, g: 0, b: 255, a: 64 });
  });
});

describe("isRgba", () => {
  it("accepts integer channels only", () => {
    expect(isRgba({ r: 1, g: 2, b: 3, a: 4 })).toBe(true);
    expect(isRgba({ r: 1.5, g: 2, b: 3, a: 4 })).toBe(false);
    expect(isRgba({ r: 1, g: 2, b: 3 })).toBe(false);
    expect(isRgba(null)).toBe(false);
  });
});

describe("ByteWriter", () => {
  it("writes little-endian integers and length-prefixed strings", () => {
    const writer = new ByteWriter();
    writer.writeU32LE(0x01020304);
    writer.writeString("ab");
    expect([...writer.toBytes()]).toEqual([4, 3, 2, 1, 2, 0, 0, 0, 97, 98]);
  });

  it("hashes identical streams identically", () => {
    const a = new ByteWriter();
    const b = new ByteWriter();
    a.writeF64LE(0.25);
    b.writeF64LE(0.25);
    expect(hashBytes(a.toBytes()).sha256).toBe(hashBytes(b.toBytes()).sha256);
  });
});
