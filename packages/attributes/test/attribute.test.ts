import { describe, expect, it } from "vitest";
import fc from "fast-check";
import { rgba } from "@metavoxel/core";
import {
  AttributeValue,
  FloatAttribute,
  OwnedAttributeValue,
  RgbaAttribute,
  SharedObject,
  SharedObjectSetAttribute,
  WeakSharedObjectHash,
  withMember,
  withoutMember
} from "../src/index.js";

class Token extends SharedObject {
  public constructor(id?: number) {
    super(id);
  }
}

const red = rgba(255, 0, 0);
const blue = rgba(0, 0, 255);

describe("RgbaAttribute", () => {
  const color = new RgbaAttribute("color");

  it("collapses eight equal children to the first", () => {
    const result = color.merge(Array.from({ length: 8 }, () => rgba(255, 0, 0)));
    expect(result.collapse).toBe(true);
    expect(result.value).toEqual(red);
  });

  it("averages mixed children by alpha", () => {
    const result = color.merge([red, red, red, red, blue, blue, blue, blue]);
    expect(result.collapse).toBe(false);
    expect(result.value).toEqual({ r: 127, g: 0, b: 127, a: 255 });
  });

  it("rejects anything but eight children", () => {
    expect(() => color.merge([red, blue])).toThrow('Attribute "color": merge expects 8 children, got 2');
  });

  it("decodes hex, arrays and objects", () => {
    expect(color.decode("#ff000080")).toEqual({ r: 255, g: 0, b: 0, a: 128 });
    expect(color.decode("#00ff00")).toEqual({ r: 0, g: 255, b: 0, a: 255 });
    expect(color.decode([1, 2, 3])).toEqual({ r: 1, g: 2, b: 3, a: 255 });
    expect(color.decode({ r: 4, g: 5, b: 6, a: 7 })).toEqual({ r: 4, g: 5, b: 6, a: 7 });
    expect(() => color.decode("red")).toThrow('Attribute "color": cannot read colour from "red"');
  });

  it("blends the incoming colour over the stored one", () => {
    expect(color.blend(red, blue)).toEqual({ r: 128, g: 0, b: 128, a: 255 });
  });
});

describe("FloatAttribute", () => {
  const mask = new FloatAttribute("mask");

  it("merges to the mean and blends to the maximum", () => {
    expect(mask.merge([0, 0, 0, 0, 1, 1, 1, 1])).toEqual({ value: 0.5, collapse: false });
    expect(mask.blend(0.25, 0.75)).toBe(0.75);
  });

  it("requires a positive placement granularity", () => {
    expect(() => new FloatAttribute("bad", { placementGranularity: 0 })).toThrow(
      'Attribute "bad": placementGranularity must be positive, got 0'
    );
  });

  it("property: merge lies between the smallest and largest child", () => {
    fc.assert(
      fc.property(fc.array(fc.double({ min: -1000, max: 1000, noNaN: true }), { minLength: 8, maxLength: 8 }), (values) => {
        const { value } = mask.merge(values);
        return value >= Math.min(...values) - 1e-9 && value <= Math.max(...values) + 1e-9;
      })
    );
  });
});

describe("SharedObjectSetAttribute", () => {
  const spanners = new SharedObjectSetAttribute("spanners");

  it("holds the union of its children", () => {
    const a = new Token();
    const b = new Token();
    const empty = spanners.defaultValue;
    const result = spanners.merge([new Set([a]), empty, empty, new Set([b]), empty, empty, empty, empty]);
    expect(result.collapse).toBe(false);
    expect([...result.value]).toEqual([a, b]);
  });

  it("compares sets by membership", () => {
    const a = new Token();
    expect(spanners.equal(new Set([a]), withMember(spanners.defaultValue, a))).toBe(true);
    expect(spanners.equal(withoutMember(new Set([a]), a), spanners.defaultValue)).toBe(true);
  });

  it("only decodes an empty default", () => {
    expect(spanners.decode([])).toBe(spanners.defaultValue);
    expect(() => spanners.decode([1])).toThrow('Attribute "spanners": shared object sets can only default to empty');
  });
});

describe("AttributeValue", () => {
  const color = new RgbaAttribute("color");
  const other = new RgbaAttribute("other");

  it("falls back to the attribute default", () => {
    const value = new AttributeValue(color);
    expect(value.isDefault()).toBe(true);
    expect(value.get(color)).toEqual({ r: 0, g: 0, b: 0, a: 0 });
  });

  it("refuses a different descriptor", () => {
    const value = new AttributeValue(color, red);
    expect(() => value.get(other)).toThrow('Requested attribute "other" from a value of "color"');
  });

  it("owned values carry their own copy", () => {
    const owned = OwnedAttributeValue.from(new AttributeValue(color, red));
    expect(owned.value).not.toBe(red);
    expect(owned.equals(new AttributeValue(color, red))).toBe(true);
  });
});

describe("WeakSharedObjectHash", () => {
  it("looks objects up by id", () => {
    const table = new WeakSharedObjectHash();
    const token = new Token();
    table.register(token);
    expect(table.value(token.id)).toBe(token);
    expect(table.remove(token.id)).toBe(true);
    expect(table.value(token.id)).toBeUndefined();
  });

  it("keeps explicit ids and never reissues them", () => {
    const kept = new Token(5000);
    const next = new Token();
    expect(kept.id).toBe(5000);
    expect(next.id).toBeGreaterThan(5000);
  });
});
