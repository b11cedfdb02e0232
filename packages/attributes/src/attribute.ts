import {
  TRANSPARENT,
  averageColors,
  blendColors,
  isRgba,
  rgba,
  rgbaEquals,
  type ByteWriter,
  type Rgba
} from "@metavoxel/core";
import { SharedObject } from "./shared-object.js";

export type AttributeKind = "rgba" | "float" | "shared-object-set";

export type SharedObjectSet = ReadonlySet<SharedObject>;

export const MERGE_COUNT = 8;
export const DEFAULT_LOD_THRESHOLD_MULTIPLIER = 1;
export const DEFAULT_PLACEMENT_GRANULARITY = 1 / 64;

export interface AttributeOptions {
  lodThresholdMultiplier?: number;
  placementGranularity?: number;
}

export interface MergeResult<T> {
  value: T;
  /** All children held equal values; the parent may become a leaf. */
  collapse: boolean;
}

/**
 * Immutable descriptor of one kind of value stored in the octree, together
 * with the rules for combining, coarsening and encoding those values.
 */
export abstract class Attribute<T = unknown> {
  public abstract readonly kind: AttributeKind;
  public readonly name: string;
  public readonly defaultValue: T;
  public readonly lodThresholdMultiplier: number;
  public readonly placementGranularity: number;

  protected constructor(name: string, defaultValue: T, options: AttributeOptions = {}) {
    const multiplier = options.lodThresholdMultiplier ?? DEFAULT_LOD_THRESHOLD_MULTIPLIER;
    const granularity = options.placementGranularity ?? DEFAULT_PLACEMENT_GRANULARITY;
    if (!name.trim()) {
      throw new Error("Attribute name must not be empty");
    }
    if (!Number.isFinite(multiplier) || multiplier <= 0) {
      throw new Error(`Attribute "${name}": lodThresholdMultiplier must be positive, got ${multiplier}`);
    }
    if (!Number.isFinite(granularity) || granularity <= 0) {
      throw new Error(`Attribute "${name}": placementGranularity must be positive, got ${granularity}`);
    }
    this.name = name;
    this.defaultValue = defaultValue;
    this.lodThresholdMultiplier = multiplier;
    this.placementGranularity = granularity;
  }

  public abstract isValue(value: unknown): value is T;

  /** Parses a configuration or script value. */
  public abstract decode(raw: unknown): T;

  public abstract encode(value: T, writer: ByteWriter): void;

  protected abstract combine(children: readonly T[]): T;

  public equal(a: T, b: T): boolean {
    return a === b;
  }

  public merge(children: readonly T[]): MergeResult<T> {
    const first = children[0];
    if (children.length !== MERGE_COUNT || first === undefined) {
      throw new Error(`Attribute "${this.name}": merge expects ${MERGE_COUNT} children, got ${children.length}`);
    }
    if (children.every((child) => this.equal(child, first))) {
      return { value: first, collapse: true };
    }
    return { value: this.combine(children), collapse: false };
  }

  /** Combines an incoming value with the one already stored. */
  public blend(source: T, _dest: T): T {
    return source;
  }

  /** Value a child takes when its parent has no finer structure. */
  public inherit(parent: T): T {
    return parent;
  }

  public copy(value: T): T {
    return value;
  }

  public coerce(value: unknown): T {
    if (!this.isValue(value)) {
      throw new Error(`Value ${describe(value)} does not belong to attribute "${this.name}"`);
    }
    return value;
  }
}

function describe(value: unknown): string {
  if (value instanceof Set) return `Set(${value.size})`;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

function parseHexColor(raw: string): Rgba | undefined {
  const match = /^#([0-9a-f]{6})([0-9a-f]{2})?$/i.exec(raw.trim());
  if (!match?.[1]) return undefined;
  const rgb = Number.parseInt(match[1], 16);
  const alpha = match[2] ? Number.parseInt(match[2], 16) : 255;
  return rgba((rgb >>> 16) & 0xff, (rgb >>> 8) & 0xff, rgb & 0xff, alpha);
}

export class RgbaAttribute extends Attribute<Rgba> {
  public readonly kind = "rgba";

  public constructor(name: string, options: AttributeOptions & { defaultValue?: Rgba } = {}) {
    super(name, options.defaultValue ?? TRANSPARENT, options);
  }

  public isValue(value: unknown): value is Rgba {
    return isRgba(value);
  }

  public decode(raw: unknown): Rgba {
    if (typeof raw === "string") {
      const parsed = parseHexColor(raw);
      if (parsed) return parsed;
    } else if (Array.isArray(raw) && (raw.length === 3 || raw.length === 4)) {
      const channels: unknown[] = raw;
      if (channels.every((c) => typeof c === "number")) {
        const [r, g, b, a] = channels.map(Number);
        return rgba(r ?? 0, g ?? 0, b ?? 0, a ?? 255);
      }
    } else if (raw && typeof raw === "object" && "r" in raw && "g" in raw && "b" in raw) {
      const a = "a" in raw ? raw.a : 255;
      if ([raw.r, raw.g, raw.b, a].every((c) => typeof c === "number")) {
        return rgba(Number(raw.r), Number(raw.g), Number(raw.b), Number(a));
      }
    }
    throw new Error(`Attribute "${this.name}": cannot read colour from ${describe(raw)}`);
  }

  public encode(value: Rgba, writer: ByteWriter): void {
    writer.writeU8(value.r);
    writer.writeU8(value.g);
    writer.writeU8(value.b);
    writer.writeU8(value.a);
  }

  protected combine(children: readonly Rgba[]): Rgba {
    return averageColors(children);
  }

  public override equal(a: Rgba, b: Rgba): boolean {
    return rgbaEquals(a, b);
  }

  public override blend(source: Rgba, dest: Rgba): Rgba {
    return blendColors(dest, source);
  }

  public override copy(value: Rgba): Rgba {
    return rgba(value.r, value.g, value.b, value.a);
  }
}

export class FloatAttribute extends Attribute<number> {
  public readonly kind = "float";

  public constructor(name: string, options: AttributeOptions & { defaultValue?: number } = {}) {
    super(name, options.defaultValue ?? 0, options);
  }

  public isValue(value: unknown): value is number {
    return typeof value === "number" && Number.isFinite(value);
  }

  public decode(raw: unknown): number {
    if (this.isValue(raw)) return raw;
    throw new Error(`Attribute "${this.name}": expected a finite number, got ${describe(raw)}`);
  }

  public encode(value: number, writer: ByteWriter): void {
    writer.writeF64LE(value);
  }

  protected combine(children: readonly number[]): number {
    return children.reduce((sum, value) => sum + value, 0) / children.length;
  }

  public override blend(source: number, dest: number): number {
    return Math.max(source, dest);
  }
}

/**
 * Sets of shared objects (spanners). A parent holds the union of its
 * children, so absence from a node rules out the whole subtree.
 */
export class SharedObjectSetAttribute extends Attribute<SharedObjectSet> {
  public readonly kind = "shared-object-set";

  public constructor(name: string, options: AttributeOptions = {}) {
    super(name, new Set<SharedObject>(), options);
  }

  public isValue(value: unknown): value is SharedObjectSet {
    if (!(value instanceof Set)) return false;
    for (const member of value) {
      if (!(member instanceof SharedObject)) return false;
    }
    return true;
  }

  public decode(raw: unknown): SharedObjectSet {
    if (raw === undefined || raw === null || (Array.isArray(raw) && raw.length === 0)) {
      return this.defaultValue;
    }
    throw new Error(`Attribute "${this.name}": shared object sets can only default to empty`);
  }

  public encode(value: SharedObjectSet, writer: ByteWriter): void {
    const members = [...value].sort((a, b) => a.id - b.id);
    writer.writeU32LE(members.length);
    for (const member of members) {
      member.encode(writer);
    }
  }

  protected combine(children: readonly SharedObjectSet[]): SharedObjectSet {
    const union = new Set<SharedObject>();
    for (const child of children) {
      for (const member of child) {
        union.add(member);
      }
    }
    return union;
  }

  public override equal(a: SharedObjectSet, b: SharedObjectSet): boolean {
    if (a === b) return true;
    if (a.size !== b.size) return false;
    for (const member of a) {
      if (!b.has(member)) return false;
    }
    return true;
  }

  public override blend(source: SharedObjectSet, dest: SharedObjectSet): SharedObjectSet {
    return this.combine([source, dest]);
  }

  public override copy(value: SharedObjectSet): SharedObjectSet {
    return new Set(value);
  }
}

export function withMember(set: SharedObjectSet, member: SharedObject): SharedObjectSet {
  const next = new Set(set);
  next.add(member);
  return next;
}

export function withoutMember(set: SharedObjectSet, member: SharedObject): SharedObjectSet {
  const next = new Set(set);
  next.delete(member);
  return next;
}

export function withReplacedMember(
  set: SharedObjectSet,
  oldMember: SharedObject,
  newMember: SharedObject
): SharedObjectSet {
  const next = new Set(set);
  next.delete(oldMember);
  next.add(newMember);
  return next;
}
