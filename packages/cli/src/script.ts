import { readFileSync } from "node:fs";
import YAML from "js-yaml";
import { Vector3 } from "three";
import { TRANSPARENT, createBox, type Rgba, type Vec3Tuple } from "@metavoxel/core";
import {
  OwnedAttributeValue,
  WeakSharedObjectHash,
  type AttributeRegistry
} from "@metavoxel/attributes";
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
  PaintHeightfieldHeightEdit,
  RemoveSpannerEdit,
  SetDataEdit,
  SetSpannerEdit,
  Sphere,
  applyEdits,
  type AnyMetavoxelEdit,
  type Spanner
} from "@metavoxel/metavoxels";

export const EDIT_TYPES = [
  "box-set",
  "global-set",
  "insert-spanner",
  "remove-spanner",
  "clear-spanners",
  "set-spanner",
  "set-data",
  "paint-height",
  "material"
] as const;

export type EditType = (typeof EDIT_TYPES)[number];

export interface EditScript {
  size: number;
  edits: AnyMetavoxelEdit[];
  /** Spanners declared in the script, by key. */
  spanners: Map<string, Spanner>;
}

type Fields = Record<string, unknown>;

function isRecord(value: unknown): value is Fields {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function isEditType(value: unknown): value is EditType {
  return EDIT_TYPES.some((type) => type === value);
}

function requireRecord(value: unknown, where: string): Fields {
  if (!isRecord(value)) {
    throw new Error(`${where} must be a mapping`);
  }
  return value;
}

function readNumber(obj: Fields, key: string, where: string, fallback?: number): number {
  const value = obj[key];
  if (value === undefined && fallback !== undefined) return fallback;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`${where}.${key} must be a number`);
  }
  return value;
}

function readString(obj: Fields, key: string, where: string): string {
  const value = obj[key];
  if (typeof value !== "string" || !value.trim()) {
    throw new Error(`${where}.${key} must be a non-empty string`);
  }
  return value.trim();
}

function readBoolean(obj: Fields, key: string, where: string): boolean {
  const value = obj[key];
  if (value === undefined) return false;
  if (typeof value !== "boolean") {
    throw new Error(`${where}.${key} must be true or false`);
  }
  return value;
}

function readVec3(obj: Fields, key: string, where: string): Vec3Tuple {
  const value = obj[key];
  if (!Array.isArray(value) || value.length !== 3) {
    throw new Error(`${where}.${key} must be a list of three numbers`);
  }
  const [x, y, z]: unknown[] = value;
  if (typeof x !== "number" || typeof y !== "number" || typeof z !== "number") {
    throw new Error(`${where}.${key} must be a list of three numbers`);
  }
  return [x, y, z];
}

function readIntegers(obj: Fields, key: string, where: string): number[] {
  const value = obj[key];
  if (!Array.isArray(value)) {
    throw new Error(`${where}.${key} must be a list of integers`);
  }
  const list: unknown[] = value;
  return list.map((entry, index) => {
    if (typeof entry !== "number" || !Number.isInteger(entry)) {
      throw new Error(`${where}.${key}[${index}] must be an integer`);
    }
    return entry;
  });
}

class ScriptDecoder {
  private readonly spanners = new Map<string, Spanner>();

  public constructor(private readonly registry: AttributeRegistry) {}

  public decode(raw: unknown, where = "script"): EditScript {
    const obj = requireRecord(raw, where);
    const size = readNumber(obj, "size", where, 1);
    const list = obj.edits ?? [];
    if (!Array.isArray(list)) {
      throw new Error(`${where}.edits must be a list`);
    }
    const entries: unknown[] = list;
    const edits = entries.map((entry, index) => this.decodeEdit(entry, `${where}.edits[${index}]`));
    return { size, edits, spanners: this.spanners };
  }

  private color(raw: unknown, where: string): Rgba {
    if (raw === undefined) return TRANSPARENT;
    try {
      return this.registry.getColorAttribute().decode(raw);
    } catch {
      throw new Error(`${where} must be a colour such as "#ff8800"`);
    }
  }

  private value(obj: Fields, where: string): OwnedAttributeValue {
    const attribute = this.registry.requireAttribute(readString(obj, "attribute", where));
    return new OwnedAttributeValue(attribute, attribute.decode(obj.value));
  }

  private material(raw: unknown, where: string): Material {
    const obj = requireRecord(raw, where);
    return new Material({
      name: readString(obj, "name", where),
      diffuse: typeof obj.diffuse === "string" ? obj.diffuse : undefined,
      scaleS: readNumber(obj, "scaleS", where, 1),
      scaleT: readNumber(obj, "scaleT", where, 1)
    });
  }

  private spanner(raw: unknown, where: string): Spanner {
    const obj = requireRecord(raw, where);
    const common = {
      registry: this.registry,
      placementGranularity: readNumber(obj, "granularity", where, 0)
    };
    const shape = readString(obj, "shape", where);
    switch (shape) {
      case "sphere":
        return new Sphere({
          ...common,
          center: readVec3(obj, "center", where),
          radius: readNumber(obj, "radius", where),
          color: obj.color === undefined ? undefined : this.color(obj.color, `${where}.color`)
        });
      case "cuboid":
        return new Cuboid({
          ...common,
          minimum: readVec3(obj, "minimum", where),
          maximum: readVec3(obj, "maximum", where),
          color: obj.color === undefined ? undefined : this.color(obj.color, `${where}.color`)
        });
      case "heightfield":
        return new Heightfield({
          ...common,
          translation: readVec3(obj, "translation", where),
          scale: readNumber(obj, "scale", where),
          aspectY: readNumber(obj, "aspectY", where, 1),
          aspectZ: readNumber(obj, "aspectZ", where, 1),
          width: readNumber(obj, "width", where),
          heights: Uint16Array.from(readIntegers(obj, "heights", where))
        });
      default:
        throw new Error(`${where}.shape must be sphere, cuboid or heightfield, got ${shape}`);
    }
  }

  /** Builds a spanner and records it under its key, if it has one. */
  private keyedSpanner(obj: Fields, where: string): Spanner {
    const spanner = this.spanner(obj.spanner, `${where}.spanner`);
    if (obj.key !== undefined) {
      const key = readString(obj, "key", where);
      if (this.spanners.has(key)) {
        throw new Error(`${where}.key "${key}" is already in use`);
      }
      this.spanners.set(key, spanner);
    }
    return spanner;
  }

  private spannerId(obj: Fields, where: string): number {
    if (obj.key !== undefined) {
      const key = readString(obj, "key", where);
      const spanner = this.spanners.get(key);
      if (!spanner) {
        throw new Error(`${where}.key "${key}" does not name an earlier spanner`);
      }
      return spanner.id;
    }
    return readNumber(obj, "id", where);
  }

  private decodeEdit(raw: unknown, where: string): AnyMetavoxelEdit {
    const obj = requireRecord(raw, where);
    const type = obj.type;
    if (!isEditType(type)) {
      throw new Error(`${where}.type must be one of ${EDIT_TYPES.join(", ")}`);
    }
    const spannersAttribute = this.registry.getSpannersAttribute();
    switch (type) {
      case "box-set":
        return new BoxSetEdit(
          createBox(readVec3(obj, "minimum", where), readVec3(obj, "maximum", where)),
          readNumber(obj, "granularity", where, 0),
          this.value(obj, where)
        );
      case "global-set":
        return new GlobalSetEdit(this.value(obj, where));
      case "insert-spanner":
        return new InsertSpannerEdit(spannersAttribute, this.keyedSpanner(obj, where));
      case "remove-spanner":
        return new RemoveSpannerEdit(spannersAttribute, this.spannerId(obj, where));
      case "clear-spanners":
        return new ClearSpannersEdit(spannersAttribute);
      case "set-spanner":
        return new SetSpannerEdit(this.keyedSpanner(obj, where));
      case "set-data": {
        // nested scripts keep their own spanner keys
        const nested = new ScriptDecoder(this.registry).decode(requireRecord(obj.data, `${where}.data`), `${where}.data`);
        const data = new MetavoxelData(this.registry, nested.size);
        applyEdits(data, new WeakSharedObjectHash(), nested.edits);
        return new SetDataEdit(new Vector3(...readVec3(obj, "minimum", where)), data, readBoolean(obj, "blend", where));
      }
      case "paint-height":
        return new PaintHeightfieldHeightEdit(
          new Vector3(...readVec3(obj, "position", where)),
          readNumber(obj, "radius", where),
          readNumber(obj, "height", where)
        );
      case "material":
        return new HeightfieldMaterialSpannerEdit(
          this.spanner(obj.spanner, `${where}.spanner`),
          this.material(obj.material, `${where}.material`),
          this.color(obj.color, `${where}.color`),
          readBoolean(obj, "paint", where)
        );
    }
  }
}

export function decodeEditScript(raw: unknown, registry: AttributeRegistry): EditScript {
  return new ScriptDecoder(registry).decode(raw);
}

export function readEditScriptFromYaml(path: string, registry: AttributeRegistry): EditScript {
  const raw = readFileSync(path, "utf8");
  return decodeEditScript(YAML.load(raw), registry);
}
