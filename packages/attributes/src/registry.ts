import { readFileSync } from "node:fs";
import YAML from "js-yaml";
import {
  Attribute,
  FloatAttribute,
  RgbaAttribute,
  SharedObjectSetAttribute,
  type AttributeKind,
  type AttributeOptions
} from "./attribute.js";

export const SPANNERS_ATTRIBUTE = "spanners";
export const COLOR_ATTRIBUTE = "color";
export const SPANNER_COLOR_ATTRIBUTE = "spannerColor";
export const SPANNER_MASK_ATTRIBUTE = "spannerMask";

export const DEFAULT_SPANNERS_LOD_THRESHOLD_MULTIPLIER = 8;

const ATTRIBUTE_KINDS: readonly AttributeKind[] = ["rgba", "float", "shared-object-set"];

export interface AttributeConfig extends AttributeOptions {
  name: string;
  type: AttributeKind;
  default?: unknown;
}

export interface AttributeRegistryConfig {
  defaults?: AttributeOptions;
  spanners?: AttributeOptions;
  attributes?: AttributeConfig[];
}

const BUILT_INS: readonly AttributeConfig[] = [
  { name: SPANNERS_ATTRIBUTE, type: "shared-object-set" },
  { name: COLOR_ATTRIBUTE, type: "rgba" },
  { name: SPANNER_COLOR_ATTRIBUTE, type: "rgba" },
  { name: SPANNER_MASK_ATTRIBUTE, type: "float" }
];

function createAttribute(config: AttributeConfig): Attribute {
  const options: AttributeOptions = {
    lodThresholdMultiplier: config.lodThresholdMultiplier,
    placementGranularity: config.placementGranularity
  };
  switch (config.type) {
    case "rgba": {
      const attribute = new RgbaAttribute(config.name, options);
      return config.default === undefined
        ? attribute
        : new RgbaAttribute(config.name, { ...options, defaultValue: attribute.decode(config.default) });
    }
    case "float": {
      const attribute = new FloatAttribute(config.name, options);
      return config.default === undefined
        ? attribute
        : new FloatAttribute(config.name, { ...options, defaultValue: attribute.decode(config.default) });
    }
    case "shared-object-set": {
      const attribute = new SharedObjectSetAttribute(config.name, options);
      attribute.decode(config.default);
      return attribute;
    }
  }
}

/**
 * Process-wide attribute table. Built once from configuration and read-only
 * afterwards; components receive it explicitly and compare attributes by
 * identity.
 */
export class AttributeRegistry {
  private readonly attributes = new Map<string, Attribute>();
  private readonly spanners: SharedObjectSetAttribute;
  private readonly color: RgbaAttribute;
  private readonly spannerColor: RgbaAttribute;
  private readonly spannerMask: FloatAttribute;

  public constructor(config: AttributeRegistryConfig = {}) {
    const defaults = config.defaults ?? {};
    const entries = new Map<string, AttributeConfig>();
    for (const builtIn of BUILT_INS) {
      const spannerOptions = builtIn.name === SPANNERS_ATTRIBUTE
        ? { lodThresholdMultiplier: DEFAULT_SPANNERS_LOD_THRESHOLD_MULTIPLIER, ...config.spanners }
        : {};
      entries.set(builtIn.name, { ...defaults, ...builtIn, ...spannerOptions });
    }
    for (const entry of config.attributes ?? []) {
      const builtIn = entries.get(entry.name);
      if (builtIn && BUILT_INS.some((b) => b.name === entry.name) && builtIn.type !== entry.type) {
        throw new Error(`Attribute "${entry.name}" is built in with type ${builtIn.type}, not ${entry.type}`);
      }
      entries.set(entry.name, { ...defaults, ...builtIn, ...entry });
    }
    for (const entry of entries.values()) {
      this.attributes.set(entry.name, createAttribute(entry));
    }

    this.spanners = this.requireKind(SPANNERS_ATTRIBUTE, SharedObjectSetAttribute);
    this.color = this.requireKind(COLOR_ATTRIBUTE, RgbaAttribute);
    this.spannerColor = this.requireKind(SPANNER_COLOR_ATTRIBUTE, RgbaAttribute);
    this.spannerMask = this.requireKind(SPANNER_MASK_ATTRIBUTE, FloatAttribute);
  }

  private requireKind<A extends Attribute>(name: string, kind: new (...args: never[]) => A): A {
    const attribute = this.attributes.get(name);
    if (!(attribute instanceof kind)) {
      throw new Error(`Attribute "${name}" is missing or has the wrong type`);
    }
    return attribute;
  }

  public getAttribute(name: string): Attribute | undefined {
    return this.attributes.get(name);
  }

  public requireAttribute(name: string): Attribute {
    const attribute = this.attributes.get(name);
    if (!attribute) {
      throw new Error(`Unknown attribute: ${name}`);
    }
    return attribute;
  }

  public getAttributes(): Attribute[] {
    return [...this.attributes.values()];
  }

  public getSpannersAttribute(): SharedObjectSetAttribute {
    return this.spanners;
  }

  public getColorAttribute(): RgbaAttribute {
    return this.color;
  }

  public getSpannerColorAttribute(): RgbaAttribute {
    return this.spannerColor;
  }

  public getSpannerMaskAttribute(): FloatAttribute {
    return this.spannerMask;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function readNumber(obj: Record<string, unknown>, key: string, where: string): number | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`${where}.${key} must be a number`);
  }
  return value;
}

function readOptions(raw: unknown, where: string): AttributeOptions {
  if (raw === undefined) return {};
  if (!isRecord(raw)) {
    throw new Error(`${where} must be a mapping`);
  }
  const out: AttributeOptions = {};
  const multiplier = readNumber(raw, "lodThresholdMultiplier", where);
  const granularity = readNumber(raw, "placementGranularity", where);
  if (multiplier !== undefined) out.lodThresholdMultiplier = multiplier;
  if (granularity !== undefined) out.placementGranularity = granularity;
  return out;
}

function isAttributeKind(value: unknown): value is AttributeKind {
  return ATTRIBUTE_KINDS.some((kind) => kind === value);
}

export function parseRegistryConfig(raw: unknown): AttributeRegistryConfig {
  if (raw === undefined || raw === null) {
    return {};
  }
  if (!isRecord(raw)) {
    throw new Error("Attribute configuration must be a mapping");
  }
  const out: AttributeRegistryConfig = {
    defaults: readOptions(raw.defaults, "defaults"),
    spanners: readOptions(raw.spanners, "spanners")
  };
  if (raw.attributes !== undefined) {
    if (!Array.isArray(raw.attributes)) {
      throw new Error("attributes must be a list");
    }
    const list: unknown[] = raw.attributes;
    out.attributes = list.map((entry, index) => {
      const where = `attributes[${index}]`;
      if (!isRecord(entry)) {
        throw new Error(`${where} must be a mapping`);
      }
      if (typeof entry.name !== "string" || !entry.name.trim()) {
        throw new Error(`${where}.name must be a non-empty string`);
      }
      if (!isAttributeKind(entry.type)) {
        throw new Error(`${where}.type must be one of ${ATTRIBUTE_KINDS.join(", ")}`);
      }
      return { ...readOptions(entry, where), name: entry.name.trim(), type: entry.type, default: entry.default };
    });
  }
  return out;
}

export function readRegistryConfigFromYaml(path: string): AttributeRegistryConfig {
  const raw = readFileSync(path, "utf8");
  return parseRegistryConfig(YAML.load(raw));
}
