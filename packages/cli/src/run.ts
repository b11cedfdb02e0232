import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { WeakSharedObjectHash, type AttributeRegistry } from "@metavoxel/attributes";
import { MetavoxelData, applyEdits, hashMetavoxelData } from "@metavoxel/metavoxels";
import { renderSlicePng } from "@metavoxel/renderer";
import { readEditScriptFromYaml, type EditScript } from "./script.js";

export interface DataSummary {
  size: number;
  bounds: { min: [number, number, number]; max: [number, number, number] };
  /** Node count per attribute that has a root. */
  nodes: Record<string, number>;
  spanners: number;
  sha256: string;
}

export function runScript(script: EditScript, registry: AttributeRegistry): MetavoxelData {
  const data = new MetavoxelData(registry, script.size);
  applyEdits(data, new WeakSharedObjectHash(), script.edits);
  return data;
}

export function summarizeData(data: MetavoxelData): DataSummary {
  const bounds = data.getBounds();
  const nodes: Record<string, number> = {};
  for (const attribute of [...data.getAttributes()].sort((a, b) => a.name.localeCompare(b.name))) {
    nodes[attribute.name] = data.countNodes(attribute);
  }
  return {
    size: data.getSize(),
    bounds: { min: [bounds.min.x, bounds.min.y, bounds.min.z], max: [bounds.max.x, bounds.max.y, bounds.max.z] },
    nodes,
    spanners: data.getIntersecting(data.registry.getSpannersAttribute(), bounds).length,
    sha256: hashMetavoxelData(data).sha256
  };
}

export interface ApplyOptions {
  scriptPath: string;
  registry: AttributeRegistry;
  /** Writes a PNG slice of `sliceAttribute` here when set. */
  slicePath?: string;
  sliceAttribute?: string;
  sliceY?: number;
  sliceResolution?: number;
}

export function applyScriptFile(options: ApplyOptions): DataSummary {
  const script = readEditScriptFromYaml(options.scriptPath, options.registry);
  const data = runScript(script, options.registry);
  if (options.slicePath) {
    const attribute = options.registry.requireAttribute(options.sliceAttribute ?? "color");
    const png = renderSlicePng(data, attribute, { y: options.sliceY, resolution: options.sliceResolution });
    mkdirSync(dirname(options.slicePath), { recursive: true });
    writeFileSync(options.slicePath, png);
    console.log(`[metavoxel] wrote ${attribute.name} slice to ${options.slicePath}`);
  }
  return summarizeData(data);
}
