#!/usr/bin/env node
import minimist from "minimist";
import { resolve } from "node:path";
import { AttributeRegistry, readRegistryConfigFromYaml } from "@metavoxel/attributes";
import { applyScriptFile } from "./run.js";

function printHelp(): void {
  console.log(`Metavoxel

Usage:
  metavoxel apply <script.yaml> [--registry attributes.yaml] [--slice out/slice.png]
  metavoxel help

Options:
  --registry <file>          YAML attribute declarations
  --slice <file>             Write a PNG slice of the result
  --slice-attribute <name>   Attribute to draw in the slice (default: color)
  --slice-y <n>              Height of the slice plane (default: 0)
  --slice-resolution <n>     Slice width and height in px (default: 64)
`);
}

function readNumberOption(value: unknown, name: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`--${name} must be a number, got ${String(value)}`);
  }
  return parsed;
}

async function run(): Promise<void> {
  const argv = minimist(process.argv.slice(2), {
    string: ["registry", "slice", "slice-attribute"],
    default: {
      "slice-attribute": "color",
      "slice-y": 0,
      "slice-resolution": 64
    }
  });

  const command = argv._[0];
  if (!command || command === "help" || command === "--help" || command === "-h") {
    printHelp();
    return;
  }

  if (command !== "apply") {
    throw new Error(`Unknown command: ${String(command)}`);
  }

  const script = argv._[1];
  if (!script) {
    throw new Error("Missing script argument.");
  }

  const registry = new AttributeRegistry(argv.registry ? readRegistryConfigFromYaml(resolve(argv.registry)) : {});
  const summary = applyScriptFile({
    scriptPath: resolve(String(script)),
    registry,
    slicePath: argv.slice ? resolve(argv.slice) : undefined,
    sliceAttribute: argv["slice-attribute"],
    sliceY: readNumberOption(argv["slice-y"], "slice-y"),
    sliceResolution: readNumberOption(argv["slice-resolution"], "slice-resolution")
  });

  console.log(JSON.stringify(summary, null, 2));
}

run().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[metavoxel] ${message}`);
  if (error instanceof Error && typeof error.stack === "string" && error.stack.trim()) {
    console.error(error.stack);
  }
  process.exit(1);
});
