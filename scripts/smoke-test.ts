import { resolve } from "node:path";
import { AttributeRegistry, readRegistryConfigFromYaml } from "../packages/attributes/src/index.js";
import { applyScriptFile } from "../packages/cli/src/index.js";

async function main(): Promise<void> {
  const registry = new AttributeRegistry(readRegistryConfigFromYaml(resolve("fixtures/attributes.yaml")));
  const summary = applyScriptFile({
    scriptPath: resolve("fixtures/edits.yaml"),
    registry,
    slicePath: resolve("data/slices/color.png"),
    sliceY: -0.5,
    sliceResolution: 128
  });
  console.log("[smoke] summary:");
  console.log(JSON.stringify(summary, null, 2));
}

main().catch((error: unknown) => {
  console.error(`[smoke] failed: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
