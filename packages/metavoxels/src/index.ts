export * from "./visitor.js";
export * from "./node.js";
export * from "./material.js";
export * from "./spanner.js";
export * from "./primitives.js";
export * from "./heightfield.js";
export * from "./spanner-visitors.js";
export * from "./data.js";
export * from "./edits.js";
export * from "./canonical.js";
