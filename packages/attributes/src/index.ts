export * from "./shared-object.js";
export * from "./attribute.js";
export * from "./attribute-value.js";
export * from "./registry.js";
