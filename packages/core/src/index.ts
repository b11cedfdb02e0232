export * from "./types.js";
export * from "./box.js";
export * from "./color.js";
export * from "./hash.js";
