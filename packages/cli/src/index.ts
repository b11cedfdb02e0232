export * from "./script.js";
export * from "./run.js";
