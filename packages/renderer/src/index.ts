export * from "./slice.js";
