export * from "./types.js";
export * from "./frame.js";
export * from "./colors.js";
