export * from "./types.js";
export * from "./errors.js";
export * from "./colors.js";
export * from "./secrets.js";
export * from "./encoder.js";
export * from "./parser.js";
