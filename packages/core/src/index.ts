export * from "./artifacts.js";
export * from "./compiler.js";
export * from "./errors.js";
export * from "./options.js";
export * from "./pipeline.js";
export * from "./types.js";
