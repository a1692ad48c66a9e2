export * from "./errors.js";
export * from "./serialization.js";
export * from "./sizing.js";
export * from "./types.js";
