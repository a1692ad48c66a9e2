export * from "./position.js";
export * from "./risk-engine.js";
