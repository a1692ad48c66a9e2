export * from "./futures-exchange.interface.js";
export * from "./bitget/bitget.adapter.js";
export * from "./bitget/bitget.constants.js";
export * from "./bitget/bitget.errors.js";
export * from "./bitget/bitget.rest.js";
export * from "./bitget/bitget.types.js";
