/**
 * @module adapters
 *
 * Transports and execution strategies.
 */

export * from "./http.ts";
export * from "./strategy.ts";
export * from "./mock/mod.ts";
