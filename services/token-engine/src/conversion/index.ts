/**
 * Conversion Module Exports
 */

export * from "./types.js";
export * from "./swap-lock.js";
export * from "./conversion-scheduler.js";
export * from "./in-memory-external-asset.js";
export * from "./mock-exchange-gateway.js";
