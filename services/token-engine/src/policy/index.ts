/**
 * Policy Module Exports
 *
 * Fee classification, tax split, pair registry and the burn threshold
 * state machine.
 */

export * from "./types.js";
export * from "./fee-policy.js";
export * from "./pair-registry.js";
export * from "./burn-monitor.js";
