/**
 * Ledger Module Exports
 */

export * from "./accounts.js";
export * from "./math.js";
export * from "./ledger.js";
