/**
 * Distribution Module Exports
 */

export * from "./types.js";
export * from "./distribution-ledger.js";
