/**
 * @levy/token-engine
 *
 * Taxed-token ledger: fee policy, burn threshold, deferred conversion,
 * distribution and anti-abuse guards behind one engine.
 */

export * from "./errors.js";
export * from "./environment.js";
export * from "./notifications.js";
export * from "./config.js";
export * from "./ledger/index.js";
export * from "./policy/index.js";
export * from "./guards/index.js";
export * from "./conversion/index.js";
export * from "./distribution/index.js";
export * from "./engine/index.js";
