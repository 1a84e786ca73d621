/**
 * Engine Module Exports
 */

export * from "./ownership.js";
export * from "./transfer-pipeline.js";
export * from "./token-engine.js";
