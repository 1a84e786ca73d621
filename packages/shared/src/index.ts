/**
 * @levy/shared
 * Shared logger, constants and schema primitives for Levy
 */

// Export schemas
export * from "./schemas/index.js";

// Export constants
export * from "./constants/index.js";

// Export logger
export {
  logger,
  createServiceLogger,
  tokenEngineLogger,
  logLedgerEvent,
  audit,
  logError,
  logFatal,
  type AuditLogEntry,
} from "./logger/index.js";
