/**
 * Levy Zod Schemas
 */

import { z } from "zod";
import { logLevelSchema, nodeEnvSchema } from "./common.js";

// Common primitives
export * from "./common.js";

// ============================================
// ENVIRONMENT SCHEMAS
// ============================================

export const baseEnvSchema = z.object({
  LOG_LEVEL: logLevelSchema.default("info"),
  LOG_FORMAT: z.enum(["json", "pretty"]).default("json"),
  NODE_ENV: nodeEnvSchema.default("production"),
});

export type BaseEnvConfig = z.infer<typeof baseEnvSchema>;
