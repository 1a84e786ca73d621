/**
 * Common Schema Primitives
 * Shared types used across all schemas
 */

import { getAddress, isAddress } from "viem";
import { z } from "zod";
import { MAX_UINT256 } from "../constants/index.js";

// ============================================
// PRIMITIVE SCHEMAS
// ============================================

/** EVM address, normalised to its checksummed form */
export const addressSchema = z
  .string()
  .refine((value) => isAddress(value, { strict: false }), "Invalid address")
  .transform((value) => getAddress(value));

/**
 * Unsigned 256-bit amount. Accepts bigint, safe integers and decimal strings
 * so values survive JSON and environment variables.
 */
export const uint256Schema = z
  .union([
    z.bigint(),
    z.number().int().nonnegative(),
    z.string().regex(/^\d+$/, "Amount must be a decimal string"),
  ])
  .transform((value) => BigInt(value))
  .refine((value) => value >= 0n && value <= MAX_UINT256, "Amount outside uint256 range");

/** Basis points, 0..10000 */
export const bpsSchema = z.number().int().min(0).max(10_000);

/** Whole percent, 0..100 */
export const percentSchema = z.number().int().min(0).max(100);

// ============================================
// COMMON ENUMS
// ============================================

export const logLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);
export type LogLevel = z.infer<typeof logLevelSchema>;

export const nodeEnvSchema = z.enum(["development", "production", "test"]);
export type NodeEnv = z.infer<typeof nodeEnvSchema>;
