/**
 * Levy Constants
 */

import type { Address } from "viem";

// ============================================
// FIXED-POINT UNITS
// ============================================

/** 10000 basis points = 100% */
export const BPS_DENOMINATOR = 10_000n;

export const PERCENT_DENOMINATOR = 100n;

export const MAX_UINT256 = 2n ** 256n - 1n;

// ============================================
// WELL-KNOWN ACCOUNTS
// ============================================

export const NULL_ACCOUNT: Address = "0x0000000000000000000000000000000000000000";

/** Tokens moved here are out of circulation for good */
export const BURN_SINK: Address = "0x000000000000000000000000000000000000dEaD";

// ============================================
// TOKEN DEFAULTS
// ============================================

export const TOKEN_DEFAULTS = {
  decimals: 18,

  // Hard ceiling for any single tax rate
  maxTaxBps: 2_500,

  // Seconds added to "now" for every gateway deadline
  deadlineWindowSeconds: 300n,

  // Tolerated slippage on the swap leg of a conversion
  slippageBps: 500,

  // Blocks between two distribution queues
  distributionDelayBlocks: 100n,
} as const;
