/**
 * Fee Policy Engine
 *
 * Pure classification and tax arithmetic. Nothing here touches state; the
 * transfer pipeline decides what to do with the assessment.
 *
 * Classification (first match wins, pair-to-pair checked first because it is
 * zero regardless of exemption):
 * 1. both endpoints pairs            -> pair-to-pair, 0
 * 2. taxes removed or either exempt  -> none, 0
 * 3. from pair                       -> buy
 * 4. to pair                         -> sell
 * 5. neither                         -> wallet
 */

import { PERCENT_DENOMINATOR } from "@levy/shared";
import type { Address } from "viem";
import { ValidationError } from "../errors.js";
import { applyBps } from "../ledger/math.js";
import type {
  PolicyState,
  TaxAssessment,
  TaxKind,
  TaxRates,
  TaxShares,
  TaxSplit,
} from "./types.js";
import { ZERO_SHARES, ZERO_TAX_RATES } from "./types.js";

export interface ClassifyInput {
  from: Address;
  to: Address;
  amount: bigint;
  policy: PolicyState;
  isPair: (account: Address) => boolean;
  isExempt: (account: Address) => boolean;
}

/**
 * Rates as callers must read them: all zero once taxes are removed
 */
export function effectiveRates(policy: PolicyState): TaxRates {
  return policy.taxesRemoved ? { ...ZERO_TAX_RATES } : { ...policy.rates };
}

export function classifyTransfer(input: ClassifyInput): TaxAssessment {
  const { from, to, amount, policy, isPair, isExempt } = input;
  const fromPair = isPair(from);
  const toPair = isPair(to);

  if (fromPair && toPair) {
    return untaxed("pair-to-pair", amount);
  }

  if (policy.taxesRemoved || isExempt(from) || isExempt(to)) {
    return untaxed("none", amount);
  }

  const rates = effectiveRates(policy);
  let kind: TaxKind;
  let rateBps: number;

  if (fromPair) {
    kind = "buy";
    rateBps = rates.buyBps;
  } else if (toPair) {
    kind = "sell";
    rateBps = rates.sellBps;
  } else {
    kind = "wallet";
    rateBps = rates.walletBps;
  }

  const taxAmount = applyBps(amount, rateBps);

  return {
    kind,
    rateBps,
    taxAmount,
    netAmount: amount - taxAmount,
    shares: splitTax(taxAmount, policy.split),
  };
}

/**
 * burn and treasury are floored; liquidity absorbs the rounding dust.
 */
export function splitTax(taxAmount: bigint, split: TaxSplit): TaxShares {
  if (taxAmount === 0n) return { ...ZERO_SHARES };

  const burn = (taxAmount * BigInt(split.burnPercent)) / PERCENT_DENOMINATOR;
  const treasury = (taxAmount * BigInt(split.treasuryPercent)) / PERCENT_DENOMINATOR;

  return {
    burn,
    treasury,
    liquidity: taxAmount - burn - treasury,
  };
}

// ============================================
// VALIDATION
// ============================================

export function validateTaxRates(rates: TaxRates, maxTaxBps: number): void {
  const entries: Array<[keyof TaxRates, number]> = [
    ["buyBps", rates.buyBps],
    ["sellBps", rates.sellBps],
    ["walletBps", rates.walletBps],
  ];

  for (const [field, value] of entries) {
    if (!Number.isInteger(value) || value < 0) {
      throw new ValidationError("InvalidConfiguration", `${field} must be a non-negative integer`, {
        [field]: value,
      });
    }
    if (value > maxTaxBps) {
      throw new ValidationError("TaxRateTooHigh", `${field} exceeds the ${maxTaxBps} bps ceiling`, {
        [field]: value,
        maxTaxBps,
      });
    }
  }
}

export function validateTaxSplit(split: TaxSplit): void {
  const { burnPercent, treasuryPercent } = split;
  if (
    !Number.isInteger(burnPercent) ||
    !Number.isInteger(treasuryPercent) ||
    burnPercent < 0 ||
    treasuryPercent < 0 ||
    burnPercent + treasuryPercent > 100
  ) {
    throw new ValidationError(
      "InvalidConfiguration",
      "Burn and treasury percents must be non-negative integers summing to at most 100",
      { burnPercent, treasuryPercent }
    );
  }
}

// ============================================
// PRIVATE HELPERS
// ============================================

function untaxed(kind: TaxKind, amount: bigint): TaxAssessment {
  return {
    kind,
    rateBps: 0,
    taxAmount: 0n,
    netAmount: amount,
    shares: { ...ZERO_SHARES },
  };
}
