/**
 * Fee Policy Types
 *
 * Rates are basis points (10000 = 100%). The tax split is whole percents of
 * the collected tax; liquidity takes whatever burn and treasury leave.
 */

// ============================================
// RATES AND SPLIT
// ============================================

export interface TaxRates {
  buyBps: number;
  sellBps: number;
  /** Independent of sellBps; set it equal to reproduce sell-rate wallet taxing */
  walletBps: number;
}

export interface TaxSplit {
  burnPercent: number;
  treasuryPercent: number;
}

export interface TaxShares {
  burn: bigint;
  treasury: bigint;
  liquidity: bigint;
}

export const ZERO_TAX_RATES: TaxRates = { buyBps: 0, sellBps: 0, walletBps: 0 };

export const ZERO_SHARES: TaxShares = { burn: 0n, treasury: 0n, liquidity: 0n };

// ============================================
// CLASSIFICATION
// ============================================

/**
 * none: exempt party or taxes removed
 * pair-to-pair: always untaxed, routed through anti-abuse limits instead
 */
export type TaxKind = "none" | "buy" | "sell" | "wallet" | "pair-to-pair";

export interface TaxAssessment {
  kind: TaxKind;
  rateBps: number;
  taxAmount: bigint;
  netAmount: bigint;
  shares: TaxShares;
}

// ============================================
// POLICY STATE
// ============================================

export interface PolicyState {
  rates: TaxRates;
  split: TaxSplit;
  /** Monotonic false -> true */
  taxesRemoved: boolean;
  /** Monotonic non-decreasing */
  burnedTotal: bigint;
  readonly burnThreshold: bigint;
  readonly maxTaxBps: number;
}

export type PolicyPhase = "taxed" | "untaxed";

export type BurnSource = "initial" | "tax" | "admin" | "holder" | "buyback";
