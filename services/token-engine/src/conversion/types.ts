/**
 * Conversion Types
 *
 * The exchange gateway and the external asset are collaborators the engine
 * does not implement. Every call returns an explicit result; the scheduler
 * decides per call site whether a failure aborts or is reported.
 */

import type { Address } from "viem";

// ============================================
// GATEWAY RESULTS
// ============================================

export type GatewayResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

export function gatewayOk<T>(value: T): GatewayResult<T> {
  return { ok: true, value };
}

export function gatewayFailure<T>(reason: string): GatewayResult<T> {
  return { ok: false, reason };
}

// ============================================
// EXCHANGE GATEWAY
// ============================================

export interface LiquidityReceipt {
  tokenUsed: bigint;
  externalUsed: bigint;
  liquidity: bigint;
}

/**
 * Router/factory of an external exchange. Token legs pull from the calling
 * token's own account through the allowance it grants the router. Deadlines
 * are absolute timestamps enforced by the gateway.
 */
export interface ExchangeGateway {
  readonly routerAddress: Address;

  getQuote(amountIn: bigint, path: readonly Address[]): Promise<GatewayResult<bigint>>;

  /**
   * The returned amount is informational only; fee-on-transfer assets may
   * deliver less.
   */
  swapExactTokensForExternal(
    amountIn: bigint,
    minOut: bigint,
    path: readonly Address[],
    recipient: Address,
    deadline: bigint
  ): Promise<GatewayResult<bigint>>;

  swapExactExternalForTokens(
    externalAmountIn: bigint,
    minOut: bigint,
    path: readonly Address[],
    recipient: Address,
    deadline: bigint
  ): Promise<GatewayResult<bigint>>;

  addLiquidity(
    tokenAmount: bigint,
    externalAmount: bigint,
    minTokenAmount: bigint,
    minExternalAmount: bigint,
    recipient: Address,
    deadline: bigint
  ): Promise<GatewayResult<LiquidityReceipt>>;

  resolvePair(tokenA: Address, tokenB: Address): Promise<GatewayResult<Address | null>>;
}

/**
 * The token's own holding of the external asset
 */
export interface ExternalAssetVault {
  balance(): Promise<bigint>;
  send(to: Address, amount: bigint): Promise<GatewayResult<bigint>>;
}

// ============================================
// SETTINGS AND STATE
// ============================================

export interface ConversionSettings {
  swapEnabled: boolean;
  /** Accumulated tax tokens needed before a sell triggers conversion */
  swapThreshold: bigint;
  /** Upper bound on tokens converted by one cycle */
  maxConversionAmount: bigint;
  slippageBps: number;
  deadlineWindowSeconds: bigint;
  /** Share of treasury proceeds reserved for buyback */
  buybackShareBps: number;
}

export interface ConversionState {
  accumulatedLiquidityTokens: bigint;
  accumulatedTreasuryTokens: bigint;
  /** External asset reserved for buyback */
  accumulatedExternal: bigint;
  /** Proceeds of a reinvest whose add-liquidity leg failed */
  liquidityExternalCarry: bigint;
  /** Tokens the gateway credited to the burn sink during the current buyback */
  buybackDelivered: bigint;
  buybackInFlight: boolean;
}

export type ConversionOperation = "reinvest" | "treasury" | "buyback";

// ============================================
// OUTCOMES
// ============================================

export type ConversionOutcome =
  | {
      status: "converted";
      operation: ConversionOperation;
      tokensIn: bigint;
      externalReceived: bigint;
      liquidityAdded?: bigint;
    }
  | {
      status: "failed";
      operation: ConversionOperation;
      stage: "swap" | "add-liquidity";
      reason: string;
    };

export type BuybackOutcome =
  | { status: "burned"; externalSpent: bigint; tokensBurned: bigint }
  | { status: "failed"; externalAmount: bigint; reason: string };

export interface ConversionCycleReport {
  reinvest?: ConversionOutcome;
  treasury?: ConversionOutcome;
}
