/**
 * Deferred Conversion Scheduler
 *
 * Turns tax tokens held by the token's own account into external asset:
 * - reinvest: swap half, pair the proceeds with the other half as liquidity
 * - treasury: swap all, reserve a share of the proceeds for buyback
 * - buyback: spend the reserve on tokens delivered straight to the burn sink
 *
 * Every gateway path runs inside the swap lock. Counters are committed before
 * the external call and restored when the call fails, so a failure leaves the
 * accumulated amounts exactly as they were. Received amounts are always
 * measured, never taken from the gateway's return value.
 */

import { BURN_SINK, BPS_DENOMINATOR, logError, tokenEngineLogger } from "@levy/shared";
import type { Address } from "viem";
import {
  InvariantViolationError,
  isTokenEngineError,
  ResourceError,
  StatePreconditionError,
  ValidationError,
} from "../errors.js";
import type { ExecutionEnvironment } from "../environment.js";
import type { Ledger } from "../ledger/ledger.js";
import { applyBps, assertAmount, minBigInt } from "../ledger/math.js";
import type { NotificationLog } from "../notifications.js";
import type { BurnThresholdMonitor } from "../policy/burn-monitor.js";
import type { PairRegistry } from "../policy/pair-registry.js";
import { SwapLock } from "./swap-lock.js";
import type {
  BuybackOutcome,
  ConversionCycleReport,
  ConversionOutcome,
  ConversionSettings,
  ConversionState,
  ExchangeGateway,
  ExternalAssetVault,
  GatewayResult,
  LiquidityReceipt,
} from "./types.js";
import { gatewayFailure } from "./types.js";

const conversionLogger = tokenEngineLogger.child({ component: "conversion-scheduler" });

export interface ConversionSchedulerDeps {
  self: Address;
  externalAsset: Address;
  liquidityRecipient: Address;
  ledger: Ledger;
  gateway: ExchangeGateway;
  vault: ExternalAssetVault;
  environment: ExecutionEnvironment;
  pairs: PairRegistry;
  burnMonitor: BurnThresholdMonitor;
  notifications: NotificationLog;
}

// ============================================
// CONVERSION SCHEDULER
// ============================================

export class ConversionScheduler {
  readonly lock = new SwapLock();
  readonly state: ConversionState = {
    accumulatedLiquidityTokens: 0n,
    accumulatedTreasuryTokens: 0n,
    accumulatedExternal: 0n,
    liquidityExternalCarry: 0n,
    buybackDelivered: 0n,
    buybackInFlight: false,
  };

  private settings: ConversionSettings;

  constructor(
    private readonly deps: ConversionSchedulerDeps,
    settings: ConversionSettings
  ) {
    validateSettings(settings);
    this.settings = { ...settings };

    conversionLogger.info({
      swapThreshold: settings.swapThreshold.toString(),
      maxConversionAmount: settings.maxConversionAmount.toString(),
      slippageBps: settings.slippageBps,
    }, "ConversionScheduler initialized");
  }

  getSettings(): ConversionSettings {
    return { ...this.settings };
  }

  updateSettings(update: Partial<ConversionSettings>): ConversionSettings {
    const next = { ...this.settings, ...update };
    validateSettings(next);

    const before = this.settings;
    this.settings = next;
    this.deps.notifications.publish("ConversionSettingsUpdated", { before, after: { ...next } });

    return { ...next };
  }

  // ============================================
  // ACCUMULATION
  // ============================================

  recordTaxAccumulation(treasury: bigint, liquidity: bigint): void {
    this.state.accumulatedTreasuryTokens += treasury;
    this.state.accumulatedLiquidityTokens += liquidity;
  }

  /**
   * Called by the transfer pipeline for every committed credit. Counts tokens
   * a pair delivers to the burn sink while a buyback is in flight, so tokens
   * anyone else sends to the sink are never mistaken for buyback output.
   */
  observeCredit(from: Address, to: Address, amount: bigint): void {
    if (!this.state.buybackInFlight) return;
    if (to !== BURN_SINK || !this.deps.pairs.isPair(from)) return;
    this.state.buybackDelivered += amount;
  }

  /**
   * External asset the distribution ledger may hand out
   */
  async distributableExternal(): Promise<bigint> {
    const balance = await this.deps.vault.balance();
    const reserved = this.state.accumulatedExternal + this.state.liquidityExternalCarry;
    return balance > reserved ? balance - reserved : 0n;
  }

  shouldTrigger(): boolean {
    if (this.lock.isLocked || !this.settings.swapEnabled) return false;
    if (this.settings.swapThreshold === 0n) return false;

    const accumulated =
      this.state.accumulatedLiquidityTokens + this.state.accumulatedTreasuryTokens;
    return accumulated >= this.settings.swapThreshold;
  }

  // ============================================
  // ENTRY POINTS
  // ============================================

  convertAndReinvest(tokenAmount: bigint): Promise<ConversionOutcome> {
    return this.lock.run(() => this.reinvest(tokenAmount));
  }

  convertTreasury(tokenAmount: bigint): Promise<ConversionOutcome> {
    return this.lock.run(() => this.convertToTreasury(tokenAmount));
  }

  /**
   * Reinvest the liquidity share then convert the treasury share, together
   * capped at maxConversionAmount, under a single lock.
   */
  runConversionCycle(): Promise<ConversionCycleReport> {
    return this.lock.run(async () => {
      const { liquidity, treasury } = this.planCycle();
      if (liquidity + treasury === 0n) {
        throw new StatePreconditionError("NothingToConvert", "No accumulated tokens to convert");
      }

      const report: ConversionCycleReport = {};
      if (liquidity > 0n) {
        report.reinvest = await this.reinvest(liquidity);
      }
      if (treasury > 0n) {
        report.treasury = await this.convertToTreasury(treasury);
      }
      return report;
    });
  }

  /**
   * Automatic trigger after a committed sell. Never throws into the transfer
   * except for invariant violations.
   */
  async runIfTriggered(): Promise<ConversionCycleReport | undefined> {
    if (!this.shouldTrigger()) return undefined;

    try {
      return await this.runConversionCycle();
    } catch (error) {
      if (error instanceof InvariantViolationError) {
        logError(error, { component: "conversion-scheduler" }, "Triggered conversion hit an invariant violation");
        throw error;
      }

      conversionLogger.warn({
        code: isTokenEngineError(error) ? error.code : undefined,
        err: error instanceof Error ? error.message : String(error),
      }, "Triggered conversion did not run");
      return undefined;
    }
  }

  buybackAndBurn(externalAmount?: bigint): Promise<BuybackOutcome> {
    return this.lock.run(() => this.buyback(externalAmount));
  }

  // ============================================
  // OPERATIONS (caller holds the lock)
  // ============================================

  private async reinvest(tokenAmount: bigint): Promise<ConversionOutcome> {
    this.requireConvertible(tokenAmount);

    const fromCounter = minBigInt(tokenAmount, this.state.accumulatedLiquidityTokens);
    const half = tokenAmount / 2n;
    const otherHalf = tokenAmount - half;

    this.state.accumulatedLiquidityTokens -= fromCounter;

    const swap = await this.swapTokensForExternal(half);
    if (!swap.ok) {
      this.state.accumulatedLiquidityTokens += fromCounter;
      return this.reportFailure("reinvest", "swap", tokenAmount, swap.reason);
    }

    const externalForLiquidity = swap.value + this.state.liquidityExternalCarry;
    this.state.liquidityExternalCarry = 0n;

    const added = await this.addLiquidity(otherHalf, externalForLiquidity);
    if (!added.ok) {
      this.state.liquidityExternalCarry += externalForLiquidity;
      this.state.accumulatedLiquidityTokens += minBigInt(otherHalf, fromCounter);
      return this.reportFailure("reinvest", "add-liquidity", otherHalf, added.reason);
    }

    const { tokenUsed, externalUsed, liquidity } = added.value;
    const tokenLeftover = otherHalf > tokenUsed ? otherHalf - tokenUsed : 0n;
    const externalLeftover =
      externalForLiquidity > externalUsed ? externalForLiquidity - externalUsed : 0n;

    this.state.accumulatedLiquidityTokens += tokenLeftover;
    this.state.liquidityExternalCarry += externalLeftover;

    this.deps.notifications.publish("LiquidityAdded", {
      tokenAmount: tokenUsed,
      externalAmount: externalUsed,
      liquidity,
    });
    this.deps.notifications.publish("ConversionSucceeded", {
      operation: "reinvest",
      tokensIn: tokenAmount,
      externalReceived: swap.value,
    });

    conversionLogger.info({
      tokensIn: tokenAmount.toString(),
      externalReceived: swap.value.toString(),
      liquidity: liquidity.toString(),
    }, "Reinvested tax tokens as liquidity");

    return {
      status: "converted",
      operation: "reinvest",
      tokensIn: tokenAmount,
      externalReceived: swap.value,
      liquidityAdded: liquidity,
    };
  }

  private async convertToTreasury(tokenAmount: bigint): Promise<ConversionOutcome> {
    this.requireConvertible(tokenAmount);

    const fromCounter = minBigInt(tokenAmount, this.state.accumulatedTreasuryTokens);
    this.state.accumulatedTreasuryTokens -= fromCounter;

    const swap = await this.swapTokensForExternal(tokenAmount);
    if (!swap.ok) {
      this.state.accumulatedTreasuryTokens += fromCounter;
      return this.reportFailure("treasury", "swap", tokenAmount, swap.reason);
    }

    const reserved = applyBps(swap.value, this.settings.buybackShareBps);
    this.state.accumulatedExternal += reserved;

    this.deps.notifications.publish("ConversionSucceeded", {
      operation: "treasury",
      tokensIn: tokenAmount,
      externalReceived: swap.value,
    });

    conversionLogger.info({
      tokensIn: tokenAmount.toString(),
      externalReceived: swap.value.toString(),
      reservedForBuyback: reserved.toString(),
    }, "Converted treasury tax tokens");

    return {
      status: "converted",
      operation: "treasury",
      tokensIn: tokenAmount,
      externalReceived: swap.value,
    };
  }

  private async buyback(externalAmount?: bigint): Promise<BuybackOutcome> {
    const amount = externalAmount ?? this.state.accumulatedExternal;
    assertAmount(amount, "externalAmount");

    if (amount === 0n) {
      throw new StatePreconditionError("NothingToConvert", "No external asset reserved for buyback");
    }
    if (amount > this.state.accumulatedExternal) {
      throw new ResourceError("InsufficientBalance", "Buyback exceeds the reserved external asset", {
        requested: amount.toString(),
        available: this.state.accumulatedExternal.toString(),
      });
    }

    this.state.accumulatedExternal -= amount;
    this.state.buybackDelivered = 0n;
    this.state.buybackInFlight = true;

    try {
      const path = [this.deps.externalAsset, this.deps.self] as const;
      const minOut = await this.minimumOut(amount, path);

      const result = await callGateway("swapExactExternalForTokens", () =>
        this.deps.gateway.swapExactExternalForTokens(amount, minOut, path, BURN_SINK, this.deadline())
      );

      if (!result.ok) {
        this.state.accumulatedExternal += amount;
        this.deps.notifications.publish("BuybackFailed", { externalAmount: amount, reason: result.reason });
        conversionLogger.warn({ externalAmount: amount.toString(), reason: result.reason }, "Buyback failed");
        return { status: "failed", externalAmount: amount, reason: result.reason };
      }

      const tokensBurned = this.state.buybackDelivered;
      const { burnedTotal } = this.deps.burnMonitor.recordBurn(BURN_SINK, tokensBurned, "buyback");

      this.deps.notifications.publish("BuybackExecuted", {
        externalSpent: amount,
        tokensBurned,
        burnedTotal,
      });

      conversionLogger.info({
        externalSpent: amount.toString(),
        tokensBurned: tokensBurned.toString(),
        quotedOut: result.value.toString(),
      }, "Buyback burned");

      return { status: "burned", externalSpent: amount, tokensBurned };
    } finally {
      this.state.buybackInFlight = false;
      this.state.buybackDelivered = 0n;
    }
  }

  // ============================================
  // GATEWAY LEGS
  // ============================================

  /**
   * Returns the measured external balance delta of the token's account.
   */
  private async swapTokensForExternal(amount: bigint): Promise<GatewayResult<bigint>> {
    const { gateway, ledger, self, vault } = this.deps;
    const path = [self, this.deps.externalAsset] as const;
    const minOut = await this.minimumOut(amount, path);

    const before = await vault.balance();
    ledger.approve(self, gateway.routerAddress, amount);

    const result = await callGateway("swapExactTokensForExternal", () =>
      gateway.swapExactTokensForExternal(amount, minOut, path, self, this.deadline())
    );
    ledger.approve(self, gateway.routerAddress, 0n);

    if (!result.ok) return result;

    const after = await vault.balance();
    return { ok: true, value: after > before ? after - before : 0n };
  }

  /**
   * Liquidity amounts are best effort: both minimums are zero.
   */
  private async addLiquidity(
    tokenAmount: bigint,
    externalAmount: bigint
  ): Promise<GatewayResult<LiquidityReceipt>> {
    const { gateway, ledger, self } = this.deps;

    ledger.approve(self, gateway.routerAddress, tokenAmount);
    const result = await callGateway("addLiquidity", () =>
      gateway.addLiquidity(
        tokenAmount,
        externalAmount,
        0n,
        0n,
        this.deps.liquidityRecipient,
        this.deadline()
      )
    );
    ledger.approve(self, gateway.routerAddress, 0n);

    return result;
  }

  /**
   * A failed quote means no slippage estimate; accept any output.
   */
  private async minimumOut(amountIn: bigint, path: readonly Address[]): Promise<bigint> {
    const quote = await callGateway("getQuote", () => this.deps.gateway.getQuote(amountIn, path));
    if (!quote.ok) return 0n;
    return (quote.value * (BPS_DENOMINATOR - BigInt(this.settings.slippageBps))) / BPS_DENOMINATOR;
  }

  private deadline(): bigint {
    return this.deps.environment.currentTime() + this.settings.deadlineWindowSeconds;
  }

  // ============================================
  // PRIVATE HELPERS
  // ============================================

  private planCycle(): { liquidity: bigint; treasury: bigint } {
    const liquidity = this.state.accumulatedLiquidityTokens;
    const treasury = this.state.accumulatedTreasuryTokens;
    const total = liquidity + treasury;
    const cap = this.settings.maxConversionAmount;

    if (total <= cap) return { liquidity, treasury };

    const cappedLiquidity = (liquidity * cap) / total;
    return { liquidity: cappedLiquidity, treasury: cap - cappedLiquidity };
  }

  private requireConvertible(tokenAmount: bigint): void {
    assertAmount(tokenAmount, "tokenAmount");
    if (tokenAmount === 0n) {
      throw new StatePreconditionError("NothingToConvert", "Token amount is zero");
    }

    const held = this.deps.ledger.balanceOf(this.deps.self);
    if (held < tokenAmount) {
      throw new ResourceError("InsufficientBalance", "Token account holds less than requested", {
        requested: tokenAmount.toString(),
        available: held.toString(),
      });
    }
  }

  private reportFailure(
    operation: "reinvest" | "treasury",
    stage: "swap" | "add-liquidity",
    tokenAmount: bigint,
    reason: string
  ): ConversionOutcome {
    this.deps.notifications.publish("ConversionFailed", { operation, stage, tokenAmount, reason });
    conversionLogger.warn({ operation, stage, tokenAmount: tokenAmount.toString(), reason }, "Conversion failed");
    return { status: "failed", operation, stage, reason };
  }
}

// ============================================
// BOUNDARY
// ============================================

/**
 * Gateway throws become failure results. Invariant violations still escape.
 */
async function callGateway<T>(
  operation: string,
  fn: () => Promise<GatewayResult<T>>
): Promise<GatewayResult<T>> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof InvariantViolationError) throw error;

    const reason = error instanceof Error ? error.message : String(error);
    conversionLogger.warn({ operation, reason }, "Gateway call threw");
    return gatewayFailure(reason);
  }
}

function validateSettings(settings: ConversionSettings): void {
  const bpsFields: Array<[string, number]> = [
    ["slippageBps", settings.slippageBps],
    ["buybackShareBps", settings.buybackShareBps],
  ];

  for (const [field, value] of bpsFields) {
    if (!Number.isInteger(value) || value < 0 || value > 10_000) {
      throw new ValidationError("InvalidConfiguration", `${field} must be between 0 and 10000`, {
        [field]: value,
      });
    }
  }

  assertAmount(settings.swapThreshold, "swapThreshold");
  assertAmount(settings.maxConversionAmount, "maxConversionAmount");
  assertAmount(settings.deadlineWindowSeconds, "deadlineWindowSeconds");
}
