/**
 * Tax Token Engine
 *
 * Owns the whole token state and exposes the holder entry points, the admin
 * surface and read-only reporting. Components never reach each other except
 * through the references wired here.
 */

import { BURN_SINK, tokenEngineLogger } from "@levy/shared";
import type { Address } from "viem";
import type { TokenEngineConfig, TokenEngineConfigInput } from "../config.js";
import { createTokenEngineConfig } from "../config.js";
import { StatePreconditionError, ValidationError } from "../errors.js";
import type { ExecutionEnvironment } from "../environment.js";
import { normalizeAccount, toAccount } from "../ledger/accounts.js";
import { Ledger } from "../ledger/ledger.js";
import { assertAmount, assertPositiveAmount } from "../ledger/math.js";
import { NotificationLog } from "../notifications.js";
import { BurnThresholdMonitor } from "../policy/burn-monitor.js";
import { effectiveRates, validateTaxRates, validateTaxSplit } from "../policy/fee-policy.js";
import { PairRegistry } from "../policy/pair-registry.js";
import type { PolicyState, TaxRates, TaxSplit } from "../policy/types.js";
import { AntiAbuseGuards } from "../guards/anti-abuse.js";
import { ConversionScheduler } from "../conversion/conversion-scheduler.js";
import type {
  BuybackOutcome,
  ConversionCycleReport,
  ConversionOutcome,
  ConversionSettings,
  ConversionState,
  ExchangeGateway,
  ExternalAssetVault,
} from "../conversion/types.js";
import { DistributionLedger } from "../distribution/distribution-ledger.js";
import type { BeneficiaryShare, QueuedDistribution } from "../distribution/types.js";
import { Ownership } from "./ownership.js";
import type { TransferReceipt } from "./transfer-pipeline.js";
import { TransferPipeline } from "./transfer-pipeline.js";

const engineLogger = tokenEngineLogger.child({ component: "token-engine" });

// ============================================
// TYPES
// ============================================

export interface TaxTokenEngineDeps {
  environment: ExecutionEnvironment;
  gateway: ExchangeGateway;
  /** The token's own holding of the external asset */
  vault: ExternalAssetVault;
}

export interface TokenSnapshot {
  name: string;
  symbol: string;
  decimals: number;
  owner: Address | null;
  ledger: {
    totalSupply: bigint;
    circulatingSupply: bigint;
    holderCount: number;
    contractBalance: bigint;
  };
  policy: {
    phase: "taxed" | "untaxed";
    rates: TaxRates;
    split: TaxSplit;
    burnedTotal: bigint;
    burnThreshold: bigint;
    maxTaxBps: number;
  };
  pairs: {
    primaryPair: Address | null;
    all: Address[];
  };
  antiAbuse: {
    tradingEnabled: boolean;
    launchBlock: bigint | null;
    maxTxAmount: bigint;
    maxPairToPairAmount: bigint;
    cooldownSeconds: bigint;
    antiBotWindowBlocks: bigint;
    launchGuardMode: string;
  };
  conversion: {
    locked: boolean;
    settings: ConversionSettings;
    accumulatedLiquidityTokens: bigint;
    accumulatedTreasuryTokens: bigint;
    accumulatedExternal: bigint;
    liquidityExternalCarry: bigint;
  };
  distribution: {
    queued: boolean;
    lastQueuedBlock: bigint | null;
    beneficiaries: BeneficiaryShare[];
    pending: Array<{ beneficiary: Address; amount: bigint }>;
    failed: Array<{ beneficiary: Address; amount: bigint }>;
    inFlight: bigint;
  };
}

// ============================================
// ENGINE
// ============================================

export class TaxTokenEngine {
  readonly address: Address;
  readonly notifications: NotificationLog;

  private readonly ledger: Ledger;
  private readonly policy: PolicyState;
  private readonly pairs: PairRegistry;
  private readonly exempt: Set<Address>;
  private readonly guards: AntiAbuseGuards;
  private readonly burnMonitor: BurnThresholdMonitor;
  private readonly scheduler: ConversionScheduler;
  private readonly distribution: DistributionLedger;
  private readonly ownership: Ownership;
  private readonly pipeline: TransferPipeline;

  constructor(
    private readonly config: TokenEngineConfig,
    deps: TaxTokenEngineDeps
  ) {
    const { environment, gateway, vault } = deps;

    if (gateway.routerAddress !== config.router) {
      throw new ValidationError("InvalidConfiguration", "Gateway router does not match configured router", {
        configured: config.router,
        gateway: gateway.routerAddress,
      });
    }

    this.address = config.tokenAddress;
    this.notifications = new NotificationLog(environment);
    this.ledger = new Ledger(this.notifications);

    this.policy = {
      rates: { ...config.taxRates },
      split: { ...config.taxSplit },
      taxesRemoved: false,
      burnedTotal: 0n,
      burnThreshold: config.burnThreshold,
      maxTaxBps: config.maxTaxBps,
    };
    validateTaxRates(this.policy.rates, this.policy.maxTaxBps);
    validateTaxSplit(this.policy.split);

    this.pairs = new PairRegistry(this.notifications);
    this.exempt = new Set([config.tokenAddress, BURN_SINK, config.admin, ...config.exempt]);

    const { launchAllowList, ...antiAbuseSettings } = config.antiAbuse;
    this.guards = new AntiAbuseGuards(antiAbuseSettings, launchAllowList, environment, this.notifications);
    this.burnMonitor = new BurnThresholdMonitor(this.policy, this.notifications);

    this.scheduler = new ConversionScheduler(
      {
        self: config.tokenAddress,
        externalAsset: config.externalAsset,
        liquidityRecipient: config.liquidityRecipient ?? config.admin,
        ledger: this.ledger,
        gateway,
        vault,
        environment,
        pairs: this.pairs,
        burnMonitor: this.burnMonitor,
        notifications: this.notifications,
      },
      config.conversion
    );

    this.distribution = new DistributionLedger(
      {
        vault,
        unreservedExternal: () => this.scheduler.distributableExternal(),
        environment,
        notifications: this.notifications,
      },
      config.distribution.minDelayBlocks,
      config.distribution.beneficiaries
    );

    this.ownership = new Ownership(config.admin, this.notifications);

    this.pipeline = new TransferPipeline({
      self: config.tokenAddress,
      externalAsset: config.externalAsset,
      ledger: this.ledger,
      policy: this.policy,
      exempt: this.exempt,
      pairs: this.pairs,
      guards: this.guards,
      burnMonitor: this.burnMonitor,
      scheduler: this.scheduler,
      ownership: this.ownership,
      gateway,
      environment,
      notifications: this.notifications,
    });

    this.ledger.mint(config.admin, config.totalSupply);
    if (config.initialBurn > 0n) {
      this.ledger.transfer(config.admin, BURN_SINK, config.initialBurn);
      this.burnMonitor.recordBurn(config.admin, config.initialBurn, "initial");
    }

    engineLogger.info({
      token: config.tokenAddress,
      symbol: config.symbol,
      totalSupply: config.totalSupply.toString(),
      initialBurn: config.initialBurn.toString(),
      burnThreshold: config.burnThreshold.toString(),
    }, "TaxTokenEngine initialized");
  }

  // ============================================
  // HOLDER ENTRY POINTS
  // ============================================

  async transfer(sender: Address, to: Address, amount: bigint): Promise<TransferReceipt> {
    const from = toAccount(sender, "from");
    return this.pipeline.execute({ sender: from, from, to: toAccount(to, "to"), amount });
  }

  async transferFrom(spender: Address, from: Address, to: Address, amount: bigint): Promise<TransferReceipt> {
    const caller = toAccount(spender, "spender");
    return this.pipeline.execute({
      sender: caller,
      from: toAccount(from, "from"),
      to: toAccount(to, "to"),
      amount,
      spender: caller,
    });
  }

  approve(owner: Address, spender: Address, amount: bigint): void {
    this.ledger.approve(toAccount(owner, "owner"), toAccount(spender, "spender"), amount);
  }

  /**
   * Destroys the holder's own tokens; total supply shrinks.
   */
  burn(holder: Address, amount: bigint): bigint {
    const account = toAccount(holder, "holder");
    assertPositiveAmount(amount);
    this.ledger.burn(account, amount);
    return this.burnMonitor.recordBurn(account, amount, "holder").burnedTotal;
  }

  /**
   * Pays one beneficiary's pending amount. Anyone may call.
   */
  async settle(beneficiary: Address): Promise<bigint> {
    return this.distribution.settle(toAccount(beneficiary, "beneficiary"));
  }

  // ============================================
  // READS
  // ============================================

  get owner(): Address | null {
    return this.ownership.owner;
  }

  totalSupply(): bigint {
    return this.ledger.totalSupply();
  }

  circulatingSupply(): bigint {
    return this.ledger.totalSupply() - this.ledger.balanceOf(BURN_SINK);
  }

  balanceOf(account: Address): bigint {
    return this.ledger.balanceOf(normalizeAccount(account));
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.ledger.allowance(normalizeAccount(owner, "owner"), normalizeAccount(spender, "spender"));
  }

  get burnedTotal(): bigint {
    return this.burnMonitor.burnedTotal;
  }

  get taxesRemoved(): boolean {
    return this.policy.taxesRemoved;
  }

  get tradingEnabled(): boolean {
    return this.guards.state.tradingEnabled;
  }

  get primaryPair(): Address | null {
    return this.pairs.primaryPair;
  }

  isPair(account: Address): boolean {
    return this.pairs.isPair(normalizeAccount(account));
  }

  isExempt(account: Address): boolean {
    return this.exempt.has(normalizeAccount(account));
  }

  effectiveRates(): TaxRates {
    return effectiveRates(this.policy);
  }

  conversionState(): ConversionState {
    return { ...this.scheduler.state };
  }

  pendingOf(beneficiary: Address): bigint {
    return this.distribution.pendingOf(normalizeAccount(beneficiary, "beneficiary"));
  }

  failedOf(beneficiary: Address): bigint {
    return this.distribution.failedOf(normalizeAccount(beneficiary, "beneficiary"));
  }

  distributableBalance(): Promise<bigint> {
    return this.distribution.distributableBalance();
  }

  assertSupplyInvariant(): void {
    this.ledger.assertSupplyInvariant();
  }

  getSnapshot(): TokenSnapshot {
    const guardState = this.guards.state;
    const conversion = this.scheduler.state;
    const distribution = this.distribution.state;
    const ledgerSnapshot = this.ledger.getSnapshot();

    return {
      name: this.config.name,
      symbol: this.config.symbol,
      decimals: this.config.decimals,
      owner: this.ownership.owner,
      ledger: {
        totalSupply: ledgerSnapshot.totalSupply,
        circulatingSupply: this.circulatingSupply(),
        holderCount: ledgerSnapshot.holderCount,
        contractBalance: this.ledger.balanceOf(this.address),
      },
      policy: {
        phase: this.burnMonitor.phase,
        rates: this.effectiveRates(),
        split: { ...this.policy.split },
        burnedTotal: this.policy.burnedTotal,
        burnThreshold: this.policy.burnThreshold,
        maxTaxBps: this.policy.maxTaxBps,
      },
      pairs: {
        primaryPair: this.pairs.primaryPair,
        all: this.pairs.list(),
      },
      antiAbuse: {
        tradingEnabled: guardState.tradingEnabled,
        launchBlock: guardState.launchBlock,
        maxTxAmount: guardState.maxTxAmount,
        maxPairToPairAmount: guardState.maxPairToPairAmount,
        cooldownSeconds: guardState.cooldownSeconds,
        antiBotWindowBlocks: guardState.antiBotWindowBlocks,
        launchGuardMode: guardState.launchGuardMode,
      },
      conversion: {
        locked: this.scheduler.lock.isLocked,
        settings: this.scheduler.getSettings(),
        accumulatedLiquidityTokens: conversion.accumulatedLiquidityTokens,
        accumulatedTreasuryTokens: conversion.accumulatedTreasuryTokens,
        accumulatedExternal: conversion.accumulatedExternal,
        liquidityExternalCarry: conversion.liquidityExternalCarry,
      },
      distribution: {
        queued: distribution.queued,
        lastQueuedBlock: distribution.lastQueuedBlock,
        beneficiaries: distribution.beneficiaries.map((share) => ({ ...share })),
        pending: entries(distribution.pending),
        failed: entries(distribution.failed),
        inFlight: distribution.inFlight,
      },
    };
  }

  // ============================================
  // ADMIN: PAIRS AND LAUNCH
  // ============================================

  setPrimaryPair(sender: Address, pair: Address): void {
    this.ownership.requireOwner(sender, "setPrimaryPair");
    this.pairs.setPrimary(toAccount(pair, "pair"), "admin");
  }

  setPair(sender: Address, pair: Address, isPair: boolean): void {
    this.ownership.requireOwner(sender, "setPair");
    this.pairs.register(toAccount(pair, "pair"), isPair);
  }

  enableTrading(sender: Address): bigint {
    this.ownership.requireOwner(sender, "enableTrading");
    return this.guards.enableTrading();
  }

  setLaunchAllowed(sender: Address, account: Address, allowed: boolean): void {
    this.ownership.requireOwner(sender, "setLaunchAllowed");
    this.guards.setLaunchAllowed(toAccount(account), allowed);
  }

  setMaxPairToPairAmount(sender: Address, amount: bigint): void {
    this.ownership.requireOwner(sender, "setMaxPairToPairAmount");
    this.guards.setMaxPairToPairAmount(amount);
  }

  setCooldownSeconds(sender: Address, seconds: bigint): void {
    this.ownership.requireOwner(sender, "setCooldownSeconds");
    this.guards.setCooldownSeconds(seconds);
  }

  // ============================================
  // ADMIN: TAX POLICY
  // ============================================

  setTaxRates(sender: Address, rates: TaxRates): void {
    this.ownership.requireOwner(sender, "setTaxRates");
    this.requireTaxed("setTaxRates");
    validateTaxRates(rates, this.policy.maxTaxBps);

    const before = { ...this.policy.rates };
    this.policy.rates = { ...rates };
    this.notifications.publish("TaxRatesUpdated", { before, after: { ...rates } });
  }

  setTaxSplit(sender: Address, split: TaxSplit): void {
    this.ownership.requireOwner(sender, "setTaxSplit");
    this.requireTaxed("setTaxSplit");
    validateTaxSplit(split);

    const before = { ...this.policy.split };
    this.policy.split = { ...split };
    this.notifications.publish("TaxSplitUpdated", { before, after: { ...split } });
  }

  setExempt(sender: Address, account: Address, exempt: boolean): void {
    this.ownership.requireOwner(sender, "setExempt");
    this.requireTaxed("setExempt");
    const target = toAccount(account);

    if (exempt) {
      this.exempt.add(target);
    } else {
      this.exempt.delete(target);
    }
    this.notifications.publish("ExemptionUpdated", { account: target, exempt });
  }

  /**
   * Moves the owner's tokens into the burn sink.
   */
  adminBurn(sender: Address, amount: bigint): bigint {
    this.ownership.requireOwner(sender, "adminBurn");
    assertPositiveAmount(amount);

    const owner = toAccount(sender, "sender");
    this.ledger.transfer(owner, BURN_SINK, amount);
    return this.burnMonitor.recordBurn(owner, amount, "admin").burnedTotal;
  }

  // ============================================
  // ADMIN: CONVERSION
  // ============================================

  setConversionSettings(sender: Address, update: Partial<ConversionSettings>): ConversionSettings {
    this.ownership.requireOwner(sender, "setConversionSettings");
    return this.scheduler.updateSettings(update);
  }

  async triggerConversion(sender: Address): Promise<ConversionCycleReport> {
    this.ownership.requireOwner(sender, "triggerConversion");
    return this.scheduler.runConversionCycle();
  }

  async convertAndReinvest(sender: Address, tokenAmount: bigint): Promise<ConversionOutcome> {
    this.ownership.requireOwner(sender, "convertAndReinvest");
    return this.scheduler.convertAndReinvest(tokenAmount);
  }

  async convertTreasury(sender: Address, tokenAmount: bigint): Promise<ConversionOutcome> {
    this.ownership.requireOwner(sender, "convertTreasury");
    return this.scheduler.convertTreasury(tokenAmount);
  }

  async triggerBuyback(sender: Address, externalAmount?: bigint): Promise<BuybackOutcome> {
    this.ownership.requireOwner(sender, "triggerBuyback");
    if (externalAmount !== undefined) assertAmount(externalAmount, "externalAmount");
    return this.scheduler.buybackAndBurn(externalAmount);
  }

  // ============================================
  // ADMIN: DISTRIBUTION
  // ============================================

  configureBeneficiaries(sender: Address, shares: BeneficiaryShare[]): void {
    this.ownership.requireOwner(sender, "configureBeneficiaries");
    this.distribution.configureBeneficiaries(
      shares.map((share) => ({ ...share, account: normalizeAccount(share.account, "beneficiary") }))
    );
  }

  async queueDistribution(sender: Address): Promise<QueuedDistribution> {
    this.ownership.requireOwner(sender, "queueDistribution");
    return this.distribution.queueDistribution();
  }

  requeueFailed(sender: Address, beneficiary: Address): bigint {
    this.ownership.requireOwner(sender, "requeueFailed");
    return this.distribution.requeueFailed(toAccount(beneficiary, "beneficiary"));
  }

  // ============================================
  // ADMIN: OWNERSHIP
  // ============================================

  transferOwnership(sender: Address, newOwner: Address): void {
    this.ownership.transferOwnership(sender, newOwner);
  }

  renounceOwnership(sender: Address): void {
    this.ownership.renounceOwnership(sender);
  }

  // ============================================
  // PRIVATE HELPERS
  // ============================================

  private requireTaxed(action: string): void {
    if (this.policy.taxesRemoved) {
      throw new StatePreconditionError("TaxesRemoved", `Taxes are permanently removed; cannot ${action}`);
    }
  }
}

function entries(map: ReadonlyMap<Address, bigint>): Array<{ beneficiary: Address; amount: bigint }> {
  return Array.from(map, ([beneficiary, amount]) => ({ beneficiary, amount }));
}

/**
 * Validate `input` against the config schema and build an engine from it.
 */
export function createTaxTokenEngine(
  input: TokenEngineConfigInput,
  deps: TaxTokenEngineDeps
): TaxTokenEngine {
  return new TaxTokenEngine(createTokenEngineConfig(input), deps);
}
