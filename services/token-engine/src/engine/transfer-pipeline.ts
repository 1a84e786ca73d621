/**
 * Transfer Pipeline
 *
 * Every token movement goes through these stages in order:
 *
 *   detect-pair -> guards -> classify -> net-transfer -> tax-apply
 *     -> threshold-check -> record-cooldown -> maybe-convert
 *
 * detect-pair and maybe-convert are the only stages that await. Everything
 * between them runs as one synchronous block, so no re-entrant call can
 * observe a half-applied transfer.
 */

import { BURN_SINK, logLedgerEvent, tokenEngineLogger } from "@levy/shared";
import type { Address } from "viem";
import { InvariantViolationError, ResourceError } from "../errors.js";
import type { ExecutionEnvironment } from "../environment.js";
import { assertNotNull, normalizeAccount } from "../ledger/accounts.js";
import type { Ledger } from "../ledger/ledger.js";
import { assertPositiveAmount } from "../ledger/math.js";
import type { NotificationLog } from "../notifications.js";
import type { BurnThresholdMonitor } from "../policy/burn-monitor.js";
import { classifyTransfer } from "../policy/fee-policy.js";
import type { PairRegistry } from "../policy/pair-registry.js";
import type { PolicyState, TaxAssessment, TaxKind, TaxShares } from "../policy/types.js";
import { ZERO_SHARES } from "../policy/types.js";
import type { AntiAbuseGuards, GuardDecision } from "../guards/anti-abuse.js";
import type { ConversionScheduler } from "../conversion/conversion-scheduler.js";
import type { ConversionCycleReport, ExchangeGateway } from "../conversion/types.js";
import type { Ownership } from "./ownership.js";

const pipelineLogger = tokenEngineLogger.child({ component: "transfer-pipeline" });

// ============================================
// TYPES
// ============================================

export interface TransferRequest {
  /** Immediate caller */
  sender: Address;
  from: Address;
  to: Address;
  amount: bigint;
  /** Set for transferFrom; the allowance of `from` to this spender is consumed */
  spender?: Address;
}

export interface TransferReceipt {
  from: Address;
  to: Address;
  amount: bigint;
  kind: TaxKind;
  taxAmount: bigint;
  netAmount: bigint;
  shares: TaxShares;
  /** True only for the transfer whose tax burn crossed the threshold */
  taxesRemovedNow: boolean;
  conversion?: ConversionCycleReport;
}

export interface TransferPipelineDeps {
  self: Address;
  externalAsset: Address;
  ledger: Ledger;
  policy: PolicyState;
  exempt: ReadonlySet<Address>;
  pairs: PairRegistry;
  guards: AntiAbuseGuards;
  burnMonitor: BurnThresholdMonitor;
  scheduler: ConversionScheduler;
  ownership: Ownership;
  gateway: ExchangeGateway;
  environment: ExecutionEnvironment;
  notifications: NotificationLog;
}

// ============================================
// PIPELINE
// ============================================

export class TransferPipeline {
  private readonly isPair = (account: Address): boolean => this.deps.pairs.isPair(account);
  private readonly isExempt = (account: Address): boolean => this.deps.exempt.has(account);

  constructor(private readonly deps: TransferPipelineDeps) {}

  async execute(request: TransferRequest): Promise<TransferReceipt> {
    assertNotNull(request.from, "from");
    assertNotNull(request.to, "to");
    assertPositiveAmount(request.amount);

    await this.detectPair();

    const receipt = this.commit(request);

    if (this.isSell(request)) {
      const conversion = await this.deps.scheduler.runIfTriggered();
      if (conversion) receipt.conversion = conversion;
    }

    return receipt;
  }

  // ============================================
  // STAGES
  // ============================================

  /**
   * Adopt the gateway's pair as primary the first time one exists. The
   * lookup holds the swap lock like every other gateway call.
   */
  private async detectPair(): Promise<void> {
    const { pairs, scheduler } = this.deps;
    if (pairs.primaryPair !== null || scheduler.lock.isLocked) return;

    const resolved = await scheduler.lock.run(() => this.lookupPair(), "pair-lookup");

    // Another call may have set it while we were waiting
    if (resolved !== null && pairs.primaryPair === null) {
      pairs.setPrimary(resolved, "gateway");
    }
  }

  private async lookupPair(): Promise<Address | null> {
    const { gateway, self, externalAsset } = this.deps;
    try {
      const result = await gateway.resolvePair(self, externalAsset);
      if (!result.ok) {
        pipelineLogger.debug({ reason: result.reason }, "Pair lookup failed");
        return null;
      }
      return result.value === null ? null : normalizeAccount(result.value, "pair");
    } catch (error) {
      if (error instanceof InvariantViolationError) throw error;
      pipelineLogger.debug({
        err: error instanceof Error ? error.message : String(error),
      }, "Pair lookup threw");
      return null;
    }
  }

  /**
   * guards -> classify -> net-transfer -> tax-apply -> threshold-check ->
   * record-cooldown, with every check before the first write.
   */
  private commit(request: TransferRequest): TransferReceipt {
    const { ledger, policy, burnMonitor, scheduler, guards, self } = this.deps;
    const { from, to, amount, spender } = request;

    const decision = this.runGuards(request);

    const available = ledger.balanceOf(from);
    if (available < amount) {
      throw new ResourceError("InsufficientBalance", "Balance too low", {
        account: from,
        requested: amount.toString(),
        available: available.toString(),
      });
    }

    if (spender !== undefined) {
      ledger.spendAllowance(from, spender, amount);
    }

    if (from === to) {
      ledger.transfer(from, to, amount);
      return untaxedReceipt(request, "none");
    }

    const assessment: TaxAssessment = classifyTransfer({
      from,
      to,
      amount,
      policy,
      isPair: this.isPair,
      isExempt: this.isExempt,
    });

    ledger.transfer(from, to, assessment.netAmount);
    scheduler.observeCredit(from, to, assessment.netAmount);

    let taxesRemovedNow = false;
    if (assessment.taxAmount > 0n) {
      taxesRemovedNow = this.applyTax(from, to, assessment);
    }

    // Idempotent; catches burns recorded outside the transfer path
    if (burnMonitor.checkThreshold()) taxesRemovedNow = true;

    if (decision.pairToPair) {
      guards.recordPairTransfer(from);
    }

    if (from !== self && to !== self) {
      logLedgerEvent("debug", "transfer", { from, to, amount, kind: assessment.kind });
    }

    return {
      from,
      to,
      amount,
      kind: assessment.kind,
      taxAmount: assessment.taxAmount,
      netAmount: assessment.netAmount,
      shares: assessment.shares,
      taxesRemovedNow,
    };
  }

  /**
   * Engine-internal movements during a conversion skip admission checks. A
   * pair lookup holding the lock does not count.
   */
  private runGuards(request: TransferRequest): GuardDecision {
    const { from, to, amount, sender } = request;
    const { scheduler, guards, ownership, self, gateway } = this.deps;

    const internal =
      scheduler.lock.heldFor === "conversion" &&
      (from === self || to === self || to === BURN_SINK);
    if (internal) {
      return { pairToPair: false };
    }

    return guards.check({
      from,
      to,
      amount,
      sender,
      owner: ownership.owner,
      self,
      router: gateway.routerAddress,
      isPair: this.isPair,
      isExempt: this.isExempt,
    });
  }

  private applyTax(from: Address, to: Address, assessment: TaxAssessment): boolean {
    const { ledger, scheduler, burnMonitor, notifications, self } = this.deps;
    const { burn, treasury, liquidity } = assessment.shares;

    if (burn > 0n) {
      ledger.transfer(from, BURN_SINK, burn);
    }
    const retained = treasury + liquidity;
    if (retained > 0n) {
      ledger.transfer(from, self, retained);
    }
    scheduler.recordTaxAccumulation(treasury, liquidity);

    notifications.publish("TaxCollected", {
      from,
      to,
      kind: assessment.kind,
      amount: assessment.taxAmount,
      burn,
      treasury,
      liquidity,
    });

    return burnMonitor.recordBurn(from, burn, "tax").taxesRemovedNow;
  }

  private isSell(request: TransferRequest): boolean {
    return this.isPair(request.to) && !this.isPair(request.from) && request.from !== this.deps.self;
  }
}

function untaxedReceipt(request: TransferRequest, kind: TaxKind): TransferReceipt {
  return {
    from: request.from,
    to: request.to,
    amount: request.amount,
    kind,
    taxAmount: 0n,
    netAmount: request.amount,
    shares: { ...ZERO_SHARES },
    taxesRemovedNow: false,
  };
}
