/**
 * Distribution Ledger
 *
 * Two-phase payout of the distributable external asset:
 * 1. queueDistribution fixes each beneficiary's pending amount
 * 2. settle sends one beneficiary's amount
 *
 * settle zeroes the pending entry before the send and never restores it. A
 * failed send is recorded in `failed` and only an admin requeue makes it
 * payable again. While a send is awaited its amount counts as `inFlight`, so
 * a queue started meanwhile cannot allocate it a second time.
 */

import { BPS_DENOMINATOR, tokenEngineLogger } from "@levy/shared";
import type { Address } from "viem";
import {
  ExternalDependencyError,
  InvariantViolationError,
  StatePreconditionError,
  ValidationError,
} from "../errors.js";
import type { ExecutionEnvironment } from "../environment.js";
import { assertNotNull } from "../ledger/accounts.js";
import type { NotificationLog } from "../notifications.js";
import type { ExternalAssetVault, GatewayResult } from "../conversion/types.js";
import { gatewayFailure } from "../conversion/types.js";
import type {
  BeneficiaryShare,
  DistributionAllocation,
  DistributionState,
  QueuedDistribution,
} from "./types.js";

const distributionLogger = tokenEngineLogger.child({ component: "distribution-ledger" });

export interface DistributionLedgerDeps {
  vault: ExternalAssetVault;
  /** External asset not reserved for buyback or pending liquidity */
  unreservedExternal: () => Promise<bigint>;
  environment: ExecutionEnvironment;
  notifications: NotificationLog;
}

export class DistributionLedger {
  readonly state: DistributionState;

  constructor(
    private readonly deps: DistributionLedgerDeps,
    minDelayBlocks: bigint,
    beneficiaries: BeneficiaryShare[] = []
  ) {
    if (beneficiaries.length > 0) {
      validateShares(beneficiaries);
    }

    this.state = {
      beneficiaries: beneficiaries.map((share) => ({ ...share })),
      pending: new Map(),
      failed: new Map(),
      inFlight: 0n,
      queued: false,
      lastQueuedBlock: null,
      minDelayBlocks,
    };
  }

  // ============================================
  // READS
  // ============================================

  pendingOf(beneficiary: Address): bigint {
    return this.state.pending.get(beneficiary) ?? 0n;
  }

  failedOf(beneficiary: Address): bigint {
    return this.state.failed.get(beneficiary) ?? 0n;
  }

  /**
   * Unreserved external asset not already owed to someone
   */
  async distributableBalance(): Promise<bigint> {
    const unreserved = await this.deps.unreservedExternal();
    const owed =
      sum(this.state.pending.values()) + sum(this.state.failed.values()) + this.state.inFlight;
    return unreserved > owed ? unreserved - owed : 0n;
  }

  // ============================================
  // CONFIGURATION
  // ============================================

  configureBeneficiaries(shares: BeneficiaryShare[]): void {
    validateShares(shares);

    const before = this.state.beneficiaries;
    const after = shares.map((share) => ({ ...share }));
    this.state.beneficiaries = after;

    this.deps.notifications.publish("BeneficiariesUpdated", { before, after });
    distributionLogger.info({ beneficiaries: after.length }, "Beneficiaries configured");
  }

  // ============================================
  // PHASE 1: QUEUE
  // ============================================

  async queueDistribution(): Promise<QueuedDistribution> {
    const total = await this.distributableBalance();

    // Checked first: pending amounts are excluded from `total`
    if (this.state.queued) {
      throw new StatePreconditionError("AlreadyQueued", "A distribution is still pending");
    }
    if (total === 0n) {
      throw new StatePreconditionError("NothingToDistribute", "No external asset to distribute");
    }

    const block = this.deps.environment.currentBlock();
    const { lastQueuedBlock, minDelayBlocks } = this.state;
    if (lastQueuedBlock !== null && block < lastQueuedBlock + minDelayBlocks) {
      throw new StatePreconditionError("TooSoon", "Minimum delay since the last queue has not elapsed", {
        lastQueuedBlock: lastQueuedBlock.toString(),
        readyAtBlock: (lastQueuedBlock + minDelayBlocks).toString(),
      });
    }
    if (this.state.beneficiaries.length === 0) {
      throw new ValidationError("InvalidShares", "No beneficiaries configured");
    }

    const allocations: DistributionAllocation[] = this.state.beneficiaries
      .map((share) => ({
        beneficiary: share.account,
        amount: (total * BigInt(share.shareBps)) / BPS_DENOMINATOR,
      }))
      .filter((allocation) => allocation.amount > 0n);

    if (allocations.length === 0) {
      throw new StatePreconditionError("NothingToDistribute", "Balance too small to allocate");
    }

    for (const { beneficiary, amount } of allocations) {
      this.state.pending.set(beneficiary, this.pendingOf(beneficiary) + amount);
    }
    this.state.queued = true;
    this.state.lastQueuedBlock = block;

    this.deps.notifications.publish("DistributionQueued", { total, allocations });
    distributionLogger.info({
      total: total.toString(),
      beneficiaries: allocations.length,
      block: block.toString(),
    }, "Distribution queued");

    return { total, allocations };
  }

  // ============================================
  // PHASE 2: SETTLE
  // ============================================

  async settle(beneficiary: Address): Promise<bigint> {
    const amount = this.pendingOf(beneficiary);
    if (amount === 0n) {
      throw new StatePreconditionError("NothingPending", "Nothing pending for beneficiary", {
        beneficiary,
      });
    }

    // Zeroed before the send; a re-entrant settle sees nothing pending
    this.state.pending.delete(beneficiary);
    this.refreshQueued();

    // Still held by the vault until the send lands; not distributable
    this.state.inFlight += amount;
    let result: GatewayResult<bigint>;
    try {
      result = await sendExternal(this.deps.vault, beneficiary, amount);
    } finally {
      this.state.inFlight -= amount;
    }

    if (!result.ok) {
      this.state.failed.set(beneficiary, this.failedOf(beneficiary) + amount);
      this.deps.notifications.publish("DistributionSettleFailed", {
        beneficiary,
        amount,
        reason: result.reason,
      });
      distributionLogger.warn({
        beneficiary,
        amount: amount.toString(),
        reason: result.reason,
      }, "Distribution settle failed");

      throw new ExternalDependencyError("TransferFailed", `External send failed: ${result.reason}`, {
        beneficiary,
        amount: amount.toString(),
      });
    }

    this.deps.notifications.publish("DistributionSettled", { beneficiary, amount });
    distributionLogger.info({ beneficiary, amount: amount.toString() }, "Distribution settled");

    return amount;
  }

  /**
   * Move a failed amount back to pending. Admin only; the caller checks.
   */
  requeueFailed(beneficiary: Address): bigint {
    const amount = this.failedOf(beneficiary);
    if (amount === 0n) {
      throw new StatePreconditionError("NothingToRequeue", "No failed amount for beneficiary", {
        beneficiary,
      });
    }

    this.state.failed.delete(beneficiary);
    this.state.pending.set(beneficiary, this.pendingOf(beneficiary) + amount);
    this.state.queued = true;

    this.deps.notifications.publish("DistributionRequeued", { beneficiary, amount });
    distributionLogger.info({ beneficiary, amount: amount.toString() }, "Failed distribution requeued");

    return amount;
  }

  private refreshQueued(): void {
    if (this.state.pending.size === 0) {
      this.state.queued = false;
    }
  }
}

// ============================================
// HELPERS
// ============================================

function validateShares(shares: BeneficiaryShare[]): void {
  if (shares.length === 0) {
    throw new ValidationError("InvalidShares", "At least one beneficiary is required");
  }

  const seen = new Set<Address>();
  let total = 0;

  for (const { account, shareBps } of shares) {
    assertNotNull(account, "beneficiary");
    if (seen.has(account)) {
      throw new ValidationError("InvalidShares", "Duplicate beneficiary", { account });
    }
    if (!Number.isInteger(shareBps) || shareBps <= 0) {
      throw new ValidationError("InvalidShares", "Share must be a positive integer of bps", {
        account,
        shareBps,
      });
    }
    seen.add(account);
    total += shareBps;
  }

  if (total !== Number(BPS_DENOMINATOR)) {
    throw new ValidationError("InvalidShares", "Shares must sum to 10000 bps", { total });
  }
}

async function sendExternal(
  vault: ExternalAssetVault,
  to: Address,
  amount: bigint
): Promise<GatewayResult<bigint>> {
  try {
    return await vault.send(to, amount);
  } catch (error) {
    if (error instanceof InvariantViolationError) throw error;
    return gatewayFailure(error instanceof Error ? error.message : String(error));
  }
}

function sum(values: Iterable<bigint>): bigint {
  let total = 0n;
  for (const value of values) {
    total += value;
  }
  return total;
}
