/**
 * Burn Threshold Monitor
 *
 * Two states, taxed -> untaxed. The transition fires the first time
 * cumulative burn reaches the threshold and can never be undone.
 */

import { tokenEngineLogger } from "@levy/shared";
import type { Address } from "viem";
import type { NotificationLog } from "../notifications.js";
import { assertAmount, checkedAdd } from "../ledger/math.js";
import type { BurnSource, PolicyPhase, PolicyState } from "./types.js";

const burnLogger = tokenEngineLogger.child({ component: "burn-monitor" });

export interface BurnRecordResult {
  burnedTotal: bigint;
  /** True only on the call that crossed the threshold */
  taxesRemovedNow: boolean;
}

export class BurnThresholdMonitor {
  constructor(
    private readonly policy: PolicyState,
    private readonly notifications: NotificationLog
  ) {}

  get phase(): PolicyPhase {
    return this.policy.taxesRemoved ? "untaxed" : "taxed";
  }

  get burnedTotal(): bigint {
    return this.policy.burnedTotal;
  }

  /**
   * Account for tokens that have already left circulation.
   */
  recordBurn(from: Address, amount: bigint, source: BurnSource): BurnRecordResult {
    assertAmount(amount);
    if (amount === 0n) {
      return { burnedTotal: this.policy.burnedTotal, taxesRemovedNow: false };
    }

    const before = this.policy.burnedTotal;
    const after = checkedAdd(before, amount, "burnedTotal");
    this.policy.burnedTotal = after;

    this.notifications.publish("Burned", {
      from,
      amount,
      source,
      burnedTotalBefore: before,
      burnedTotalAfter: after,
    });

    return { burnedTotal: after, taxesRemovedNow: this.checkThreshold() };
  }

  /**
   * Idempotent: a second call after the transition is a no-op.
   */
  checkThreshold(): boolean {
    if (this.policy.taxesRemoved) return false;
    if (this.policy.burnedTotal < this.policy.burnThreshold) return false;

    this.policy.taxesRemoved = true;
    this.notifications.publish("TaxesRemoved", {
      burnedTotal: this.policy.burnedTotal,
      burnThreshold: this.policy.burnThreshold,
    });

    burnLogger.info({
      burnedTotal: this.policy.burnedTotal.toString(),
      burnThreshold: this.policy.burnThreshold.toString(),
    }, "Burn threshold reached, taxes permanently removed");

    return true;
  }
}
