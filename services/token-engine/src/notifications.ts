/**
 * Notification Log
 *
 * Append-only record of every state change, also emitted live so indexers can
 * follow along. Payloads carry before/after or delta values so policy state,
 * ledger aggregates and distribution history can be rebuilt from the log alone.
 */

import { EventEmitter } from "eventemitter3";
import type { Address } from "viem";
import type { ExecutionEnvironment } from "./environment.js";
import type { BurnSource, TaxKind, TaxRates, TaxSplit } from "./policy/types.js";
import type { BeneficiaryShare } from "./distribution/types.js";
import type { ConversionOperation, ConversionSettings } from "./conversion/types.js";

// ============================================
// PAYLOADS
// ============================================

export interface TokenNotificationMap {
  Transfer: { from: Address; to: Address; amount: bigint };
  Approval: { owner: Address; spender: Address; amount: bigint };
  TaxCollected: {
    from: Address;
    to: Address;
    kind: TaxKind;
    amount: bigint;
    burn: bigint;
    treasury: bigint;
    liquidity: bigint;
  };
  Burned: {
    from: Address;
    amount: bigint;
    source: BurnSource;
    burnedTotalBefore: bigint;
    burnedTotalAfter: bigint;
  };
  TaxesRemoved: { burnedTotal: bigint; burnThreshold: bigint };
  PairRegistered: { pair: Address; isPair: boolean };
  PrimaryPairSet: { pair: Address; source: "admin" | "gateway" };
  TradingEnabled: { launchBlock: bigint };
  TaxRatesUpdated: { before: TaxRates; after: TaxRates };
  TaxSplitUpdated: { before: TaxSplit; after: TaxSplit };
  ExemptionUpdated: { account: Address; exempt: boolean };
  LaunchAllowListUpdated: { account: Address; allowed: boolean };
  BeneficiariesUpdated: { before: BeneficiaryShare[]; after: BeneficiaryShare[] };
  AntiAbuseUpdated: {
    field: "maxPairToPairAmount" | "cooldownSeconds";
    before: bigint;
    after: bigint;
  };
  ConversionSettingsUpdated: { before: ConversionSettings; after: ConversionSettings };
  ConversionSucceeded: {
    operation: ConversionOperation;
    tokensIn: bigint;
    externalReceived: bigint;
  };
  ConversionFailed: {
    operation: ConversionOperation;
    stage: "swap" | "add-liquidity";
    tokenAmount: bigint;
    reason: string;
  };
  LiquidityAdded: { tokenAmount: bigint; externalAmount: bigint; liquidity: bigint };
  BuybackExecuted: { externalSpent: bigint; tokensBurned: bigint; burnedTotal: bigint };
  BuybackFailed: { externalAmount: bigint; reason: string };
  DistributionQueued: { total: bigint; allocations: Array<{ beneficiary: Address; amount: bigint }> };
  DistributionSettled: { beneficiary: Address; amount: bigint };
  DistributionSettleFailed: { beneficiary: Address; amount: bigint; reason: string };
  DistributionRequeued: { beneficiary: Address; amount: bigint };
  OwnershipTransferred: { previousOwner: Address | null; newOwner: Address | null };
}

export type NotificationType = keyof TokenNotificationMap;

export interface TokenNotification<K extends NotificationType = NotificationType> {
  sequence: number;
  type: K;
  block: bigint;
  timestamp: bigint;
  payload: TokenNotificationMap[K];
}

export interface NotificationLogEvents {
  notification: (notification: TokenNotification) => void;
}

// ============================================
// NOTIFICATION LOG
// ============================================

export class NotificationLog extends EventEmitter<NotificationLogEvents> {
  private readonly entries: TokenNotification[] = [];

  constructor(private readonly environment: ExecutionEnvironment) {
    super();
  }

  publish<K extends NotificationType>(
    type: K,
    payload: TokenNotificationMap[K]
  ): TokenNotification<K> {
    const notification: TokenNotification<K> = {
      sequence: this.entries.length,
      type,
      block: this.environment.currentBlock(),
      timestamp: this.environment.currentTime(),
      payload,
    };

    this.entries.push(notification);
    this.emit("notification", notification);

    return notification;
  }

  /**
   * Entries of one type, oldest first
   */
  ofType<K extends NotificationType>(type: K): TokenNotification<K>[] {
    return this.entries.filter(
      (entry): entry is TokenNotification<K> => entry.type === type
    );
  }

  all(): readonly TokenNotification[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }
}
