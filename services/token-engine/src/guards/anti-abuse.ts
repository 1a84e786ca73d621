/**
 * Anti-abuse Guards
 *
 * Admission checks run before any tax is computed:
 * - trading gate (only admin and the token's own account move before launch)
 * - launch-window bot exclusion
 * - pair-to-pair size cap and per-sender cooldown
 * - max transaction size for plain wallet transfers
 *
 * Checks never mutate; the cooldown stamp is written by the pipeline only
 * after the transfer has committed.
 */

import { tokenEngineLogger } from "@levy/shared";
import type { Address } from "viem";
import { ResourceError, StatePreconditionError } from "../errors.js";
import type { ExecutionEnvironment } from "../environment.js";
import type { NotificationLog } from "../notifications.js";
import { assertAmount } from "../ledger/math.js";

const guardLogger = tokenEngineLogger.child({ component: "anti-abuse" });

// ============================================
// TYPES
// ============================================

/**
 * contract-allowlist: contract callers must be router, pair, exempt or allow-listed
 * origin-only: the immediate caller must be the transaction's originating account
 */
export type LaunchGuardMode = "contract-allowlist" | "origin-only";

export interface AntiAbuseSettings {
  maxTxAmount: bigint;
  maxPairToPairAmount: bigint;
  cooldownSeconds: bigint;
  antiBotWindowBlocks: bigint;
  launchGuardMode: LaunchGuardMode;
}

export interface AntiAbuseState extends AntiAbuseSettings {
  readonly maxTxAmount: bigint;
  lastPairTransferAt: Map<Address, bigint>;
  launchBlock: bigint | null;
  /** Monotonic false -> true */
  tradingEnabled: boolean;
  launchAllowList: Set<Address>;
}

export interface GuardInput {
  from: Address;
  to: Address;
  amount: bigint;
  sender: Address;
  owner: Address | null;
  self: Address;
  router: Address;
  isPair: (account: Address) => boolean;
  isExempt: (account: Address) => boolean;
}

export interface GuardDecision {
  pairToPair: boolean;
}

// ============================================
// GUARDS
// ============================================

export class AntiAbuseGuards {
  readonly state: AntiAbuseState;

  constructor(
    settings: AntiAbuseSettings,
    launchAllowList: Address[],
    private readonly environment: ExecutionEnvironment,
    private readonly notifications: NotificationLog
  ) {
    this.state = {
      ...settings,
      lastPairTransferAt: new Map(),
      launchBlock: null,
      tradingEnabled: false,
      launchAllowList: new Set(launchAllowList),
    };
  }

  check(input: GuardInput): GuardDecision {
    const { from, to, amount, isPair, isExempt } = input;

    this.checkTradingGate(input);
    this.checkLaunchWindow(input);

    const pairToPair = isPair(from) && isPair(to);

    if (pairToPair) {
      this.checkPairToPair(from, amount);
    } else if (!isExempt(from) && !isExempt(to) && !isPair(from) && !isPair(to)) {
      if (amount > this.state.maxTxAmount) {
        throw new ResourceError("ExceedsMaxTx", "Transfer exceeds the maximum transaction size", {
          amount: amount.toString(),
          maxTxAmount: this.state.maxTxAmount.toString(),
        });
      }
    }

    return { pairToPair };
  }

  recordPairTransfer(from: Address): void {
    this.state.lastPairTransferAt.set(from, this.environment.currentTime());
  }

  isInLaunchWindow(): boolean {
    if (!this.state.tradingEnabled || this.state.launchBlock === null) return false;
    return this.environment.currentBlock() <= this.state.launchBlock + this.state.antiBotWindowBlocks;
  }

  // ============================================
  // ADMIN MUTATIONS
  // ============================================

  enableTrading(): bigint {
    if (this.state.tradingEnabled) {
      throw new StatePreconditionError("TradingAlreadyEnabled", "Trading is already enabled");
    }

    const launchBlock = this.environment.currentBlock();
    this.state.tradingEnabled = true;
    this.state.launchBlock = launchBlock;
    this.notifications.publish("TradingEnabled", { launchBlock });

    guardLogger.info({ launchBlock: launchBlock.toString() }, "Trading enabled");
    return launchBlock;
  }

  setMaxPairToPairAmount(amount: bigint): void {
    assertAmount(amount, "maxPairToPairAmount");
    const before = this.state.maxPairToPairAmount;
    this.state.maxPairToPairAmount = amount;
    this.notifications.publish("AntiAbuseUpdated", {
      field: "maxPairToPairAmount",
      before,
      after: amount,
    });
  }

  setCooldownSeconds(seconds: bigint): void {
    assertAmount(seconds, "cooldownSeconds");
    const before = this.state.cooldownSeconds;
    this.state.cooldownSeconds = seconds;
    this.notifications.publish("AntiAbuseUpdated", {
      field: "cooldownSeconds",
      before,
      after: seconds,
    });
  }

  setLaunchAllowed(account: Address, allowed: boolean): void {
    if (allowed) {
      this.state.launchAllowList.add(account);
    } else {
      this.state.launchAllowList.delete(account);
    }
    this.notifications.publish("LaunchAllowListUpdated", { account, allowed });
  }

  // ============================================
  // PRIVATE METHODS
  // ============================================

  private checkTradingGate(input: GuardInput): void {
    if (this.state.tradingEnabled) return;

    const { from, to, owner, self } = input;
    const touchesOwner = owner !== null && (from === owner || to === owner);
    const touchesSelf = from === self || to === self;

    if (!touchesOwner && !touchesSelf) {
      guardLogger.debug({ from, to }, "Transfer rejected before trading enabled");
      throw new StatePreconditionError("TradingNotEnabled", "Trading is not enabled yet", {
        from,
        to,
      });
    }
  }

  private checkLaunchWindow(input: GuardInput): void {
    if (!this.isInLaunchWindow()) return;

    const { from, to, sender, router, isPair, isExempt } = input;
    if (isExempt(from) || isExempt(to)) return;

    if (this.state.launchGuardMode === "origin-only") {
      if (sender !== this.environment.txOrigin()) {
        this.rejectLaunch(sender, "caller is not the transaction origin");
      }
      return;
    }

    if (!this.environment.isContract(sender)) return;

    const allowed =
      sender === router ||
      isPair(sender) ||
      isExempt(sender) ||
      this.state.launchAllowList.has(sender);

    if (!allowed) {
      this.rejectLaunch(sender, "contract caller is not allow-listed");
    }
  }

  private rejectLaunch(sender: Address, reason: string): never {
    guardLogger.warn({ sender, reason }, "Launch-window transfer rejected");
    throw new StatePreconditionError("LaunchGuardRejected", `Launch guard: ${reason}`, {
      sender,
      launchBlock: this.state.launchBlock?.toString(),
    });
  }

  private checkPairToPair(from: Address, amount: bigint): void {
    if (amount > this.state.maxPairToPairAmount) {
      throw new ResourceError("ExceedsPairLimit", "Pair-to-pair transfer exceeds the limit", {
        amount: amount.toString(),
        maxPairToPairAmount: this.state.maxPairToPairAmount.toString(),
      });
    }

    const last = this.state.lastPairTransferAt.get(from);
    if (last === undefined) return;

    const now = this.environment.currentTime();
    const readyAt = last + this.state.cooldownSeconds;
    if (now < readyAt) {
      throw new ResourceError("CooldownActive", "Pair-to-pair cooldown is active", {
        from,
        readyAt: readyAt.toString(),
        now: now.toString(),
      });
    }
  }
}
