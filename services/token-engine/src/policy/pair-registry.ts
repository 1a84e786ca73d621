/**
 * Pair Registry
 *
 * Addresses recognised as exchange pairs. The primary pair is set once,
 * either by the admin or the first time the gateway resolves one, and never
 * changes afterwards.
 */

import { tokenEngineLogger } from "@levy/shared";
import type { Address } from "viem";
import { StatePreconditionError } from "../errors.js";
import type { NotificationLog } from "../notifications.js";

const pairLogger = tokenEngineLogger.child({ component: "pair-registry" });

export class PairRegistry {
  private readonly pairs: Set<Address> = new Set();
  private primary: Address | null = null;

  constructor(private readonly notifications: NotificationLog) {}

  isPair(account: Address): boolean {
    return this.pairs.has(account);
  }

  get primaryPair(): Address | null {
    return this.primary;
  }

  list(): Address[] {
    return Array.from(this.pairs);
  }

  setPrimary(pair: Address, source: "admin" | "gateway"): void {
    if (this.primary !== null) {
      throw new StatePreconditionError("PairAlreadySet", "Primary pair is already set", {
        primaryPair: this.primary,
      });
    }

    this.primary = pair;
    this.notifications.publish("PrimaryPairSet", { pair, source });
    this.register(pair, true);

    pairLogger.info({ pair, source }, "Primary pair set");
  }

  register(pair: Address, isPair: boolean): void {
    if (!isPair && pair === this.primary) {
      throw new StatePreconditionError("PairAlreadySet", "Primary pair cannot be unregistered", {
        pair,
      });
    }

    if (isPair) {
      this.pairs.add(pair);
    } else {
      this.pairs.delete(pair);
    }

    this.notifications.publish("PairRegistered", { pair, isPair });
  }
}
