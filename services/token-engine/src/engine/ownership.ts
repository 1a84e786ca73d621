/**
 * Single-principal admin authority. Renouncing is terminal.
 */

import { audit, tokenEngineLogger } from "@levy/shared";
import type { Address } from "viem";
import { StatePreconditionError } from "../errors.js";
import { normalizeAccount, toAccount } from "../ledger/accounts.js";
import type { NotificationLog } from "../notifications.js";

const ownershipLogger = tokenEngineLogger.child({ component: "ownership" });

export class Ownership {
  private current: Address | null;

  constructor(
    initialOwner: Address,
    private readonly notifications: NotificationLog
  ) {
    this.current = toAccount(initialOwner, "owner");
  }

  get owner(): Address | null {
    return this.current;
  }

  isOwner(account: Address): boolean {
    return this.current !== null && this.current === normalizeAccount(account);
  }

  /**
   * Gate for every admin operation; records the action on success.
   */
  requireOwner(caller: Address, action: string): void {
    const sender = normalizeAccount(caller, "sender");
    if (!this.isOwner(sender)) {
      ownershipLogger.debug({ sender, action }, "Unauthorized admin call");
      throw new StatePreconditionError("Unauthorized", `Only the owner may ${action}`, {
        sender,
        owner: this.current,
      });
    }

    audit({
      action,
      actor: sender,
      entityType: "token-engine",
      entityId: "admin",
    });
  }

  transferOwnership(sender: Address, nominee: Address): void {
    this.requireOwner(sender, "transferOwnership");
    const newOwner = toAccount(nominee, "newOwner");

    const previousOwner = this.current;
    this.current = newOwner;
    this.notifications.publish("OwnershipTransferred", { previousOwner, newOwner });
  }

  renounceOwnership(sender: Address): void {
    this.requireOwner(sender, "renounceOwnership");

    const previousOwner = this.current;
    this.current = null;
    this.notifications.publish("OwnershipTransferred", { previousOwner, newOwner: null });
    ownershipLogger.warn({ previousOwner }, "Ownership renounced");
  }
}
