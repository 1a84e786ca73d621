/**
 * Ledger
 *
 * Exclusive owner of balances, allowances and total supply. Every other
 * component mutates token state through these operations only.
 *
 * Invariant: sum(balances) == totalSupply after every operation.
 */

import { tokenEngineLogger, logFatal, MAX_UINT256, NULL_ACCOUNT } from "@levy/shared";
import type { Address } from "viem";
import { InvariantViolationError, ResourceError } from "../errors.js";
import type { NotificationLog } from "../notifications.js";
import { assertNotNull } from "./accounts.js";
import { assertAmount, checkedAdd, checkedSub } from "./math.js";

const ledgerLogger = tokenEngineLogger.child({ component: "ledger" });

export interface LedgerSnapshot {
  totalSupply: bigint;
  holderCount: number;
}

export class Ledger {
  private supply = 0n;
  private readonly balances: Map<Address, bigint> = new Map();
  private readonly allowances: Map<Address, Map<Address, bigint>> = new Map();

  constructor(private readonly notifications: NotificationLog) {}

  // ============================================
  // READS
  // ============================================

  totalSupply(): bigint {
    return this.supply;
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(account) ?? 0n;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.allowances.get(owner)?.get(spender) ?? 0n;
  }

  /**
   * Accounts that have ever been credited, including those back at zero
   */
  holders(): Address[] {
    return Array.from(this.balances.keys());
  }

  getSnapshot(): LedgerSnapshot {
    return {
      totalSupply: this.supply,
      holderCount: this.balances.size,
    };
  }

  // ============================================
  // MUTATIONS
  // ============================================

  mint(to: Address, amount: bigint): void {
    assertNotNull(to, "to");
    assertAmount(amount);

    const newSupply = checkedAdd(this.supply, amount, "mint supply");
    const newBalance = checkedAdd(this.balanceOf(to), amount, "mint balance");

    this.supply = newSupply;
    this.balances.set(to, newBalance);

    this.notifications.publish("Transfer", { from: NULL_ACCOUNT, to, amount });
    ledgerLogger.debug({ to, amount: amount.toString() }, "Minted");
  }

  burn(from: Address, amount: bigint): void {
    assertNotNull(from, "from");
    assertAmount(amount);
    this.requireBalance(from, amount);

    this.balances.set(from, checkedSub(this.balanceOf(from), amount, "burn balance"));
    this.supply = checkedSub(this.supply, amount, "burn supply");

    this.notifications.publish("Transfer", { from, to: NULL_ACCOUNT, amount });
    ledgerLogger.debug({ from, amount: amount.toString() }, "Burned");
  }

  /**
   * Moves exactly `amount`. Routing decisions (tax, burn) happen before this
   * is called; the ledger only applies what it is told.
   */
  transfer(from: Address, to: Address, amount: bigint): void {
    assertNotNull(from, "from");
    assertNotNull(to, "to");
    assertAmount(amount);
    this.requireBalance(from, amount);

    if (from !== to) {
      const newTo = checkedAdd(this.balanceOf(to), amount, "transfer credit");
      this.balances.set(from, checkedSub(this.balanceOf(from), amount, "transfer debit"));
      this.balances.set(to, newTo);
    }

    this.notifications.publish("Transfer", { from, to, amount });
  }

  approve(owner: Address, spender: Address, amount: bigint): void {
    assertNotNull(owner, "owner");
    assertNotNull(spender, "spender");
    assertAmount(amount);

    this.setAllowance(owner, spender, amount);
    this.notifications.publish("Approval", { owner, spender, amount });
  }

  /**
   * MAX_UINT256 is an unlimited allowance and is never decremented.
   */
  spendAllowance(owner: Address, spender: Address, amount: bigint): void {
    assertAmount(amount);
    const current = this.allowance(owner, spender);
    if (current === MAX_UINT256) return;

    if (current < amount) {
      throw new ResourceError("InsufficientAllowance", "Allowance too low", {
        owner,
        spender,
        requested: amount.toString(),
        available: current.toString(),
      });
    }

    this.setAllowance(owner, spender, current - amount);
  }

  // ============================================
  // INVARIANT
  // ============================================

  assertSupplyInvariant(): void {
    let sum = 0n;
    for (const balance of this.balances.values()) {
      sum += balance;
    }

    if (sum !== this.supply) {
      const error = new InvariantViolationError(
        "SupplyMismatch",
        `Sum of balances ${sum} does not match total supply ${this.supply}`,
        { sum: sum.toString(), totalSupply: this.supply.toString() }
      );
      logFatal(error, { component: "ledger", ...error.details });
      throw error;
    }
  }

  // ============================================
  // PRIVATE METHODS
  // ============================================

  private requireBalance(account: Address, amount: bigint): void {
    const available = this.balanceOf(account);
    if (available < amount) {
      throw new ResourceError("InsufficientBalance", "Balance too low", {
        account,
        requested: amount.toString(),
        available: available.toString(),
      });
    }
  }

  private setAllowance(owner: Address, spender: Address, amount: bigint): void {
    let spenders = this.allowances.get(owner);
    if (!spenders) {
      spenders = new Map();
      this.allowances.set(owner, spenders);
    }
    spenders.set(spender, amount);
  }
}
