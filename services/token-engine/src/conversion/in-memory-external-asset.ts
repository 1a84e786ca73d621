/**
 * In-memory External Asset
 *
 * Stand-in for the external asset the token converts into. Supports a
 * transfer fee and per-recipient send failures so tests can exercise
 * balance-delta measurement and failed settles.
 */

import type { Address } from "viem";
import { getAddress } from "viem";
import { ResourceError } from "../errors.js";
import { applyBps, assertAmount } from "../ledger/math.js";
import type { ExternalAssetVault, GatewayResult } from "./types.js";
import { gatewayFailure, gatewayOk } from "./types.js";

export interface InMemoryExternalAssetOptions {
  address: Address;
  /** Withheld from every delivery, in bps */
  transferFeeBps: number;
}

export class InMemoryExternalAsset {
  readonly address: Address;
  transferFeeBps: number;

  private readonly balances: Map<Address, bigint> = new Map();
  private readonly rejectingRecipients: Set<Address> = new Set();

  constructor(options: Partial<InMemoryExternalAssetOptions> = {}) {
    this.address = getAddress(options.address ?? "0x00000000000000000000000000000000000E0001");
    this.transferFeeBps = options.transferFeeBps ?? 0;
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(account) ?? 0n;
  }

  /**
   * Deliver freshly issued units, less the transfer fee. Returns what arrived.
   */
  credit(account: Address, amount: bigint): bigint {
    assertAmount(amount);
    const delivered = amount - applyBps(amount, this.transferFeeBps);
    this.balances.set(account, this.balanceOf(account) + delivered);
    return delivered;
  }

  debit(account: Address, amount: bigint): void {
    assertAmount(amount);
    const available = this.balanceOf(account);
    if (available < amount) {
      throw new ResourceError("InsufficientBalance", "External asset balance too low", {
        account,
        requested: amount.toString(),
        available: available.toString(),
      });
    }
    this.balances.set(account, available - amount);
  }

  move(from: Address, to: Address, amount: bigint): bigint {
    this.debit(from, amount);
    return this.credit(to, amount);
  }

  rejectTransfersTo(account: Address, reject = true): void {
    if (reject) {
      this.rejectingRecipients.add(account);
    } else {
      this.rejectingRecipients.delete(account);
    }
  }

  /**
   * The holding of one account, as the token engine sees its own.
   */
  vaultFor(owner: Address): ExternalAssetVault {
    return {
      balance: async () => this.balanceOf(owner),
      send: async (to: Address, amount: bigint): Promise<GatewayResult<bigint>> => {
        if (this.rejectingRecipients.has(to)) {
          return gatewayFailure(`recipient ${to} rejected the transfer`);
        }
        if (this.balanceOf(owner) < amount) {
          return gatewayFailure("insufficient external asset balance");
        }
        return gatewayOk(this.move(owner, to, amount));
      },
    };
  }
}
