/**
 * Execution Environment
 *
 * The host that sequences calls. The engine only reads block height, wall
 * clock, the originating account of the current transaction and whether an
 * account carries code. The immediate caller is passed explicitly to every
 * entry point as `sender`.
 */

import type { Address } from "viem";
import { getAddress } from "viem";

export interface ExecutionEnvironment {
  currentBlock(): bigint;
  /** Seconds since epoch */
  currentTime(): bigint;
  txOrigin(): Address;
  isContract(account: Address): boolean;
}

// ============================================
// SIMULATED ENVIRONMENT
// ============================================

export interface SimulatedEnvironmentOptions {
  startBlock: bigint;
  startTime: bigint;
  secondsPerBlock: bigint;
  origin: Address;
}

const DEFAULT_OPTIONS: SimulatedEnvironmentOptions = {
  startBlock: 1_000n,
  startTime: 1_700_000_000n,
  secondsPerBlock: 2n,
  origin: "0x0000000000000000000000000000000000000001",
};

/**
 * In-process host used by tests and local simulations.
 */
export class SimulatedEnvironment implements ExecutionEnvironment {
  private block: bigint;
  private time: bigint;
  private origin: Address;
  private readonly secondsPerBlock: bigint;
  private readonly contracts: Set<Address> = new Set();

  constructor(options?: Partial<SimulatedEnvironmentOptions>) {
    const resolved = { ...DEFAULT_OPTIONS, ...options };
    this.block = resolved.startBlock;
    this.time = resolved.startTime;
    this.origin = resolved.origin;
    this.secondsPerBlock = resolved.secondsPerBlock;
  }

  currentBlock(): bigint {
    return this.block;
  }

  currentTime(): bigint {
    return this.time;
  }

  txOrigin(): Address {
    return this.origin;
  }

  isContract(account: Address): boolean {
    return this.contracts.has(getAddress(account));
  }

  /**
   * Advance by whole blocks; time moves with them.
   */
  mine(blocks = 1n): void {
    this.block += blocks;
    this.time += blocks * this.secondsPerBlock;
  }

  /**
   * Advance wall clock without producing blocks.
   */
  advanceTime(seconds: bigint): void {
    this.time += seconds;
  }

  setOrigin(origin: Address): void {
    this.origin = getAddress(origin);
  }

  markContract(account: Address): void {
    this.contracts.add(getAddress(account));
  }
}
