/**
 * Distribution Types
 */

import type { Address } from "viem";

export interface BeneficiaryShare {
  account: Address;
  /** All shares of a configuration sum to exactly 10000 */
  shareBps: number;
}

export interface DistributionState {
  beneficiaries: BeneficiaryShare[];
  pending: Map<Address, bigint>;
  /** Amounts whose send failed, kept until an admin requeues them */
  failed: Map<Address, bigint>;
  /** Sum of sends that have left pending but not yet completed */
  inFlight: bigint;
  queued: boolean;
  lastQueuedBlock: bigint | null;
  readonly minDelayBlocks: bigint;
}

export interface DistributionAllocation {
  beneficiary: Address;
  amount: bigint;
}

export interface QueuedDistribution {
  total: bigint;
  allocations: DistributionAllocation[];
}
