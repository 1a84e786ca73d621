/**
 * Swap Lock
 *
 * The only mutual-exclusion primitive. Nested entry fails immediately with
 * SwapLocked; it never waits. `heldFor` tells a conversion apart from a
 * plain pair lookup, since only the former moves tokens on the token's behalf.
 */

import { StatePreconditionError } from "../errors.js";

export type SwapLockPurpose = "conversion" | "pair-lookup";

export class SwapLock {
  private purpose: SwapLockPurpose | null = null;

  get isLocked(): boolean {
    return this.purpose !== null;
  }

  get heldFor(): SwapLockPurpose | null {
    return this.purpose;
  }

  async run<T>(fn: () => Promise<T>, purpose: SwapLockPurpose = "conversion"): Promise<T> {
    if (this.purpose !== null) {
      throw new StatePreconditionError("SwapLocked", "Conversion already in progress", {
        heldFor: this.purpose,
      });
    }

    this.purpose = purpose;
    try {
      return await fn();
    } finally {
      this.purpose = null;
    }
  }
}
