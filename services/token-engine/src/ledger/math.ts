/**
 * Checked u256 arithmetic. Nothing here wraps or clamps.
 */

import { BPS_DENOMINATOR, MAX_UINT256 } from "@levy/shared";
import { InvariantViolationError, ValidationError } from "../errors.js";

export function checkedAdd(a: bigint, b: bigint, context: string): bigint {
  const result = a + b;
  if (result > MAX_UINT256) {
    throw new InvariantViolationError("Overflow", `u256 overflow in ${context}`, {
      a: a.toString(),
      b: b.toString(),
    });
  }
  return result;
}

export function checkedSub(a: bigint, b: bigint, context: string): bigint {
  if (b > a) {
    throw new InvariantViolationError("Underflow", `u256 underflow in ${context}`, {
      a: a.toString(),
      b: b.toString(),
    });
  }
  return a - b;
}

/**
 * floor(amount * bps / 10000)
 */
export function applyBps(amount: bigint, bps: number | bigint): bigint {
  return (amount * BigInt(bps)) / BPS_DENOMINATOR;
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function assertAmount(amount: bigint, field = "amount"): void {
  if (amount < 0n || amount > MAX_UINT256) {
    throw new ValidationError("InvalidAmount", `${field} must be within u256 range`, {
      [field]: amount.toString(),
    });
  }
}

export function assertPositiveAmount(amount: bigint, field = "amount"): void {
  assertAmount(amount, field);
  if (amount === 0n) {
    throw new ValidationError("InvalidAmount", `${field} must be greater than zero`);
  }
}
