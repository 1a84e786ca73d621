import { getAddress, isAddress, isAddressEqual, type Address } from "viem";
import { NULL_ACCOUNT } from "@levy/shared";
import { ValidationError } from "../errors.js";

/**
 * Checksummed form of caller input. Every map key and comparison uses it.
 */
export function normalizeAccount(value: string, field = "account"): Address {
  if (!isAddress(value, { strict: false })) {
    throw new ValidationError("InvalidAccount", `${field} is not a valid address`, {
      [field]: value,
    });
  }
  return getAddress(value);
}

/**
 * Normalise caller input to a checksummed account. Rejects malformed input
 * and the null account.
 */
export function toAccount(value: string, field = "account"): Address {
  const account = normalizeAccount(value, field);
  if (isNullAccount(account)) {
    throw new ValidationError("InvalidAccount", `${field} cannot be the null account`);
  }
  return account;
}

export function isNullAccount(account: Address): boolean {
  return isAddressEqual(account, NULL_ACCOUNT);
}

export function assertNotNull(account: Address, field: string): void {
  if (isNullAccount(account)) {
    throw new ValidationError("InvalidAccount", `${field} cannot be the null account`);
  }
}
