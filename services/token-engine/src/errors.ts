/**
 * Token Engine Errors
 *
 * Every failure surfaced by an entry point is one of these. The category tells
 * the caller whether a retry with corrected input, a state re-check, or nothing
 * at all is appropriate.
 */

// ============================================
// ERROR CODES
// ============================================

export type ValidationErrorCode =
  | "InvalidAccount"
  | "InvalidAmount"
  | "InvalidShares"
  | "InvalidConfiguration"
  | "TaxRateTooHigh";

export type StatePreconditionErrorCode =
  | "AlreadyQueued"
  | "SwapLocked"
  | "TradingAlreadyEnabled"
  | "TradingNotEnabled"
  | "PairAlreadySet"
  | "TaxesRemoved"
  | "NothingToConvert"
  | "NothingToDistribute"
  | "NothingPending"
  | "NothingToRequeue"
  | "TooSoon"
  | "Unauthorized"
  | "LaunchGuardRejected";

export type ResourceErrorCode =
  | "InsufficientBalance"
  | "InsufficientAllowance"
  | "ExceedsMaxTx"
  | "ExceedsPairLimit"
  | "CooldownActive";

export type ExternalDependencyErrorCode = "TransferFailed" | "GatewayFailure";

export type InvariantErrorCode = "Overflow" | "Underflow" | "SupplyMismatch";

export type TokenErrorCode =
  | ValidationErrorCode
  | StatePreconditionErrorCode
  | ResourceErrorCode
  | ExternalDependencyErrorCode
  | InvariantErrorCode;

export type ErrorCategory =
  | "validation"
  | "state"
  | "resource"
  | "external"
  | "invariant";

// ============================================
// ERRORS
// ============================================

export abstract class TokenEngineError extends Error {
  abstract readonly category: ErrorCategory;

  constructor(
    public readonly code: TokenErrorCode,
    message: string,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = "TokenEngineError";
  }
}

export class ValidationError extends TokenEngineError {
  readonly category = "validation" as const;

  constructor(code: ValidationErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = "ValidationError";
  }
}

export class StatePreconditionError extends TokenEngineError {
  readonly category = "state" as const;

  constructor(code: StatePreconditionErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = "StatePreconditionError";
  }
}

export class ResourceError extends TokenEngineError {
  readonly category = "resource" as const;

  constructor(code: ResourceErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = "ResourceError";
  }
}

export class ExternalDependencyError extends TokenEngineError {
  readonly category = "external" as const;

  constructor(code: ExternalDependencyErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = "ExternalDependencyError";
  }
}

/**
 * Unreachable in correct code. Never caught and clamped.
 */
export class InvariantViolationError extends TokenEngineError {
  readonly category = "invariant" as const;

  constructor(code: InvariantErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = "InvariantViolationError";
  }
}

export function isTokenEngineError(
  error: unknown,
  code?: TokenErrorCode
): error is TokenEngineError {
  if (!(error instanceof TokenEngineError)) return false;
  return code === undefined || error.code === code;
}
