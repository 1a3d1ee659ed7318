/**
 * @potledger/service — Error envelopes.
 *
 * Every failure that crosses the service boundary has the shape:
 * { error: { code: string, kind: ErrorKind, message: string, details?: Record<string, unknown> } }
 */

import { LedgerError } from "@potledger/ledger";
import { CurrencyError } from "@potledger/currency";

// =============================================================================
// Kinds
// =============================================================================

/**
 * What the caller can do about a failure.
 */
export type ErrorKind =
  | "NOT_FOUND"
  | "OWNERSHIP_VIOLATION"
  | "INSUFFICIENT_FUNDS"
  | "UNBALANCED_LEGS"
  | "EXCHANGE_RATE_MISSING"
  | "VALIDATION"
  | "CONFLICT"
  | "STORAGE"
  | "INTERNAL";

const KIND_MAP: Readonly<Record<string, ErrorKind>> = {
  // Lookups
  ACCOUNT_NOT_FOUND: "NOT_FOUND",
  POT_NOT_FOUND: "NOT_FOUND",
  TRANSACTION_NOT_FOUND: "NOT_FOUND",
  UNKNOWN_CURRENCY: "NOT_FOUND",
  CATEGORY_NOT_FOUND: "NOT_FOUND",
  SCENARIO_NOT_FOUND: "NOT_FOUND",

  // Transfers
  POT_OWNERSHIP_MISMATCH: "OWNERSHIP_VIOLATION",
  INSUFFICIENT_FUNDS: "INSUFFICIENT_FUNDS",
  UNBALANCED_LEGS: "UNBALANCED_LEGS",
  EXCHANGE_RATE_MISSING: "EXCHANGE_RATE_MISSING",

  // Input
  INVALID_AMOUNT: "VALIDATION",
  INVALID_RATE: "VALIDATION",
  INVALID_DATE: "VALIDATION",
  INVALID_CURRENCY: "VALIDATION",
  CURRENCY_MISMATCH: "VALIDATION",
  TOO_FEW_LEGS: "VALIDATION",
  SAME_ACCOUNT: "VALIDATION",
  SAME_POT: "VALIDATION",
  POT_INACTIVE: "VALIDATION",
  SEED_INVALID: "VALIDATION",

  // State
  DUPLICATE_CURRENCY: "CONFLICT",
  RECORD_CONFLICT: "CONFLICT",
  CATEGORY_CYCLE: "CONFLICT",
  STORE_BUSY: "CONFLICT",
  STORE_CLOSED: "STORAGE",
  STORAGE_FAILURE: "STORAGE",
  SNAPSHOT_INTEGRITY: "STORAGE",
};

export function errorKind(code: string): ErrorKind {
  return KIND_MAP[code] ?? "INTERNAL";
}

// =============================================================================
// Envelope
// =============================================================================

export interface ErrorDetail {
  readonly code: string;
  readonly kind: ErrorKind;
  readonly message: string;
  readonly details?: Readonly<Record<string, unknown>>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: string,
  message: string,
  details?: Readonly<Record<string, unknown>>,
): ErrorEnvelope {
  const error: ErrorDetail = { code, kind: errorKind(code), message };
  if (details !== undefined) {
    return { error: { ...error, details } };
  }
  return { error };
}

/**
 * Map any thrown value to an envelope. Domain errors keep their code and
 * details; anything else becomes INTERNAL_ERROR without leaking its message.
 */
export function toErrorEnvelope(err: unknown): ErrorEnvelope {
  if (err instanceof LedgerError || err instanceof CurrencyError) {
    return createErrorEnvelope(err.code, err.message, err.details);
  }
  return createErrorEnvelope("INTERNAL_ERROR", "Internal error");
}

export function isDomainError(err: unknown): err is LedgerError | CurrencyError {
  return err instanceof LedgerError || err instanceof CurrencyError;
}
