/**
 * Runtime Type Guards
 *
 * Narrowing functions for ledger domain types.
 * These enable safe runtime validation at system boundaries
 * (service inputs, deserialized store records, seed files).
 */

import type {
  AccountType,
  CurrencyKind,
  DecimalString,
  IsoDate,
  LegType,
  Money,
} from "./financial.js";

const ACCOUNT_TYPES = new Set<string>([
  "current",
  "savings",
  "credit_card",
  "loan",
  "mortgage",
  "crypto",
]);
const CURRENCY_KINDS = new Set<string>(["fiat", "crypto"]);
const LEG_TYPES = new Set<string>(["debit", "credit"]);

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isAccountType(value: unknown): value is AccountType {
  return typeof value === "string" && ACCOUNT_TYPES.has(value);
}

export function isCurrencyKind(value: unknown): value is CurrencyKind {
  return typeof value === "string" && CURRENCY_KINDS.has(value);
}

export function isLegType(value: unknown): value is LegType {
  return typeof value === "string" && LEG_TYPES.has(value);
}

export function isDecimalString(value: unknown): value is DecimalString {
  return typeof value === "string" && DECIMAL_PATTERN.test(value);
}

/**
 * A real calendar date in YYYY-MM-DD form ("2024-02-30" is rejected).
 */
export function isIsoDate(value: unknown): value is IsoDate {
  if (typeof value !== "string") return false;
  const match = DATE_PATTERN.exec(value);
  if (match === null) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

export function isMoney(value: unknown): value is Money {
  if (value === null || typeof value !== "object") return false;
  if (!("amount" in value) || !("currency" in value) || !("decimals" in value)) return false;
  const { amount, currency, decimals } = value;
  return (
    isDecimalString(amount) &&
    typeof currency === "string" &&
    currency.length > 0 &&
    typeof decimals === "number" &&
    Number.isInteger(decimals) &&
    decimals >= 0
  );
}
