/**
 * @potledger/ledger — Deterministic decimal arithmetic.
 *
 * All arithmetic uses bigint internally, scaled to LEDGER_SCALE (12)
 * fractional digits. Decimal strings are converted to/from bigint via
 * decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Currency must match for all Money operations
 * - Amounts must be valid decimal strings
 * - Multiplication and division round half-even back to LEDGER_SCALE
 * - A currency's `decimals` governs display rounding only
 */

import type { Money } from "@potledger/types";
import { LedgerError } from "./types.js";

/** Fractional digits retained for every amount and rate. */
export const LEDGER_SCALE = 12;

const SCALE_FACTOR = 10n ** BigInt(LEDGER_SCALE);

// ─── Internal Helpers ────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=6 → 100000000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const parts = abs.split(".");
  const intPart = parts[0] ?? "0";
  const fracPart = parts[1] ?? "";

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but at most ${String(decimals)} are allowed`,
    );
  }

  const paddedFrac = fracPart.padEnd(decimals, "0");
  const value = BigInt(intPart + paddedFrac);

  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string with exactly `decimals` places.
 *
 * 10050n with decimals=2 → "100.50"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

/**
 * Integer division rounding half to even. `denominator` must be positive.
 */
function divideRounded(numerator: bigint, denominator: bigint): bigint {
  const negative = numerator < 0n;
  const abs = negative ? -numerator : numerator;
  let quotient = abs / denominator;
  const twiceRemainder = (abs % denominator) * 2n;

  if (
    twiceRemainder > denominator ||
    (twiceRemainder === denominator && quotient % 2n === 1n)
  ) {
    quotient += 1n;
  }

  return negative ? -quotient : quotient;
}

// ─── Scaled API (LEDGER_SCALE) ───────────────────────────────────────────

/**
 * Parse a decimal string at ledger precision.
 */
export function toScaled(amount: string): bigint {
  return parseAmount(amount, LEDGER_SCALE);
}

/**
 * Format a ledger-scaled value canonically: trailing zeros trimmed,
 * but never fewer than `minDecimals` fractional digits.
 *
 * -100000000000000n, 2 → "-100.00"
 * 12500000000000n, 2 → "12.50"
 * 123456789000n, 2 → "0.123456789"
 */
export function fromScaled(scaled: bigint, minDecimals: number = 0): string {
  const full = formatAmount(scaled, LEDGER_SCALE);
  const keep = Math.min(Math.max(minDecimals, 0), LEDGER_SCALE);
  const point = full.indexOf(".");
  const intPart = full.slice(0, point);
  let fracPart = full.slice(point + 1);

  while (fracPart.length > keep && fracPart.endsWith("0")) {
    fracPart = fracPart.slice(0, -1);
  }

  return fracPart.length === 0 ? intPart : `${intPart}.${fracPart}`;
}

export function multiplyScaled(a: bigint, b: bigint): bigint {
  return divideRounded(a * b, SCALE_FACTOR);
}

export function divideScaled(a: bigint, b: bigint): bigint {
  if (b === 0n) {
    throw new LedgerError("INVALID_AMOUNT", "Division by zero");
  }
  const numerator = a * SCALE_FACTOR;
  return b < 0n ? divideRounded(-numerator, -b) : divideRounded(numerator, b);
}

/**
 * Round a ledger-scaled value to `decimals` places, staying at ledger scale.
 */
export function roundScaled(scaled: bigint, decimals: number): bigint {
  if (decimals >= LEDGER_SCALE) {
    return scaled;
  }
  const factor = 10n ** BigInt(LEDGER_SCALE - decimals);
  return divideRounded(scaled, factor) * factor;
}

// ─── Decimal String API ──────────────────────────────────────────────────

export function addDecimal(a: string, b: string, minDecimals: number = 0): string {
  return fromScaled(toScaled(a) + toScaled(b), minDecimals);
}

export function subtractDecimal(a: string, b: string, minDecimals: number = 0): string {
  return fromScaled(toScaled(a) - toScaled(b), minDecimals);
}

export function multiplyDecimal(a: string, b: string, minDecimals: number = 0): string {
  return fromScaled(multiplyScaled(toScaled(a), toScaled(b)), minDecimals);
}

export function divideDecimal(a: string, b: string, minDecimals: number = 0): string {
  return fromScaled(divideScaled(toScaled(a), toScaled(b)), minDecimals);
}

/**
 * Round half-even to exactly `decimals` places, for display.
 */
export function roundToDecimals(value: string, decimals: number): string {
  const rounded = roundScaled(toScaled(value), decimals);
  const places = Math.min(decimals, LEDGER_SCALE);
  return formatAmount(rounded / 10n ** BigInt(LEDGER_SCALE - places), places);
}

export function compareDecimal(a: string, b: string): -1 | 0 | 1 {
  const va = toScaled(a);
  const vb = toScaled(b);
  if (va < vb) return -1;
  if (va > vb) return 1;
  return 0;
}

// ─── Money API ───────────────────────────────────────────────────────────

/**
 * Assert two Money values have the same currency.
 */
export function assertSameCurrency(a: Money, b: Money): void {
  if (a.currency !== b.currency) {
    throw new LedgerError(
      "CURRENCY_MISMATCH",
      `Cannot operate on different currencies: "${a.currency}" vs "${b.currency}"`,
      { left: a.currency, right: b.currency },
    );
  }
}

export function toMoney(scaled: bigint, currency: string, decimals: number): Money {
  return { amount: fromScaled(scaled, decimals), currency, decimals };
}

export function addMoney(a: Money, b: Money): Money {
  assertSameCurrency(a, b);
  return toMoney(toScaled(a.amount) + toScaled(b.amount), a.currency, a.decimals);
}

export function subtractMoney(a: Money, b: Money): Money {
  assertSameCurrency(a, b);
  return toMoney(toScaled(a.amount) - toScaled(b.amount), a.currency, a.decimals);
}

export function isNegative(money: Money): boolean {
  return toScaled(money.amount) < 0n;
}

export function zeroMoney(currency: string, decimals: number): Money {
  return toMoney(0n, currency, decimals);
}

export function compareMoney(a: Money, b: Money): -1 | 0 | 1 {
  assertSameCurrency(a, b);
  return compareDecimal(a.amount, b.amount);
}

/**
 * Round a Money amount to its currency's display precision.
 */
export function roundMoney(money: Money): Money {
  return { ...money, amount: roundToDecimals(money.amount, money.decimals) };
}
