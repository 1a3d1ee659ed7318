/**
 * Tests for deterministic decimal arithmetic.
 *
 * Covers:
 * - Parsing and formatting at fixed precision
 * - Canonical ledger-scale output
 * - Half-even rounding for multiplication, division and display
 * - Money operations and currency safety
 */

import { describe, expect, it } from "vitest";
import type { Money } from "@potledger/types";
import {
  addDecimal,
  addMoney,
  compareDecimal,
  compareMoney,
  divideDecimal,
  formatAmount,
  fromScaled,
  isNegative,
  multiplyDecimal,
  parseAmount,
  roundMoney,
  roundToDecimals,
  subtractDecimal,
  subtractMoney,
  toScaled,
  zeroMoney,
} from "../src/money-math.js";
import { LedgerError } from "../src/types.js";

function gbp(amount: string): Money {
  return { amount, currency: "GBP", decimals: 2 };
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err: unknown) {
    return err instanceof LedgerError ? err.code : undefined;
  }
  return undefined;
}

// ─── Parsing and formatting ──────────────────────────────────────────────

describe("parseAmount", () => {
  it("scales by the requested decimals", () => {
    expect(parseAmount("100.50", 2)).toBe(10050n);
    expect(parseAmount("100", 6)).toBe(100000000n);
    expect(parseAmount("-50.25", 2)).toBe(-5025n);
  });

  it("rejects more decimal places than allowed", () => {
    expect(codeOf(() => parseAmount("1.234", 2))).toBe("INVALID_AMOUNT");
  });

  it("rejects malformed input", () => {
    expect(codeOf(() => parseAmount("abc", 2))).toBe("INVALID_AMOUNT");
    expect(codeOf(() => parseAmount("", 2))).toBe("INVALID_AMOUNT");
    expect(codeOf(() => parseAmount("1e5", 2))).toBe("INVALID_AMOUNT");
    expect(codeOf(() => parseAmount(".5", 2))).toBe("INVALID_AMOUNT");
  });
});

describe("formatAmount", () => {
  it("pads to exactly the requested places", () => {
    expect(formatAmount(10050n, 2)).toBe("100.50");
    expect(formatAmount(-5n, 2)).toBe("-0.05");
    expect(formatAmount(7n, 0)).toBe("7");
  });
});

describe("fromScaled", () => {
  it("keeps at least the minimum fractional digits", () => {
    expect(fromScaled(toScaled("-100"), 2)).toBe("-100.00");
    expect(fromScaled(toScaled("12.5"), 2)).toBe("12.50");
    expect(fromScaled(0n, 2)).toBe("0.00");
  });

  it("trims trailing zeros beyond the minimum", () => {
    expect(fromScaled(toScaled("0.123456789"), 2)).toBe("0.123456789");
    expect(fromScaled(toScaled("5.000"))).toBe("5");
  });
});

// ─── Arithmetic ──────────────────────────────────────────────────────────

describe("decimal arithmetic", () => {
  it("adds and subtracts exactly", () => {
    expect(addDecimal("0.1", "0.2")).toBe("0.3");
    expect(subtractDecimal("5", "7.5", 2)).toBe("-2.50");
  });

  it("multiplies a converted amount", () => {
    expect(multiplyDecimal("10", "1.25", 2)).toBe("12.50");
  });

  it("rounds a product half-even at ledger precision", () => {
    // 1e-12 * 0.5 = 0.5e-12 rounds to the even neighbour 0
    expect(multiplyDecimal("0.000000000001", "0.5")).toBe("0");
    // 3e-12 * 0.5 = 1.5e-12 rounds up to 2e-12
    expect(multiplyDecimal("0.000000000003", "0.5")).toBe("0.000000000002");
  });

  it("divides with half-even rounding at ledger precision", () => {
    expect(divideDecimal("1", "3")).toBe("0.333333333333");
    expect(divideDecimal("2", "3")).toBe("0.666666666667");
    expect(divideDecimal("-1", "4")).toBe("-0.25");
    expect(divideDecimal("1", "-4")).toBe("-0.25");
  });

  it("rejects division by zero", () => {
    expect(codeOf(() => divideDecimal("1", "0"))).toBe("INVALID_AMOUNT");
  });

  it("compares by value", () => {
    expect(compareDecimal("1.10", "1.1")).toBe(0);
    expect(compareDecimal("-1", "0")).toBe(-1);
    expect(compareDecimal("2", "1.999999999999")).toBe(1);
  });
});

describe("roundToDecimals", () => {
  it("rounds ties to even", () => {
    expect(roundToDecimals("2.345", 2)).toBe("2.34");
    expect(roundToDecimals("2.355", 2)).toBe("2.36");
    expect(roundToDecimals("-2.355", 2)).toBe("-2.36");
    expect(roundToDecimals("1234.5", 0)).toBe("1234");
  });

  it("pads values that need no rounding", () => {
    expect(roundToDecimals("7", 2)).toBe("7.00");
  });
});

// ─── Money ───────────────────────────────────────────────────────────────

describe("Money operations", () => {
  it("adds and subtracts within one currency", () => {
    expect(addMoney(gbp("10.005"), gbp("0.005"))).toEqual(gbp("10.01"));
    expect(subtractMoney(gbp("5"), gbp("7.5"))).toEqual(gbp("-2.50"));
  });

  it("refuses to mix currencies", () => {
    const usd: Money = { amount: "1", currency: "USD", decimals: 2 };
    expect(codeOf(() => addMoney(gbp("1"), usd))).toBe("CURRENCY_MISMATCH");
    expect(codeOf(() => compareMoney(gbp("1"), usd))).toBe("CURRENCY_MISMATCH");
  });

  it("builds a zero in the currency's precision", () => {
    expect(zeroMoney("JPY", 0)).toEqual({ amount: "0", currency: "JPY", decimals: 0 });
  });

  it("rounds to display precision", () => {
    expect(roundMoney(gbp("0.125")).amount).toBe("0.12");
  });

  it("orders and signs amounts of one currency", () => {
    expect(compareMoney(gbp("10.00"), gbp("10"))).toBe(0);
    expect(compareMoney(gbp("9.999"), gbp("10"))).toBe(-1);
    expect(isNegative(gbp("-0.01"))).toBe(true);
    expect(isNegative(gbp("0"))).toBe(false);
  });
});
