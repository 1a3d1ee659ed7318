/**
 * Tests for CurrencyDirectory.
 *
 * Covers:
 * - Registration, defaults and validation
 * - Listing and deactivation
 * - Directional rates, point-in-time lookup and tie-breaking
 * - Conversion
 */

import { beforeEach, describe, expect, it } from "vitest";
import { InMemoryLedgerStore } from "@potledger/ledger";
import { CurrencyDirectory } from "../src/directory.js";
import { CurrencyError } from "../src/errors.js";
import { endOfDay } from "../src/rates.js";

let directory: CurrencyDirectory;

beforeEach(() => {
  directory = new CurrencyDirectory(new InMemoryLedgerStore(), {
    now: () => new Date("2024-03-01T12:00:00Z"),
  });
  directory.registerCurrency({ code: "GBP", name: "British Pound", symbol: "£", kind: "fiat" });
  directory.registerCurrency({ code: "USD", name: "US Dollar", symbol: "$", kind: "fiat" });
});

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err: unknown) {
    return err instanceof CurrencyError ? err.code : undefined;
  }
  return undefined;
}

// ─── Currencies ──────────────────────────────────────────────────────────

describe("registerCurrency", () => {
  it("applies default decimals per kind and upper-cases the code", () => {
    const btc = directory.registerCurrency({ code: "btc", name: "Bitcoin", symbol: "₿", kind: "crypto" });
    expect(btc).toEqual({
      code: "BTC",
      name: "Bitcoin",
      symbol: "₿",
      kind: "crypto",
      decimals: 8,
      active: true,
    });
    expect(directory.require("GBP").decimals).toBe(2);
  });

  it("keeps explicit decimals", () => {
    const jpy = directory.registerCurrency({
      code: "JPY",
      name: "Japanese Yen",
      symbol: "¥",
      kind: "fiat",
      decimals: 0,
    });
    expect(jpy.decimals).toBe(0);
  });

  it("rejects a duplicate code regardless of case", () => {
    expect(
      codeOf(() => directory.registerCurrency({ code: "gbp", name: "Again", symbol: "£", kind: "fiat" })),
    ).toBe("DUPLICATE_CURRENCY");
  });

  it("rejects malformed codes and decimals", () => {
    expect(
      codeOf(() => directory.registerCurrency({ code: "", name: "None", symbol: "", kind: "fiat" })),
    ).toBe("INVALID_CURRENCY");
    expect(
      codeOf(() =>
        directory.registerCurrency({ code: "XYZ", name: "Bad", symbol: "", kind: "fiat", decimals: 19 }),
      ),
    ).toBe("INVALID_CURRENCY");
    expect(
      codeOf(() =>
        directory.registerCurrency({ code: "XYZ", name: "Bad", symbol: "", kind: "fiat", decimals: 1.5 }),
      ),
    ).toBe("INVALID_CURRENCY");
  });
});

describe("lookup and list", () => {
  it("finds codes case-insensitively", () => {
    expect(directory.lookup("usd")?.code).toBe("USD");
    expect(directory.lookup("EUR")).toBeUndefined();
    expect(codeOf(() => directory.require("EUR"))).toBe("UNKNOWN_CURRENCY");
  });

  it("lists active currencies, optionally by kind", () => {
    directory.registerCurrency({ code: "ETH", name: "Ethereum", symbol: "Ξ", kind: "crypto", decimals: 18 });
    expect(directory.codes()).toEqual(["GBP", "USD", "ETH"]);
    expect(directory.list("crypto").map((currency) => currency.code)).toEqual(["ETH"]);
  });

  it("hides deactivated currencies from the list but keeps them resolvable", () => {
    const usd = directory.deactivate("usd");
    expect(usd.active).toBe(false);
    expect(directory.codes()).toEqual(["GBP"]);
    expect(directory.lookup("USD")?.active).toBe(false);
    expect(directory.deactivate("USD").active).toBe(false);
  });
});

// ─── Rates ───────────────────────────────────────────────────────────────

describe("setRate", () => {
  it("stores a canonical rate with a fresh id", () => {
    const rate = directory.setRate("gbp", "usd", "1.2500", "2024-01-01T00:00:00Z");
    expect(rate).toEqual({
      id: 1,
      from: "GBP",
      to: "USD",
      rate: "1.25",
      timestamp: "2024-01-01T00:00:00.000Z",
    });
  });

  it("uses the clock when no timestamp is given", () => {
    expect(directory.setRate("GBP", "USD", "1.25").timestamp).toBe("2024-03-01T12:00:00.000Z");
  });

  it("rejects unknown currencies and non-positive or malformed rates", () => {
    expect(codeOf(() => directory.setRate("GBP", "EUR", "1.1"))).toBe("UNKNOWN_CURRENCY");
    expect(codeOf(() => directory.setRate("GBP", "USD", "0"))).toBe("INVALID_RATE");
    expect(codeOf(() => directory.setRate("GBP", "USD", "-1.25"))).toBe("INVALID_RATE");
    expect(codeOf(() => directory.setRate("GBP", "USD", "abc"))).toBe("INVALID_RATE");
    expect(codeOf(() => directory.setRate("GBP", "USD", "1.25", "not a time"))).toBe("INVALID_RATE");
  });

  it("does not create the inverse rate", () => {
    directory.setRate("GBP", "USD", "1.25");
    expect(directory.rateAt("USD", "GBP")).toBeUndefined();
  });
});

describe("setRatePair", () => {
  it("records both directions at one instant", () => {
    const [forward, inverse] = directory.setRatePair("GBP", "USD", "1.25", "2024-01-01T00:00:00Z");
    expect(forward.rate).toBe("1.25");
    expect(inverse).toMatchObject({ from: "USD", to: "GBP", rate: "0.8" });
    expect(directory.rateAt("USD", "GBP")).toBe("0.8");
  });
});

describe("rateAt", () => {
  beforeEach(() => {
    directory.setRate("GBP", "USD", "1.20", "2024-01-01T00:00:00Z");
    directory.setRate("GBP", "USD", "1.25", "2024-02-01T00:00:00Z");
  });

  it("returns 1 for a same-currency pair without a stored rate", () => {
    expect(directory.rateAt("GBP", "gbp")).toBe("1");
    expect(directory.rateAt("XYZ", "XYZ")).toBe("1");
  });

  it("returns the latest rate at or before the requested time", () => {
    expect(directory.rateAt("GBP", "USD", endOfDay("2024-01-15"))).toBe("1.2");
    expect(directory.rateAt("GBP", "USD", "2024-02-01T00:00:00Z")).toBe("1.25");
    expect(directory.rateAt("GBP", "USD")).toBe("1.25");
  });

  it("reports no rate before the first one", () => {
    expect(directory.rateAt("GBP", "USD", "2023-12-31T23:59:59Z")).toBeUndefined();
  });

  it("prefers the rate recorded last when timestamps tie", () => {
    directory.setRate("GBP", "USD", "1.30", "2024-02-01T00:00:00Z");
    expect(directory.rateAt("GBP", "USD")).toBe("1.3");
  });

  it("lists a pair's history oldest first", () => {
    directory.setRate("GBP", "USD", "1.1", "2023-06-01T00:00:00Z");
    expect(directory.rateHistory("gbp", "usd").map((rate) => rate.rate)).toEqual(["1.1", "1.2", "1.25"]);
  });
});

describe("convert", () => {
  it("multiplies by the effective rate in the target precision", () => {
    directory.setRate("GBP", "USD", "1.25", "2024-01-01T00:00:00Z");
    expect(directory.convert("10", "GBP", "USD")).toBe("12.50");
    expect(directory.convert("10", "GBP", "USD", "2023-01-01T00:00:00Z")).toBeUndefined();
  });

  it("returns the amount for a same-currency pair", () => {
    expect(directory.convert("7.5", "GBP", "GBP")).toBe("7.50");
  });
});
