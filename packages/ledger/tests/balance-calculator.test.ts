/**
 * Tests for balance derivation.
 *
 * Covers:
 * - Account balances from credits and debits
 * - Pot and available (untagged) balances
 * - Point-in-time balances via asOfDate
 * - Per-currency totals with and without external accounts
 */

import { beforeEach, describe, expect, it } from "vitest";
import {
  accountBalance,
  availableBalance,
  currencyTotals,
  legSum,
  potBalance,
} from "../src/balance-calculator.js";
import { InMemoryLedgerStore } from "../src/in-memory-store.js";
import { appendTransaction } from "../src/journal.js";
import type { LegDraft } from "../src/types.js";
import { credit, debit, seedChart } from "./fixtures.js";

let store: InMemoryLedgerStore;

beforeEach(() => {
  store = new InMemoryLedgerStore();
  seedChart(store);
});

function post(date: string, legs: readonly LegDraft[], currency = "GBP"): void {
  store.transaction((session) =>
    appendTransaction(session, { description: "Test", date, currency, legs }),
  );
}

describe("legSum", () => {
  it("nets credits against debits", () => {
    const legs = [
      { id: 1, transactionId: 1, accountId: 1, type: "credit", amount: "10.50", currency: "GBP", rate: "1" },
      { id: 2, transactionId: 1, accountId: 1, type: "debit", amount: "0.25", currency: "GBP", rate: "1" },
    ] as const;
    expect(legSum(legs)).toBe(10250000000000n);
  });
});

describe("accountBalance", () => {
  it("starts at zero in the account's precision", () => {
    expect(store.read((reader) => accountBalance(reader, 1))).toEqual({
      amount: "0.00",
      currency: "GBP",
      decimals: 2,
    });
  });

  it("reflects a transfer between two accounts", () => {
    post("2024-01-15", [debit(1, "100"), credit(2, "100")]);

    expect(store.read((reader) => accountBalance(reader, 1)).amount).toBe("-100.00");
    expect(store.read((reader) => accountBalance(reader, 2)).amount).toBe("100.00");
  });

  it("includes pot-tagged legs", () => {
    post("2024-01-15", [debit(4, "80"), credit(1, "80")]);
    post("2024-01-16", [debit(4, "20"), credit(1, "20", { potId: 1 })]);

    expect(store.read((reader) => accountBalance(reader, 1)).amount).toBe("100.00");
  });

  it("ignores transactions after asOfDate", () => {
    post("2024-01-15", [debit(4, "80"), credit(1, "80")]);
    post("2024-02-01", [debit(1, "30"), credit(2, "30")]);

    expect(store.read((reader) => accountBalance(reader, 1, "2024-01-31")).amount).toBe("80.00");
    expect(store.read((reader) => accountBalance(reader, 1, "2024-02-01")).amount).toBe("50.00");
    expect(store.read((reader) => accountBalance(reader, 1, "2024-01-01")).amount).toBe("0.00");
  });

  it("accepts converted legs that balance after display rounding", () => {
    post("2024-01-15", [debit(3, "10", { rate: "3" }), credit(1, "3.33")], "GBP");
    expect(store.read((reader) => accountBalance(reader, 3)).amount).toBe("-10.00");
  });
});

describe("pot and available balances", () => {
  beforeEach(() => {
    post("2024-01-15", [debit(4, "100"), credit(1, "100")]);
    post("2024-01-16", [debit(1, "40"), credit(1, "40", { potId: 1 })]);
    post("2024-01-17", [debit(1, "15", { potId: 1 }), credit(2, "15")]);
  });

  it("sums only legs tagged with the pot", () => {
    expect(store.read((reader) => potBalance(reader, 1))).toEqual({
      amount: "25.00",
      currency: "GBP",
      decimals: 2,
    });
  });

  it("leaves the account balance unchanged by moves into a pot", () => {
    expect(store.read((reader) => accountBalance(reader, 1)).amount).toBe("85.00");
  });

  it("reports the untagged remainder as available", () => {
    expect(store.read((reader) => availableBalance(reader, 1)).amount).toBe("60.00");
  });

  it("honours asOfDate for pots", () => {
    expect(store.read((reader) => potBalance(reader, 1, "2024-01-16")).amount).toBe("40.00");
  });
});

describe("currencyTotals", () => {
  beforeEach(() => {
    post("2024-01-15", [debit(4, "100"), credit(1, "100")]);
    post("2024-01-16", [debit(1, "8"), credit(3, "10", { rate: "1.25" })]);
  });

  it("excludes external accounts by default", () => {
    expect(store.read((reader) => currencyTotals(reader))).toEqual([
      { amount: "92.00", currency: "GBP", decimals: 2 },
      { amount: "10.00", currency: "USD", decimals: 2 },
    ]);
  });

  it("adds external accounts when asked", () => {
    const totals = store.read((reader) => currencyTotals(reader, { includeExternal: true }));
    expect(totals.find((money) => money.currency === "GBP")?.amount).toBe("-8.00");
  });
});
