/**
 * Shared fixtures for @potledger/ledger tests.
 *
 * Builds a small chart directly through a store session:
 * - currencies GBP, USD, JPY
 * - accounts 1 "Checking" (GBP), 2 "Savings" (GBP), 3 "Dollars" (USD),
 *   4 "Employer" (GBP, external)
 * - pots 1 "Holiday" on Checking, 2 "Bills" on Savings
 */

import type { Account, Currency, Pot } from "@potledger/types";
import type { LedgerSession, LedgerStore, LegDraft } from "../src/types.js";

export const TS = "2024-01-15T10:00:00.000Z";

export const GBP: Currency = {
  code: "GBP",
  name: "British Pound",
  symbol: "£",
  kind: "fiat",
  decimals: 2,
  active: true,
};

export const USD: Currency = {
  code: "USD",
  name: "US Dollar",
  symbol: "$",
  kind: "fiat",
  decimals: 2,
  active: true,
};

export const JPY: Currency = {
  code: "JPY",
  name: "Japanese Yen",
  symbol: "¥",
  kind: "fiat",
  decimals: 0,
  active: true,
};

function addAccount(
  session: LedgerSession,
  name: string,
  currency: string,
  external = false,
): Account {
  return session.accounts.insert({
    id: session.nextId("accounts"),
    name,
    type: "current",
    currency,
    external,
    createdAt: TS,
  });
}

function addPot(session: LedgerSession, name: string, accountId: number): Pot {
  return session.pots.insert({
    id: session.nextId("pots"),
    name,
    accountId,
    active: true,
    createdAt: TS,
  });
}

export function seedChart(store: LedgerStore): void {
  store.transaction((session) => {
    session.currencies.insert(GBP);
    session.currencies.insert(USD);
    session.currencies.insert(JPY);
    addAccount(session, "Checking", "GBP");
    addAccount(session, "Savings", "GBP");
    addAccount(session, "Dollars", "USD");
    addAccount(session, "Employer", "GBP", true);
    addPot(session, "Holiday", 1);
    addPot(session, "Bills", 2);
  });
}

export function debit(accountId: number, amount: string, extra?: Partial<LegDraft>): LegDraft {
  return { accountId, type: "debit", amount, rate: "1", ...extra };
}

export function credit(accountId: number, amount: string, extra?: Partial<LegDraft>): LegDraft {
  return { accountId, type: "credit", amount, rate: "1", ...extra };
}
