/**
 * Shared fixtures for @potledger/budget tests.
 *
 * A fresh in-memory ledger with GBP and USD registered and four accounts:
 * 1 "Checking" (GBP, current), 2 "Savings" (GBP, savings),
 * 3 "Dollars" (USD, current), 4 "Employer" (GBP, external).
 */

import { InMemoryLedgerStore } from "@potledger/ledger";
import { CurrencyDirectory } from "@potledger/currency";
import { CategoryRegistry } from "../src/categories.js";
import { AccountRegistry } from "../src/registry.js";
import { ScenarioPlanner } from "../src/scenarios.js";
import { TransferEngine } from "../src/transfer-engine.js";
import type { TransferEngineOptions } from "../src/types.js";

export const NOW = new Date("2024-01-15T10:00:00.000Z");

export interface Harness {
  readonly store: InMemoryLedgerStore;
  readonly directory: CurrencyDirectory;
  readonly registry: AccountRegistry;
  readonly engine: TransferEngine;
  readonly categories: CategoryRegistry;
  readonly scenarios: ScenarioPlanner;
}

export function createHarness(engineOptions?: Omit<TransferEngineOptions, "now">): Harness {
  const now = (): Date => NOW;
  const store = new InMemoryLedgerStore();
  const directory = new CurrencyDirectory(store, { now });
  const registry = new AccountRegistry(store, { now, funds: engineOptions?.funds });
  const engine = new TransferEngine(store, { ...engineOptions, now });
  const categories = new CategoryRegistry(store, { now });
  const scenarios = new ScenarioPlanner(store, { now });

  directory.registerCurrency({ code: "GBP", name: "British Pound", symbol: "£", kind: "fiat" });
  directory.registerCurrency({ code: "USD", name: "US Dollar", symbol: "$", kind: "fiat" });

  registry.createAccount({ name: "Checking", type: "current", currency: "GBP" });
  registry.createAccount({ name: "Savings", type: "savings", currency: "GBP" });
  registry.createAccount({ name: "Dollars", type: "current", currency: "USD" });
  registry.createAccount({ name: "Employer", type: "current", currency: "GBP", external: true });

  return { store, directory, registry, engine, categories, scenarios };
}
