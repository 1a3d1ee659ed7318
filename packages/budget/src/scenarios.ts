/**
 * Scenario Planner
 *
 * What-if plans: named sets of hypothetical dated amounts, kept in the
 * store beside the ledger but never posted to it. A scenario forecast is
 * the running total of its amounts in date order.
 *
 * Rules:
 * - A scenario is denominated in one registered currency
 * - Positive amounts are inflows, negative amounts outflows; zero is rejected
 * - Forecast order is (date, id); the end date is inclusive
 */

import type { IsoDate, Scenario, ScenarioTransaction } from "@potledger/types";
import {
  LedgerError,
  fromScaled,
  requireCategory,
  requireCurrency,
  toScaled,
} from "@potledger/ledger";
import type { LedgerReader, LedgerStore } from "@potledger/ledger";
import { requireCurrencyIn } from "@potledger/currency";
import { requireIsoDate } from "./dates.js";
import type {
  CreateScenarioInput,
  ScenarioForecastPoint,
  ScenarioTransactionInput,
} from "./types.js";

export interface ScenarioPlannerOptions {
  readonly now?: (() => Date) | undefined;
}

export function requireScenario(reader: LedgerReader, scenarioId: number): Scenario {
  const scenario = reader.scenarios.get(scenarioId);
  if (scenario === undefined) {
    throw new LedgerError("SCENARIO_NOT_FOUND", `Unknown scenario: ${String(scenarioId)}`, {
      scenarioId,
    });
  }
  return scenario;
}

function byDateThenId(a: ScenarioTransaction, b: ScenarioTransaction): number {
  if (a.date !== b.date) {
    return a.date < b.date ? -1 : 1;
  }
  return a.id - b.id;
}

export function scenarioTransactionsIn(
  reader: LedgerReader,
  scenarioId: number,
): readonly ScenarioTransaction[] {
  requireScenario(reader, scenarioId);
  return reader.scenarioTransactions
    .find((tx) => tx.scenarioId === scenarioId)
    .slice()
    .sort(byDateThenId);
}

/**
 * Running balance after each of the scenario's transactions dated on or
 * before `endDate`, starting from `opening`.
 */
export function forecastIn(
  reader: LedgerReader,
  scenarioId: number,
  endDate: IsoDate,
  opening: string = "0",
): readonly ScenarioForecastPoint[] {
  const scenario = requireScenario(reader, scenarioId);
  const { decimals } = requireCurrency(reader, scenario.currency);
  let balance = toScaled(opening);

  return scenarioTransactionsIn(reader, scenarioId)
    .filter((tx) => tx.date <= endDate)
    .map((tx) => {
      balance += toScaled(tx.amount);
      return {
        transactionId: tx.id,
        date: tx.date,
        description: tx.description,
        amount: tx.amount,
        balance: fromScaled(balance, decimals),
      };
    });
}

export class ScenarioPlanner {
  private readonly store: LedgerStore;
  private readonly now: () => Date;

  constructor(store: LedgerStore, options?: ScenarioPlannerOptions) {
    this.store = store;
    this.now = options?.now ?? (() => new Date());
  }

  createScenario(input: CreateScenarioInput): Scenario {
    const createdAt = this.now().toISOString();

    return this.store.transaction((session) => {
      const currency = requireCurrencyIn(session, input.currency);
      return session.scenarios.insert({
        id: session.nextId("scenarios"),
        name: input.name,
        ...(input.description !== undefined ? { description: input.description } : {}),
        currency: currency.code,
        createdAt,
      });
    });
  }

  addTransaction(scenarioId: number, input: ScenarioTransactionInput): ScenarioTransaction {
    const date = requireIsoDate(input.date);
    const amount = toScaled(input.amount);
    if (amount === 0n) {
      throw new LedgerError("INVALID_AMOUNT", "A scenario amount must not be zero", {
        scenarioId,
        amount: input.amount,
      });
    }
    const createdAt = this.now().toISOString();

    return this.store.transaction((session) => {
      const scenario = requireScenario(session, scenarioId);
      const currency = requireCurrency(session, scenario.currency);
      const category =
        input.categoryId !== undefined ? requireCategory(session, input.categoryId) : undefined;

      return session.scenarioTransactions.insert({
        id: session.nextId("scenarioTransactions"),
        scenarioId: scenario.id,
        date,
        description: input.description,
        amount: fromScaled(amount, currency.decimals),
        ...(category !== undefined ? { categoryId: category.id } : {}),
        createdAt,
      });
    });
  }

  get(id: number): Scenario | undefined {
    return this.store.read((reader) => reader.scenarios.get(id));
  }

  getAll(): readonly Scenario[] {
    return this.store.read((reader) => reader.scenarios.all());
  }

  transactions(scenarioId: number): readonly ScenarioTransaction[] {
    return this.store.read((reader) => scenarioTransactionsIn(reader, scenarioId));
  }

  calculateForecast(
    scenarioId: number,
    endDate: IsoDate,
    opening?: string,
  ): readonly ScenarioForecastPoint[] {
    const end = requireIsoDate(endDate);
    return this.store.read((reader) => forecastIn(reader, scenarioId, end, opening));
  }
}
