/**
 * BudgetService — Composition root for the budgeting packages.
 *
 * A presentation layer (CLI, HTTP, UI) calls this facade and never imports
 * the domain packages directly. The service owns the store handle and
 * releases it in `close()`.
 *
 * Logging:
 * - info for every successful write, with the identifiers and amounts
 * - warn for every domain failure, with its code and details
 * - debug for reads
 */

import type { Logger } from "pino";
import type {
  Account,
  Category,
  CategoryNode,
  Currency,
  CurrencyKind,
  ExchangeRate,
  IsoDate,
  Money,
  Pot,
  Scenario,
  ScenarioTransaction,
  Transaction,
  TransactionLeg,
} from "@potledger/types";
import {
  InMemoryLedgerStore,
  JsonlLedgerStore,
  accountBalance,
  accountTransactions,
  availableBalance,
  currencyTotals,
  legsOf,
  potBalance,
  potTransactions,
  requireAccount,
} from "@potledger/ledger";
import type { DateRange, LedgerStore } from "@potledger/ledger";
import { CurrencyDirectory, seedCurrencies } from "@potledger/currency";
import type { RegisterCurrencyInput } from "@potledger/currency";
import {
  AccountRegistry,
  CategoryRegistry,
  ScenarioPlanner,
  TransferEngine,
  accrueInterest,
  accrueOverdraftInterest,
  expandSchedule,
  potsOfIn,
  projectBalances,
  startingBalances,
  startingPotBalances,
} from "@potledger/budget";
import type {
  AccountPatch,
  CategoryPatch,
  CategoryTransactionsOptions,
  CreateAccountInput,
  CreatePotOptions,
  CreateScenarioInput,
  MultiLegInput,
  MultiLegOptions,
  ProjectedBalance,
  ScenarioForecastPoint,
  ScenarioTransactionInput,
  ScheduledTransaction,
} from "@potledger/budget";
import type { AppConfig } from "./config.js";
import { parseAccountTypes } from "./config.js";
import { isDomainError } from "./errors.js";
import { createLogger } from "./logger.js";

// =============================================================================
// Types
// =============================================================================

export interface BudgetServiceDeps {
  readonly logger?: Logger | undefined;
  /** Overrides the store chosen from LEDGER_FILE. */
  readonly store?: LedgerStore | undefined;
  readonly now?: (() => Date) | undefined;
}

export interface PotSummary {
  readonly pot: Pot;
  readonly balance: Money;
}

export interface AccountSummary {
  readonly account: Account;
  readonly balance: Money;
  readonly available: Money;
  readonly pots: readonly PotSummary[];
}

export interface InterestPreview {
  readonly accountId: number;
  readonly days: number;
  readonly balance: Money;
  readonly interest: Money;
  readonly overdraftInterest: Money;
}

type LogContext = Readonly<Record<string, unknown>>;

// =============================================================================
// Service
// =============================================================================

export class BudgetService {
  readonly store: LedgerStore;
  readonly directory: CurrencyDirectory;
  readonly registry: AccountRegistry;
  readonly engine: TransferEngine;
  readonly categories: CategoryRegistry;
  readonly scenarios: ScenarioPlanner;

  private readonly log: Logger;

  constructor(store: LedgerStore, logger: Logger, config: AppConfig, now?: () => Date) {
    this.store = store;
    this.log = logger.child({ component: "budget-service" });
    this.directory = new CurrencyDirectory(store, { now });
    this.registry = new AccountRegistry(store, { now, funds: config.FUNDS_MEASURE });
    this.engine = new TransferEngine(store, {
      now,
      overdraft: { blockedTypes: parseAccountTypes(config.OVERDRAFT_BLOCKED_TYPES) },
      funds: config.FUNDS_MEASURE,
    });
    this.categories = new CategoryRegistry(store, { now });
    this.scenarios = new ScenarioPlanner(store, { now });
  }

  // ─── Currencies ────────────────────────────────────────────────────

  seedCurrencies(): readonly Currency[] {
    return this.write("seedCurrencies", {}, () => seedCurrencies(this.directory), (seeded) => ({
      registered: seeded.map((currency) => currency.code),
    }));
  }

  registerCurrency(input: RegisterCurrencyInput): Currency {
    return this.write("registerCurrency", { currency: input.code }, () =>
      this.directory.registerCurrency(input),
    );
  }

  deactivateCurrency(code: string): Currency {
    return this.write("deactivateCurrency", { currency: code }, () => this.directory.deactivate(code));
  }

  listCurrencies(kind?: CurrencyKind): readonly Currency[] {
    return this.read("listCurrencies", { kind }, () => this.directory.list(kind));
  }

  setRate(from: string, to: string, rate: string, timestamp?: string): ExchangeRate {
    return this.write("setRate", { from, to, rate }, () =>
      this.directory.setRate(from, to, rate, timestamp),
    );
  }

  setRatePair(
    from: string,
    to: string,
    rate: string,
    timestamp?: string,
  ): readonly [ExchangeRate, ExchangeRate] {
    return this.write("setRatePair", { from, to, rate }, () =>
      this.directory.setRatePair(from, to, rate, timestamp),
    );
  }

  rateAt(from: string, to: string, atTime?: string): string | undefined {
    return this.read("rateAt", { from, to, atTime }, () => this.directory.rateAt(from, to, atTime));
  }

  convert(amount: string, from: string, to: string, atTime?: string): string | undefined {
    return this.read("convert", { amount, from, to }, () =>
      this.directory.convert(amount, from, to, atTime),
    );
  }

  // ─── Accounts & Pots ───────────────────────────────────────────────

  createAccount(input: CreateAccountInput): Account {
    return this.write(
      "createAccount",
      { name: input.name, type: input.type, currency: input.currency },
      () => this.registry.createAccount(input),
      (account) => ({ accountId: account.id }),
    );
  }

  updateAccount(id: number, patch: AccountPatch): Account {
    return this.write("updateAccount", { accountId: id, fields: Object.keys(patch) }, () =>
      this.registry.updateAccount(id, patch),
    );
  }

  setDefaultImportFormat(id: number, format: string | null): Account {
    return this.write("setDefaultImportFormat", { accountId: id, format }, () =>
      this.registry.setDefaultImportFormat(id, format),
    );
  }

  getAccount(id: number): Account {
    return this.read("getAccount", { accountId: id }, () => this.registry.require(id));
  }

  getAccountByName(name: string): Account | undefined {
    return this.read("getAccountByName", { name }, () => this.registry.getByName(name));
  }

  listAccounts(): readonly Account[] {
    return this.read("listAccounts", {}, () => this.registry.getAll());
  }

  createPot(accountId: number, name: string, options?: CreatePotOptions): Pot {
    return this.write(
      "createPot",
      { accountId, name, initialAmount: options?.initialAmount },
      () => this.registry.createPot(accountId, name, options),
      (pot) => ({ potId: pot.id }),
    );
  }

  deactivatePot(id: number): Pot {
    return this.write("deactivatePot", { potId: id }, () => this.registry.deactivatePot(id));
  }

  potsOf(accountId: number): readonly Pot[] {
    return this.read("potsOf", { accountId }, () => this.registry.potsOf(accountId));
  }

  // ─── Transfers ─────────────────────────────────────────────────────

  transferBetweenAccounts(
    fromId: number,
    toId: number,
    amount: string,
    description?: string,
    date?: IsoDate,
    categoryId?: number,
  ): Transaction {
    return this.write(
      "transferBetweenAccounts",
      { fromAccountId: fromId, toAccountId: toId, amount, categoryId },
      () => this.engine.transferBetweenAccounts(fromId, toId, amount, description, date, categoryId),
      transactionContext,
    );
  }

  transferToPot(
    accountId: number,
    potId: number,
    amount: string,
    description?: string,
    date?: IsoDate,
  ): Transaction {
    return this.write(
      "transferToPot",
      { accountId, potId, amount },
      () => this.engine.transferToPot(accountId, potId, amount, description, date),
      transactionContext,
    );
  }

  transferFromPot(
    accountId: number,
    potId: number,
    amount: string,
    description?: string,
    date?: IsoDate,
  ): Transaction {
    return this.write(
      "transferFromPot",
      { accountId, potId, amount },
      () => this.engine.transferFromPot(accountId, potId, amount, description, date),
      transactionContext,
    );
  }

  transferBetweenPots(
    accountId: number,
    fromPotId: number,
    toPotId: number,
    amount: string,
    description?: string,
    date?: IsoDate,
  ): Transaction {
    return this.write(
      "transferBetweenPots",
      { accountId, fromPotId, toPotId, amount },
      () => this.engine.transferBetweenPots(accountId, fromPotId, toPotId, amount, description, date),
      transactionContext,
    );
  }

  createMultiLegTransaction(
    legs: readonly MultiLegInput[],
    description: string,
    options?: MultiLegOptions,
  ): Transaction {
    return this.write(
      "createMultiLegTransaction",
      { legCount: legs.length, currency: options?.currency, categoryId: options?.categoryId },
      () => this.engine.createMultiLegTransaction(legs, description, options),
      transactionContext,
    );
  }

  // ─── Categories ────────────────────────────────────────────────────

  createCategory(name: string, parentId?: number): Category {
    return this.write(
      "createCategory",
      { name, parentId },
      () => this.categories.createCategory(name, parentId),
      (category) => ({ categoryId: category.id }),
    );
  }

  updateCategory(id: number, patch: CategoryPatch): Category {
    return this.write("updateCategory", { categoryId: id, fields: Object.keys(patch) }, () =>
      this.categories.updateCategory(id, patch),
    );
  }

  listCategories(): readonly Category[] {
    return this.read("listCategories", {}, () => this.categories.getAll());
  }

  categoryChildren(id: number): readonly Category[] {
    return this.read("categoryChildren", { categoryId: id }, () => this.categories.children(id));
  }

  categoryHierarchy(): readonly CategoryNode[] {
    return this.read("categoryHierarchy", {}, () => this.categories.fullHierarchy());
  }

  categoryTransactions(
    id: number,
    range?: DateRange,
    options?: CategoryTransactionsOptions,
  ): readonly Transaction[] {
    return this.read("categoryTransactions", { categoryId: id, ...range, ...options }, () =>
      this.categories.transactions(id, range, options),
    );
  }

  // ─── Balances & History ────────────────────────────────────────────

  accountBalance(accountId: number, asOfDate?: IsoDate): Money {
    return this.read("accountBalance", { accountId, asOfDate }, () =>
      this.store.read((reader) => accountBalance(reader, accountId, asOfDate)),
    );
  }

  potBalance(potId: number, asOfDate?: IsoDate): Money {
    return this.read("potBalance", { potId, asOfDate }, () =>
      this.store.read((reader) => potBalance(reader, potId, asOfDate)),
    );
  }

  availableBalance(accountId: number, asOfDate?: IsoDate): Money {
    return this.read("availableBalance", { accountId, asOfDate }, () =>
      this.store.read((reader) => availableBalance(reader, accountId, asOfDate)),
    );
  }

  currencyTotals(includeExternal = false): readonly Money[] {
    return this.read("currencyTotals", { includeExternal }, () =>
      this.store.read((reader) => currencyTotals(reader, { includeExternal })),
    );
  }

  accountTransactions(accountId: number, range?: DateRange): readonly Transaction[] {
    return this.read("accountTransactions", { accountId, ...range }, () =>
      this.store.read((reader) => accountTransactions(reader, accountId, range)),
    );
  }

  potTransactions(potId: number, range?: DateRange): readonly Transaction[] {
    return this.read("potTransactions", { potId, ...range }, () =>
      this.store.read((reader) => potTransactions(reader, potId, range)),
    );
  }

  legsOf(transactionId: number): readonly TransactionLeg[] {
    return this.read("legsOf", { transactionId }, () =>
      this.store.read((reader) => legsOf(reader, transactionId)),
    );
  }

  /**
   * Balance, available funds and every pot of an account, from one read.
   */
  accountSummary(accountId: number): AccountSummary {
    return this.read("accountSummary", { accountId }, () =>
      this.store.read((reader) => ({
        account: requireAccount(reader, accountId),
        balance: accountBalance(reader, accountId),
        available: availableBalance(reader, accountId),
        pots: potsOfIn(reader, accountId).map((pot) => ({
          pot,
          balance: potBalance(reader, pot.id),
        })),
      })),
    );
  }

  // ─── Planning ──────────────────────────────────────────────────────

  /**
   * Interest the account would earn and overdraft interest it would owe
   * over `days` at its current balance. Posts nothing.
   */
  interestPreview(accountId: number, days: number): InterestPreview {
    return this.read("interestPreview", { accountId, days }, () =>
      this.store.read((reader) => {
        const account = requireAccount(reader, accountId);
        const balance = accountBalance(reader, accountId);
        return {
          accountId,
          days,
          balance,
          interest: accrueInterest(account, balance, days),
          overdraftInterest: accrueOverdraftInterest(account, balance, days),
        };
      }),
    );
  }

  /**
   * Project balances of every account and pot a schedule touches from
   * today's ledger through the forecast window.
   */
  forecast(
    scheduled: readonly ScheduledTransaction[],
    start: IsoDate,
    end: IsoDate,
  ): readonly ProjectedBalance[] {
    return this.read("forecast", { schedules: scheduled.length, start, end }, () => {
      const items = expandSchedule(scheduled, start, end);
      const accountIds = [...new Set(items.flatMap((item) => [item.fromAccountId, item.toAccountId]))];
      const potIds = [
        ...new Set(
          items
            .flatMap((item) => [item.fromPotId, item.toPotId])
            .filter((id): id is number => id !== undefined),
        ),
      ];
      return this.store.read((reader) =>
        projectBalances(
          startingBalances(reader, accountIds),
          items,
          startingPotBalances(reader, potIds),
        ),
      );
    });
  }

  createScenario(input: CreateScenarioInput): Scenario {
    return this.write(
      "createScenario",
      { name: input.name, currency: input.currency },
      () => this.scenarios.createScenario(input),
      (scenario) => ({ scenarioId: scenario.id }),
    );
  }

  addScenarioTransaction(scenarioId: number, input: ScenarioTransactionInput): ScenarioTransaction {
    return this.write(
      "addScenarioTransaction",
      { scenarioId, date: input.date, amount: input.amount },
      () => this.scenarios.addTransaction(scenarioId, input),
      (tx) => ({ scenarioTransactionId: tx.id }),
    );
  }

  listScenarios(): readonly Scenario[] {
    return this.read("listScenarios", {}, () => this.scenarios.getAll());
  }

  /**
   * Running balance of a what-if scenario through `endDate`. Posts nothing.
   */
  scenarioForecast(
    scenarioId: number,
    endDate: IsoDate,
    opening?: string,
  ): readonly ScenarioForecastPoint[] {
    return this.read("scenarioForecast", { scenarioId, endDate, opening }, () =>
      this.scenarios.calculateForecast(scenarioId, endDate, opening),
    );
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  close(): void {
    this.store.close();
    this.log.info("Ledger store closed");
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private write<T>(
    op: string,
    context: LogContext,
    fn: () => T,
    describe?: (result: T) => LogContext,
  ): T {
    try {
      const result = fn();
      this.log.info({ op, ...context, ...describe?.(result) }, `${op} succeeded`);
      return result;
    } catch (err: unknown) {
      this.logFailure(op, context, err);
      throw err;
    }
  }

  private read<T>(op: string, context: LogContext, fn: () => T): T {
    this.log.debug({ op, ...context }, op);
    try {
      return fn();
    } catch (err: unknown) {
      this.logFailure(op, context, err);
      throw err;
    }
  }

  private logFailure(op: string, context: LogContext, err: unknown): void {
    if (isDomainError(err)) {
      this.log.warn({ op, ...context, code: err.code, details: err.details }, `${op} rejected: ${err.message}`);
    } else {
      this.log.error({ op, ...context, err }, `${op} failed`);
    }
  }
}

function transactionContext(tx: Transaction): LogContext {
  return {
    transactionId: tx.id,
    date: tx.date,
    legs: tx.legs.map((leg) => ({
      accountId: leg.accountId,
      potId: leg.potId,
      type: leg.type,
      amount: leg.amount,
      currency: leg.currency,
    })),
  };
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Build a service from configuration: JSONL store when LEDGER_FILE is set,
 * in-memory otherwise; starter currencies when SEED_CURRENCIES is true.
 */
export function createBudgetService(config: AppConfig, deps?: BudgetServiceDeps): BudgetService {
  const logger = deps?.logger ?? createLogger(config);
  const store =
    deps?.store ??
    (config.LEDGER_FILE !== undefined
      ? new JsonlLedgerStore({ filePath: config.LEDGER_FILE })
      : new InMemoryLedgerStore());

  logger.info(
    { storage: config.LEDGER_FILE !== undefined ? "jsonl" : "memory", file: config.LEDGER_FILE },
    "Ledger store opened",
  );

  const service = new BudgetService(store, logger, config, deps?.now);
  if (config.SEED_CURRENCIES) {
    service.seedCurrencies();
  }
  return service;
}
