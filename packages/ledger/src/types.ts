/**
 * @potledger/ledger — Internal types for the ledger engine.
 *
 * Error taxonomy, repository and store contracts, transaction drafts
 * and query types shared by the ledger, currency and budget packages.
 *
 * Rules:
 * - All types are readonly
 * - No mutation of stored transactions or legs
 * - Fail-closed: invalid writes throw, never silently succeed
 */

import type {
  Account,
  Category,
  Currency,
  CurrencyCode,
  ExchangeRate,
  IsoDate,
  LegType,
  Pot,
  Scenario,
  ScenarioTransaction,
  Transaction,
} from "@potledger/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "ACCOUNT_NOT_FOUND"
  | "POT_NOT_FOUND"
  | "TRANSACTION_NOT_FOUND"
  | "CATEGORY_NOT_FOUND"
  | "CATEGORY_CYCLE"
  | "SCENARIO_NOT_FOUND"
  | "UNKNOWN_CURRENCY"
  | "POT_OWNERSHIP_MISMATCH"
  | "POT_INACTIVE"
  | "INSUFFICIENT_FUNDS"
  | "UNBALANCED_LEGS"
  | "TOO_FEW_LEGS"
  | "INVALID_AMOUNT"
  | "INVALID_RATE"
  | "INVALID_DATE"
  | "CURRENCY_MISMATCH"
  | "EXCHANGE_RATE_MISSING"
  | "SAME_ACCOUNT"
  | "SAME_POT"
  | "RECORD_CONFLICT"
  | "STORE_BUSY"
  | "STORE_CLOSED"
  | "STORAGE_FAILURE"
  | "SNAPSHOT_INTEGRITY";

/**
 * Structured error from the ledger engine.
 * Always thrown, never returned.
 * `details` carries the identifiers a caller needs to render the failure.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(
    code: LedgerErrorCode,
    message: string,
    details?: Readonly<Record<string, unknown>>,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
    this.name = "LedgerError";
    this.code = code;
    this.details = details;
  }
}

// ─── Repositories ────────────────────────────────────────────────────────

export type RecordKey = string | number;

export interface ReadRepository<T, K extends RecordKey> {
  get(key: K): T | undefined;
  /** All records in insertion order. */
  all(): readonly T[];
  find(predicate: (record: T) => boolean): readonly T[];
  count(): number;
}

/** Records can be added, never changed or removed. */
export interface AppendOnlyRepository<T, K extends RecordKey> extends ReadRepository<T, K> {
  insert(record: T): T;
}

/** Records can be added and replaced by key, never removed. */
export interface Repository<T, K extends RecordKey> extends AppendOnlyRepository<T, K> {
  replace(record: T): T;
}

/** Record type stored in each table. */
export interface TableRecords {
  currencies: Currency;
  rates: ExchangeRate;
  accounts: Account;
  pots: Pot;
  transactions: Transaction;
  categories: Category;
  scenarios: Scenario;
  scenarioTransactions: ScenarioTransaction;
}

export type TableName = keyof TableRecords;

/** Id sequences handed out by the store. */
export type SequenceName =
  | "rates"
  | "accounts"
  | "pots"
  | "transactions"
  | "legs"
  | "categories"
  | "scenarios"
  | "scenarioTransactions";

export type Sequences = Readonly<Record<SequenceName, number>>;

/**
 * A single staged write. One committed unit of work is an ordered list of these.
 */
export type ChangeRecord = {
  [N in TableName]: {
    readonly op: "insert" | "replace";
    readonly table: N;
    readonly record: TableRecords[N];
  };
}[TableName];

// ─── Store ───────────────────────────────────────────────────────────────

/**
 * Read-only view of committed ledger state.
 */
export interface LedgerReader {
  readonly currencies: ReadRepository<Currency, CurrencyCode>;
  readonly rates: ReadRepository<ExchangeRate, number>;
  readonly accounts: ReadRepository<Account, number>;
  readonly pots: ReadRepository<Pot, number>;
  readonly transactions: ReadRepository<Transaction, number>;
  readonly categories: ReadRepository<Category, number>;
  readonly scenarios: ReadRepository<Scenario, number>;
  readonly scenarioTransactions: ReadRepository<ScenarioTransaction, number>;
}

/**
 * A unit of work. Reads see committed state plus this unit's own writes.
 * Transactions and rates are append-only; nothing can be deleted.
 */
export interface LedgerSession extends LedgerReader {
  readonly currencies: Repository<Currency, CurrencyCode>;
  readonly rates: AppendOnlyRepository<ExchangeRate, number>;
  readonly accounts: Repository<Account, number>;
  readonly pots: Repository<Pot, number>;
  readonly transactions: AppendOnlyRepository<Transaction, number>;
  readonly categories: Repository<Category, number>;
  readonly scenarios: Repository<Scenario, number>;
  readonly scenarioTransactions: AppendOnlyRepository<ScenarioTransaction, number>;
  nextId(sequence: SequenceName): number;
}

/**
 * Storage handle for the ledger.
 *
 * `transaction()` is the only write path: the callback's writes are staged
 * and become visible together when it returns, or not at all when it throws.
 * Units are serialised: opening a second unit while one is active fails
 * with STORE_BUSY.
 */
export interface LedgerStore {
  read<T>(fn: (reader: LedgerReader) => T): T;
  transaction<T>(fn: (session: LedgerSession) => T): T;
  close(): void;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

export interface LedgerState {
  readonly currencies: readonly Currency[];
  readonly rates: readonly ExchangeRate[];
  readonly accounts: readonly Account[];
  readonly pots: readonly Pot[];
  readonly transactions: readonly Transaction[];
  readonly categories: readonly Category[];
  readonly scenarios: readonly Scenario[];
  readonly scenarioTransactions: readonly ScenarioTransaction[];
  readonly sequences: Sequences;
}

/**
 * Serializable snapshot of the entire ledger state.
 * `stateHash` is a SHA-256 over the canonical JSON of `state`.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly state: LedgerState;
  readonly stateHash: string;
  readonly createdAt: string;
}

// ─── Append Types ────────────────────────────────────────────────────────

/**
 * One leg of a transaction before ids are assigned.
 * The leg's currency is always its account's currency.
 */
export interface LegDraft {
  readonly accountId: number;
  readonly potId?: number | undefined;
  readonly type: LegType;
  readonly amount: string;
  /** Rate from the settlement currency into the account's currency. */
  readonly rate: string;
}

export interface TransactionDraft {
  readonly description: string;
  readonly date: IsoDate;
  /** Settlement currency. */
  readonly currency: CurrencyCode;
  readonly legs: readonly LegDraft[];
  readonly categoryId?: number | undefined;
}

// ─── Query Types ─────────────────────────────────────────────────────────

/**
 * Inclusive calendar date range.
 */
export interface DateRange {
  readonly from?: IsoDate | undefined;
  readonly to?: IsoDate | undefined;
}
