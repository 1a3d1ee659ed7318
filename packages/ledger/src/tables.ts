/**
 * @potledger/ledger — Table storage shared by every LedgerStore.
 *
 * LedgerTables holds committed state in insertion-ordered Maps.
 * A StagedSession overlays a unit of work on top of it: writes land in
 * per-table staging maps and an ordered change list, and are applied to
 * the committed tables only by `commit()`.
 */

import type { CurrencyCode } from "@potledger/types";
import type {
  ChangeRecord,
  LedgerReader,
  LedgerSession,
  LedgerState,
  ReadRepository,
  RecordKey,
  Repository,
  SequenceName,
  Sequences,
  TableName,
  TableRecords,
} from "./types.js";
import { LedgerError } from "./types.js";

type KeyOf<N extends TableName> = N extends "currencies" ? CurrencyCode : number;

const KEY_OF: { readonly [N in TableName]: (record: TableRecords[N]) => KeyOf<N> } = {
  currencies: (record) => record.code,
  rates: (record) => record.id,
  accounts: (record) => record.id,
  pots: (record) => record.id,
  transactions: (record) => record.id,
  categories: (record) => record.id,
  scenarios: (record) => record.id,
  scenarioTransactions: (record) => record.id,
};

const EMPTY_SEQUENCES: Sequences = {
  rates: 0,
  accounts: 0,
  pots: 0,
  transactions: 0,
  legs: 0,
  categories: 0,
  scenarios: 0,
  scenarioTransactions: 0,
};

// ─── Read view ───────────────────────────────────────────────────────────

class MapRepository<T, K extends RecordKey> implements ReadRepository<T, K> {
  constructor(private readonly _records: ReadonlyMap<K, T>) {}

  get(key: K): T | undefined {
    return this._records.get(key);
  }

  all(): readonly T[] {
    return [...this._records.values()];
  }

  find(predicate: (record: T) => boolean): readonly T[] {
    return [...this._records.values()].filter(predicate);
  }

  count(): number {
    return this._records.size;
  }
}

// ─── Staged table ────────────────────────────────────────────────────────

class StagedTable<N extends TableName> implements Repository<TableRecords[N], KeyOf<N>> {
  private readonly _staged = new Map<KeyOf<N>, TableRecords[N]>();

  constructor(
    private readonly _table: N,
    private readonly _committed: ReadonlyMap<KeyOf<N>, TableRecords[N]>,
    private readonly _record: (op: ChangeRecord["op"], record: TableRecords[N]) => void,
  ) {}

  get(key: KeyOf<N>): TableRecords[N] | undefined {
    return this._staged.get(key) ?? this._committed.get(key);
  }

  all(): readonly TableRecords[N][] {
    const result: TableRecords[N][] = [];
    for (const [key, record] of this._committed) {
      result.push(this._staged.get(key) ?? record);
    }
    for (const [key, record] of this._staged) {
      if (!this._committed.has(key)) {
        result.push(record);
      }
    }
    return result;
  }

  find(predicate: (record: TableRecords[N]) => boolean): readonly TableRecords[N][] {
    return this.all().filter(predicate);
  }

  count(): number {
    let count = this._committed.size;
    for (const key of this._staged.keys()) {
      if (!this._committed.has(key)) count++;
    }
    return count;
  }

  insert(record: TableRecords[N]): TableRecords[N] {
    const key = KEY_OF[this._table](record);
    if (this.get(key) !== undefined) {
      throw new LedgerError(
        "RECORD_CONFLICT",
        `Record "${String(key)}" already exists in ${this._table}`,
        { table: this._table, key },
      );
    }
    this._staged.set(key, record);
    this._record("insert", record);
    return record;
  }

  replace(record: TableRecords[N]): TableRecords[N] {
    const key = KEY_OF[this._table](record);
    if (this.get(key) === undefined) {
      throw new LedgerError(
        "RECORD_CONFLICT",
        `Cannot replace missing record "${String(key)}" in ${this._table}`,
        { table: this._table, key },
      );
    }
    this._staged.set(key, record);
    this._record("replace", record);
    return record;
  }
}

// ─── Session ─────────────────────────────────────────────────────────────

export class StagedSession implements LedgerSession {
  readonly currencies: StagedTable<"currencies">;
  readonly rates: StagedTable<"rates">;
  readonly accounts: StagedTable<"accounts">;
  readonly pots: StagedTable<"pots">;
  readonly transactions: StagedTable<"transactions">;
  readonly categories: StagedTable<"categories">;
  readonly scenarios: StagedTable<"scenarios">;
  readonly scenarioTransactions: StagedTable<"scenarioTransactions">;

  private readonly _changes: ChangeRecord[] = [];
  private readonly _sequences: Record<SequenceName, number>;

  constructor(tables: LedgerTables) {
    this._sequences = { ...tables.sequences };
    this.currencies = new StagedTable("currencies", tables.currencies, (op, record) => {
      this._changes.push({ op, table: "currencies", record });
    });
    this.rates = new StagedTable("rates", tables.rates, (op, record) => {
      this._changes.push({ op, table: "rates", record });
    });
    this.accounts = new StagedTable("accounts", tables.accounts, (op, record) => {
      this._changes.push({ op, table: "accounts", record });
    });
    this.pots = new StagedTable("pots", tables.pots, (op, record) => {
      this._changes.push({ op, table: "pots", record });
    });
    this.transactions = new StagedTable("transactions", tables.transactions, (op, record) => {
      this._changes.push({ op, table: "transactions", record });
    });
    this.categories = new StagedTable("categories", tables.categories, (op, record) => {
      this._changes.push({ op, table: "categories", record });
    });
    this.scenarios = new StagedTable("scenarios", tables.scenarios, (op, record) => {
      this._changes.push({ op, table: "scenarios", record });
    });
    this.scenarioTransactions = new StagedTable(
      "scenarioTransactions",
      tables.scenarioTransactions,
      (op, record) => {
        this._changes.push({ op, table: "scenarioTransactions", record });
      },
    );
  }

  nextId(sequence: SequenceName): number {
    const next = this._sequences[sequence] + 1;
    this._sequences[sequence] = next;
    return next;
  }

  get changes(): readonly ChangeRecord[] {
    return this._changes;
  }

  get sequences(): Sequences {
    return { ...this._sequences };
  }
}

// ─── Committed tables ────────────────────────────────────────────────────

export class LedgerTables {
  readonly currencies = new Map<CurrencyCode, TableRecords["currencies"]>();
  readonly rates = new Map<number, TableRecords["rates"]>();
  readonly accounts = new Map<number, TableRecords["accounts"]>();
  readonly pots = new Map<number, TableRecords["pots"]>();
  readonly transactions = new Map<number, TableRecords["transactions"]>();
  readonly categories = new Map<number, TableRecords["categories"]>();
  readonly scenarios = new Map<number, TableRecords["scenarios"]>();
  readonly scenarioTransactions = new Map<number, TableRecords["scenarioTransactions"]>();

  private _sequences: Sequences = EMPTY_SEQUENCES;

  get sequences(): Sequences {
    return this._sequences;
  }

  reader(): LedgerReader {
    return {
      currencies: new MapRepository(this.currencies),
      rates: new MapRepository(this.rates),
      accounts: new MapRepository(this.accounts),
      pots: new MapRepository(this.pots),
      transactions: new MapRepository(this.transactions),
      categories: new MapRepository(this.categories),
      scenarios: new MapRepository(this.scenarios),
      scenarioTransactions: new MapRepository(this.scenarioTransactions),
    };
  }

  openSession(): StagedSession {
    return new StagedSession(this);
  }

  /**
   * Apply a unit of work. Changes are applied in the order they were staged.
   */
  apply(changes: readonly ChangeRecord[], sequences: Sequences): void {
    for (const change of changes) {
      switch (change.table) {
        case "currencies":
          this.currencies.set(change.record.code, change.record);
          break;
        case "rates":
          this.rates.set(change.record.id, change.record);
          break;
        case "accounts":
          this.accounts.set(change.record.id, change.record);
          break;
        case "pots":
          this.pots.set(change.record.id, change.record);
          break;
        case "transactions":
          this.transactions.set(change.record.id, change.record);
          break;
        case "categories":
          this.categories.set(change.record.id, change.record);
          break;
        case "scenarios":
          this.scenarios.set(change.record.id, change.record);
          break;
        case "scenarioTransactions":
          this.scenarioTransactions.set(change.record.id, change.record);
          break;
      }
    }
    this._sequences = { ...sequences };
  }

  commit(session: StagedSession): void {
    this.apply(session.changes, session.sequences);
  }

  toState(): LedgerState {
    return {
      currencies: [...this.currencies.values()],
      rates: [...this.rates.values()],
      accounts: [...this.accounts.values()],
      pots: [...this.pots.values()],
      transactions: [...this.transactions.values()],
      categories: [...this.categories.values()],
      scenarios: [...this.scenarios.values()],
      scenarioTransactions: [...this.scenarioTransactions.values()],
      sequences: { ...this._sequences },
    };
  }

  /**
   * Load a full state into empty tables, in table order.
   */
  load(state: LedgerState): void {
    const changes: ChangeRecord[] = [
      ...state.currencies.map((record) => ({ op: "insert", table: "currencies", record }) as const),
      ...state.rates.map((record) => ({ op: "insert", table: "rates", record }) as const),
      ...state.accounts.map((record) => ({ op: "insert", table: "accounts", record }) as const),
      ...state.pots.map((record) => ({ op: "insert", table: "pots", record }) as const),
      ...state.transactions.map((record) => ({ op: "insert", table: "transactions", record }) as const),
      ...state.categories.map((record) => ({ op: "insert", table: "categories", record }) as const),
      ...state.scenarios.map((record) => ({ op: "insert", table: "scenarios", record }) as const),
      ...state.scenarioTransactions.map(
        (record) => ({ op: "insert", table: "scenarioTransactions", record }) as const,
      ),
    ];
    this.apply(changes, state.sequences);
  }
}
