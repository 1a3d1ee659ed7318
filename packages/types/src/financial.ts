/**
 * Financial Types
 *
 * Core primitives for a personal multi-currency budgeting ledger:
 * currencies and rates, accounts, savings pots, and double-entry
 * transactions made of legs.
 *
 * Rules:
 * - All amounts and rates are decimal strings, never JS numbers
 * - Currency is always explicit on money and on every leg
 * - Transactions and legs are append-only by contract
 * - Balances are never stored; they are folded from legs
 */

/**
 * Currency code. ISO 4217 for fiat ("GBP"), ticker for crypto ("BTC").
 * Always upper-case once registered.
 */
export type CurrencyCode = string;

/**
 * A decimal number carried as a string (e.g. "100.50", "-3", "1.25").
 */
export type DecimalString = string;

/**
 * Calendar date in YYYY-MM-DD form.
 */
export type IsoDate = string;

/**
 * A precise monetary amount.
 */
export interface Money {
  /** Decimal string at full ledger precision (e.g. "12.50", "-0.0001") */
  readonly amount: DecimalString;

  readonly currency: CurrencyCode;

  /** Display precision of the currency. GBP = 2, JPY = 0, BTC = 8. */
  readonly decimals: number;
}

// ─── Currencies ──────────────────────────────────────────────────────────

export type CurrencyKind = "fiat" | "crypto";

export interface Currency {
  readonly code: CurrencyCode;
  readonly name: string;
  readonly symbol: string;
  readonly kind: CurrencyKind;

  /** Display and rounding granularity, not storage precision. */
  readonly decimals: number;

  readonly active: boolean;
}

/**
 * A time-stamped rate converting one unit of `from` into `to`.
 * Inverse rates are never derived by the store.
 */
export interface ExchangeRate {
  readonly id: number;
  readonly from: CurrencyCode;
  readonly to: CurrencyCode;
  readonly rate: DecimalString;

  /** ISO 8601 timestamp */
  readonly timestamp: string;
}

// ─── Accounts & Pots ─────────────────────────────────────────────────────

/**
 * Informational only. The type never decides whether a transfer is legal,
 * except through an explicitly configured overdraft policy.
 */
export type AccountType =
  | "current"
  | "savings"
  | "credit_card"
  | "loan"
  | "mortgage"
  | "crypto";

export type InterestCompounding = "daily" | "monthly";

export interface InterestConfig {
  /** Annual rate as a fraction, e.g. "0.0750" for 7.5% */
  readonly rate: DecimalString;
  readonly compounding: InterestCompounding;
}

export interface OverdraftConfig {
  /** How far below zero the account may go, as a positive amount. */
  readonly limit: DecimalString;

  /** Annual overdraft rate as a fraction, e.g. "0.19" */
  readonly interestRate?: DecimalString | undefined;
}

export interface Account {
  readonly id: number;
  readonly name: string;
  readonly type: AccountType;

  /** Fixed at creation. Every leg on this account is in this currency. */
  readonly currency: CurrencyCode;

  /** Counterparty outside the user's own money supply (employer, merchant). */
  readonly external: boolean;

  readonly interest?: InterestConfig | undefined;
  readonly overdraft?: OverdraftConfig | undefined;
  readonly minimumPayment?: DecimalString | undefined;

  /** Name of the statement import format used for this account. */
  readonly defaultImportFormat?: string | undefined;

  readonly createdAt: string;
}

/**
 * A named, ring-fenced sub-partition of an account's funds.
 * Shares the account's currency; cannot move to another account.
 */
export interface Pot {
  readonly id: number;
  readonly name: string;
  readonly accountId: number;
  readonly target?: DecimalString | undefined;
  readonly active: boolean;
  readonly createdAt: string;
}

// ─── Transactions ────────────────────────────────────────────────────────

/**
 * Side of a leg (double-entry accounting).
 */
export type LegType = "debit" | "credit";

/**
 * One side of a transaction, tied to one account and optionally one pot.
 */
export interface TransactionLeg {
  readonly id: number;
  readonly transactionId: number;
  readonly accountId: number;

  /** When set, the pot must belong to `accountId`. */
  readonly potId?: number | undefined;

  readonly type: LegType;

  /** Strictly positive, in the leg's own currency. */
  readonly amount: DecimalString;

  /** Always equal to the account's currency. */
  readonly currency: CurrencyCode;

  /** Rate from the transaction's settlement currency into `currency`. "1" when equal. */
  readonly rate: DecimalString;
}

/**
 * A balanced group of legs. Ordering between transactions is (date, id).
 */
export interface Transaction {
  readonly id: number;
  readonly description: string;
  readonly date: IsoDate;

  /** Settlement currency: the currency the transaction is denominated in. */
  readonly currency: CurrencyCode;

  /** Insertion order, not semantically significant. */
  readonly legs: readonly TransactionLeg[];

  readonly categoryId?: number | undefined;

  readonly createdAt: string;
}

// ─── Categories ──────────────────────────────────────────────────────────

/**
 * A spending or income category. Categories form a forest through `parentId`.
 */
export interface Category {
  readonly id: number;
  readonly name: string;
  readonly parentId?: number | undefined;
  readonly createdAt: string;
}

/** A category with its descendants, as returned by a hierarchy query. */
export interface CategoryNode {
  readonly id: number;
  readonly name: string;
  readonly children: readonly CategoryNode[];
}

// ─── Scenarios ───────────────────────────────────────────────────────────

/**
 * A named what-if plan: hypothetical dated amounts in one currency,
 * kept apart from the ledger.
 */
export interface Scenario {
  readonly id: number;
  readonly name: string;
  readonly description?: string | undefined;
  readonly currency: CurrencyCode;
  readonly createdAt: string;
}

/**
 * One hypothetical movement in a scenario.
 * Positive amounts are inflows, negative amounts outflows.
 */
export interface ScenarioTransaction {
  readonly id: number;
  readonly scenarioId: number;
  readonly date: IsoDate;
  readonly description: string;
  readonly amount: DecimalString;
  readonly categoryId?: number | undefined;
  readonly createdAt: string;
}
