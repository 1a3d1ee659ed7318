/**
 * Budget Types
 *
 * Inputs and results for the registry, the transfer engine and the
 * supplementary calculations.
 *
 * Rules:
 * - All types are readonly (immutability by default)
 * - Amounts and rates are decimal strings
 * - Dates are YYYY-MM-DD; timestamps are ISO 8601
 */

import type {
  AccountType,
  CurrencyCode,
  DecimalString,
  InterestConfig,
  IsoDate,
  LegType,
  OverdraftConfig,
} from "@potledger/types";

// =============================================================================
// Registry
// =============================================================================

export interface CreateAccountInput {
  readonly name: string;
  readonly type: AccountType;
  readonly currency: CurrencyCode;
  readonly external?: boolean | undefined;
  readonly interest?: InterestConfig | undefined;
  readonly overdraft?: OverdraftConfig | undefined;
  readonly minimumPayment?: DecimalString | undefined;
  readonly defaultImportFormat?: string | undefined;
}

/**
 * Named fields an account may change after creation.
 * `undefined` leaves a field alone; `null` clears an optional one.
 * Currency and type are fixed at creation.
 */
export interface AccountPatch {
  readonly name?: string | undefined;
  readonly interest?: InterestConfig | null | undefined;
  readonly overdraft?: OverdraftConfig | null | undefined;
  readonly minimumPayment?: DecimalString | null | undefined;
  readonly defaultImportFormat?: string | null | undefined;
}

export interface CreatePotOptions {
  readonly target?: DecimalString | undefined;
  /** Moved from the account into the new pot in the same unit of work. */
  readonly initialAmount?: DecimalString | undefined;
  readonly date?: IsoDate | undefined;
}

// =============================================================================
// Categories
// =============================================================================

/** `null` for `parentId` makes the category a root. */
export interface CategoryPatch {
  readonly name?: string | undefined;
  readonly parentId?: number | null | undefined;
}

export interface CategoryTransactionsOptions {
  readonly includeSubcategories?: boolean | undefined;
}

// =============================================================================
// Scenarios
// =============================================================================

export interface CreateScenarioInput {
  readonly name: string;
  readonly description?: string | undefined;
  readonly currency: CurrencyCode;
}

export interface ScenarioTransactionInput {
  readonly date: IsoDate;
  readonly description: string;
  /** Signed: positive is an inflow. */
  readonly amount: DecimalString;
  readonly categoryId?: number | undefined;
}

export interface ScenarioForecastPoint {
  readonly transactionId: number;
  readonly date: IsoDate;
  readonly description: string;
  readonly amount: DecimalString;
  /** Running total after this transaction. */
  readonly balance: DecimalString;
}

// =============================================================================
// Transfer Engine
// =============================================================================

/**
 * What counts as an account's funds in a funds check.
 *
 * - "balance": the whole account balance, pot money included
 * - "available": only money outside the account's pots, so money set aside
 *   in a pot cannot be spent or ring-fenced a second time
 */
export type FundsMeasure = "balance" | "available";

/**
 * Which accounts `transferBetweenAccounts` checks for funds.
 *
 * External accounts are never checked. An account whose type is listed in
 * `blockedTypes` may not go below minus its overdraft limit (zero when none
 * is configured). Any other account with a configured overdraft limit may
 * not go below it. Everything else is unchecked.
 */
export interface OverdraftPolicy {
  readonly blockedTypes: readonly AccountType[];
}

export interface TransferEngineOptions {
  /** Clock for default dates and record timestamps. */
  readonly now?: (() => Date) | undefined;
  readonly overdraft?: OverdraftPolicy | undefined;
  /** Defaults to "balance". */
  readonly funds?: FundsMeasure | undefined;
}

/**
 * One leg of a caller-composed transaction.
 * Without `rate`, the rate in force on the transaction date is used.
 */
export interface MultiLegInput {
  readonly accountId: number;
  readonly potId?: number | undefined;
  readonly type: LegType;
  readonly amount: DecimalString;
  readonly rate?: DecimalString | undefined;
}

export interface MultiLegOptions {
  readonly date?: IsoDate | undefined;
  /** Settlement currency; defaults to the first leg's account currency. */
  readonly currency?: CurrencyCode | undefined;
  readonly categoryId?: number | undefined;
}

// =============================================================================
// Forecast
// =============================================================================

export type Recurrence = "once" | "daily" | "weekly" | "monthly";

/**
 * A planned, repeating movement between two accounts.
 * Not part of the ledger; forecasts never post legs.
 */
export interface ScheduledTransaction {
  readonly id: number;
  readonly description: string;
  readonly amount: DecimalString;
  readonly fromAccountId: number;
  readonly toAccountId: number;
  readonly fromPotId?: number | undefined;
  readonly toPotId?: number | undefined;
  readonly recurrence: Recurrence;
  readonly startDate: IsoDate;
  /** Inclusive. Open-ended when absent. */
  readonly endDate?: IsoDate | undefined;
  readonly active: boolean;
}

export interface ForecastItem {
  readonly scheduleId: number;
  readonly date: IsoDate;
  readonly description: string;
  readonly amount: DecimalString;
  readonly fromAccountId: number;
  readonly toAccountId: number;
  readonly fromPotId?: number | undefined;
  readonly toPotId?: number | undefined;
}

/**
 * Running balances of every touched account after one forecast item.
 */
export interface ProjectedBalance {
  readonly date: IsoDate;
  readonly item: ForecastItem;
  readonly balances: ReadonlyMap<number, DecimalString>;
  /** Running balances of every pot an item has named so far. */
  readonly potBalances: ReadonlyMap<number, DecimalString>;
}
