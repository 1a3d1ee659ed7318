/**
 * @potledger/types — Shared domain types for the budgeting ledger.
 *
 * Used across all potledger packages:
 * - Money, currencies and exchange rates
 * - Accounts and savings pots
 * - Transactions and their legs
 * - Categories and forecast scenarios
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

export type {
  CurrencyCode,
  DecimalString,
  IsoDate,
  Money,
  CurrencyKind,
  Currency,
  ExchangeRate,
  AccountType,
  InterestCompounding,
  InterestConfig,
  OverdraftConfig,
  Account,
  Pot,
  LegType,
  TransactionLeg,
  Transaction,
  Category,
  CategoryNode,
  Scenario,
  ScenarioTransaction,
} from "./financial.js";

export {
  isAccountType,
  isCurrencyKind,
  isLegType,
  isDecimalString,
  isIsoDate,
  isMoney,
} from "./guards.js";
