/**
 * @potledger/ledger — Append-only double-entry ledger core.
 *
 * Enforces the ledger invariants:
 * - Every transaction has at least two legs and balances in its
 *   settlement currency
 * - Legs are immutable once appended; corrections are new transactions
 * - A pot-tagged leg always sits on the pot's own account
 * - Balances are folded from legs, never stored
 * - All monetary arithmetic uses bigint (no floating point)
 */

// Stores
export { InMemoryLedgerStore, computeStateHash, verifySnapshotIntegrity } from "./in-memory-store.js";
export { JsonlLedgerStore } from "./jsonl-store.js";
export type { JsonlLedgerStoreOptions } from "./jsonl-store.js";

// Journal
export {
  appendTransaction,
  balanceTolerance,
  accountTransactions,
  potTransactions,
  categoryTransactions,
  legsOf,
  legCount,
  compareTransactions,
  requireAccount,
  requirePot,
  requireCurrency,
  requireCategory,
} from "./journal.js";

// Balance computation
export {
  accountBalance,
  potBalance,
  availableBalance,
  currencyTotals,
  legSum,
} from "./balance-calculator.js";

// Decimal arithmetic
export {
  LEDGER_SCALE,
  parseAmount,
  formatAmount,
  toScaled,
  fromScaled,
  multiplyScaled,
  divideScaled,
  roundScaled,
  addDecimal,
  subtractDecimal,
  multiplyDecimal,
  divideDecimal,
  roundToDecimals,
  compareDecimal,
  assertSameCurrency,
  toMoney,
  addMoney,
  subtractMoney,
  isNegative,
  zeroMoney,
  compareMoney,
  roundMoney,
} from "./money-math.js";

// Types
export type {
  LedgerErrorCode,
  RecordKey,
  ReadRepository,
  AppendOnlyRepository,
  Repository,
  TableRecords,
  TableName,
  SequenceName,
  Sequences,
  ChangeRecord,
  LedgerReader,
  LedgerSession,
  LedgerStore,
  LedgerState,
  LedgerSnapshot,
  LegDraft,
  TransactionDraft,
  DateRange,
} from "./types.js";

export { LedgerError } from "./types.js";
