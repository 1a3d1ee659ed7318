/**
 * @potledger/budget — Accounts, pots and transfers.
 *
 * Four subsystems:
 * 1. Registry: accounts and their pots
 * 2. Transfer Engine: balanced transfers between accounts and pots
 * 3. Categories: a hierarchy that transactions are filed under
 * 4. Planning: interest accrual, scheduled-transaction forecasts and
 *    what-if scenarios
 */

// Registry
export { AccountRegistry, potsOfIn } from "./registry.js";
export type { AccountRegistryOptions } from "./registry.js";

// Categories
export { CategoryRegistry, childrenIn, hierarchyIn, subtreeIdsIn } from "./categories.js";
export type { CategoryRegistryOptions } from "./categories.js";

// Transfers
export { TransferEngine } from "./transfer-engine.js";
export {
  DEFAULT_FUNDS_MEASURE,
  DEFAULT_OVERDRAFT_POLICY,
  assertFunds,
  assertWithinOverdraft,
  fundsOf,
  overdraftFloor,
} from "./overdraft.js";

// Planning
export { accrueInterest, accrueOverdraftInterest, powScaled } from "./interest.js";
export {
  expandSchedule,
  projectBalances,
  startingBalances,
  startingPotBalances,
} from "./forecast.js";
export {
  ScenarioPlanner,
  forecastIn,
  requireScenario,
  scenarioTransactionsIn,
} from "./scenarios.js";
export type { ScenarioPlannerOptions } from "./scenarios.js";
export { addDays, addMonthsClamped, requireIsoDate, toIsoDate } from "./dates.js";

// Types
export type {
  CreateAccountInput,
  AccountPatch,
  CreatePotOptions,
  CategoryPatch,
  CategoryTransactionsOptions,
  CreateScenarioInput,
  ScenarioTransactionInput,
  ScenarioForecastPoint,
  OverdraftPolicy,
  FundsMeasure,
  TransferEngineOptions,
  MultiLegInput,
  MultiLegOptions,
  Recurrence,
  ScheduledTransaction,
  ForecastItem,
  ProjectedBalance,
} from "./types.js";
