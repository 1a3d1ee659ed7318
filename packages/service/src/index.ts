/**
 * @potledger/service — Budget service facade.
 *
 * Configuration, logging, error envelopes and the single entry point a
 * presentation layer talks to.
 */

export { BudgetService, createBudgetService } from "./budget-service.js";
export type {
  AccountSummary,
  BudgetServiceDeps,
  InterestPreview,
  PotSummary,
} from "./budget-service.js";

export { ConfigSchema, loadConfig, parseAccountTypes } from "./config.js";
export type { AppConfig } from "./config.js";

export { createLogger } from "./logger.js";

export { createErrorEnvelope, errorKind, isDomainError, toErrorEnvelope } from "./errors.js";
export type { ErrorDetail, ErrorEnvelope, ErrorKind } from "./errors.js";
