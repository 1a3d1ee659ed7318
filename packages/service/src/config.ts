/**
 * @potledger/service — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import type { AccountType } from "@potledger/types";
import { isAccountType } from "@potledger/types";
import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Storage: JSONL file when set, in-memory otherwise
  LEDGER_FILE: z.string().min(1).optional(),

  // Currencies
  SEED_CURRENCIES: z
    .enum(["true", "false"])
    .transform((v) => v === "true")
    .default("true"),

  // Transfers
  OVERDRAFT_BLOCKED_TYPES: z.string().default(""),
  // "available" keeps pot money out of funds checks
  FUNDS_MEASURE: z.enum(["balance", "available"]).default("balance"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Account Type Parsing
// =============================================================================

/**
 * Parse OVERDRAFT_BLOCKED_TYPES into account types.
 *
 * Format: "current,savings"
 */
export function parseAccountTypes(raw: string): readonly AccountType[] {
  if (raw.trim() === "") {
    return [];
  }

  const types: AccountType[] = [];

  for (const entry of raw.split(",")) {
    const type = entry.trim();
    if (!isAccountType(type)) {
      throw new Error(
        `Invalid account type "${type}" in OVERDRAFT_BLOCKED_TYPES. Must be one of: current, savings, credit_card, loan, mortgage, crypto`,
      );
    }
    if (!types.includes(type)) {
      types.push(type);
    }
  }

  return types;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
