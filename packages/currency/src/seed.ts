/**
 * @potledger/currency — Starter currency set.
 *
 * The entries live in data/currencies.json beside this package and are
 * validated before anything is registered.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import type { Currency } from "@potledger/types";
import { z } from "zod";
import type { CurrencyDirectory, RegisterCurrencyInput } from "./directory.js";
import { CurrencyError } from "./errors.js";

const SeedEntrySchema = z.object({
  code: z.string().min(1),
  name: z.string().min(1),
  symbol: z.string(),
  kind: z.enum(["fiat", "crypto"]),
  decimals: z.number().int().min(0).optional(),
});

const SeedFileSchema = z.array(SeedEntrySchema);

export const DEFAULT_SEED_FILE = fileURLToPath(new URL("../data/currencies.json", import.meta.url));

export function parseSeedEntries(raw: unknown): readonly RegisterCurrencyInput[] {
  const parsed = SeedFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CurrencyError("SEED_INVALID", `Invalid currency seed data: ${parsed.error.message}`, {
      issues: parsed.error.issues.map((issue) => issue.path.join(".")),
    });
  }
  return parsed.data;
}

export function loadSeedEntries(filePath: string = DEFAULT_SEED_FILE): readonly RegisterCurrencyInput[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err: unknown) {
    throw new CurrencyError("SEED_INVALID", `Cannot read currency seed file "${filePath}": ${String(err)}`, {
      filePath,
    });
  }
  return parseSeedEntries(raw);
}

/**
 * Register every seed entry whose code is not yet known.
 * Returns the currencies registered by this call.
 */
export function seedCurrencies(
  directory: CurrencyDirectory,
  entries: readonly RegisterCurrencyInput[] = loadSeedEntries(),
): readonly Currency[] {
  const registered: Currency[] = [];
  for (const entry of entries) {
    if (directory.lookup(entry.code) !== undefined) {
      continue;
    }
    registered.push(directory.registerCurrency(entry));
  }
  return registered;
}
