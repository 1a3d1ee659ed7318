/**
 * @potledger/ledger — Zod schemas for persisted records.
 *
 * Used to validate every record read back from a file-backed store.
 */

import { z } from "zod";

const decimal = z.string().regex(/^-?\d+(\.\d+)?$/, "expected a decimal string");
const id = z.number().int().positive();

export const CurrencyRecordSchema = z.object({
  code: z.string().min(1),
  name: z.string(),
  symbol: z.string(),
  kind: z.enum(["fiat", "crypto"]),
  decimals: z.number().int().min(0),
  active: z.boolean(),
});

export const ExchangeRateRecordSchema = z.object({
  id,
  from: z.string().min(1),
  to: z.string().min(1),
  rate: decimal,
  timestamp: z.string(),
});

export const AccountRecordSchema = z.object({
  id,
  name: z.string(),
  type: z.enum(["current", "savings", "credit_card", "loan", "mortgage", "crypto"]),
  currency: z.string().min(1),
  external: z.boolean(),
  interest: z
    .object({ rate: decimal, compounding: z.enum(["daily", "monthly"]) })
    .optional(),
  overdraft: z
    .object({ limit: decimal, interestRate: decimal.optional() })
    .optional(),
  minimumPayment: decimal.optional(),
  defaultImportFormat: z.string().optional(),
  createdAt: z.string(),
});

export const PotRecordSchema = z.object({
  id,
  name: z.string(),
  accountId: id,
  target: decimal.optional(),
  active: z.boolean(),
  createdAt: z.string(),
});

export const LegRecordSchema = z.object({
  id,
  transactionId: id,
  accountId: id,
  potId: id.optional(),
  type: z.enum(["debit", "credit"]),
  amount: decimal,
  currency: z.string().min(1),
  rate: decimal,
});

export const TransactionRecordSchema = z.object({
  id,
  description: z.string(),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  currency: z.string().min(1),
  legs: z.array(LegRecordSchema).min(2),
  categoryId: id.optional(),
  createdAt: z.string(),
});

export const CategoryRecordSchema = z.object({
  id,
  name: z.string().min(1),
  parentId: id.optional(),
  createdAt: z.string(),
});

export const ScenarioRecordSchema = z.object({
  id,
  name: z.string().min(1),
  description: z.string().optional(),
  currency: z.string().min(1),
  createdAt: z.string(),
});

export const ScenarioTransactionRecordSchema = z.object({
  id,
  scenarioId: id,
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  description: z.string(),
  amount: decimal,
  categoryId: id.optional(),
  createdAt: z.string(),
});

const op = z.enum(["insert", "replace"]);

export const ChangeRecordSchema = z.discriminatedUnion("table", [
  z.object({ op, table: z.literal("currencies"), record: CurrencyRecordSchema }),
  z.object({ op, table: z.literal("rates"), record: ExchangeRateRecordSchema }),
  z.object({ op, table: z.literal("accounts"), record: AccountRecordSchema }),
  z.object({ op, table: z.literal("pots"), record: PotRecordSchema }),
  z.object({ op, table: z.literal("transactions"), record: TransactionRecordSchema }),
  z.object({ op, table: z.literal("categories"), record: CategoryRecordSchema }),
  z.object({ op, table: z.literal("scenarios"), record: ScenarioRecordSchema }),
  z.object({
    op,
    table: z.literal("scenarioTransactions"),
    record: ScenarioTransactionRecordSchema,
  }),
]);

const sequence = z.number().int().min(0);

export const SequencesSchema = z.object({
  rates: sequence,
  accounts: sequence,
  pots: sequence,
  transactions: sequence,
  legs: sequence,
  // Absent from files written before these tables existed.
  categories: sequence.default(0),
  scenarios: sequence.default(0),
  scenarioTransactions: sequence.default(0),
});

/**
 * One line of the JSONL ledger file: a committed unit of work.
 */
export const CommitLineSchema = z.object({
  seq: z.number().int().positive(),
  committedAt: z.string(),
  sequences: SequencesSchema,
  changes: z.array(ChangeRecordSchema).min(1),
});

export type CommitLine = z.infer<typeof CommitLineSchema>;
