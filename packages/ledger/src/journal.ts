/**
 * @potledger/ledger — Journal: the only write path for transactions.
 *
 * Validation rules (fail-closed: all must pass before anything is staged):
 * 1. At least two legs
 * 2. A real calendar date
 * 3. Every amount and rate strictly positive
 * 4. Every account exists; every pot exists and belongs to its leg's account
 * 5. A leg in the settlement currency carries rate 1
 * 6. Debits equal credits in the settlement currency. Legs at rate 1 must
 *    match exactly; once any leg is converted, the full-precision difference
 *    may be at most half a unit of the settlement currency's last decimal
 * 7. A category, when given, exists
 *
 * There is NO update or delete. Corrections are new offsetting transactions.
 */

import type {
  Account,
  Category,
  Currency,
  Pot,
  Transaction,
  TransactionLeg,
} from "@potledger/types";
import { isIsoDate } from "@potledger/types";
import {
  LEDGER_SCALE,
  divideScaled,
  fromScaled,
  toScaled,
} from "./money-math.js";
import type {
  DateRange,
  LedgerReader,
  LedgerSession,
  TransactionDraft,
} from "./types.js";
import { LedgerError } from "./types.js";

const ONE = toScaled("1");

/**
 * Largest difference, ledger-scaled, a converted transaction may carry:
 * half a unit of the settlement currency's last decimal, and never less
 * than one ledger unit per converted leg.
 */
export function balanceTolerance(decimals: number, convertedLegs: number): bigint {
  if (convertedLegs === 0) {
    return 0n;
  }
  const halfUnit =
    decimals >= LEDGER_SCALE ? 0n : 5n * 10n ** BigInt(LEDGER_SCALE - decimals - 1);
  const floor = BigInt(convertedLegs);
  return halfUnit > floor ? halfUnit : floor;
}

// ─── Lookups ─────────────────────────────────────────────────────────────

export function requireAccount(reader: LedgerReader, accountId: number): Account {
  const account = reader.accounts.get(accountId);
  if (account === undefined) {
    throw new LedgerError("ACCOUNT_NOT_FOUND", `Unknown account: ${String(accountId)}`, {
      accountId,
    });
  }
  return account;
}

export function requirePot(reader: LedgerReader, potId: number): Pot {
  const pot = reader.pots.get(potId);
  if (pot === undefined) {
    throw new LedgerError("POT_NOT_FOUND", `Unknown pot: ${String(potId)}`, { potId });
  }
  return pot;
}

export function requireCategory(reader: LedgerReader, categoryId: number): Category {
  const category = reader.categories.get(categoryId);
  if (category === undefined) {
    throw new LedgerError("CATEGORY_NOT_FOUND", `Unknown category: ${String(categoryId)}`, {
      categoryId,
    });
  }
  return category;
}

export function requireCurrency(reader: LedgerReader, code: string): Currency {
  const currency = reader.currencies.get(code.toUpperCase());
  if (currency === undefined) {
    throw new LedgerError("UNKNOWN_CURRENCY", `Unknown currency: "${code}"`, { currency: code });
  }
  return currency;
}

// ─── Append ──────────────────────────────────────────────────────────────

/**
 * Validate a draft and stage it as a transaction with fresh ids.
 * Throws LedgerError without staging anything if any rule fails.
 */
export function appendTransaction(
  session: LedgerSession,
  draft: TransactionDraft,
  createdAt: string = new Date().toISOString(),
): Transaction {
  if (draft.legs.length < 2) {
    throw new LedgerError(
      "TOO_FEW_LEGS",
      `A transaction needs at least two legs, got ${String(draft.legs.length)}`,
      { legCount: draft.legs.length },
    );
  }

  if (!isIsoDate(draft.date)) {
    throw new LedgerError("INVALID_DATE", `Invalid transaction date: "${draft.date}"`, {
      date: draft.date,
    });
  }

  const category =
    draft.categoryId !== undefined ? requireCategory(session, draft.categoryId) : undefined;
  const settlement = requireCurrency(session, draft.currency);
  let debits = 0n;
  let credits = 0n;
  let convertedLegs = 0;

  for (const leg of draft.legs) {
    const amount = toScaled(leg.amount);
    if (amount <= 0n) {
      throw new LedgerError(
        "INVALID_AMOUNT",
        `Leg amounts must be positive, got "${leg.amount}"`,
        { accountId: leg.accountId, amount: leg.amount },
      );
    }

    const rate = toScaled(leg.rate);
    if (rate <= 0n) {
      throw new LedgerError("INVALID_RATE", `Leg rates must be positive, got "${leg.rate}"`, {
        accountId: leg.accountId,
        rate: leg.rate,
      });
    }

    const account = requireAccount(session, leg.accountId);

    if (leg.potId !== undefined) {
      const pot = requirePot(session, leg.potId);
      if (pot.accountId !== account.id) {
        throw new LedgerError(
          "POT_OWNERSHIP_MISMATCH",
          `Pot ${String(pot.id)} belongs to account ${String(pot.accountId)}, not ${String(account.id)}`,
          { potId: pot.id, accountId: account.id, ownerAccountId: pot.accountId },
        );
      }
    }

    if (account.currency === settlement.code && rate !== ONE) {
      throw new LedgerError(
        "INVALID_RATE",
        `Leg on account ${String(account.id)} is in the settlement currency but has rate "${leg.rate}"`,
        { accountId: account.id, rate: leg.rate },
      );
    }

    if (rate !== ONE) {
      convertedLegs += 1;
    }
    const settled = rate === ONE ? amount : divideScaled(amount, rate);
    if (leg.type === "debit") {
      debits += settled;
    } else {
      credits += settled;
    }
  }

  const difference = debits > credits ? debits - credits : credits - debits;
  if (difference > balanceTolerance(settlement.decimals, convertedLegs)) {
    throw new LedgerError(
      "UNBALANCED_LEGS",
      `Transaction is unbalanced in ${settlement.code}: debits=${fromScaled(debits, settlement.decimals)}, credits=${fromScaled(credits, settlement.decimals)}`,
      {
        currency: settlement.code,
        debits: fromScaled(debits, settlement.decimals),
        credits: fromScaled(credits, settlement.decimals),
      },
    );
  }

  // Stage as one record.
  const transactionId = session.nextId("transactions");
  const legs: TransactionLeg[] = draft.legs.map((leg) => {
    const account = requireAccount(session, leg.accountId);
    const currency = requireCurrency(session, account.currency);
    return {
      id: session.nextId("legs"),
      transactionId,
      accountId: account.id,
      ...(leg.potId !== undefined ? { potId: leg.potId } : {}),
      type: leg.type,
      amount: fromScaled(toScaled(leg.amount), currency.decimals),
      currency: account.currency,
      rate: fromScaled(toScaled(leg.rate)),
    };
  });

  return session.transactions.insert({
    id: transactionId,
    description: draft.description,
    date: draft.date,
    currency: settlement.code,
    legs,
    ...(category !== undefined ? { categoryId: category.id } : {}),
    createdAt,
  });
}

// ─── Queries ─────────────────────────────────────────────────────────────

/**
 * Order transactions by date, ties broken by id.
 */
export function compareTransactions(a: Transaction, b: Transaction): number {
  if (a.date !== b.date) {
    return a.date < b.date ? -1 : 1;
  }
  return a.id - b.id;
}

function inRange(date: string, range: DateRange | undefined): boolean {
  if (range === undefined) return true;
  if (range.from !== undefined && date < range.from) return false;
  if (range.to !== undefined && date > range.to) return false;
  return true;
}

/**
 * Transactions with at least one leg on the account, ordered by (date, id).
 */
export function accountTransactions(
  reader: LedgerReader,
  accountId: number,
  range?: DateRange,
): readonly Transaction[] {
  requireAccount(reader, accountId);
  return reader.transactions
    .find(
      (tx) =>
        inRange(tx.date, range) && tx.legs.some((leg) => leg.accountId === accountId),
    )
    .slice()
    .sort(compareTransactions);
}

/**
 * Transactions with at least one leg tagged to the pot, ordered by (date, id).
 */
export function potTransactions(
  reader: LedgerReader,
  potId: number,
  range?: DateRange,
): readonly Transaction[] {
  requirePot(reader, potId);
  return reader.transactions
    .find((tx) => inRange(tx.date, range) && tx.legs.some((leg) => leg.potId === potId))
    .slice()
    .sort(compareTransactions);
}

/**
 * Transactions filed under any of the given categories, ordered by (date, id).
 */
export function categoryTransactions(
  reader: LedgerReader,
  categoryIds: Iterable<number>,
  range?: DateRange,
): readonly Transaction[] {
  const wanted = new Set(categoryIds);
  for (const id of wanted) {
    requireCategory(reader, id);
  }
  return reader.transactions
    .find(
      (tx) => tx.categoryId !== undefined && wanted.has(tx.categoryId) && inRange(tx.date, range),
    )
    .slice()
    .sort(compareTransactions);
}

export function legsOf(reader: LedgerReader, transactionId: number): readonly TransactionLeg[] {
  const transaction = reader.transactions.get(transactionId);
  if (transaction === undefined) {
    throw new LedgerError(
      "TRANSACTION_NOT_FOUND",
      `Unknown transaction: ${String(transactionId)}`,
      { transactionId },
    );
  }
  return transaction.legs;
}

/**
 * Total number of legs across every transaction.
 */
export function legCount(reader: LedgerReader): number {
  return reader.transactions.all().reduce((sum, tx) => sum + tx.legs.length, 0);
}
