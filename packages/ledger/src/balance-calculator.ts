/**
 * @potledger/ledger — Balance calculation engine.
 *
 * Derives account and pot balances by folding over transaction legs.
 * Nothing here is cached: every call recomputes from committed legs,
 * so two calls with no write in between always agree.
 *
 * Rules:
 * - Balance = sum(credit) - sum(debit), at full ledger precision
 * - Pot-tagged legs count toward their account as well as their pot
 * - `asOfDate` restricts the fold to transactions dated on or before it
 * - Balances are per account currency (never cross-currency)
 */

import type { Money, TransactionLeg } from "@potledger/types";
import { requireAccount, requireCurrency, requirePot } from "./journal.js";
import { addMoney, toMoney, toScaled, zeroMoney } from "./money-math.js";
import type { LedgerReader } from "./types.js";

/**
 * Net of a set of legs: credits minus debits, ledger-scaled.
 */
export function legSum(legs: Iterable<TransactionLeg>): bigint {
  let total = 0n;
  for (const leg of legs) {
    const amount = toScaled(leg.amount);
    total += leg.type === "credit" ? amount : -amount;
  }
  return total;
}

/**
 * Collect legs matching a predicate from transactions dated on or before `asOfDate`.
 */
function collectLegs(
  reader: LedgerReader,
  matches: (leg: TransactionLeg) => boolean,
  asOfDate?: string,
): TransactionLeg[] {
  const legs: TransactionLeg[] = [];
  for (const tx of reader.transactions.all()) {
    if (asOfDate !== undefined && tx.date > asOfDate) {
      continue;
    }
    for (const leg of tx.legs) {
      if (matches(leg)) {
        legs.push(leg);
      }
    }
  }
  return legs;
}

/**
 * Balance of an account, including legs tagged to any of its pots.
 */
export function accountBalance(
  reader: LedgerReader,
  accountId: number,
  asOfDate?: string,
): Money {
  const account = requireAccount(reader, accountId);
  const currency = requireCurrency(reader, account.currency);
  const legs = collectLegs(reader, (leg) => leg.accountId === accountId, asOfDate);
  return toMoney(legSum(legs), currency.code, currency.decimals);
}

/**
 * Balance of a pot: only the legs tagged with it.
 */
export function potBalance(
  reader: LedgerReader,
  potId: number,
  asOfDate?: string,
): Money {
  const pot = requirePot(reader, potId);
  const account = requireAccount(reader, pot.accountId);
  const currency = requireCurrency(reader, account.currency);
  const legs = collectLegs(reader, (leg) => leg.potId === potId, asOfDate);
  return toMoney(legSum(legs), currency.code, currency.decimals);
}

/**
 * Spendable amount outside pots: account balance minus every pot's balance,
 * i.e. the fold over the account's untagged legs.
 */
export function availableBalance(
  reader: LedgerReader,
  accountId: number,
  asOfDate?: string,
): Money {
  const account = requireAccount(reader, accountId);
  const currency = requireCurrency(reader, account.currency);
  const legs = collectLegs(
    reader,
    (leg) => leg.accountId === accountId && leg.potId === undefined,
    asOfDate,
  );
  return toMoney(legSum(legs), currency.code, currency.decimals);
}

/**
 * Sum of balances per currency across accounts.
 * External accounts are excluded unless `includeExternal` is set.
 */
export function currencyTotals(
  reader: LedgerReader,
  options?: { readonly includeExternal?: boolean | undefined },
): readonly Money[] {
  const totals = new Map<string, Money>();
  const includeExternal = options?.includeExternal ?? false;

  for (const account of reader.accounts.all()) {
    if (account.external && !includeExternal) {
      continue;
    }
    const balance = accountBalance(reader, account.id);
    const total = totals.get(account.currency) ?? zeroMoney(balance.currency, balance.decimals);
    totals.set(account.currency, addMoney(total, balance));
  }

  return [...totals.values()];
}
