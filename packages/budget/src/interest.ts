/**
 * Interest accrual.
 *
 * Computes compound interest on a balance over a number of days without
 * posting anything. All arithmetic is ledger-scaled bigint.
 *
 * Rules:
 * - Daily compounding uses rate / 365 per day
 * - Monthly compounding uses rate / 12 / 30 per day
 * - Overdraft interest applies only to current accounts below zero, on at
 *   most the overdraft limit, at the overdraft rate / 365 per day
 * - Results keep full precision; round for display with roundMoney
 */

import type { Account, Money } from "@potledger/types";
import {
  LedgerError,
  divideScaled,
  isNegative,
  multiplyScaled,
  toMoney,
  toScaled,
  zeroMoney,
} from "@potledger/ledger";

const ONE = toScaled("1");
const DAYS_PER_YEAR = toScaled("365");
const DAYS_PER_MONTHLY_YEAR = toScaled("360");

/**
 * base^exponent at ledger scale, by repeated squaring.
 */
export function powScaled(base: bigint, exponent: number): bigint {
  let result = ONE;
  let square = base;
  let remaining = exponent;
  while (remaining > 0) {
    if (remaining % 2 === 1) {
      result = multiplyScaled(result, square);
    }
    square = multiplyScaled(square, square);
    remaining = Math.floor(remaining / 2);
  }
  return result;
}

function assertDays(days: number): void {
  if (!Number.isInteger(days) || days < 0) {
    throw new LedgerError("INVALID_AMOUNT", `Days must be a non-negative integer, got ${String(days)}`, {
      days,
    });
  }
}

/**
 * principal * ((1 + dailyRate)^days - 1)
 */
function compound(principal: bigint, dailyRate: bigint, days: number): bigint {
  return multiplyScaled(principal, powScaled(ONE + dailyRate, days) - ONE);
}

/**
 * Interest earned (or owed, for a negative balance) over `days`.
 * Zero when the account has no interest configuration.
 */
export function accrueInterest(account: Account, balance: Money, days: number): Money {
  assertDays(days);
  if (account.interest === undefined) {
    return zeroMoney(balance.currency, balance.decimals);
  }

  const perYear = account.interest.compounding === "daily" ? DAYS_PER_YEAR : DAYS_PER_MONTHLY_YEAR;
  const dailyRate = divideScaled(toScaled(account.interest.rate), perYear);
  return toMoney(compound(toScaled(balance.amount), dailyRate, days), balance.currency, balance.decimals);
}

/**
 * Overdraft charge over `days`, as a positive amount.
 * Zero for any account other than a current account, for a non-negative
 * balance, and without an overdraft rate.
 */
export function accrueOverdraftInterest(account: Account, balance: Money, days: number): Money {
  assertDays(days);
  const rate = account.overdraft?.interestRate;
  if (
    account.type !== "current" ||
    !isNegative(balance) ||
    account.overdraft === undefined ||
    rate === undefined
  ) {
    return zeroMoney(balance.currency, balance.decimals);
  }

  const overdrawn = -toScaled(balance.amount);
  const limit = toScaled(account.overdraft.limit);
  const principal = overdrawn < limit ? overdrawn : limit;
  const dailyRate = divideScaled(toScaled(rate), DAYS_PER_YEAR);
  return toMoney(compound(principal, dailyRate, days), balance.currency, balance.decimals);
}
