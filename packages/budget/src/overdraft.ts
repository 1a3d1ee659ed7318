/**
 * Funds checks.
 *
 * An account's funds are its balance, or with the "available" measure only
 * the money outside its pots. Account-to-account transfers are further
 * governed by the overdraft policy.
 */

import type { Account, Money } from "@potledger/types";
import {
  LedgerError,
  accountBalance,
  availableBalance,
  compareMoney,
  subtractMoney,
  toMoney,
  toScaled,
} from "@potledger/ledger";
import type { LedgerReader } from "@potledger/ledger";
import type { FundsMeasure, OverdraftPolicy } from "./types.js";

/** No account is blocked; only configured overdraft limits apply. */
export const DEFAULT_OVERDRAFT_POLICY: OverdraftPolicy = { blockedTypes: [] };

export const DEFAULT_FUNDS_MEASURE: FundsMeasure = "balance";

export function fundsOf(reader: LedgerReader, accountId: number, measure: FundsMeasure): Money {
  return measure === "available"
    ? availableBalance(reader, accountId)
    : accountBalance(reader, accountId);
}

/**
 * Fail with INSUFFICIENT_FUNDS unless the account's funds cover `amount`.
 */
export function assertFunds(
  reader: LedgerReader,
  account: Account,
  amount: bigint,
  measure: FundsMeasure,
  context?: Readonly<Record<string, unknown>>,
): void {
  const funds = fundsOf(reader, account.id, measure);
  const wanted = toMoney(amount, funds.currency, funds.decimals);
  if (compareMoney(funds, wanted) < 0) {
    throw new LedgerError(
      "INSUFFICIENT_FUNDS",
      `Account ${String(account.id)} has ${funds.amount} ${account.currency} (${measure}), cannot move ${wanted.amount}`,
      {
        accountId: account.id,
        ...context,
        measure,
        funds: funds.amount,
        amount: wanted.amount,
      },
    );
  }
}

/**
 * The lowest funds the policy allows, ledger-scaled,
 * or undefined when the account is unchecked.
 */
export function overdraftFloor(account: Account, policy: OverdraftPolicy): bigint | undefined {
  if (account.external) {
    return undefined;
  }
  const limit = account.overdraft !== undefined ? toScaled(account.overdraft.limit) : undefined;
  if (policy.blockedTypes.includes(account.type)) {
    return -(limit ?? 0n);
  }
  return limit === undefined ? undefined : -limit;
}

export function assertWithinOverdraft(
  reader: LedgerReader,
  account: Account,
  amount: bigint,
  policy: OverdraftPolicy,
  measure: FundsMeasure = DEFAULT_FUNDS_MEASURE,
): void {
  const floor = overdraftFloor(account, policy);
  if (floor === undefined) {
    return;
  }

  const funds = fundsOf(reader, account.id, measure);
  const wanted = toMoney(amount, funds.currency, funds.decimals);
  const lowest = toMoney(floor, funds.currency, funds.decimals);
  if (compareMoney(subtractMoney(funds, wanted), lowest) < 0) {
    throw new LedgerError(
      "INSUFFICIENT_FUNDS",
      `Account ${String(account.id)} has ${funds.amount} ${account.currency} (${measure}) and may not go below ${lowest.amount}`,
      {
        accountId: account.id,
        measure,
        funds: funds.amount,
        amount: wanted.amount,
        floor: lowest.amount,
      },
    );
  }
}
