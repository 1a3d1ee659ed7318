/**
 * Transfer Engine
 *
 * Composes balanced transactions for the four transfer shapes and for
 * caller-supplied legs, and appends them through the journal.
 *
 * Rules:
 * - Every operation is one unit of work: it appends a whole transaction
 *   or nothing
 * - A cross-currency leg records the rate it was converted at
 * - A missing rate fails with EXCHANGE_RATE_MISSING; it is never assumed 1
 * - Pot moves never change the account balance, only how it is split
 * - No retries; every failure is surfaced to the caller
 */

import type { Account, IsoDate, Pot, Transaction } from "@potledger/types";
import {
  LedgerError,
  appendTransaction,
  compareMoney,
  fromScaled,
  multiplyDecimal,
  potBalance,
  requireAccount,
  requirePot,
  toMoney,
  toScaled,
} from "@potledger/ledger";
import type { LedgerSession, LedgerStore, LegDraft, TransactionDraft } from "@potledger/ledger";
import { endOfDay, rateAtIn, requireCurrencyIn } from "@potledger/currency";
import { requireIsoDate, toIsoDate } from "./dates.js";
import {
  DEFAULT_FUNDS_MEASURE,
  DEFAULT_OVERDRAFT_POLICY,
  assertFunds,
  assertWithinOverdraft,
} from "./overdraft.js";
import type {
  FundsMeasure,
  MultiLegInput,
  MultiLegOptions,
  OverdraftPolicy,
  TransferEngineOptions,
} from "./types.js";

// =============================================================================
// Helpers
// =============================================================================

function positiveAmount(amount: string): bigint {
  const scaled = toScaled(amount);
  if (scaled <= 0n) {
    throw new LedgerError("INVALID_AMOUNT", `Transfer amount must be positive, got "${amount}"`, {
      amount,
    });
  }
  return scaled;
}

function requireRate(
  session: LedgerSession,
  from: string,
  to: string,
  date: IsoDate,
): string {
  const rate = rateAtIn(session, from, to, endOfDay(date));
  if (rate === undefined) {
    throw new LedgerError(
      "EXCHANGE_RATE_MISSING",
      `No ${from}→${to} exchange rate on or before ${date}`,
      { from, to, date },
    );
  }
  return rate;
}

function requireOwnedPot(session: LedgerSession, account: Account, potId: number): Pot {
  const pot = requirePot(session, potId);
  if (pot.accountId !== account.id) {
    throw new LedgerError(
      "POT_OWNERSHIP_MISMATCH",
      `Pot ${String(pot.id)} belongs to account ${String(pot.accountId)}, not ${String(account.id)}`,
      { potId: pot.id, accountId: account.id, ownerAccountId: pot.accountId },
    );
  }
  return pot;
}

function requireActivePot(pot: Pot): void {
  if (!pot.active) {
    throw new LedgerError("POT_INACTIVE", `Pot ${String(pot.id)} is inactive and cannot receive funds`, {
      potId: pot.id,
    });
  }
}

// =============================================================================
// Transfer Engine
// =============================================================================

export class TransferEngine {
  private readonly store: LedgerStore;
  private readonly now: () => Date;
  private readonly overdraft: OverdraftPolicy;
  private readonly funds: FundsMeasure;

  constructor(store: LedgerStore, options?: TransferEngineOptions) {
    this.store = store;
    this.now = options?.now ?? (() => new Date());
    this.overdraft = options?.overdraft ?? DEFAULT_OVERDRAFT_POLICY;
    this.funds = options?.funds ?? DEFAULT_FUNDS_MEASURE;
  }

  /**
   * Move money between two accounts, converting at the rate in force on
   * `date` when their currencies differ. Settles in the source currency.
   */
  transferBetweenAccounts(
    fromId: number,
    toId: number,
    amount: string,
    description?: string,
    date?: IsoDate,
    categoryId?: number,
  ): Transaction {
    if (fromId === toId) {
      throw new LedgerError("SAME_ACCOUNT", `Cannot transfer account ${String(fromId)} to itself`, {
        accountId: fromId,
      });
    }
    const value = positiveAmount(amount);
    const on = this.resolveDate(date);

    return this.store.transaction((session) => {
      const from = requireAccount(session, fromId);
      const to = requireAccount(session, toId);

      const rate = from.currency === to.currency ? "1" : requireRate(session, from.currency, to.currency, on);
      assertWithinOverdraft(session, from, value, this.overdraft, this.funds);

      const sent = fromScaled(value);
      return this.append(session, {
        description: description ?? `Transfer from ${from.name} to ${to.name}`,
        date: on,
        currency: from.currency,
        legs: [
          { accountId: from.id, type: "debit", amount: sent, rate: "1" },
          { accountId: to.id, type: "credit", amount: multiplyDecimal(sent, rate), rate },
        ],
        categoryId,
      });
    });
  }

  /**
   * Ring-fence part of an account's funds in one of its pots.
   */
  transferToPot(
    accountId: number,
    potId: number,
    amount: string,
    description?: string,
    date?: IsoDate,
  ): Transaction {
    const value = positiveAmount(amount);
    const on = this.resolveDate(date);

    return this.store.transaction((session) => {
      const account = requireAccount(session, accountId);
      const pot = requireOwnedPot(session, account, potId);
      requireActivePot(pot);

      assertFunds(session, account, value, this.funds, { potId: pot.id });

      const moved = fromScaled(value);
      return this.append(session, {
        description: description ?? `Transfer to pot ${pot.name}`,
        date: on,
        currency: account.currency,
        legs: [
          { accountId: account.id, type: "debit", amount: moved, rate: "1" },
          { accountId: account.id, potId: pot.id, type: "credit", amount: moved, rate: "1" },
        ],
      });
    });
  }

  /**
   * Release money from a pot back into its account's available funds.
   */
  transferFromPot(
    accountId: number,
    potId: number,
    amount: string,
    description?: string,
    date?: IsoDate,
  ): Transaction {
    const value = positiveAmount(amount);
    const on = this.resolveDate(date);

    return this.store.transaction((session) => {
      const account = requireAccount(session, accountId);
      const pot = requireOwnedPot(session, account, potId);
      this.assertPotFunds(session, pot, value, amount);

      const moved = fromScaled(value);
      return this.append(session, {
        description: description ?? `Transfer from pot ${pot.name}`,
        date: on,
        currency: account.currency,
        legs: [
          { accountId: account.id, potId: pot.id, type: "debit", amount: moved, rate: "1" },
          { accountId: account.id, type: "credit", amount: moved, rate: "1" },
        ],
      });
    });
  }

  transferBetweenPots(
    accountId: number,
    fromPotId: number,
    toPotId: number,
    amount: string,
    description?: string,
    date?: IsoDate,
  ): Transaction {
    if (fromPotId === toPotId) {
      throw new LedgerError("SAME_POT", `Cannot transfer pot ${String(fromPotId)} to itself`, {
        potId: fromPotId,
      });
    }
    const value = positiveAmount(amount);
    const on = this.resolveDate(date);

    return this.store.transaction((session) => {
      const account = requireAccount(session, accountId);
      const source = requireOwnedPot(session, account, fromPotId);
      const target = requireOwnedPot(session, account, toPotId);
      requireActivePot(target);
      this.assertPotFunds(session, source, value, amount);

      const moved = fromScaled(value);
      return this.append(session, {
        description: description ?? `Transfer from pot ${source.name} to pot ${target.name}`,
        date: on,
        currency: account.currency,
        legs: [
          { accountId: account.id, potId: source.id, type: "debit", amount: moved, rate: "1" },
          { accountId: account.id, potId: target.id, type: "credit", amount: moved, rate: "1" },
        ],
      });
    });
  }

  /**
   * Append caller-composed legs. A leg without a rate is converted at the
   * settlement→account rate in force on the transaction date.
   */
  createMultiLegTransaction(
    legs: readonly MultiLegInput[],
    description: string,
    options?: MultiLegOptions,
  ): Transaction {
    const on = this.resolveDate(options?.date);

    return this.store.transaction((session) => {
      const first = legs[0];
      if (legs.length < 2 || first === undefined) {
        throw new LedgerError(
          "TOO_FEW_LEGS",
          `A transaction needs at least two legs, got ${String(legs.length)}`,
          { legCount: legs.length },
        );
      }

      const settlement =
        options?.currency !== undefined
          ? requireCurrencyIn(session, options.currency).code
          : requireAccount(session, first.accountId).currency;

      const drafts: LegDraft[] = legs.map((leg) => {
        const account = requireAccount(session, leg.accountId);
        if (leg.potId !== undefined && leg.type === "credit") {
          requireActivePot(requirePot(session, leg.potId));
        }
        const rate =
          leg.rate ??
          (account.currency === settlement ? "1" : requireRate(session, settlement, account.currency, on));
        return {
          accountId: account.id,
          ...(leg.potId !== undefined ? { potId: leg.potId } : {}),
          type: leg.type,
          amount: leg.amount,
          rate,
        };
      });

      return this.append(session, {
        description,
        date: on,
        currency: settlement,
        legs: drafts,
        categoryId: options?.categoryId,
      });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private resolveDate(date: IsoDate | undefined): IsoDate {
    return requireIsoDate(date ?? toIsoDate(this.now()));
  }

  private append(
    session: LedgerSession,
    draft: TransactionDraft,
  ): Transaction {
    return appendTransaction(session, draft, this.now().toISOString());
  }

  private assertPotFunds(session: LedgerSession, pot: Pot, value: bigint, amount: string): void {
    const balance = potBalance(session, pot.id);
    if (compareMoney(balance, toMoney(value, balance.currency, balance.decimals)) < 0) {
      throw new LedgerError(
        "INSUFFICIENT_FUNDS",
        `Pot ${String(pot.id)} holds ${balance.amount}, cannot move ${amount}`,
        { potId: pot.id, balance: balance.amount, amount },
      );
    }
  }
}
