/**
 * Account & Pot Registry
 *
 * Creates and maintains accounts and their pots. Every operation is one
 * unit of work on the LedgerStore.
 *
 * Rules:
 * - An account's currency must be registered and active, and never changes
 * - A pot lives on exactly one account and shares its currency
 * - A pot funded at creation is created together with the transaction
 *   that funds it, so no pot holds money without a leg behind it
 * - Inactive pots keep their balance and history
 */

import type {
  Account,
  InterestConfig,
  OverdraftConfig,
  Pot,
  Transaction,
} from "@potledger/types";
import {
  LedgerError,
  appendTransaction,
  fromScaled,
  requireAccount,
  requirePot,
  toScaled,
} from "@potledger/ledger";
import type { LedgerReader, LedgerSession, LedgerStore } from "@potledger/ledger";
import { CurrencyError, requireCurrencyIn } from "@potledger/currency";
import { requireIsoDate, toIsoDate } from "./dates.js";
import { DEFAULT_FUNDS_MEASURE, assertFunds } from "./overdraft.js";
import type { AccountPatch, CreateAccountInput, CreatePotOptions, FundsMeasure } from "./types.js";

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

export interface AccountRegistryOptions {
  readonly now?: (() => Date) | undefined;
  /** What initial pot funding is checked against. Defaults to "balance". */
  readonly funds?: FundsMeasure | undefined;
}

// =============================================================================
// Validation
// =============================================================================

function nonNegative(value: string, field: string): string {
  const scaled = toScaled(value);
  if (scaled < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `${field} must not be negative, got "${value}"`, {
      field,
      value,
    });
  }
  return fromScaled(scaled);
}

function validInterest(interest: InterestConfig): InterestConfig {
  return { rate: nonNegative(interest.rate, "interest.rate"), compounding: interest.compounding };
}

function validOverdraft(overdraft: OverdraftConfig): OverdraftConfig {
  return {
    limit: nonNegative(overdraft.limit, "overdraft.limit"),
    ...(overdraft.interestRate !== undefined
      ? { interestRate: nonNegative(overdraft.interestRate, "overdraft.interestRate") }
      : {}),
  };
}

// =============================================================================
// Registry
// =============================================================================

export class AccountRegistry {
  private readonly store: LedgerStore;
  private readonly now: () => Date;
  private readonly funds: FundsMeasure;

  constructor(store: LedgerStore, options?: AccountRegistryOptions) {
    this.store = store;
    this.now = options?.now ?? (() => new Date());
    this.funds = options?.funds ?? DEFAULT_FUNDS_MEASURE;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Accounts
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Create an account. Its balance starts at zero because it has no legs.
   */
  createAccount(input: CreateAccountInput): Account {
    const createdAt = this.now().toISOString();

    return this.store.transaction((session) => {
      const currency = requireCurrencyIn(session, input.currency);
      if (!currency.active) {
        throw new CurrencyError("UNKNOWN_CURRENCY", `Currency "${currency.code}" is not active`, {
          currency: currency.code,
        });
      }

      return session.accounts.insert({
        id: session.nextId("accounts"),
        name: input.name,
        type: input.type,
        currency: currency.code,
        external: input.external ?? false,
        ...(input.interest !== undefined ? { interest: validInterest(input.interest) } : {}),
        ...(input.overdraft !== undefined ? { overdraft: validOverdraft(input.overdraft) } : {}),
        ...(input.minimumPayment !== undefined
          ? { minimumPayment: nonNegative(input.minimumPayment, "minimumPayment") }
          : {}),
        ...(input.defaultImportFormat !== undefined
          ? { defaultImportFormat: input.defaultImportFormat }
          : {}),
        createdAt,
      });
    });
  }

  get(id: number): Account | undefined {
    return this.store.read((reader) => reader.accounts.get(id));
  }

  getAll(): readonly Account[] {
    return this.store.read((reader) => reader.accounts.all());
  }

  /**
   * First account with exactly this name, in creation order.
   */
  getByName(name: string): Account | undefined {
    return this.store.read((reader) => reader.accounts.find((account) => account.name === name)[0]);
  }

  require(id: number): Account {
    return this.store.read((reader) => requireAccount(reader, id));
  }

  updateAccount(id: number, patch: AccountPatch): Account {
    return this.store.transaction((session) => {
      const next: Mutable<Account> = { ...requireAccount(session, id) };

      if (patch.name !== undefined) {
        next.name = patch.name;
      }

      if (patch.interest === null) {
        delete next.interest;
      } else if (patch.interest !== undefined) {
        next.interest = validInterest(patch.interest);
      }

      if (patch.overdraft === null) {
        delete next.overdraft;
      } else if (patch.overdraft !== undefined) {
        next.overdraft = validOverdraft(patch.overdraft);
      }

      if (patch.minimumPayment === null) {
        delete next.minimumPayment;
      } else if (patch.minimumPayment !== undefined) {
        next.minimumPayment = nonNegative(patch.minimumPayment, "minimumPayment");
      }

      if (patch.defaultImportFormat === null) {
        delete next.defaultImportFormat;
      } else if (patch.defaultImportFormat !== undefined) {
        next.defaultImportFormat = patch.defaultImportFormat;
      }

      return session.accounts.replace(next);
    });
  }

  setDefaultImportFormat(id: number, format: string | null): Account {
    return this.updateAccount(id, { defaultImportFormat: format });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Pots
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Create a pot on an account. A positive `initialAmount` is moved out of
   * the account's funds into the pot in the same unit of work.
   */
  createPot(accountId: number, name: string, options?: CreatePotOptions): Pot {
    const createdAt = this.now().toISOString();
    const date = requireIsoDate(options?.date ?? toIsoDate(this.now()));
    const initial = toScaled(nonNegative(options?.initialAmount ?? "0", "initialAmount"));

    return this.store.transaction((session) => {
      const account = requireAccount(session, accountId);
      const pot = session.pots.insert({
        id: session.nextId("pots"),
        name,
        accountId: account.id,
        ...(options?.target !== undefined
          ? { target: nonNegative(options.target, "target") }
          : {}),
        active: true,
        createdAt,
      });

      if (initial > 0n) {
        assertFunds(session, account, initial, this.funds, { potId: pot.id });
        fundNewPot(session, account, pot, initial, date, createdAt);
      }

      return pot;
    });
  }

  getPot(id: number): Pot | undefined {
    return this.store.read((reader) => reader.pots.get(id));
  }

  requirePot(id: number): Pot {
    return this.store.read((reader) => requirePot(reader, id));
  }

  potsOf(accountId: number): readonly Pot[] {
    return this.store.read((reader) => potsOfIn(reader, accountId));
  }

  /**
   * Stop a pot receiving funds. It can still be drained.
   */
  deactivatePot(id: number): Pot {
    return this.store.transaction((session) => {
      const pot = requirePot(session, id);
      return pot.active ? session.pots.replace({ ...pot, active: false }) : pot;
    });
  }
}

export function potsOfIn(reader: LedgerReader, accountId: number): readonly Pot[] {
  requireAccount(reader, accountId);
  return reader.pots.find((pot) => pot.accountId === accountId);
}

function fundNewPot(
  session: LedgerSession,
  account: Account,
  pot: Pot,
  amount: bigint,
  date: string,
  createdAt: string,
): Transaction {
  const value = fromScaled(amount);
  return appendTransaction(
    session,
    {
      description: `Initial funding for pot "${pot.name}"`,
      date,
      currency: account.currency,
      legs: [
        { accountId: account.id, type: "debit", amount: value, rate: "1" },
        { accountId: account.id, potId: pot.id, type: "credit", amount: value, rate: "1" },
      ],
    },
    createdAt,
  );
}
