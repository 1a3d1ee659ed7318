/**
 * @potledger/currency — Currency Directory.
 *
 * Registry of currencies and their exchange-rate history, backed by a
 * LedgerStore. Every write is its own unit of work.
 *
 * Rules:
 * - Codes are case-insensitive and stored upper-case
 * - A code can be registered once; deactivation hides it from `list()`
 *   and from new accounts but keeps it resolvable for existing ones
 * - Decimals default to 2 for fiat and 8 for crypto
 */

import type { Currency, CurrencyCode, CurrencyKind, ExchangeRate } from "@potledger/types";
import { divideDecimal } from "@potledger/ledger";
import type { LedgerStore } from "@potledger/ledger";
import { CurrencyError } from "./errors.js";
import {
  convertIn,
  normalizeCode,
  normalizeRate,
  rateAtIn,
  rateHistoryIn,
  requireCurrencyIn,
  setRateIn,
} from "./rates.js";

const DEFAULT_DECIMALS: Readonly<Record<CurrencyKind, number>> = {
  fiat: 2,
  crypto: 8,
};

const MAX_DECIMALS = 18;
const CODE_PATTERN = /^[A-Z0-9]{2,12}$/;

export interface RegisterCurrencyInput {
  readonly code: string;
  readonly name: string;
  readonly symbol: string;
  readonly kind: CurrencyKind;
  readonly decimals?: number | undefined;
}

export interface CurrencyDirectoryOptions {
  /** Clock used when a rate is set without a timestamp. */
  readonly now?: (() => Date) | undefined;
}

export class CurrencyDirectory {
  private readonly store: LedgerStore;
  private readonly now: () => Date;

  constructor(store: LedgerStore, options?: CurrencyDirectoryOptions) {
    this.store = store;
    this.now = options?.now ?? (() => new Date());
  }

  // ───────────────────────────────────────────────────────────────────────
  // Currencies
  // ───────────────────────────────────────────────────────────────────────

  registerCurrency(input: RegisterCurrencyInput): Currency {
    const code = normalizeCode(input.code);
    if (!CODE_PATTERN.test(code)) {
      throw new CurrencyError("INVALID_CURRENCY", `Invalid currency code: "${input.code}"`, {
        currency: input.code,
      });
    }

    const decimals = input.decimals ?? DEFAULT_DECIMALS[input.kind];
    if (!Number.isInteger(decimals) || decimals < 0 || decimals > MAX_DECIMALS) {
      throw new CurrencyError(
        "INVALID_CURRENCY",
        `Currency decimals must be an integer from 0 to ${String(MAX_DECIMALS)}, got ${String(decimals)}`,
        { currency: code, decimals },
      );
    }

    return this.store.transaction((session) => {
      if (session.currencies.get(code) !== undefined) {
        throw new CurrencyError("DUPLICATE_CURRENCY", `Currency "${code}" is already registered`, {
          currency: code,
        });
      }
      return session.currencies.insert({
        code,
        name: input.name,
        symbol: input.symbol,
        kind: input.kind,
        decimals,
        active: true,
      });
    });
  }

  lookup(code: string): Currency | undefined {
    return this.store.read((reader) => reader.currencies.get(normalizeCode(code)));
  }

  require(code: string): Currency {
    return this.store.read((reader) => requireCurrencyIn(reader, code));
  }

  /**
   * Active currencies, optionally of one kind, in registration order.
   */
  list(kind?: CurrencyKind): readonly Currency[] {
    return this.store.read((reader) =>
      reader.currencies.find(
        (currency) => currency.active && (kind === undefined || currency.kind === kind),
      ),
    );
  }

  deactivate(code: string): Currency {
    return this.store.transaction((session) => {
      const currency = requireCurrencyIn(session, code);
      if (!currency.active) {
        return currency;
      }
      return session.currencies.replace({ ...currency, active: false });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Rates
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Record the rate for one direction. The inverse is not created.
   */
  setRate(from: string, to: string, rate: string, timestamp?: string): ExchangeRate {
    const at = timestamp ?? this.now().toISOString();
    return this.store.transaction((session) => setRateIn(session, from, to, rate, at));
  }

  /**
   * Record a rate and its inverse (1 / rate) at the same instant.
   */
  setRatePair(
    from: string,
    to: string,
    rate: string,
    timestamp?: string,
  ): readonly [ExchangeRate, ExchangeRate] {
    const at = timestamp ?? this.now().toISOString();
    const inverse = divideDecimal("1", normalizeRate(rate));
    return this.store.transaction((session): readonly [ExchangeRate, ExchangeRate] => [
      setRateIn(session, from, to, rate, at),
      setRateIn(session, to, from, inverse, at),
    ]);
  }

  rateAt(from: string, to: string, atTime?: string): string | undefined {
    return this.store.read((reader) => rateAtIn(reader, from, to, atTime));
  }

  convert(amount: string, from: string, to: string, atTime?: string): string | undefined {
    return this.store.read((reader) => convertIn(reader, amount, from, to, atTime));
  }

  rateHistory(from: string, to: string): readonly ExchangeRate[] {
    return this.store.read((reader) => rateHistoryIn(reader, from, to));
  }

  codes(): readonly CurrencyCode[] {
    return this.list().map((currency) => currency.code);
  }
}
