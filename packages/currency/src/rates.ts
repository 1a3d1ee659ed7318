/**
 * @potledger/currency — Exchange-rate history over a ledger reader.
 *
 * These functions take a reader or session rather than a store so the
 * Transfer Engine can resolve and record rates inside its own unit of work.
 *
 * Rules:
 * - Rates are directional; setting A→B never creates B→A
 * - A same-currency pair is always "1" and never touches the store
 * - The effective rate at T is the latest with timestamp <= T;
 *   equal timestamps resolve to the rate recorded last
 * - A missing rate is reported as undefined, never assumed to be 1
 */

import type { Currency, CurrencyCode, ExchangeRate, IsoDate } from "@potledger/types";
import { isDecimalString } from "@potledger/types";
import { fromScaled, multiplyDecimal, toScaled } from "@potledger/ledger";
import type { LedgerReader, LedgerSession } from "@potledger/ledger";
import { CurrencyError } from "./errors.js";

const MAX_RATE_DECIMALS = 12;

export function normalizeCode(code: string): CurrencyCode {
  return code.trim().toUpperCase();
}

/**
 * The last instant of a calendar day, used to look up the rate in force on it.
 */
export function endOfDay(date: IsoDate): string {
  return `${date}T23:59:59.999Z`;
}

/**
 * Parse an ISO-8601 instant into its canonical UTC form.
 */
export function normalizeTimestamp(value: string): string {
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new CurrencyError("INVALID_RATE", `Invalid rate timestamp: "${value}"`, {
      timestamp: value,
    });
  }
  return parsed.toISOString();
}

/**
 * Validate a rate string and return its canonical form.
 */
export function normalizeRate(rate: string): string {
  const fraction = rate.split(".")[1] ?? "";
  if (!isDecimalString(rate) || fraction.length > MAX_RATE_DECIMALS) {
    throw new CurrencyError("INVALID_RATE", `Invalid exchange rate: "${rate}"`, { rate });
  }
  const scaled = toScaled(rate);
  if (scaled <= 0n) {
    throw new CurrencyError("INVALID_RATE", `Exchange rate must be positive, got "${rate}"`, {
      rate,
    });
  }
  return fromScaled(scaled);
}

export function requireCurrencyIn(reader: LedgerReader, code: string): Currency {
  const currency = reader.currencies.get(normalizeCode(code));
  if (currency === undefined) {
    throw new CurrencyError("UNKNOWN_CURRENCY", `Unknown currency: "${code}"`, {
      currency: code,
    });
  }
  return currency;
}

export function setRateIn(
  session: LedgerSession,
  from: string,
  to: string,
  rate: string,
  timestamp: string,
): ExchangeRate {
  const fromCurrency = requireCurrencyIn(session, from);
  const toCurrency = requireCurrencyIn(session, to);

  return session.rates.insert({
    id: session.nextId("rates"),
    from: fromCurrency.code,
    to: toCurrency.code,
    rate: normalizeRate(rate),
    timestamp: normalizeTimestamp(timestamp),
  });
}

export function rateAtIn(
  reader: LedgerReader,
  from: string,
  to: string,
  atTime?: string,
): string | undefined {
  const fromCode = normalizeCode(from);
  const toCode = normalizeCode(to);
  if (fromCode === toCode) {
    return "1";
  }

  const cutoff = atTime === undefined ? undefined : normalizeTimestamp(atTime);
  let best: ExchangeRate | undefined;

  for (const candidate of reader.rates.all()) {
    if (candidate.from !== fromCode || candidate.to !== toCode) continue;
    if (cutoff !== undefined && candidate.timestamp > cutoff) continue;
    if (
      best === undefined ||
      candidate.timestamp > best.timestamp ||
      (candidate.timestamp === best.timestamp && candidate.id > best.id)
    ) {
      best = candidate;
    }
  }

  return best?.rate;
}

/**
 * `amount * rateAt(from, to, atTime)`, shown with at least the target
 * currency's decimals. Undefined when no rate applies.
 */
export function convertIn(
  reader: LedgerReader,
  amount: string,
  from: string,
  to: string,
  atTime?: string,
): string | undefined {
  const target = requireCurrencyIn(reader, to);
  const rate = rateAtIn(reader, from, to, atTime);
  if (rate === undefined) {
    return undefined;
  }
  return multiplyDecimal(amount, rate, target.decimals);
}

/**
 * Every recorded rate for a pair, oldest first.
 */
export function rateHistoryIn(
  reader: LedgerReader,
  from: string,
  to: string,
): readonly ExchangeRate[] {
  const fromCode = normalizeCode(from);
  const toCode = normalizeCode(to);
  return reader.rates
    .find((rate) => rate.from === fromCode && rate.to === toCode)
    .slice()
    .sort((a, b) => (a.timestamp === b.timestamp ? a.id - b.id : a.timestamp < b.timestamp ? -1 : 1));
}
