/**
 * Calendar helpers over YYYY-MM-DD strings, all in UTC.
 */

import type { IsoDate } from "@potledger/types";
import { isIsoDate } from "@potledger/types";
import { LedgerError } from "@potledger/ledger";

const DAY_MS = 86_400_000;

export function toIsoDate(date: Date): IsoDate {
  return date.toISOString().slice(0, 10);
}

export function requireIsoDate(value: string): IsoDate {
  if (!isIsoDate(value)) {
    throw new LedgerError("INVALID_DATE", `Invalid date: "${value}"`, { date: value });
  }
  return value;
}

function parts(date: IsoDate): readonly [number, number, number] {
  const [year, month, day] = date.split("-").map(Number);
  return [year ?? 0, month ?? 1, day ?? 1];
}

export function addDays(date: IsoDate, days: number): IsoDate {
  const [year, month, day] = parts(date);
  return toIsoDate(new Date(Date.UTC(year, month - 1, day) + days * DAY_MS));
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Same day-of-month `months` later, clamped to the end of shorter months.
 * 2024-01-31 + 1 → 2024-02-29
 */
export function addMonthsClamped(date: IsoDate, months: number): IsoDate {
  const [year, month, day] = parts(date);
  const index = year * 12 + (month - 1) + months;
  const targetYear = Math.floor(index / 12);
  const targetMonth = (index % 12) + 1;
  const targetDay = Math.min(day, daysInMonth(targetYear, targetMonth));
  return toIsoDate(new Date(Date.UTC(targetYear, targetMonth - 1, targetDay)));
}
