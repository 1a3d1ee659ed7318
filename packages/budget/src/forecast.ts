/**
 * Forecast expander.
 *
 * Turns scheduled transactions into dated forecast items and projects
 * running balances from them. Nothing here touches the ledger except to
 * read starting balances.
 *
 * Rules:
 * - Occurrences are anchored on the schedule's own start date
 * - Monthly occurrences keep their day of month, clamped to short months
 * - Inactive schedules produce nothing
 * - The window and the schedule's end date are both inclusive
 * - A pot on either side moves with its account, as a pot-tagged leg would
 */

import type { DecimalString, IsoDate } from "@potledger/types";
import {
  LedgerError,
  accountBalance,
  addDecimal,
  potBalance,
  subtractDecimal,
} from "@potledger/ledger";
import type { LedgerReader } from "@potledger/ledger";
import { addDays, addMonthsClamped, requireIsoDate } from "./dates.js";
import type { ForecastItem, ProjectedBalance, ScheduledTransaction } from "./types.js";

function occurrence(schedule: ScheduledTransaction, index: number): IsoDate {
  switch (schedule.recurrence) {
    case "once":
      return schedule.startDate;
    case "daily":
      return addDays(schedule.startDate, index);
    case "weekly":
      return addDays(schedule.startDate, index * 7);
    case "monthly":
      return addMonthsClamped(schedule.startDate, index);
  }
}

function toItem(schedule: ScheduledTransaction, date: IsoDate): ForecastItem {
  return {
    scheduleId: schedule.id,
    date,
    description: schedule.description,
    amount: schedule.amount,
    fromAccountId: schedule.fromAccountId,
    toAccountId: schedule.toAccountId,
    ...(schedule.fromPotId !== undefined ? { fromPotId: schedule.fromPotId } : {}),
    ...(schedule.toPotId !== undefined ? { toPotId: schedule.toPotId } : {}),
  };
}

/**
 * Every occurrence of the active schedules between `start` and `end`,
 * ordered by date, then by schedule id.
 */
export function expandSchedule(
  scheduled: readonly ScheduledTransaction[],
  start: IsoDate,
  end: IsoDate,
): readonly ForecastItem[] {
  requireIsoDate(start);
  requireIsoDate(end);
  if (end < start) {
    throw new LedgerError("INVALID_DATE", `Forecast window ends (${end}) before it starts (${start})`, {
      start,
      end,
    });
  }

  const items: ForecastItem[] = [];
  for (const schedule of scheduled) {
    if (!schedule.active) continue;

    const last =
      schedule.endDate !== undefined && schedule.endDate < end ? schedule.endDate : end;

    for (let index = 0; ; index++) {
      const date = occurrence(schedule, index);
      if (date > last) break;
      if (date >= start) {
        items.push(toItem(schedule, date));
      }
      if (schedule.recurrence === "once") break;
    }
  }

  return items.sort((a, b) =>
    a.date === b.date ? a.scheduleId - b.scheduleId : a.date < b.date ? -1 : 1,
  );
}

/**
 * Current balances of the given accounts, as the starting point of a projection.
 */
export function startingBalances(
  reader: LedgerReader,
  accountIds: readonly number[],
  asOfDate?: IsoDate,
): ReadonlyMap<number, DecimalString> {
  return new Map(
    accountIds.map((id) => [id, accountBalance(reader, id, asOfDate).amount] as const),
  );
}

export function startingPotBalances(
  reader: LedgerReader,
  potIds: readonly number[],
  asOfDate?: IsoDate,
): ReadonlyMap<number, DecimalString> {
  return new Map(potIds.map((id) => [id, potBalance(reader, id, asOfDate).amount] as const));
}

function shift(
  running: Map<number, DecimalString>,
  id: number,
  amount: DecimalString,
  apply: (a: string, b: string) => string,
): void {
  running.set(id, apply(running.get(id) ?? "0", amount));
}

/**
 * Apply forecast items in order, debiting the source and crediting the
 * destination by the item amount. An item naming a pot also moves that
 * pot's balance. Accounts and pots without a starting balance start at zero.
 */
export function projectBalances(
  start: ReadonlyMap<number, DecimalString>,
  items: readonly ForecastItem[],
  potStart: ReadonlyMap<number, DecimalString> = new Map(),
): readonly ProjectedBalance[] {
  const running = new Map(start);
  const pots = new Map(potStart);
  return items.map((item) => {
    shift(running, item.fromAccountId, item.amount, subtractDecimal);
    shift(running, item.toAccountId, item.amount, addDecimal);
    if (item.fromPotId !== undefined) shift(pots, item.fromPotId, item.amount, subtractDecimal);
    if (item.toPotId !== undefined) shift(pots, item.toPotId, item.amount, addDecimal);
    return { date: item.date, item, balances: new Map(running), potBalances: new Map(pots) };
  });
}
