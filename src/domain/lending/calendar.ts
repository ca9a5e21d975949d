// ---------------------------------------------------------------------------
// Calendar-day helpers for due dates.
//
// Due dates are local calendar days. Differences are taken on the local wall
// clock, so a daylight-saving shift never moves a return across a day
// boundary.
// ---------------------------------------------------------------------------

import type { IsoDate } from "../../core/types.js";

const MS_PER_DAY = 86_400_000;

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

interface CalendarDay {
  year: number;
  month: number;
  day: number;
}

/**
 * Parse a `YYYY-MM-DD` string. Returns `null` for anything that is not a
 * real calendar day (e.g. `2026-02-30`).
 */
export function parseIsoDate(value: string): CalendarDay | null {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  const probe = new Date(Date.UTC(year, month - 1, day));
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    return null;
  }

  return { year, month, day };
}

export function isIsoDate(value: string): value is IsoDate {
  return parseIsoDate(value) !== null;
}

/** Format the local calendar day of `date` as `YYYY-MM-DD`. */
export function toIsoDate(date: Date): IsoDate {
  const year = String(date.getFullYear()).padStart(4, "0");
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/** The local calendar day `days` after the one `date` falls on. */
export function addCalendarDays(date: Date, days: number): IsoDate {
  return toIsoDate(
    new Date(date.getFullYear(), date.getMonth(), date.getDate() + days),
  );
}

/**
 * Whole days elapsed from the start of `dueDate` to `now`, truncated
 * toward negative infinity. Negative before the due date, 0 during it.
 */
export function daysPastDue(dueDate: IsoDate, now: Date): number {
  const due = parseIsoDate(dueDate);
  if (!due) {
    throw new RangeError(`Not a calendar date: "${dueDate}"`);
  }

  const wallClockNow = Date.UTC(
    now.getFullYear(),
    now.getMonth(),
    now.getDate(),
    now.getHours(),
    now.getMinutes(),
    now.getSeconds(),
    now.getMilliseconds(),
  );
  const dueStart = Date.UTC(due.year, due.month - 1, due.day);

  return Math.floor((wallClockNow - dueStart) / MS_PER_DAY);
}
