/**
 * Calendar-date helpers. Dates are YYYY-MM-DD strings in UTC, which order
 * correctly under plain string comparison.
 */

const DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;

/** Last day representable as YYYY-MM-DD */
export const MAX_CALENDAR_DATE = '9999-12-31';

/** True for a well-formed YYYY-MM-DD string naming a real calendar day */
export function isCalendarDate(value: string): boolean {
  if (!DATE_REGEX.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

export function addDays(date: string, days: number): string {
  const parsed = new Date(`${date}T00:00:00.000Z`);
  parsed.setUTCDate(parsed.getUTCDate() + days);
  return parsed.toISOString().slice(0, 10);
}

/** Today's date in UTC */
export function todayUtc(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}

/**
 * Exclusive end of an inclusive range; null stays null (+infinity).
 * A range ending on MAX_CALENDAR_DATE is open-ended too, since the day after
 * it has no four-digit year and would sort before every real date.
 */
export function exclusiveEnd(effectiveTo: string | null): string | null {
  return effectiveTo === null || effectiveTo >= MAX_CALENDAR_DATE ? null : addDays(effectiveTo, 1);
}

/** a < b where null is +infinity */
export function endBefore(a: string | null, b: string | null): boolean {
  if (a === null) return false;
  if (b === null) return true;
  return a < b;
}
