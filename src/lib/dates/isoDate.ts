/**
 * Calendar helpers for ISO dates ("YYYY-MM-DD").
 *
 * All arithmetic happens in UTC so month boundaries never shift with the
 * host timezone. Plain strings compare chronologically, which the period
 * loop relies on.
 */

export type IsoDate = string;

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 86_400_000;

export function isIsoDate(value: string): boolean {
  const match = ISO_DATE_RE.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return (
    date.getUTCFullYear() === Number(y) &&
    date.getUTCMonth() === Number(m) - 1 &&
    date.getUTCDate() === Number(d)
  );
}

function parts(date: IsoDate): { year: number; month: number; day: number } {
  const match = ISO_DATE_RE.exec(date);
  if (!match) {
    throw new Error(`INVALID_DATE: expected YYYY-MM-DD, got "${date}"`);
  }
  return { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) };
}

function format(year: number, month: number, day: number): IsoDate {
  const y = String(year).padStart(4, "0");
  const m = String(month).padStart(2, "0");
  const d = String(day).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function toUtcMs(date: IsoDate): number {
  const { year, month, day } = parts(date);
  return Date.UTC(year, month - 1, day);
}

export function fromUtcMs(ms: number): IsoDate {
  return new Date(ms).toISOString().slice(0, 10);
}

/** Calendar month number, 1..12. */
export function monthOf(date: IsoDate): number {
  return parts(date).month;
}

export function monthStart(date: IsoDate): IsoDate {
  const { year, month } = parts(date);
  return format(year, month, 1);
}

export function monthEnd(date: IsoDate): IsoDate {
  const { year, month } = parts(date);
  return format(year, month, daysInMonth(year, month));
}

/** year * 12 + month, the index used for month arithmetic. */
export function monthOrdinal(date: IsoDate): number {
  const { year, month } = parts(date);
  return year * 12 + month;
}

/** Whole calendar months from `from` to `to`, ignoring the day of month. */
export function monthsBetween(from: IsoDate, to: IsoDate): number {
  return monthOrdinal(to) - monthOrdinal(from);
}

export function isSameMonth(a: IsoDate, b: IsoDate): boolean {
  return monthOrdinal(a) === monthOrdinal(b);
}

/** Shift by whole months; the day is clamped to the target month's length. */
export function addMonths(date: IsoDate, months: number): IsoDate {
  const { year, month, day } = parts(date);
  const zeroBased = year * 12 + (month - 1) + months;
  const targetYear = Math.floor(zeroBased / 12);
  const targetMonth = zeroBased - targetYear * 12 + 1;
  return format(targetYear, targetMonth, Math.min(day, daysInMonth(targetYear, targetMonth)));
}

export function addDays(date: IsoDate, days: number): IsoDate {
  return fromUtcMs(toUtcMs(date) + days * MS_PER_DAY);
}

export function daysBetween(from: IsoDate, to: IsoDate): number {
  return Math.round((toUtcMs(to) - toUtcMs(from)) / MS_PER_DAY);
}

/**
 * Month starts from `start`'s month through `end`'s month inclusive.
 * Empty when `end` falls in an earlier month.
 */
export function enumerateMonths(start: IsoDate, end: IsoDate): IsoDate[] {
  const count = monthsBetween(start, end) + 1;
  const first = monthStart(start);
  const months: IsoDate[] = [];
  for (let i = 0; i < count; i++) {
    months.push(addMonths(first, i));
  }
  return months;
}
