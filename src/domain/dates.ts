import { DateKey } from "./types";

const DAY_MS = 86_400_000;
const DATE_KEY = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isDateKey(value: string): boolean {
  const m = DATE_KEY.exec(value);
  if (!m) return false;
  const d = new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3])));
  return d.toISOString().slice(0, 10) === value;
}

export function toDateKey(date: Date): DateKey {
  return date.toISOString().slice(0, 10);
}

export function todayUtc(now: Date = new Date()): DateKey {
  return toDateKey(now);
}

export function addDays(key: DateKey, days: number): DateKey {
  if (!isDateKey(key)) throw new RangeError(`Invalid date key: ${key}`);
  return toDateKey(new Date(Date.parse(`${key}T00:00:00Z`) + days * DAY_MS));
}

/**
 * The `days` consecutive dates ending at `anchor`, newest first:
 * `[anchor, anchor-1, ..., anchor-(days-1)]`.
 */
export function windowDates(anchor: DateKey, days: number): DateKey[] {
  if (!Number.isInteger(days) || days < 1) {
    throw new RangeError(`Window length must be a positive integer, got ${days}`);
  }
  const dates: DateKey[] = [];
  for (let i = 0; i < days; i++) dates.push(addDays(anchor, -i));
  return dates;
}
