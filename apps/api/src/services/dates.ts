import type { IsoDate } from "@costlens/types";

const DAY_MS = 86_400_000;
const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(value: string): boolean {
  if (!ISO_DATE_RE.test(value)) return false;
  const d = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(d.getTime()) && d.toISOString().slice(0, 10) === value;
}

export function toDayNumber(date: IsoDate): number {
  return Math.floor(Date.parse(`${date}T00:00:00Z`) / DAY_MS);
}

export function fromDayNumber(day: number): IsoDate {
  return new Date(day * DAY_MS).toISOString().slice(0, 10);
}

export function addDays(date: IsoDate, days: number): IsoDate {
  return fromDayNumber(toDayNumber(date) + days);
}

/** Whole days from `a` to `b` (negative when `b` is earlier). */
export function diffDays(a: IsoDate, b: IsoDate): number {
  return toDayNumber(b) - toDayNumber(a);
}

/** Inclusive day count of a period. */
export function periodDays(start: IsoDate, end: IsoDate): number {
  return diffDays(start, end) + 1;
}

export function formatDate(d: Date): IsoDate {
  return d.toISOString().slice(0, 10);
}

export function lastDayOfMonth(date: IsoDate): IsoDate {
  const d = new Date(`${date}T00:00:00Z`);
  return formatDate(new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth() + 1, 0)));
}

/**
 * Accepts `YYYY-MM-DD`, `YYYYMMDD` (as string or number) and full ISO
 * timestamps; returns the calendar date or `null`.
 */
export function coerceIsoDate(value: unknown): IsoDate | null {
  if (typeof value === "number" && Number.isInteger(value)) value = String(value);
  if (typeof value !== "string") return null;
  const v = value.trim();
  if (/^\d{8}$/.test(v)) {
    const iso = `${v.slice(0, 4)}-${v.slice(4, 6)}-${v.slice(6, 8)}`;
    return isIsoDate(iso) ? iso : null;
  }
  const head = v.slice(0, 10);
  return isIsoDate(head) ? head : null;
}
