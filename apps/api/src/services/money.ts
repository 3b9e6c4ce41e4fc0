import type { Micros } from "@costlens/types";

export const MICROS_PER_UNIT = 1_000_000;

const DECIMAL_RE = /^([+-])?(\d*)(?:\.(\d*))?$/;

/**
 * Parse a decimal amount into integer micro-units without going through
 * binary floating point. Digits past the sixth decimal place round half
 * away from zero. Returns `null` for anything that is not a plain decimal.
 */
export function toMicros(value: string | number): Micros | null {
  let text: string;
  if (typeof value === "number") {
    if (!Number.isFinite(value)) return null;
    text = value.toFixed(7);
  } else {
    text = value.trim();
  }
  const m = DECIMAL_RE.exec(text);
  if (!m) return null;
  const sign = m[1] === "-" ? -1 : 1;
  const whole = m[2] ?? "";
  const frac = m[3] ?? "";
  if (whole === "" && frac === "") return null;

  const padded = (frac + "0000000").slice(0, 7);
  const micros = Number(whole || "0") * MICROS_PER_UNIT + Number(padded.slice(0, 6));
  const roundUp = Number(padded[6]) >= 5 ? 1 : 0;
  const result = sign * (micros + roundUp);
  return result === 0 ? 0 : result;
}

/** Decimal number of currency units, for responses and statistics. */
export function fromMicros(micros: Micros): number {
  return micros / MICROS_PER_UNIT;
}

export function unitsToMicros(units: number): Micros {
  return Math.round(units * MICROS_PER_UNIT);
}

export function sumMicros(values: Iterable<Micros>): Micros {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

/** Multiply by a rate and round once to the nearest micro-unit. */
export function convertMicros(micros: Micros, rate: number): Micros {
  return roundHalfAway(micros * rate);
}

/** Scale by `numerator / denominator` with a single rounding step. */
export function scaleMicros(micros: Micros, numerator: number, denominator: number): Micros {
  if (denominator === 0) return 0;
  return roundHalfAway((micros * numerator) / denominator);
}

function roundHalfAway(n: number): number {
  const r = Math.sign(n) * Math.round(Math.abs(n));
  return r === 0 ? 0 : r;
}

/** `"USD 1234.56"`: cents rounded half away from zero, no grouping. */
export function formatMoney(micros: Micros, currency: string): string {
  const cents = roundHalfAway(micros / 10_000);
  const abs = Math.abs(cents);
  const units = Math.floor(abs / 100);
  const rest = String(abs % 100).padStart(2, "0");
  return `${currency} ${cents < 0 ? "-" : ""}${units}.${rest}`;
}

/** Micros rounded to whole cents, expressed in currency units. */
export function toCurrencyUnits(micros: Micros): number {
  return roundHalfAway(micros / 10_000) / 100;
}
