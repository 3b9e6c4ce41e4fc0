import type {
  AnomalyEvent,
  CostRecord,
  ForecastPoint,
  ForecastResult,
  IsoDate,
  Micros,
  RegionFootprint,
  ServiceSpend,
  Severity,
  TrendDirection,
  TrendSignal,
} from "@costlens/types";
import { InsufficientDataError } from "../infra/errors";
import { fromDayNumber, toDayNumber } from "./dates";

// ────────────────────────────────────────────
// Analytics Engine
//
// Pure functions over canonical records:
//   trend → TrendSignal[]
//   detectAnomalies → AnomalyEvent[]
//   forecast → per-service projections
// Money stays in integer micros; only the
// statistics (mean, deviation, slope) are floats.
// ────────────────────────────────────────────

export type SeriesPoint = {
  periodStart: IsoDate;
  periodEnd: IsoDate;
  amountMicros: Micros;
};

export type TrendOptions = {
  stablePct?: number;
};

export type AnomalyOptions = {
  minHistory?: number;
  threshold?: number;
  mediumAt?: number;
  highAt?: number;
  minRelativeStd?: number;
};

export const ANOMALY_DEFAULTS = {
  minHistory: 7,
  threshold: 2.5,
  mediumAt: 3.5,
  highAt: 5,
  minRelativeStd: 0.05,
} satisfies Required<AnomalyOptions>;

const MIN_FORECAST_POINTS = 3;
const ONE_CENT_MICROS = 10_000;
// two-sided 95% normal quantile
const Z_95 = 1.96;

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

/** Per-service series, summed across dimensions for each period start, oldest first. */
export function seriesByService(records: readonly CostRecord[]): Map<string, SeriesPoint[]> {
  const grouped = new Map<string, Map<IsoDate, SeriesPoint>>();
  for (const r of records) {
    let byStart = grouped.get(r.service);
    if (!byStart) {
      byStart = new Map();
      grouped.set(r.service, byStart);
    }
    const point = byStart.get(r.periodStart);
    if (point) {
      point.amountMicros += r.amountMicros;
      if (r.periodEnd > point.periodEnd) point.periodEnd = r.periodEnd;
    } else {
      byStart.set(r.periodStart, { periodStart: r.periodStart, periodEnd: r.periodEnd, amountMicros: r.amountMicros });
    }
  }

  const out = new Map<string, SeriesPoint[]>();
  for (const service of [...grouped.keys()].sort()) {
    const points = [...(grouped.get(service)?.values() ?? [])];
    points.sort((a, b) => (a.periodStart < b.periodStart ? -1 : a.periodStart > b.periodStart ? 1 : 0));
    out.set(service, points);
  }
  return out;
}

// ---------- trend ----------

/**
 * Compare the last two complete `windowSize`-day windows per service.
 * Windows are anchored at the latest observed day across all records; a
 * window counts only when it lies inside the service's observed span.
 */
export function trend(records: readonly CostRecord[], windowSize: number, opts: TrendOptions = {}): TrendSignal[] {
  if (records.length === 0 || windowSize < 1) return [];
  const stablePct = opts.stablePct ?? 5;
  const anchor = Math.max(...records.map((r) => toDayNumber(r.periodEnd)));
  const currentStart = anchor - windowSize + 1;
  const previousStart = currentStart - windowSize;

  const signals: TrendSignal[] = [];
  for (const [service, points] of seriesByService(records)) {
    if (points.length === 0 || toDayNumber(points[0].periodStart) > previousStart) continue;
    // A service that stopped reporting before the current window has no trend.
    const lastDay = Math.max(...points.map((p) => toDayNumber(p.periodEnd)));
    if (lastDay < currentStart) continue;

    let previous = 0;
    let current = 0;
    for (const p of points) {
      const day = toDayNumber(p.periodStart);
      if (day >= currentStart && day <= anchor) current += p.amountMicros;
      else if (day >= previousStart && day < currentStart) previous += p.amountMicros;
    }

    const delta = current - previous;
    const deltaPct = previous === 0 ? (current > 0 ? 100 : 0) : round2((delta / previous) * 100);
    signals.push({
      service,
      windowStart: fromDayNumber(previousStart),
      windowEnd: fromDayNumber(anchor),
      windowDays: windowSize,
      previousAmountMicros: previous,
      currentAmountMicros: current,
      deltaAmountMicros: delta,
      deltaPct,
      direction: directionOf(deltaPct, stablePct),
    });
  }
  return signals;
}

function directionOf(deltaPct: number, stablePct: number): TrendDirection {
  if (Math.abs(deltaPct) < stablePct) return "stable";
  return deltaPct > 0 ? "increasing" : "decreasing";
}

// ---------- anomalies ----------

export function severityFor(score: number, mediumAt: number, highAt: number): Severity {
  if (score >= highAt) return "high";
  if (score >= mediumAt) return "medium";
  return "low";
}

/**
 * Flag observations whose distance from the trailing baseline (mean and
 * standard deviation of the previous `minHistory` observations) exceeds
 * `threshold` deviations. The first `minHistory` observations of a service
 * are never flagged. The deviation is floored at `minRelativeStd × |mean|`
 * and one cent, so a perfectly flat baseline still yields a finite score.
 */
export function detectAnomalies(records: readonly CostRecord[], opts: AnomalyOptions = {}): AnomalyEvent[] {
  const o = { ...ANOMALY_DEFAULTS, ...opts };
  const events: AnomalyEvent[] = [];

  for (const [service, points] of seriesByService(records)) {
    for (let i = o.minHistory; i < points.length; i++) {
      const point = points[i];
      const baseline = points.slice(i - o.minHistory, i).map((p) => p.amountMicros);
      const mean = baseline.reduce((s, v) => s + v, 0) / baseline.length;
      const variance = baseline.reduce((s, v) => s + (v - mean) ** 2, 0) / baseline.length;
      const sigma = Math.max(Math.sqrt(variance), o.minRelativeStd * Math.abs(mean), ONE_CENT_MICROS);
      const score = Math.abs(point.amountMicros - mean) / sigma;
      if (score <= o.threshold) continue;

      events.push({
        service,
        observedAt: point.periodStart,
        periodEnd: point.periodEnd,
        observedAmountMicros: point.amountMicros,
        expectedAmountMicros: Math.round(mean),
        deviationScore: round2(score),
        severity: severityFor(score, o.mediumAt, o.highAt),
        baselineSize: baseline.length,
      });
    }
  }
  return events;
}

// ---------- forecast ----------

/**
 * Least-squares line over the trailing `window` points of one series,
 * projected `horizon` steps forward. The step is the series' median spacing
 * in days. Throws InsufficientDataError below three points.
 */
export function forecastSeries(service: string, points: readonly SeriesPoint[], horizon: number, window = 30): ForecastPoint[] {
  const recent = points.slice(-Math.max(window, MIN_FORECAST_POINTS));
  if (recent.length < MIN_FORECAST_POINTS) {
    throw new InsufficientDataError(service, recent.length, MIN_FORECAST_POINTS);
  }

  const xs = recent.map((p) => toDayNumber(p.periodStart));
  const ys = recent.map((p) => p.amountMicros);
  const n = xs.length;
  const meanX = xs.reduce((s, v) => s + v, 0) / n;
  const meanY = ys.reduce((s, v) => s + v, 0) / n;
  let sxx = 0;
  let sxy = 0;
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - meanX;
    sxx += dx * dx;
    sxy += dx * (ys[i] - meanY);
  }
  const slope = sxx === 0 ? 0 : sxy / sxx;
  const intercept = meanY - slope * meanX;

  const residualVar = xs.reduce((s, x, i) => s + (ys[i] - (intercept + slope * x)) ** 2, 0) / n;
  const margin = Z_95 * Math.sqrt(residualVar) * Math.sqrt(1 + 1 / n);

  const gaps = xs.slice(1).map((x, i) => x - xs[i]).sort((a, b) => a - b);
  const step = Math.max(1, gaps[Math.floor(gaps.length / 2)]);
  const lastX = xs[n - 1];

  const out: ForecastPoint[] = [];
  for (let h = 1; h <= horizon; h++) {
    const x = lastX + step * h;
    const value = intercept + slope * x;
    out.push({
      date: fromDayNumber(x),
      amountMicros: Math.max(0, Math.round(value)),
      lowerMicros: Math.max(0, Math.round(value - margin)),
      upperMicros: Math.max(0, Math.round(value + margin)),
    });
  }
  return out;
}

/**
 * Forecast every service. Services with too little history land in
 * `unavailable` instead of failing the whole call.
 */
export function forecast(records: readonly CostRecord[], horizon: number, window = 30): ForecastResult {
  const byService: Record<string, ForecastPoint[]> = {};
  const unavailable: string[] = [];
  for (const [service, points] of seriesByService(records)) {
    try {
      byService[service] = forecastSeries(service, points, horizon, window);
    } catch (e: unknown) {
      if (!(e instanceof InsufficientDataError)) throw e;
      unavailable.push(service);
    }
  }
  return { horizon, byService, unavailable };
}

// ---------- cost drivers ----------

/** Services ranked by total spend, with share and cumulative share of the total. */
export function rankServicesBySpend(records: readonly CostRecord[], topN = 10): ServiceSpend[] {
  const totals = new Map<string, Micros>();
  for (const r of records) totals.set(r.service, (totals.get(r.service) ?? 0) + r.amountMicros);
  const grand = [...totals.values()].reduce((s, v) => s + v, 0);

  const ranked = [...totals.entries()].sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
  let cumulative = 0;
  return ranked.slice(0, topN).map(([service, totalMicros]) => {
    cumulative += totalMicros;
    return {
      service,
      totalMicros,
      sharePct: grand > 0 ? round2((totalMicros / grand) * 100) : 0,
      cumulativePct: grand > 0 ? round2((cumulative / grand) * 100) : 0,
    };
  });
}

/** Distinct regions carrying spend, optionally only for periods starting on or after `since`. */
export function regionFootprint(records: readonly CostRecord[], since?: IsoDate): RegionFootprint {
  const spendByRegion: Record<string, Micros> = {};
  for (const r of records) {
    if (since && r.periodStart < since) continue;
    const region = r.dimensions.region;
    if (!region || r.amountMicros <= 0) continue;
    spendByRegion[region] = (spendByRegion[region] ?? 0) + r.amountMicros;
  }
  return { regions: Object.keys(spendByRegion).sort(), spendByRegion };
}

export function latestDay(records: readonly CostRecord[]): IsoDate | null {
  let latest: IsoDate | null = null;
  for (const r of records) if (latest === null || r.periodEnd > latest) latest = r.periodEnd;
  return latest;
}
