// Monetary amounts are integer micro-units (1e-6 of the currency unit).
export type Micros = number;

/** ISO date, `YYYY-MM-DD`. */
export type IsoDate = string;

export type CostRecord = {
  id: string;
  service: string;
  amountMicros: Micros;
  currency: string;
  periodStart: IsoDate;
  periodEnd: IsoDate;
  dimensions: Record<string, string>;
  sourceIngestedAt: string;
};

export type BillingPeriod = {
  start: IsoDate;
  end: IsoDate;
};

export type Granularity = "daily" | "monthly";

export type TrendDirection = "increasing" | "decreasing" | "stable";

export type TrendSignal = {
  service: string;
  windowStart: IsoDate;
  windowEnd: IsoDate;
  windowDays: number;
  previousAmountMicros: Micros;
  currentAmountMicros: Micros;
  deltaAmountMicros: Micros;
  deltaPct: number;
  direction: TrendDirection;
};

export type Severity = "low" | "medium" | "high";

export type AnomalyEvent = {
  service: string;
  observedAt: IsoDate;
  periodEnd: IsoDate;
  observedAmountMicros: Micros;
  expectedAmountMicros: Micros;
  deviationScore: number;
  severity: Severity;
  baselineSize: number;
};

export type ForecastPoint = {
  date: IsoDate;
  amountMicros: Micros;
  lowerMicros: Micros;
  upperMicros: Micros;
};

export type ForecastResult = {
  horizon: number;
  byService: Record<string, ForecastPoint[]>;
  unavailable: string[];
};

export type ServiceSpend = {
  service: string;
  totalMicros: Micros;
  sharePct: number;
  cumulativePct: number;
};

export type RegionFootprint = {
  regions: string[];
  spendByRegion: Record<string, Micros>;
};
