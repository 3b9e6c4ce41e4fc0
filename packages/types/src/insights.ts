import type { IsoDate, Micros, Severity, TrendDirection } from "./cost";

export const INSIGHT_CATEGORIES = [
  "cost-optimization",
  "right-sizing",
  "resource-cleanup",
  "architecture-optimization",
] as const;

export type InsightCategory = (typeof INSIGHT_CATEGORIES)[number];

export const PRIORITIES = ["High", "Medium", "Low"] as const;

export type Priority = (typeof PRIORITIES)[number];

export type SourceSignal =
  | {
      kind: "anomaly";
      service: string;
      observedAt: IsoDate;
      deviationScore: number;
      severity: Severity;
    }
  | {
      kind: "trend";
      service: string;
      windowStart: IsoDate;
      windowEnd: IsoDate;
      deltaPct: number;
      direction: TrendDirection;
    }
  | {
      kind: "footprint";
      regions: string[];
    }
  | {
      kind: "ranking";
      service: string;
      rank: number;
      sharePct: number;
    };

export type Insight = {
  id: string;
  category: InsightCategory;
  service: string;
  title: string;
  description: string;
  recommendation: string;
  potentialSavingsMicros: Micros;
  currency: string;
  priority: Priority;
  sourceSignal: SourceSignal;
  firstSeenAt?: string;
  lastSeenAt?: string;
};

export type InsightFilter = {
  category?: InsightCategory;
  priority?: Priority;
  service?: string;
};
