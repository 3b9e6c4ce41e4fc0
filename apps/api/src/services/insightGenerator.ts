import type {
  AnomalyEvent,
  CostRecord,
  Insight,
  InsightCategory,
  InsightFilter,
  Micros,
  Priority,
  SourceSignal,
  TrendSignal,
} from "@costlens/types";
import { hashKey } from "../infra/cacheManager";
import { latestDay, rankServicesBySpend, regionFootprint } from "./analytics";
import { addDays, periodDays } from "./dates";
import { convertMicros, formatMoney, scaleMicros } from "./money";

// ────────────────────────────────────────────
// Insight Generator
//
// Signals → ranked, deduplicated Insights.
// Ids hash category + service + description;
// descriptions carry no amounts, so a re-run
// over the same issue yields the same id.
// ────────────────────────────────────────────

export type InsightConfig = {
  currency: string;
  trendPctThreshold: number;
  highSavingsMicros: Micros;
  mediumSavingsMicros: Micros;
  billingPeriodDays: number;
  regionSpreadLimit: number;
  consolidationRate: number;
  /** How many of the largest services get a cost-driver insight; 0 turns the rule off. */
  topDriverCount: number;
  topDriverSavingsRate: number;
};

export type ServiceFamily = "compute" | "storage" | "database" | "network" | "other";

const FAMILY_PATTERNS: Array<[ServiceFamily, RegExp]> = [
  ["storage", /storage|\bs3\b|blob|\bebs\b|\befs\b|glacier|backup|disk|snapshot/i],
  ["database", /sql|database|\brds\b|dynamo|cosmos|redis|aurora|cache/i],
  ["network", /network|bandwidth|\bvpc\b|\bnat\b|load balancer|cloudfront|\bcdn\b|ip address|\bdns\b|gateway/i],
  ["compute", /\bec2\b|compute|virtual machine|lambda|functions|container|kubernetes|\baks\b|\beks\b|app service|fargate/i],
];

const ANOMALY_CATEGORY: Record<ServiceFamily, InsightCategory> = {
  compute: "cost-optimization",
  storage: "resource-cleanup",
  database: "cost-optimization",
  network: "resource-cleanup",
  other: "cost-optimization",
};

const ANOMALY_RECOMMENDATION: Record<ServiceFamily, string> = {
  compute: "Check for runaway autoscaling, unplanned instances or jobs left running, and stop or resize what is not needed.",
  storage: "Look for unattached disks, stale snapshots and lifecycle rules that stopped applying; delete or tier down what is unused.",
  database: "Review recent scaling or provisioned throughput changes and scale back capacity the workload does not use.",
  network: "Check egress growth, idle load balancers, NAT gateways and unassociated public IPs; release what is unused.",
  other: "Review the usage behind this increase and add a budget alert for the service.",
};

const PRIORITY_RANK: Record<Priority, number> = { High: 0, Medium: 1, Low: 2 };

export const MULTI_REGION_SERVICE = "multi-region";

export function serviceFamily(service: string): ServiceFamily {
  for (const [family, re] of FAMILY_PATTERNS) if (re.test(service)) return family;
  return "other";
}

export function insightId(category: InsightCategory, service: string, description: string): string {
  return hashKey(`${category}|${service}|${description}`, 16);
}

export function priorityFor(savings: Micros, config: Pick<InsightConfig, "highSavingsMicros" | "mediumSavingsMicros">): Priority {
  if (savings >= config.highSavingsMicros) return "High";
  if (savings >= config.mediumSavingsMicros) return "Medium";
  return "Low";
}

function signalStrength(signal: SourceSignal): number {
  switch (signal.kind) {
    case "anomaly":
      return signal.deviationScore;
    case "trend":
      return signal.deltaPct;
    case "footprint":
      return signal.regions.length;
    case "ranking":
      return signal.sharePct;
  }
}

// Strengths of different signal kinds are not on one scale.
function compareStrength(a: SourceSignal, b: SourceSignal): number {
  if (a.kind !== b.kind) return 0;
  return signalStrength(b) - signalStrength(a);
}

export function compareInsights(a: Insight, b: Insight): number {
  return (
    b.potentialSavingsMicros - a.potentialSavingsMicros ||
    PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority] ||
    compareStrength(a.sourceSignal, b.sourceSignal) ||
    (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
  );
}

type Draft = Omit<Insight, "id" | "priority" | "currency">;

function fromAnomaly(e: AnomalyEvent, config: InsightConfig): Draft | null {
  if (e.severity === "low") return null;
  const excess = Math.max(0, e.observedAmountMicros - e.expectedAmountMicros);
  if (excess === 0) return null;

  const days = periodDays(e.observedAt, e.periodEnd);
  const savings = days < config.billingPeriodDays ? scaleMicros(excess, config.billingPeriodDays, days) : excess;
  const family = serviceFamily(e.service);
  return {
    category: ANOMALY_CATEGORY[family],
    service: e.service,
    title: `${e.service} spend spike on ${e.observedAt}`,
    description: `${e.service} spend for the period starting ${e.observedAt} deviated from its trailing baseline.`,
    recommendation: `${ANOMALY_RECOMMENDATION[family]} Observed ${formatMoney(e.observedAmountMicros, config.currency)} against an expected ${formatMoney(e.expectedAmountMicros, config.currency)}.`,
    potentialSavingsMicros: savings,
    sourceSignal: {
      kind: "anomaly",
      service: e.service,
      observedAt: e.observedAt,
      deviationScore: e.deviationScore,
      severity: e.severity,
    },
  };
}

function fromTrend(t: TrendSignal, config: InsightConfig): Draft | null {
  if (t.direction !== "increasing" || t.deltaPct <= config.trendPctThreshold) return null;
  return {
    category: "right-sizing",
    service: t.service,
    title: `${t.service} spend up ${t.deltaPct}% over ${t.windowDays} days`,
    description: `${t.service} spend is rising between consecutive ${t.windowDays}-day windows.`,
    recommendation:
      "Compare utilization with provisioned capacity and right-size or schedule resources that grew without matching demand.",
    potentialSavingsMicros: Math.max(0, scaleMicros(t.deltaAmountMicros, config.billingPeriodDays, t.windowDays)),
    sourceSignal: {
      kind: "trend",
      service: t.service,
      windowStart: t.windowStart,
      windowEnd: t.windowEnd,
      deltaPct: t.deltaPct,
      direction: t.direction,
    },
  };
}

function fromFootprint(records: readonly CostRecord[], config: InsightConfig): Draft | null {
  const latest = latestDay(records);
  if (!latest) return null;
  const footprint = regionFootprint(records, addDays(latest, -(config.billingPeriodDays - 1)));
  if (footprint.regions.length <= config.regionSpreadLimit) return null;

  const spend = Object.values(footprint.spendByRegion).reduce((s, v) => s + v, 0);
  return {
    category: "architecture-optimization",
    service: MULTI_REGION_SERVICE,
    title: `Spend spread across ${footprint.regions.length} regions`,
    description: `Spend is spread across more than ${config.regionSpreadLimit} regions.`,
    recommendation: `Evaluate whether every region (${footprint.regions.join(", ")}) is needed and consolidate workloads where latency and data residency allow.`,
    potentialSavingsMicros: convertMicros(spend, config.consolidationRate),
    sourceSignal: { kind: "footprint", regions: footprint.regions },
  };
}

function fromTopDrivers(records: readonly CostRecord[], config: InsightConfig): Draft[] {
  const latest = latestDay(records);
  if (!latest || config.topDriverCount < 1) return [];
  const since = addDays(latest, -(config.billingPeriodDays - 1));
  const recent = records.filter((r) => r.periodStart >= since);

  return rankServicesBySpend(recent, config.topDriverCount)
    .filter((s) => s.totalMicros > 0)
    .map((s, i): Draft => ({
      category: "cost-optimization",
      service: s.service,
      title: `High spending on ${s.service}`,
      description: `${s.service} is one of your largest cost drivers.`,
      recommendation: `Review ${s.service} usage and consider reserved instances or savings plans. It accounts for ${s.sharePct}% of spend over the last ${config.billingPeriodDays} days (${formatMoney(s.totalMicros, config.currency)}).`,
      potentialSavingsMicros: convertMicros(s.totalMicros, config.topDriverSavingsRate),
      sourceSignal: { kind: "ranking", service: s.service, rank: i + 1, sharePct: s.sharePct },
    }));
}

/**
 * Turn one analytics pass into Insights: medium/high anomalies, trends rising
 * faster than the configured threshold, an over-wide region footprint and
 * the largest services by recent spend.
 * Output is deduplicated by id (last one wins) and ordered by savings,
 * priority, signal strength, then id.
 */
export function generateInsights(
  trends: readonly TrendSignal[],
  anomalies: readonly AnomalyEvent[],
  records: readonly CostRecord[],
  config: InsightConfig,
): Insight[] {
  const drafts: Draft[] = [];
  for (const e of anomalies) {
    const d = fromAnomaly(e, config);
    if (d) drafts.push(d);
  }
  for (const t of trends) {
    const d = fromTrend(t, config);
    if (d) drafts.push(d);
  }
  const footprint = fromFootprint(records, config);
  if (footprint) drafts.push(footprint);
  drafts.push(...fromTopDrivers(records, config));

  const byId = new Map<string, Insight>();
  for (const d of drafts) {
    const id = insightId(d.category, d.service, d.description);
    byId.delete(id);
    byId.set(id, {
      id,
      ...d,
      currency: config.currency,
      priority: priorityFor(d.potentialSavingsMicros, config),
    });
  }
  return [...byId.values()].sort(compareInsights);
}

export type MergeResult = {
  insights: Insight[];
  retired: string[];
};

/**
 * Replace the previous Insight set with a fresh pass. Surviving ids keep
 * their `firstSeenAt`; savings and priority come from the fresh pass.
 * Ids whose signal did not reproduce are retired.
 */
export function mergeInsights(previous: readonly Insight[], next: readonly Insight[], now: string): MergeResult {
  const prevById = new Map(previous.map((i) => [i.id, i]));
  const insights = next.map((i) => ({
    ...i,
    firstSeenAt: prevById.get(i.id)?.firstSeenAt ?? now,
    lastSeenAt: now,
  }));
  const nextIds = new Set(next.map((i) => i.id));
  const retired = previous.filter((i) => !nextIds.has(i.id)).map((i) => i.id).sort();
  return { insights, retired };
}

export function filterInsights(insights: readonly Insight[], filter: InsightFilter = {}): Insight[] {
  return insights.filter(
    (i) =>
      (!filter.category || i.category === filter.category) &&
      (!filter.priority || i.priority === filter.priority) &&
      (!filter.service || i.service.toLowerCase() === filter.service.toLowerCase()),
  );
}

export function totalSavings(insights: readonly Insight[]): Micros {
  return insights.reduce((s, i) => s + i.potentialSavingsMicros, 0);
}
