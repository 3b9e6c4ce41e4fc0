import { describe, expect, it } from "vitest";
import type { AnomalyEvent, CostRecord, TrendSignal } from "@costlens/types";
import {
  MULTI_REGION_SERVICE,
  filterInsights,
  generateInsights,
  insightId,
  mergeInsights,
  priorityFor,
  serviceFamily,
  totalSavings,
  type InsightConfig,
} from "./insightGenerator";

const CONFIG: InsightConfig = {
  currency: "USD",
  trendPctThreshold: 20,
  highSavingsMicros: 1_000_000_000,
  mediumSavingsMicros: 100_000_000,
  billingPeriodDays: 30,
  regionSpreadLimit: 3,
  consolidationRate: 0.1,
  topDriverCount: 0,
  topDriverSavingsRate: 0.15,
};

function anomaly(overrides: Partial<AnomalyEvent> = {}): AnomalyEvent {
  return {
    service: "EC2",
    observedAt: "2024-02-19",
    periodEnd: "2024-02-25",
    observedAmountMicros: 500_000_000,
    expectedAmountMicros: 100_000_000,
    deviationScore: 80,
    severity: "high",
    baselineSize: 7,
    ...overrides,
  };
}

function trendSignal(overrides: Partial<TrendSignal> = {}): TrendSignal {
  return {
    service: "Azure Kubernetes Service",
    windowStart: "2024-03-01",
    windowEnd: "2024-03-14",
    windowDays: 7,
    previousAmountMicros: 700_000_000,
    currentAmountMicros: 1_050_000_000,
    deltaAmountMicros: 350_000_000,
    deltaPct: 50,
    direction: "increasing",
    ...overrides,
  };
}

function spendRecord(service: string, day: string, units: number): CostRecord {
  return {
    id: `rec-${service}-${day}`,
    service,
    amountMicros: units * 1_000_000,
    currency: "USD",
    periodStart: day,
    periodEnd: day,
    dimensions: {},
    sourceIngestedAt: "2024-03-11T00:00:00.000Z",
  };
}

function regionRecord(region: string, units: number): CostRecord {
  return {
    id: `rec-${region}`,
    service: "Virtual Machines",
    amountMicros: units * 1_000_000,
    currency: "USD",
    periodStart: "2024-03-10",
    periodEnd: "2024-03-10",
    dimensions: { region },
    sourceIngestedAt: "2024-03-11T00:00:00.000Z",
  };
}

describe("serviceFamily", () => {
  it("classifies common service names", () => {
    expect(serviceFamily("Amazon EC2")).toBe("compute");
    expect(serviceFamily("Storage")).toBe("storage");
    expect(serviceFamily("Amazon Simple Storage Service")).toBe("storage");
    expect(serviceFamily("SQL Database")).toBe("database");
    expect(serviceFamily("Bandwidth")).toBe("network");
    expect(serviceFamily("Azure Monitor")).toBe("other");
  });
});

describe("generateInsights", () => {
  it("turns a compute anomaly into a cost-optimization insight extrapolated to the billing period", () => {
    const [insight] = generateInsights([], [anomaly()], [], CONFIG);

    expect(insight).toMatchObject({
      id: insightId("cost-optimization", "EC2", "EC2 spend for the period starting 2024-02-19 deviated from its trailing baseline."),
      category: "cost-optimization",
      service: "EC2",
      title: "EC2 spend spike on 2024-02-19",
      // 400 over 7 days, scaled to 30 days
      potentialSavingsMicros: 1_714_285_714,
      priority: "High",
      currency: "USD",
      sourceSignal: { kind: "anomaly", service: "EC2", observedAt: "2024-02-19", deviationScore: 80, severity: "high" },
    });
    expect(insight.recommendation).toContain("Observed USD 500.00 against an expected USD 100.00.");
  });

  it("routes storage anomalies to resource cleanup", () => {
    const [insight] = generateInsights(
      [],
      [anomaly({ service: "Storage", observedAt: "2024-03-05", periodEnd: "2024-03-05", observedAmountMicros: 60_000_000, expectedAmountMicros: 40_000_000 })],
      [],
      CONFIG,
    );
    expect(insight.category).toBe("resource-cleanup");
    expect(insight.potentialSavingsMicros).toBe(600_000_000);
    expect(insight.priority).toBe("Medium");
  });

  it("skips low-severity anomalies and non-rising trends", () => {
    const insights = generateInsights(
      [trendSignal({ direction: "decreasing", deltaPct: -50 }), trendSignal({ service: "SQL Database", deltaPct: 15 })],
      [anomaly({ severity: "low", deviationScore: 3 })],
      [],
      CONFIG,
    );
    expect(insights).toEqual([]);
  });

  it("emits right-sizing for trends above the threshold", () => {
    const [insight] = generateInsights([trendSignal()], [], [], CONFIG);
    expect(insight).toMatchObject({
      category: "right-sizing",
      title: "Azure Kubernetes Service spend up 50% over 7 days",
      potentialSavingsMicros: 1_500_000_000,
      priority: "High",
    });
  });

  it("flags a footprint wider than the region limit", () => {
    const records = ["eastus", "westus", "japaneast", "westeurope"].map((r) => regionRecord(r, 250));
    const [insight] = generateInsights([], [], records, CONFIG);
    expect(insight).toMatchObject({
      category: "architecture-optimization",
      service: MULTI_REGION_SERVICE,
      title: "Spend spread across 4 regions",
      potentialSavingsMicros: 100_000_000,
      priority: "Medium",
      sourceSignal: { kind: "footprint", regions: ["eastus", "japaneast", "westeurope", "westus"] },
    });
    expect(generateInsights([], [], records.slice(0, 3), CONFIG)).toEqual([]);
  });

  it("orders by savings, then priority, then id", () => {
    const insights = generateInsights(
      [trendSignal()],
      [anomaly(), anomaly({ service: "Storage", observedAt: "2024-03-05", periodEnd: "2024-03-05", observedAmountMicros: 60_000_000, expectedAmountMicros: 40_000_000 })],
      [],
      CONFIG,
    );
    expect(insights.map((i) => i.potentialSavingsMicros)).toEqual([1_714_285_714, 1_500_000_000, 600_000_000]);
  });

  it("breaks ties between different signal kinds by id", () => {
    // 350 over 7 days on both signals, scaled to 1500.00
    const spike = (deviationScore: number) => anomaly({ observedAmountMicros: 450_000_000, deviationScore, severity: "high" });
    const strong = generateInsights([trendSignal()], [spike(80)], [], CONFIG);
    const weak = generateInsights([trendSignal()], [spike(5.5)], [], CONFIG);

    expect(strong.map((i) => i.potentialSavingsMicros)).toEqual([1_500_000_000, 1_500_000_000]);
    expect(strong.map((i) => i.id)).toEqual(strong.map((i) => i.id).sort());
    expect(weak.map((i) => i.id)).toEqual(strong.map((i) => i.id));
  });

  it("puts the stronger signal first when kinds match", () => {
    const insights = generateInsights(
      [],
      [anomaly({ service: "Lambda", deviationScore: 6 }), anomaly({ service: "EC2", deviationScore: 80 })],
      [],
      CONFIG,
    );
    expect(insights.map((i) => i.service)).toEqual(["EC2", "Lambda"]);
  });

  it("is deterministic for a fixed input", () => {
    const records = ["eastus", "westus", "japaneast", "westeurope"].map((r) => regionRecord(r, 250));
    const run = () => generateInsights([trendSignal()], [anomaly()], records, CONFIG);
    expect(run()).toEqual(run());
    expect(run().map((i) => i.id)).toEqual(run().map((i) => i.id));
  });

  it("keeps one insight per id, with the last signal's savings", () => {
    const insights = generateInsights(
      [],
      [anomaly({ observedAmountMicros: 200_000_000 }), anomaly({ observedAmountMicros: 300_000_000 })],
      [],
      CONFIG,
    );
    expect(insights).toHaveLength(1);
    // 200 over 7 days, scaled to 30 days
    expect(insights[0].potentialSavingsMicros).toBe(857_142_857);
    expect(insights[0].priority).toBe("Medium");
  });
});

describe("top cost drivers", () => {
  const records = [
    spendRecord("Virtual Machines", "2024-03-08", 300),
    spendRecord("Virtual Machines", "2024-03-09", 300),
    spendRecord("Virtual Machines", "2024-03-10", 300),
    spendRecord("Storage", "2024-03-10", 100),
    spendRecord("Backup", "2024-01-15", 5000),
  ];

  it("flags the largest service over the last billing period", () => {
    const insights = generateInsights([], [], records, { ...CONFIG, topDriverCount: 1 });

    expect(insights).toHaveLength(1);
    expect(insights[0]).toEqual({
      id: insightId("cost-optimization", "Virtual Machines", "Virtual Machines is one of your largest cost drivers."),
      category: "cost-optimization",
      service: "Virtual Machines",
      title: "High spending on Virtual Machines",
      description: "Virtual Machines is one of your largest cost drivers.",
      recommendation:
        "Review Virtual Machines usage and consider reserved instances or savings plans. It accounts for 90% of spend over the last 30 days (USD 900.00).",
      potentialSavingsMicros: 135_000_000,
      priority: "Medium",
      currency: "USD",
      sourceSignal: { kind: "ranking", service: "Virtual Machines", rank: 1, sharePct: 90 },
    });
  });

  it("ranks several drivers and ignores spend before the billing period", () => {
    const insights = generateInsights([], [], records, { ...CONFIG, topDriverCount: 3 });
    expect(insights.map((i) => [i.service, i.sourceSignal])).toEqual([
      ["Virtual Machines", { kind: "ranking", service: "Virtual Machines", rank: 1, sharePct: 90 }],
      ["Storage", { kind: "ranking", service: "Storage", rank: 2, sharePct: 10 }],
    ]);
    expect(insights[1]).toMatchObject({ potentialSavingsMicros: 15_000_000, priority: "Low" });
  });

  it("is off when the driver count is zero", () => {
    expect(generateInsights([], [], records, CONFIG)).toEqual([]);
  });
});

describe("mergeInsights", () => {
  it("keeps firstSeenAt for surviving ids and retires the rest", () => {
    const first = mergeInsights([], generateInsights([trendSignal()], [anomaly()], [], CONFIG), "2024-03-01T00:00:00.000Z");
    const second = mergeInsights(first.insights, generateInsights([], [anomaly()], [], CONFIG), "2024-03-02T00:00:00.000Z");

    expect(second.insights).toHaveLength(1);
    expect(second.insights[0]).toMatchObject({ firstSeenAt: "2024-03-01T00:00:00.000Z", lastSeenAt: "2024-03-02T00:00:00.000Z" });
    expect(second.retired).toEqual(first.insights.filter((i) => i.category === "right-sizing").map((i) => i.id));
  });

  it("does not change total savings when the same pass runs twice", () => {
    const pass = () => generateInsights([trendSignal()], [anomaly()], [], CONFIG);
    const first = mergeInsights([], pass(), "2024-03-01T00:00:00.000Z");
    const second = mergeInsights(first.insights, pass(), "2024-03-01T01:00:00.000Z");
    expect(totalSavings(second.insights)).toBe(totalSavings(first.insights));
    expect(second.retired).toEqual([]);
  });
});

describe("helpers", () => {
  it("assigns priority from the savings breakpoints", () => {
    expect(priorityFor(1_000_000_000, CONFIG)).toBe("High");
    expect(priorityFor(999_999_999, CONFIG)).toBe("Medium");
    expect(priorityFor(100_000_000, CONFIG)).toBe("Medium");
    expect(priorityFor(99_999_999, CONFIG)).toBe("Low");
  });

  it("filters by category, priority and service", () => {
    const insights = generateInsights([trendSignal()], [anomaly()], [], CONFIG);
    expect(filterInsights(insights, { category: "right-sizing" }).map((i) => i.service)).toEqual(["Azure Kubernetes Service"]);
    expect(filterInsights(insights, { service: "ec2" })).toHaveLength(1);
    expect(filterInsights(insights, { priority: "Low" })).toEqual([]);
    expect(filterInsights(insights)).toHaveLength(2);
  });
});
