import { describe, expect, it } from "vitest";
import type { CostRecord } from "@costlens/types";
import { InsufficientDataError } from "../infra/errors";
import { detectAnomalies, forecast, forecastSeries, rankServicesBySpend, regionFootprint, seriesByService, trend } from "./analytics";
import { addDays } from "./dates";
import { unitsToMicros } from "./money";

let seq = 0;
function record(service: string, periodStart: string, units: number, opts: { days?: number; region?: string } = {}): CostRecord {
  return {
    id: `r${++seq}`,
    service,
    amountMicros: unitsToMicros(units),
    currency: "USD",
    periodStart,
    periodEnd: addDays(periodStart, (opts.days ?? 1) - 1),
    dimensions: opts.region ? { region: opts.region } : {},
    sourceIngestedAt: "2024-04-01T00:00:00.000Z",
  };
}

function weekly(service: string, amounts: number[], start = "2024-01-01"): CostRecord[] {
  return amounts.map((a, i) => record(service, addDays(start, i * 7), a, { days: 7 }));
}

function daily(service: string, amounts: number[], start = "2024-03-01"): CostRecord[] {
  return amounts.map((a, i) => record(service, addDays(start, i), a));
}

describe("detectAnomalies", () => {
  it("flags a $500 week after seven $100 weeks as a high-severity EC2 anomaly", () => {
    const events = detectAnomalies(weekly("EC2", [100, 100, 100, 100, 100, 100, 100, 500]), { minHistory: 7, threshold: 2.5 });

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      service: "EC2",
      observedAt: "2024-02-19",
      periodEnd: "2024-02-25",
      observedAmountMicros: 500_000_000,
      expectedAmountMicros: 100_000_000,
      deviationScore: 80,
      severity: "high",
      baselineSize: 7,
    });
  });

  it("never flags a service with fewer than min_history prior periods", () => {
    const events = detectAnomalies(weekly("EC2", [100, 100, 100, 100, 100, 100, 100_000]), { minHistory: 7 });
    expect(events).toEqual([]);
  });

  it("ignores ordinary noise", () => {
    const events = detectAnomalies(daily("Storage", [100, 102, 98, 101, 99, 100, 103, 101, 99]));
    expect(events).toEqual([]);
  });

  it("grades severity by score", () => {
    // baseline 100 with sigma floored at 5 → 120 scores 4 (medium), 300 scores 40 (high)
    const medium = detectAnomalies(daily("SQL", [100, 100, 100, 100, 100, 100, 100, 120]));
    expect(medium.map((e) => [e.deviationScore, e.severity])).toEqual([[4, "medium"]]);

    const low = detectAnomalies(daily("SQL", [100, 100, 100, 100, 100, 100, 100, 115]));
    expect(low.map((e) => [e.deviationScore, e.severity])).toEqual([[3, "low"]]);
  });
});

describe("trend", () => {
  it("reports +50% when the last 7-day window totals $1050 after $700", () => {
    const records = daily("EC2", [100, 100, 100, 100, 100, 100, 100, 150, 150, 150, 150, 150, 150, 150]);
    const [signal] = trend(records, 7);

    expect(signal).toEqual({
      service: "EC2",
      windowStart: "2024-03-01",
      windowEnd: "2024-03-14",
      windowDays: 7,
      previousAmountMicros: 700_000_000,
      currentAmountMicros: 1_050_000_000,
      deltaAmountMicros: 350_000_000,
      deltaPct: 50,
      direction: "increasing",
    });
  });

  it("skips services without two complete windows", () => {
    const records = [
      ...daily("EC2", Array.from({ length: 14 }, () => 10)),
      ...daily("Lambda", [5, 5, 5], "2024-03-12"),
    ];
    expect(trend(records, 7).map((s) => s.service)).toEqual(["EC2"]);
  });

  it("skips services that stopped reporting before the current window", () => {
    const records = [
      ...daily("EC2", Array.from({ length: 14 }, () => 10)),
      ...daily("Legacy", Array.from({ length: 7 }, () => 40)),
    ];
    expect(trend(records, 7).map((s) => [s.service, s.deltaPct, s.direction])).toEqual([["EC2", 0, "stable"]]);
  });

  it("treats small moves as stable and drops as decreasing", () => {
    const records = [
      ...daily("A", [...Array.from({ length: 7 }, () => 100), ...Array.from({ length: 7 }, () => 103)]),
      ...daily("B", [...Array.from({ length: 7 }, () => 100), ...Array.from({ length: 7 }, () => 50)]),
    ];
    expect(trend(records, 7).map((s) => [s.service, s.deltaPct, s.direction])).toEqual([
      ["A", 3, "stable"],
      ["B", -50, "decreasing"],
    ]);
  });
});

describe("forecast", () => {
  it("extends a straight line", () => {
    const [points] = [...seriesByService(daily("EC2", [10, 20, 30])).values()];
    expect(forecastSeries("EC2", points, 2)).toEqual([
      { date: "2024-03-04", amountMicros: 40_000_000, lowerMicros: 40_000_000, upperMicros: 40_000_000 },
      { date: "2024-03-05", amountMicros: 50_000_000, lowerMicros: 50_000_000, upperMicros: 50_000_000 },
    ]);
  });

  it("steps by the series spacing and never goes below zero", () => {
    const [points] = [...seriesByService(weekly("EC2", [30, 20, 10])).values()];
    const out = forecastSeries("EC2", points, 2);
    expect(out.map((p) => [p.date, p.amountMicros])).toEqual([
      ["2024-01-22", 0],
      ["2024-01-29", 0],
    ]);
  });

  it("throws InsufficientDataError below three points", () => {
    const [points] = [...seriesByService(daily("EC2", [10, 20])).values()];
    expect(() => forecastSeries("EC2", points, 3)).toThrow(InsufficientDataError);
  });

  it("reports thin services as unavailable instead of failing", () => {
    const result = forecast([...daily("EC2", [10, 20, 30]), ...daily("Lambda", [1, 2])], 1);
    expect(Object.keys(result.byService)).toEqual(["EC2"]);
    expect(result.unavailable).toEqual(["Lambda"]);
  });
});

describe("cost drivers", () => {
  it("ranks services by total spend", () => {
    const records = [...daily("A", [100, 200]), ...daily("B", [100])];
    expect(rankServicesBySpend(records)).toEqual([
      { service: "A", totalMicros: 300_000_000, sharePct: 75, cumulativePct: 75 },
      { service: "B", totalMicros: 100_000_000, sharePct: 25, cumulativePct: 100 },
    ]);
  });

  it("collects the regions that carry spend", () => {
    const records = [
      record("A", "2024-03-01", 5, { region: "westus" }),
      record("A", "2024-03-02", 5, { region: "eastus" }),
      record("B", "2024-02-01", 5, { region: "japaneast" }),
      record("B", "2024-03-02", 0, { region: "brazilsouth" }),
    ];
    expect(regionFootprint(records, "2024-03-01")).toEqual({
      regions: ["eastus", "westus"],
      spendByRegion: { westus: 5_000_000, eastus: 5_000_000 },
    });
  });
});
