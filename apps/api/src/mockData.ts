import type { Granularity, IsoDate } from "@costlens/types";
import { addDays, lastDayOfMonth, toDayNumber } from "./services/dates";

// Demo spend used when no subscription is configured. Deterministic per
// day so repeated syncs over the same window ingest identical records.

type DemoService = {
  service: string;
  region: string;
  dailyCost: number;
  /** Relative growth per day. */
  growth: number;
};

const DEMO_SERVICES: DemoService[] = [
  { service: "Virtual Machines", region: "koreacentral", dailyCost: 182.4, growth: 0.004 },
  { service: "Azure Kubernetes Service", region: "koreacentral", dailyCost: 96.75, growth: 0.012 },
  { service: "Storage", region: "koreacentral", dailyCost: 41.2, growth: 0 },
  { service: "SQL Database", region: "japaneast", dailyCost: 74.1, growth: 0.001 },
  { service: "Bandwidth", region: "eastus", dailyCost: 18.6, growth: 0 },
  { service: "Azure Monitor", region: "westeurope", dailyCost: 9.3, growth: 0 },
  { service: "Application Gateway", region: "southeastasia", dailyCost: 22.05, growth: 0 },
];

// Storage spikes on the last demo day so the anomaly path has something to show.
const SPIKE = { service: "Storage", factor: 6 };

function wobble(day: number, salt: number): number {
  const x = Math.sin(day * 12.9898 + salt * 78.233) * 43758.5453;
  return (x - Math.floor(x) - 0.5) * 0.06;
}

type DemoLineItem = {
  service: string;
  amount: string;
  currency: string;
  periodStart: IsoDate;
  periodEnd: IsoDate;
  dimensions: Record<string, string>;
};

export function demoBillingPayload(start: IsoDate, end: IsoDate, granularity: Granularity): { lineItems: DemoLineItem[] } {
  const lastDay = toDayNumber(end);
  const firstDay = toDayNumber(start);
  const lineItems: DemoLineItem[] = [];

  for (let day = firstDay, date = start; day <= lastDay; day++, date = addDays(date, 1)) {
    DEMO_SERVICES.forEach((s, salt) => {
      const grown = s.dailyCost * (1 + s.growth * (day - firstDay));
      const factor = day === lastDay && s.service === SPIKE.service ? SPIKE.factor : 1 + wobble(day, salt);
      lineItems.push({
        service: s.service,
        amount: (grown * factor).toFixed(2),
        currency: "USD",
        periodStart: date,
        periodEnd: date,
        dimensions: { region: s.region },
      });
    });
  }

  if (granularity === "daily") return { lineItems };

  // Fold days into calendar months, clipped to the window.
  const monthly = new Map<string, { item: DemoLineItem; cents: number }>();
  for (const item of lineItems) {
    const monthStart = `${item.periodStart.slice(0, 7)}-01`;
    const key = `${item.service}|${monthStart}`;
    const cents = Math.round(Number(item.amount) * 100);
    const existing = monthly.get(key);
    if (existing) {
      existing.cents += cents;
      continue;
    }
    const periodEnd = lastDayOfMonth(monthStart);
    monthly.set(key, {
      item: { ...item, periodStart: monthStart < start ? start : monthStart, periodEnd: periodEnd > end ? end : periodEnd },
      cents,
    });
  }
  return {
    lineItems: [...monthly.values()].map(({ item, cents }) => ({ ...item, amount: (cents / 100).toFixed(2) })),
  };
}
