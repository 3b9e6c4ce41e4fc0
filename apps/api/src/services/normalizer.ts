import { z } from "zod";
import type { BillingPeriod, CostRecord, IsoDate } from "@costlens/types";
import { hashKey } from "../infra/cacheManager";
import { ConversionError, ValidationError } from "../infra/errors";
import { coerceIsoDate, addDays, lastDayOfMonth } from "./dates";
import { convertMicros, toMicros } from "./money";

// ────────────────────────────────────────────
// Record Normalizer
//
// Raw billing payload (Azure Cost Management,
// AWS Cost Explorer or plain line items)
//   → validated entries → currency unification
//   → canonical CostRecord series.
// ────────────────────────────────────────────

export type NormalizeOptions = {
  reportingCurrency: string;
  rates: Record<string, number>;
  ingestedAt?: string;
};

export type RejectedEntry = {
  index: number;
  reason: string;
  service?: string;
  period?: string;
};

export type NormalizeResult = {
  records: CostRecord[];
  rejected: RejectedEntry[];
};

/** One raw observation, before any validation. */
export type RawEntry = {
  index: number;
  service: unknown;
  amount: unknown;
  currency: unknown;
  periodStart: unknown;
  periodEnd: unknown;
  dimensions: Record<string, string>;
};

type DraftRecord = Omit<CostRecord, "id" | "sourceIngestedAt">;

// ---------- raw payload shapes ----------

const AzureQuerySchema = z.object({
  properties: z.object({
    columns: z.array(z.object({ name: z.string(), type: z.string().optional() })),
    rows: z.array(z.array(z.unknown())),
    nextLink: z.string().nullish(),
  }),
});

const AwsCostExplorerSchema = z.object({
  GroupDefinitions: z.array(z.object({ Type: z.string().optional(), Key: z.string() })).optional(),
  ResultsByTime: z.array(
    z.object({
      TimePeriod: z.object({ Start: z.string(), End: z.string() }),
      Groups: z
        .array(
          z.object({
            Keys: z.array(z.string()),
            Metrics: z.record(z.object({ Amount: z.string(), Unit: z.string().optional() })),
          }),
        )
        .optional(),
    }),
  ),
});

const LineItemsSchema = z.object({
  lineItems: z.array(z.record(z.unknown())),
});

export type AzureQueryResult = z.infer<typeof AzureQuerySchema>;
export type AwsCostExplorerResult = z.infer<typeof AwsCostExplorerSchema>;

const AZURE_COST_COLUMNS = ["Cost", "PreTaxCost", "CostUSD", "CostInBillingCurrency"];
const AZURE_DATE_COLUMNS = ["UsageDate", "BillingMonth", "Date"];
const AZURE_DIMENSION_NAMES: Record<string, string> = {
  ResourceLocation: "region",
  ResourceGroup: "resourceGroup",
  ResourceGroupName: "resourceGroup",
  SubscriptionId: "subscriptionId",
  SubscriptionName: "subscription",
  MeterCategory: "meterCategory",
  ResourceId: "resourceId",
};
const AWS_COST_METRICS = ["UnblendedCost", "BlendedCost", "AmortizedCost", "NetUnblendedCost"];

// ---------- payload → raw entries ----------

/**
 * Flatten any supported billing payload into raw entries. An unrecognised
 * payload is a batch-level ValidationError.
 */
export function extractRawEntries(raw: unknown): RawEntry[] {
  const azure = AzureQuerySchema.safeParse(raw);
  if (azure.success) return fromAzureQuery(azure.data);

  const aws = AwsCostExplorerSchema.safeParse(raw);
  if (aws.success) return fromAwsCostExplorer(aws.data);

  const items = LineItemsSchema.safeParse(raw);
  if (items.success) return fromLineItems(items.data.lineItems);

  throw new ValidationError("Unrecognised billing payload");
}

function fromAzureQuery(result: AzureQueryResult): RawEntry[] {
  const names = result.properties.columns.map((c) => c.name);
  const costIdx = names.findIndex((n) => AZURE_COST_COLUMNS.includes(n));
  const dateIdx = names.findIndex((n) => AZURE_DATE_COLUMNS.includes(n));
  const serviceIdx = names.indexOf("ServiceName");
  const currencyIdx = names.indexOf("Currency");
  const monthly = dateIdx >= 0 && names[dateIdx] === "BillingMonth";

  return result.properties.rows.map((row, index) => {
    const dimensions: Record<string, string> = {};
    names.forEach((name, i) => {
      if (i === costIdx || i === dateIdx || i === serviceIdx || i === currencyIdx) return;
      const value = row[i];
      if (typeof value !== "string" || value.trim() === "") return;
      dimensions[AZURE_DIMENSION_NAMES[name] ?? lowerFirst(name)] = value.trim();
    });
    const start = dateIdx >= 0 ? coerceIsoDate(row[dateIdx]) : null;
    return {
      index,
      service: serviceIdx >= 0 ? row[serviceIdx] : undefined,
      amount: costIdx >= 0 ? row[costIdx] : undefined,
      currency: currencyIdx >= 0 ? row[currencyIdx] : undefined,
      periodStart: start ?? (dateIdx >= 0 ? row[dateIdx] : undefined),
      periodEnd: start && monthly ? lastDayOfMonth(start) : start,
      dimensions,
    };
  });
}

function fromAwsCostExplorer(result: AwsCostExplorerResult): RawEntry[] {
  const entries: RawEntry[] = [];
  const defs = result.GroupDefinitions;
  let index = 0;

  for (const bucket of result.ResultsByTime) {
    const start = coerceIsoDate(bucket.TimePeriod.Start);
    const endExclusive = coerceIsoDate(bucket.TimePeriod.End);
    // Cost Explorer periods end exclusively.
    const end = start && endExclusive && endExclusive > start ? addDays(endExclusive, -1) : start;

    for (const group of bucket.Groups ?? []) {
      let service: string | undefined;
      const dimensions: Record<string, string> = {};

      group.Keys.forEach((key, i) => {
        const def = defs?.[i];
        if (def) {
          if (def.Key === "SERVICE") service = key;
          else if (def.Key === "REGION") dimensions.region = key;
          else if (def.Type === "TAG") {
            const [tagKey, tagValue] = splitTag(key, def.Key);
            if (tagValue) dimensions[`tag:${tagKey}`] = tagValue;
          } else dimensions[def.Key.toLowerCase()] = key;
        } else if (/^(Amazon|AWS)/.test(key)) {
          service = key;
        } else {
          dimensions.region = key;
        }
      });

      const metricName = AWS_COST_METRICS.find((m) => group.Metrics[m] !== undefined);
      const metric = metricName ? group.Metrics[metricName] : undefined;
      entries.push({
        index: index++,
        service,
        amount: metric?.Amount,
        currency: metric?.Unit,
        periodStart: start ?? bucket.TimePeriod.Start,
        periodEnd: end,
        dimensions,
      });
    }
  }
  return entries;
}

function fromLineItems(items: Record<string, unknown>[]): RawEntry[] {
  return items.map((item, index) => {
    const dimensions: Record<string, string> = {};
    const rawDims = item.dimensions;
    if (rawDims && typeof rawDims === "object") {
      for (const [k, v] of Object.entries(rawDims)) {
        if (typeof v === "string" && v.trim() !== "") dimensions[k.trim()] = v.trim();
      }
    }
    const start = coerceIsoDate(item.periodStart);
    return {
      index,
      service: item.service,
      amount: item.amount,
      currency: item.currency,
      periodStart: start ?? item.periodStart,
      periodEnd: coerceIsoDate(item.periodEnd) ?? start,
      dimensions,
    };
  });
}

function splitTag(key: string, tagKey: string): [string, string] {
  const idx = key.indexOf("$");
  if (idx < 0) return [tagKey, key];
  return [key.slice(0, idx) || tagKey, key.slice(idx + 1)];
}

function lowerFirst(s: string): string {
  return s.charAt(0).toLowerCase() + s.slice(1);
}

// ---------- entry validation ----------

/**
 * Validate one raw entry against the sync window.
 * Throws ValidationError for a missing service, an unparseable or negative
 * amount, or a period entirely outside the window. A period that overlaps
 * the window is clipped to it.
 */
export function normalizeEntry(entry: RawEntry, period: BillingPeriod, defaultCurrency: string): DraftRecord {
  const service = typeof entry.service === "string" ? entry.service.trim().replace(/\s+/g, " ") : "";
  const ctx = { index: entry.index, service: service || undefined };
  if (!service) throw new ValidationError("Missing service name", ctx);

  const amount =
    typeof entry.amount === "string" || typeof entry.amount === "number" ? toMicros(entry.amount) : null;
  if (amount === null) throw new ValidationError(`Unparseable amount for ${service}`, ctx);
  if (amount < 0) throw new ValidationError(`Negative amount for ${service}`, ctx);

  const rawStart = coerceIsoDate(entry.periodStart);
  if (!rawStart) throw new ValidationError(`Missing or invalid period for ${service}`, ctx);
  const periodCtx = { ...ctx, period: rawStart };
  const rawEnd = coerceIsoDate(entry.periodEnd) ?? rawStart;
  if (rawEnd < rawStart) throw new ValidationError(`Period ends before it starts for ${service}`, periodCtx);
  if (rawEnd < period.start || rawStart > period.end) {
    throw new ValidationError(`Period ${rawStart} outside ${period.start}..${period.end}`, periodCtx);
  }
  // Billing months overlap the window edges; keep the overlapping part.
  const periodStart: IsoDate = rawStart < period.start ? period.start : rawStart;
  const periodEnd: IsoDate = rawEnd > period.end ? period.end : rawEnd;

  const currency =
    typeof entry.currency === "string" && entry.currency.trim() !== ""
      ? entry.currency.trim().toUpperCase()
      : defaultCurrency;

  return { service, amountMicros: amount, currency, periodStart, periodEnd, dimensions: entry.dimensions };
}

export function recordKey(r: Pick<CostRecord, "service" | "periodStart" | "periodEnd" | "dimensions">): string {
  const dims = Object.keys(r.dimensions)
    .sort()
    .map((k) => `${k}=${r.dimensions[k]}`)
    .join(";");
  return `${r.service}|${r.periodStart}|${r.periodEnd}|${dims}`;
}

export function recordId(r: Pick<CostRecord, "service" | "periodStart" | "periodEnd" | "dimensions">): string {
  return hashKey(recordKey(r), 24);
}

export function compareRecords(a: CostRecord, b: CostRecord): number {
  if (a.service !== b.service) return a.service < b.service ? -1 : 1;
  if (a.periodStart !== b.periodStart) return a.periodStart < b.periodStart ? -1 : 1;
  if (a.id !== b.id) return a.id < b.id ? -1 : 1;
  return 0;
}

// ---------- batch ----------

/**
 * Normalize a raw billing batch for `period`. Invalid entries are rejected
 * individually; a missing conversion rate aborts the batch with
 * ConversionError before any record is produced.
 */
export function normalize(raw: unknown, period: BillingPeriod, options: NormalizeOptions): NormalizeResult {
  const reporting = options.reportingCurrency.toUpperCase();
  const ingestedAt = options.ingestedAt ?? new Date().toISOString();
  const rejected: RejectedEntry[] = [];
  const drafts: DraftRecord[] = [];

  for (const entry of extractRawEntries(raw)) {
    try {
      drafts.push(normalizeEntry(entry, period, reporting));
    } catch (e: unknown) {
      if (!(e instanceof ValidationError)) throw e;
      rejected.push({ index: entry.index, reason: e.message, service: e.context.service, period: e.context.period });
    }
  }

  const missing = [...new Set(drafts.map((d) => d.currency))]
    .filter((c) => c !== reporting && options.rates[c] === undefined)
    .sort();
  if (missing.length > 0) throw new ConversionError(missing, reporting);

  const byKey = new Map<string, CostRecord>();
  for (const d of drafts) {
    const amountMicros = d.currency === reporting ? d.amountMicros : convertMicros(d.amountMicros, options.rates[d.currency] ?? 1);
    const key = recordKey(d);
    const existing = byKey.get(key);
    if (existing) {
      existing.amountMicros += amountMicros;
      continue;
    }
    byKey.set(key, {
      id: hashKey(key, 24),
      service: d.service,
      amountMicros,
      currency: reporting,
      periodStart: d.periodStart,
      periodEnd: d.periodEnd,
      dimensions: { ...d.dimensions },
      sourceIngestedAt: ingestedAt,
    });
  }

  return { records: [...byKey.values()].sort(compareRecords), rejected };
}

// ---------- idempotent ingestion ----------

export type IngestResult = {
  records: CostRecord[];
  added: CostRecord[];
  superseded: string[];
  unchanged: number;
};

/**
 * Replace every existing record whose period starts inside `window` with the
 * incoming batch. Records identical to the ones they replace are kept as the
 * existing objects, so re-ingesting the same batch changes nothing.
 */
export function ingestRecords(existing: readonly CostRecord[], incoming: readonly CostRecord[], window: BillingPeriod): IngestResult {
  const inWindow = (r: CostRecord) => r.periodStart >= window.start && r.periodStart <= window.end;
  const previousById = new Map<string, CostRecord>();
  const kept: CostRecord[] = [];
  for (const r of existing) {
    if (inWindow(r)) previousById.set(r.id, r);
    else kept.push(r);
  }

  const added: CostRecord[] = [];
  const reused = new Set<string>();
  const next: CostRecord[] = [...kept];
  for (const r of incoming) {
    const prev = previousById.get(r.id);
    if (prev && prev.amountMicros === r.amountMicros && prev.currency === r.currency) {
      next.push(prev);
      reused.add(prev.id);
    } else {
      next.push(r);
      added.push(r);
    }
  }

  const superseded = [...previousById.keys()].filter((id) => !reused.has(id)).sort();
  return { records: next.sort(compareRecords), added, superseded, unchanged: reused.size };
}
