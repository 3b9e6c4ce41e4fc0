import { z } from "zod";
import type { Granularity, IsoDate } from "@costlens/types";
import type { Env } from "../env";
import { getArmFetcherAuto, type ArmFetcher } from "../infra/azureClientFactory";
import { logEvent } from "../infra/logger";
import { demoBillingPayload } from "../mockData";

// ────────────────────────────────────────────
// Billing sources
//
// fetchCostAndUsage(start, end, granularity)
//   → raw payload for the Record Normalizer.
// Transient failures (network, 429, 5xx)
// surface as TransientBillingError; the engine
// owns the retry loop.
// ────────────────────────────────────────────

export type FetchOptions = {
  bearerToken?: string;
};

export type BillingSource = {
  readonly name: string;
  fetchCostAndUsage(start: IsoDate, end: IsoDate, granularity: Granularity, opts?: FetchOptions): Promise<unknown>;
};

const API_VERSION = "2023-11-01";
const MAX_PAGES = 50;

const QueryPageSchema = z.object({
  properties: z.object({
    columns: z.array(z.object({ name: z.string(), type: z.string().optional() })),
    rows: z.array(z.array(z.unknown())),
    nextLink: z.string().nullish(),
  }),
});

export type CostQueryPage = z.infer<typeof QueryPageSchema>;

export function costQueryBody(start: IsoDate, end: IsoDate, granularity: Granularity): Record<string, unknown> {
  return {
    type: "ActualCost",
    timeframe: "Custom",
    timePeriod: { from: `${start}T00:00:00Z`, to: `${end}T23:59:59Z` },
    dataset: {
      granularity: granularity === "daily" ? "Daily" : "Monthly",
      aggregation: { totalCost: { name: "Cost", function: "Sum" } },
      grouping: [
        { type: "Dimension", name: "ServiceName" },
        { type: "Dimension", name: "ResourceLocation" },
      ],
    },
  };
}

/** Azure Cost Management query for one subscription, following `nextLink` until exhausted. */
export class AzureCostManagementSource implements BillingSource {
  readonly name = "azure-cost-management";

  constructor(
    private readonly env: Env,
    private readonly subscriptionId: string,
    private readonly fetcherFor: (env: Env, bearerToken: string | undefined) => Promise<ArmFetcher> = getArmFetcherAuto,
  ) {}

  async fetchCostAndUsage(start: IsoDate, end: IsoDate, granularity: Granularity, opts: FetchOptions = {}): Promise<CostQueryPage> {
    const fetcher = await this.fetcherFor(this.env, opts.bearerToken);
    const body = costQueryBody(start, end, granularity);
    let url: string | null =
      `https://management.azure.com/subscriptions/${this.subscriptionId}/providers/Microsoft.CostManagement/query?api-version=${API_VERSION}`;

    let columns: CostQueryPage["properties"]["columns"] = [];
    const rows: unknown[][] = [];
    let pages = 0;
    while (url && pages < MAX_PAGES) {
      const page = QueryPageSchema.parse(await fetcher.postJson(url, body));
      if (pages === 0) columns = page.properties.columns;
      rows.push(...page.properties.rows);
      url = page.properties.nextLink || null;
      pages++;
    }
    if (url) {
      logEvent({ level: "warn", event: "billing_page_limit", tenantId: this.subscriptionId, detail: `stopped after ${MAX_PAGES} pages` });
    }

    return { properties: { columns, rows } };
  }
}

/** Synthetic spend for local runs without a subscription. */
export class DemoBillingSource implements BillingSource {
  readonly name = "demo";

  async fetchCostAndUsage(start: IsoDate, end: IsoDate, granularity: Granularity): Promise<unknown> {
    return demoBillingPayload(start, end, granularity);
  }
}
