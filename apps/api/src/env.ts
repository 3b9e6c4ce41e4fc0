import { z } from "zod";

const RatesSchema = z.record(z.string().length(3), z.number().positive());

// JSON object of currency → rate into the reporting currency, validated at startup.
const CurrencyRatesSchema = z
  .string()
  .default("{}")
  .transform((raw, ctx) => {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected a JSON object" });
      return z.NEVER;
    }
    const parsed = RatesSchema.safeParse(json);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue.message, path: issue.path });
      }
      return z.NEVER;
    }
    const rates: Record<string, number> = {};
    for (const [code, rate] of Object.entries(parsed.data)) rates[code.toUpperCase()] = rate;
    return rates;
  });

const EnvSchema = z.object({
  PORT: z.coerce.number().default(4000),
  CORS_ORIGIN: z.string().default("http://localhost:3000"),
  AZURE_SUBSCRIPTION_IDS: z.string().optional(),

  // Azure AD (API confidential client) for OBO and service-principal syncs
  AZURE_AD_TENANT_ID: z.string().optional(),
  AZURE_AD_CLIENT_ID: z.string().optional(),
  AZURE_AD_CLIENT_SECRET: z.string().optional(),

  // Billing source
  BILLING_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  BILLING_BACKOFF_MS: z.coerce.number().int().min(0).default(500),
  BILLING_GRANULARITY: z.enum(["daily", "monthly"]).default("daily"),
  SYNC_DEFAULT_DAYS: z.coerce.number().int().min(1).max(365).default(30),

  // Currency normalization
  REPORTING_CURRENCY: z.string().length(3).default("USD"),
  CURRENCY_RATES: CurrencyRatesSchema,

  // Analytics thresholds
  ANOMALY_THRESHOLD: z.coerce.number().positive().default(2.5),
  ANOMALY_MIN_HISTORY: z.coerce.number().int().min(1).default(7),
  ANOMALY_SEVERITY_MEDIUM: z.coerce.number().positive().default(3.5),
  ANOMALY_SEVERITY_HIGH: z.coerce.number().positive().default(5),
  ANOMALY_MIN_RELATIVE_STD: z.coerce.number().min(0).default(0.05),
  TREND_WINDOW_DAYS: z.coerce.number().int().min(1).default(7),
  TREND_STABLE_PCT: z.coerce.number().min(0).default(5),
  FORECAST_HORIZON: z.coerce.number().int().min(1).default(30),
  FORECAST_WINDOW: z.coerce.number().int().min(3).default(30),

  // Insight generation
  TREND_INSIGHT_PCT: z.coerce.number().min(0).default(20),
  SAVINGS_HIGH: z.coerce.number().min(0).default(1000),
  SAVINGS_MEDIUM: z.coerce.number().min(0).default(100),
  BILLING_PERIOD_DAYS: z.coerce.number().int().min(1).default(30),
  REGION_SPREAD_LIMIT: z.coerce.number().int().min(1).default(3),
  REGION_CONSOLIDATION_RATE: z.coerce.number().min(0).max(1).default(0.1),
  TOP_DRIVER_COUNT: z.coerce.number().int().min(0).default(1),
  TOP_DRIVER_SAVINGS_RATE: z.coerce.number().min(0).max(1).default(0.15),

  // Query orchestration
  QUERY_TOP_K: z.coerce.number().int().min(1).default(8),
  QUERY_TOP_INSIGHTS: z.coerce.number().int().min(0).default(5),
  QUERY_CONTEXT_CHARS: z.coerce.number().int().min(200).default(6000),
  LLM_TIMEOUT_MS: z.coerce.number().int().min(100).default(20_000),
  CONVERSATION_TTL_MS: z.coerce.number().int().min(1000).default(30 * 60_000),
  CONVERSATION_MAX_TURNS: z.coerce.number().int().min(0).default(3),

  // OpenAI-compatible language model and embeddings
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().optional(),
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  EMBEDDING_CACHE_TTL_MS: z.coerce.number().default(6 * 60 * 60_000),

  // Snapshot persistence (blob storage wins when configured)
  SNAPSHOT_DIR: z.string().default("./data/snapshots"),
  SNAPSHOT_STORAGE_ACCOUNT: z.string().optional(),
  SNAPSHOT_CONTAINER: z.string().default("cost-snapshots"),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(processEnv: NodeJS.ProcessEnv): Env {
  const parsed = EnvSchema.safeParse(processEnv);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("\n");
    throw new Error(`Invalid environment variables:\n${msg}`);
  }
  return parsed.data;
}

export function parseSubscriptionIds(raw: string | undefined): string[] {
  return (raw ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}
