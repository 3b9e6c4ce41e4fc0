import OpenAI from "openai";
import type {
  AnalyticsSnapshot,
  AskResponse,
  BillingPeriod,
  CostRecord,
  EngineSummary,
  ForecastResult,
  Granularity,
  Insight,
  InsightFilter,
  SyncResult,
} from "@costlens/types";
import { parseSubscriptionIds, type Env } from "../env";
import { hasSPConfig } from "../infra/azureClientFactory";
import { IndexUnavailableError } from "../infra/errors";
import { describeError, logEvent } from "../infra/logger";
import { withRetry } from "../infra/retry";
import { snapshotStoreFromEnv, newSnapshotDocument, type PersistedSnapshot, type SnapshotStore } from "../infra/snapshotStore";
import { TenantLock } from "../infra/tenantLock";
import { ANOMALY_DEFAULTS, detectAnomalies, forecast, trend, type AnomalyOptions } from "./analytics";
import { AzureCostManagementSource, DemoBillingSource, type BillingSource } from "./billingSource";
import { addDays, formatDate } from "./dates";
import { HashingEmbedder, OpenAIEmbedder, type Embedder } from "./embeddings";
import { filterInsights, generateInsights, mergeInsights, totalSavings, type InsightConfig } from "./insightGenerator";
import { OpenAILanguageModel, type LanguageModel } from "./languageModel";
import { unitsToMicros } from "./money";
import { ingestRecords, normalize } from "./normalizer";
import { QueryOrchestrator, type OrchestratorConfig } from "./queryOrchestrator";
import { renderReport } from "./report";
import { SemanticIndex, insightDocument, recordDocument, type IndexDocument } from "./semanticIndex";

// ────────────────────────────────────────────
// Cost Intelligence Engine (one per tenant)
//
// sync: fetch → normalize → ingest → analytics
//   → insights → index delta → persist → swap
//
// Readers only ever see a whole EngineState;
// a pass builds the next one off to the side
// and replaces the reference at the very end.
// ────────────────────────────────────────────

export type EngineConfig = {
  tenantId: string;
  reportingCurrency: string;
  rates: Record<string, number>;
  granularity: Granularity;
  defaultDays: number;
  billing: { maxAttempts: number; backoffMs: number };
  anomaly: Required<AnomalyOptions>;
  trendWindowDays: number;
  trendStablePct: number;
  forecastHorizon: number;
  forecastWindow: number;
  insight: InsightConfig;
  query: OrchestratorConfig;
};

export type EngineDeps = {
  source: BillingSource;
  store: SnapshotStore;
  embedder: Embedder;
  model: LanguageModel | null;
  lock?: TenantLock;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
};

export type SyncOptions = {
  bearerToken?: string;
};

type EngineState = Readonly<{
  generation: number;
  lastSyncAt: string | null;
  records: readonly CostRecord[];
  recordsById: ReadonlyMap<string, CostRecord>;
  insights: readonly Insight[];
  index: SemanticIndex;
  analytics: AnalyticsSnapshot | null;
}>;

const TOP_SUMMARY_INSIGHTS = 5;

export class CostIntelligenceEngine {
  private state: EngineState;
  private loading: Promise<void> | null = null;
  private readonly lock: TenantLock;
  private readonly orchestrator: QueryOrchestrator;
  private readonly now: () => Date;

  constructor(
    readonly config: EngineConfig,
    private readonly deps: EngineDeps,
  ) {
    this.lock = deps.lock ?? new TenantLock();
    this.now = deps.now ?? (() => new Date());
    this.orchestrator = new QueryOrchestrator(deps.model, config.query, config.tenantId);
    this.state = this.emptyState();
  }

  get tenantId(): string {
    return this.config.tenantId;
  }

  get generation(): number {
    return this.state.generation;
  }

  isSyncing(): boolean {
    return this.lock.isLocked(this.tenantId);
  }

  // ---------- persistence ----------

  /** Restore the last persisted snapshot once. A missing or invalid snapshot leaves the engine empty. */
  load(): Promise<void> {
    this.loading ??= this.restore().catch((e: unknown) => {
      logEvent({ level: "error", event: "snapshot_load_failed", tenantId: this.tenantId, detail: describeError(e) });
    });
    return this.loading;
  }

  private async restore(): Promise<void> {
    const doc = await this.deps.store.load(this.tenantId);
    if (!doc) return;

    const records = doc.records;
    const insights = doc.insights;
    let index: SemanticIndex;
    if (doc.index.embedder === this.deps.embedder.name) {
      index = SemanticIndex.fromEntries(this.deps.embedder, doc.index.entries);
    } else {
      index = new SemanticIndex(this.deps.embedder);
      try {
        await index.rebuild(documentsFor(records, insights));
        logEvent({ level: "info", event: "index_rebuilt", tenantId: this.tenantId, detail: `embedder changed from ${doc.index.embedder}` });
      } catch (e: unknown) {
        if (!(e instanceof IndexUnavailableError)) throw e;
        logEvent({ level: "warn", event: "index_rebuild_failed", tenantId: this.tenantId, detail: e.message });
      }
    }

    // A sync that finished while the snapshot was loading wins.
    if (this.state.generation > 0) return;
    this.state = {
      generation: doc.generation,
      lastSyncAt: doc.lastSyncAt,
      records,
      recordsById: new Map(records.map((r) => [r.id, r])),
      insights,
      index,
      analytics: null,
    };
    logEvent({
      level: "info",
      event: "snapshot_loaded",
      tenantId: this.tenantId,
      detail: `generation ${doc.generation}, ${records.length} records, ${insights.length} insights`,
    });
  }

  // ---------- sync ----------

  /**
   * Run one analytics pass over the last `days` days. A second call while a
   * pass is running for this tenant is skipped, not queued.
   */
  async sync(days = this.config.defaultDays, opts: SyncOptions = {}): Promise<SyncResult> {
    await this.load();
    const started = Date.now();
    try {
      const outcome = await this.lock.runExclusive(this.tenantId, () => this.pass(days, opts));
      if (!outcome.acquired) {
        logEvent({ level: "info", event: "sync_skipped", tenantId: this.tenantId, detail: "a sync is already running" });
        return { status: "skipped", reason: "A sync is already running for this tenant", recordsIngested: 0 };
      }
      logEvent({
        level: "info",
        event: "sync_completed",
        tenantId: this.tenantId,
        durationMs: Date.now() - started,
        detail: JSON.stringify(outcome.value),
      });
      return outcome.value;
    } catch (e: unknown) {
      logEvent({ level: "error", event: "sync_failed", tenantId: this.tenantId, durationMs: Date.now() - started, detail: describeError(e) });
      return { status: "error", message: describeError(e), recordsIngested: 0 };
    }
  }

  /** Entry point for an external scheduler. */
  runSync(days = this.config.defaultDays): Promise<SyncResult> {
    return this.sync(days);
  }

  private async pass(days: number, opts: SyncOptions): Promise<SyncResult> {
    const previous = this.state;
    const now = this.now();
    const nowIso = now.toISOString();
    const end = formatDate(now);
    const period: BillingPeriod = { start: addDays(end, -(Math.max(1, days) - 1)), end };

    const raw = await withRetry(
      () => this.deps.source.fetchCostAndUsage(period.start, period.end, this.config.granularity, { bearerToken: opts.bearerToken }),
      {
        maxAttempts: this.config.billing.maxAttempts,
        baseDelayMs: this.config.billing.backoffMs,
        label: `${this.deps.source.name}:${this.tenantId}`,
        sleep: this.deps.sleep,
      },
    );

    const normalized = normalize(raw, period, {
      reportingCurrency: this.config.reportingCurrency,
      rates: this.config.rates,
      ingestedAt: nowIso,
    });
    for (const r of normalized.rejected) {
      logEvent({
        level: "warn",
        event: "record_rejected",
        tenantId: this.tenantId,
        service: r.service,
        period: r.period,
        detail: `entry ${r.index}: ${r.reason}`,
      });
    }

    const ingest = ingestRecords(previous.records, normalized.records, period);
    const records = ingest.records;
    const analytics = this.analyze(records);
    const fresh = generateInsights(analytics.trends, analytics.anomalies, records, this.config.insight);
    const merged = mergeInsights(previous.insights, fresh, nowIso);

    const index = previous.index.fork();
    for (const id of ingest.superseded) index.remove(id);
    for (const id of merged.retired) index.remove(id);
    await index.upsertMany(documentsFor(records, merged.insights));

    const next: EngineState = {
      generation: previous.generation + 1,
      lastSyncAt: nowIso,
      records,
      recordsById: new Map(records.map((r) => [r.id, r])),
      insights: merged.insights,
      index,
      analytics,
    };
    await this.deps.store.save(this.toDocument(next));
    this.state = next;

    return {
      status: "success",
      recordsIngested: normalized.records.length,
      recordsRejected: normalized.rejected.length,
      recordsSuperseded: ingest.superseded.length,
      insightsGenerated: merged.insights.length,
      insightsRetired: merged.retired.length,
      generation: next.generation,
      period,
    };
  }

  private analyze(records: readonly CostRecord[]): AnalyticsSnapshot {
    const forecastResult = forecast(records, this.config.forecastHorizon, this.config.forecastWindow);
    for (const service of forecastResult.unavailable) {
      logEvent({ level: "info", event: "forecast_skipped", tenantId: this.tenantId, service, detail: "fewer than 3 historical points" });
    }
    return {
      trends: trend(records, this.config.trendWindowDays, { stablePct: this.config.trendStablePct }),
      anomalies: detectAnomalies(records, this.config.anomaly),
      forecast: forecastResult,
    };
  }

  private toDocument(state: EngineState): PersistedSnapshot {
    return newSnapshotDocument({
      tenantId: this.tenantId,
      generation: state.generation,
      lastSyncAt: state.lastSyncAt,
      currency: this.config.reportingCurrency,
      records: [...state.records],
      insights: [...state.insights],
      index: { embedder: this.deps.embedder.name, entries: state.index.toEntries() },
    });
  }

  // ---------- reads ----------

  async getSummary(): Promise<EngineSummary> {
    await this.load();
    const s = this.state;
    return {
      tenantId: this.tenantId,
      generation: s.generation,
      lastSyncAt: s.lastSyncAt,
      currency: this.config.reportingCurrency,
      recordCount: s.records.length,
      totalInsights: s.insights.length,
      totalPotentialSavingsMicros: totalSavings(s.insights),
      topInsights: s.insights.slice(0, TOP_SUMMARY_INSIGHTS),
    };
  }

  async listInsights(filter?: InsightFilter): Promise<Insight[]> {
    await this.load();
    return filterInsights(this.state.insights, filter);
  }

  async ask(question: string, conversationId: string, signal?: AbortSignal): Promise<AskResponse> {
    await this.load();
    const s = this.state;
    return this.orchestrator.ask(
      { index: s.index, records: s.recordsById, insights: s.insights, currency: this.config.reportingCurrency },
      question,
      conversationId,
      signal,
    );
  }

  async generateReport(): Promise<string> {
    await this.load();
    const s = this.state;
    return renderReport({
      tenantId: this.tenantId,
      generation: s.generation,
      lastSyncAt: s.lastSyncAt,
      currency: this.config.reportingCurrency,
      records: s.records,
      insights: s.insights,
    });
  }

  async getForecast(horizon = this.config.forecastHorizon): Promise<ForecastResult> {
    await this.load();
    return forecast(this.state.records, horizon, this.config.forecastWindow);
  }

  async getAnalytics(): Promise<AnalyticsSnapshot> {
    await this.load();
    return this.state.analytics ?? this.analyze(this.state.records);
  }

  /** Drop all state, in memory and persisted. Refused while a sync is running. */
  async clear(): Promise<boolean> {
    await this.load();
    const outcome = await this.lock.runExclusive(this.tenantId, async () => {
      await this.deps.store.clear(this.tenantId);
      this.state = { ...this.emptyState(), generation: this.state.generation + 1 };
    });
    if (outcome.acquired) logEvent({ level: "info", event: "engine_cleared", tenantId: this.tenantId });
    return outcome.acquired;
  }

  private emptyState(): EngineState {
    return {
      generation: 0,
      lastSyncAt: null,
      records: [],
      recordsById: new Map(),
      insights: [],
      index: new SemanticIndex(this.deps.embedder),
      analytics: null,
    };
  }
}

function documentsFor(records: readonly CostRecord[], insights: readonly Insight[]): IndexDocument[] {
  return [...records.map(recordDocument), ...insights.map(insightDocument)];
}

// ────────────────────────────────────────────
// Wiring from the environment
// ────────────────────────────────────────────

export const DEMO_TENANT = "demo";

export function engineConfigFromEnv(env: Env, tenantId: string): EngineConfig {
  return {
    tenantId,
    reportingCurrency: env.REPORTING_CURRENCY.toUpperCase(),
    rates: env.CURRENCY_RATES,
    granularity: env.BILLING_GRANULARITY,
    defaultDays: env.SYNC_DEFAULT_DAYS,
    billing: { maxAttempts: env.BILLING_MAX_ATTEMPTS, backoffMs: env.BILLING_BACKOFF_MS },
    anomaly: {
      ...ANOMALY_DEFAULTS,
      minHistory: env.ANOMALY_MIN_HISTORY,
      threshold: env.ANOMALY_THRESHOLD,
      mediumAt: env.ANOMALY_SEVERITY_MEDIUM,
      highAt: env.ANOMALY_SEVERITY_HIGH,
      minRelativeStd: env.ANOMALY_MIN_RELATIVE_STD,
    },
    trendWindowDays: env.TREND_WINDOW_DAYS,
    trendStablePct: env.TREND_STABLE_PCT,
    forecastHorizon: env.FORECAST_HORIZON,
    forecastWindow: env.FORECAST_WINDOW,
    insight: {
      currency: env.REPORTING_CURRENCY.toUpperCase(),
      trendPctThreshold: env.TREND_INSIGHT_PCT,
      highSavingsMicros: unitsToMicros(env.SAVINGS_HIGH),
      mediumSavingsMicros: unitsToMicros(env.SAVINGS_MEDIUM),
      billingPeriodDays: env.BILLING_PERIOD_DAYS,
      regionSpreadLimit: env.REGION_SPREAD_LIMIT,
      consolidationRate: env.REGION_CONSOLIDATION_RATE,
      topDriverCount: env.TOP_DRIVER_COUNT,
      topDriverSavingsRate: env.TOP_DRIVER_SAVINGS_RATE,
    },
    query: {
      topK: env.QUERY_TOP_K,
      topInsights: env.QUERY_TOP_INSIGHTS,
      contextChars: env.QUERY_CONTEXT_CHARS,
      timeoutMs: env.LLM_TIMEOUT_MS,
      maxTurns: env.CONVERSATION_MAX_TURNS,
      conversationTtlMs: env.CONVERSATION_TTL_MS,
    },
  };
}

export type EngineFactory = (tenantId: string) => CostIntelligenceEngine;

/** Builds one engine per tenant on first use and keeps it for the life of the process. */
export class EngineRegistry {
  private readonly engines = new Map<string, CostIntelligenceEngine>();

  constructor(
    readonly tenantIds: readonly string[],
    private readonly factory: EngineFactory,
  ) {
    if (tenantIds.length === 0) throw new Error("EngineRegistry needs at least one tenant");
  }

  get defaultTenant(): string {
    return this.tenantIds[0];
  }

  has(tenantId: string): boolean {
    return this.tenantIds.includes(tenantId);
  }

  get(tenantId: string = this.defaultTenant): CostIntelligenceEngine {
    let engine = this.engines.get(tenantId);
    if (!engine) {
      engine = this.factory(tenantId);
      this.engines.set(tenantId, engine);
    }
    return engine;
  }
}

/**
 * Production wiring: Azure Cost Management per subscription when
 * subscriptions are configured, otherwise a single demo tenant. OpenAI
 * powers embeddings and answers when a key is present.
 */
export function createEngineRegistry(env: Env): EngineRegistry {
  const subscriptions = parseSubscriptionIds(env.AZURE_SUBSCRIPTION_IDS);
  const store = snapshotStoreFromEnv(env);
  const lock = new TenantLock();

  const client = env.OPENAI_API_KEY
    ? new OpenAI({ apiKey: env.OPENAI_API_KEY, baseURL: env.OPENAI_BASE_URL })
    : null;
  const embedder: Embedder = client
    ? new OpenAIEmbedder({ client, model: env.OPENAI_EMBEDDING_MODEL, cacheTtlMs: env.EMBEDDING_CACHE_TTL_MS })
    : new HashingEmbedder();
  const model: LanguageModel | null = client ? new OpenAILanguageModel({ client, model: env.OPENAI_MODEL }) : null;

  if (subscriptions.length > 0 && !hasSPConfig(env)) {
    logEvent({ level: "warn", event: "sp_not_configured", detail: "scheduled syncs need AZURE_AD_* credentials; user syncs use OBO" });
  }

  const tenantIds = subscriptions.length > 0 ? subscriptions : [DEMO_TENANT];
  return new EngineRegistry(tenantIds, (tenantId) => {
    const source: BillingSource =
      subscriptions.length > 0 ? new AzureCostManagementSource(env, tenantId) : new DemoBillingSource();
    return new CostIntelligenceEngine(engineConfigFromEnv(env, tenantId), { source, store, embedder, model, lock });
  });
}
