import type { AskResponse, CostRecord, Insight, QueryState, ServiceSpend } from "@costlens/types";
import { CacheManager } from "../infra/cacheManager";
import { GenerationError, IndexUnavailableError, QueryCancelledError } from "../infra/errors";
import { describeError, logEvent } from "../infra/logger";
import { rankServicesBySpend } from "./analytics";
import type { ConversationTurn, LanguageModel } from "./languageModel";
import { formatMoney } from "./money";
import { insightDocument, recordDocument, type IndexMatch, type SemanticIndex } from "./semanticIndex";

// ────────────────────────────────────────────
// Query Orchestrator
//
// received → retrieving → contextAssembled
//   → awaitingGeneration → completed | failed
//
// Reads one immutable engine snapshot; never
// writes to the index. The model call is the
// only await that can take long, and it is
// bounded by a timeout and the caller's signal.
// ────────────────────────────────────────────

export type QueryView = {
  index: SemanticIndex;
  records: ReadonlyMap<string, CostRecord>;
  /** Current insights, best first. */
  insights: readonly Insight[];
  currency: string;
};

export type OrchestratorConfig = {
  topK: number;
  topInsights: number;
  contextChars: number;
  timeoutMs: number;
  maxTurns: number;
  conversationTtlMs: number;
  topServices?: number;
};

type ContextBase = {
  id: string;
  text: string;
  score: number;
  date: string;
  /** Position among the always-included top insights; null for retrieved items. */
  pinnedRank: number | null;
};

export type ContextItem = (ContextBase & { kind: "insight"; insight: Insight }) | (ContextBase & { kind: "record"; record: CostRecord });

export type AssembledContext = {
  items: ContextItem[];
  text: string;
  dropped: number;
};

const SEPARATOR = "\n\n";

function compareKeepOrder(a: ContextItem, b: ContextItem): number {
  if (a.pinnedRank !== null || b.pinnedRank !== null) {
    if (a.pinnedRank === null) return 1;
    if (b.pinnedRank === null) return -1;
    return a.pinnedRank - b.pinnedRank;
  }
  return b.score - a.score || (a.date < b.date ? 1 : a.date > b.date ? -1 : 0) || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);
}

/**
 * Fit candidates into `budget` characters. Pinned insights go first, in
 * rank order; retrieved items follow by score, newer first on ties. Items
 * past the first one that does not fit are dropped, so the lowest-scored
 * and oldest go first.
 */
export function assembleContext(candidates: readonly ContextItem[], budget: number): AssembledContext {
  const ordered = [...candidates].sort(compareKeepOrder);
  const items: ContextItem[] = [];
  let used = 0;
  for (const item of ordered) {
    const cost = item.text.length + (items.length > 0 ? SEPARATOR.length : 0);
    if (used + cost > budget) break;
    items.push(item);
    used += cost;
  }
  return { items, text: items.map((i) => i.text).join(SEPARATOR), dropped: ordered.length - items.length };
}

export function fallbackAnswer(
  reason: string,
  topServices: readonly ServiceSpend[],
  insights: readonly Insight[],
  currency: string,
): string {
  const lines = [`A generated answer is not available (${reason}).`];
  if (topServices.length === 0 && insights.length === 0) {
    lines.push("No cost records or insights matched the question.");
    return lines.join("\n");
  }
  if (topServices.length > 0) {
    lines.push("", "Top services by spend in the retrieved records:");
    topServices.forEach((s, i) => {
      lines.push(`${i + 1}. ${s.service}: ${formatMoney(s.totalMicros, currency)} (${s.sharePct}%)`);
    });
  }
  if (insights.length > 0) {
    lines.push("", "Related optimization opportunities:");
    for (const i of insights) {
      lines.push(`- [${i.priority}] ${i.title} (potential savings ${formatMoney(i.potentialSavingsMicros, i.currency)})`);
    }
  }
  return lines.join("\n");
}

export class QueryOrchestrator {
  private readonly conversations: CacheManager<ConversationTurn[]>;

  constructor(
    private readonly model: LanguageModel | null,
    private readonly config: OrchestratorConfig,
    private readonly tenantId: string,
  ) {
    this.conversations = new CacheManager<ConversationTurn[]>(500, config.conversationTtlMs);
  }

  history(conversationId: string): ConversationTurn[] {
    return this.conversations.get(conversationId) ?? [];
  }

  async ask(view: QueryView, question: string, conversationId: string, signal?: AbortSignal): Promise<AskResponse> {
    const trace: QueryState[] = ["received"];
    const started = Date.now();
    throwIfCancelled(signal);

    trace.push("retrieving");
    let matches: IndexMatch[] = [];
    let indexNote: string | undefined;
    try {
      matches = await view.index.query(question, this.config.topK);
    } catch (e: unknown) {
      if (!(e instanceof IndexUnavailableError)) throw e;
      indexNote = "semantic index unavailable, answered from insights only";
      logEvent({ level: "warn", event: "retrieval_degraded", tenantId: this.tenantId, detail: describeError(e) });
    }
    throwIfCancelled(signal);

    const candidates = this.candidates(view, matches);
    let context = assembleContext(candidates, this.config.contextChars);
    trace.push("contextAssembled");
    if (context.dropped > 0) {
      logEvent({ level: "info", event: "context_truncated", tenantId: this.tenantId, detail: `${context.dropped} item(s) dropped` });
    }

    if (!this.model) {
      trace.push("completed");
      return this.degraded(view, conversationId, context, trace, "no language model configured", indexNote);
    }

    trace.push("awaitingGeneration");
    const history = this.history(conversationId).slice(-this.config.maxTurns);
    let lastError: GenerationError | undefined;
    for (let attempt = 1; attempt <= 2; attempt++) {
      try {
        const text = await this.generateWithTimeout(this.model, question, context.text, history, signal);
        trace.push("completed");
        this.remember(conversationId, { question, answer: text });
        logEvent({
          level: "info",
          event: "query_completed",
          tenantId: this.tenantId,
          durationMs: Date.now() - started,
          detail: `attempt ${attempt}, ${context.items.length} context item(s)`,
        });
        return {
          status: "completed",
          conversationId,
          responseText: text,
          supportingData: this.supportingData(context),
          trace,
          ...(indexNote ? { note: indexNote } : {}),
        };
      } catch (e: unknown) {
        if (signal?.aborted) throw new QueryCancelledError();
        if (!(e instanceof GenerationError)) throw e;
        lastError = e;
        logEvent({
          level: "warn",
          event: "generation_failed",
          tenantId: this.tenantId,
          detail: `attempt ${attempt} (${e.reason}): ${e.message}`,
        });
        if (attempt === 1) context = assembleContext(candidates, Math.floor(this.config.contextChars / 2));
      }
    }

    trace.push("failed");
    const reason = lastError?.reason === "timeout" ? "language model timed out" : "language model unavailable";
    return this.degraded(view, conversationId, context, trace, reason, indexNote);
  }

  private candidates(view: QueryView, matches: readonly IndexMatch[]): ContextItem[] {
    const insightsById = new Map(view.insights.map((i) => [i.id, i]));
    const byId = new Map<string, ContextItem>();

    view.insights.slice(0, this.config.topInsights).forEach((insight, rank) => {
      byId.set(insight.id, {
        kind: "insight",
        id: insight.id,
        text: insightDocument(insight).text,
        score: 1,
        date: insight.lastSeenAt ?? "",
        pinnedRank: rank,
        insight,
      });
    });

    for (const m of matches) {
      if (byId.has(m.entityId)) continue;
      const record = view.records.get(m.entityId);
      if (record) {
        byId.set(record.id, {
          kind: "record",
          id: record.id,
          text: recordDocument(record).text,
          score: m.score,
          date: record.periodStart,
          pinnedRank: null,
          record,
        });
        continue;
      }
      const insight = insightsById.get(m.entityId);
      if (insight) {
        byId.set(insight.id, {
          kind: "insight",
          id: insight.id,
          text: insightDocument(insight).text,
          score: m.score,
          date: insight.lastSeenAt ?? "",
          pinnedRank: null,
          insight,
        });
      }
    }
    return [...byId.values()];
  }

  private supportingData(context: AssembledContext): AskResponse["supportingData"] {
    const records: CostRecord[] = [];
    const insights: string[] = [];
    for (const item of context.items) {
      if (item.kind === "record") records.push(item.record);
      else insights.push(item.id);
    }
    return {
      records: records.map((r) => r.id),
      insights,
      topServices: rankServicesBySpend(records, this.config.topServices ?? 5),
    };
  }

  private degraded(
    view: QueryView,
    conversationId: string,
    context: AssembledContext,
    trace: QueryState[],
    reason: string,
    indexNote?: string,
  ): AskResponse {
    const supportingData = this.supportingData(context);
    const insights = context.items.flatMap((i) => (i.kind === "insight" ? [i.insight] : []));
    logEvent({ level: "warn", event: "query_degraded", tenantId: this.tenantId, detail: reason });
    return {
      status: "degraded",
      conversationId,
      responseText: fallbackAnswer(reason, supportingData.topServices, insights, view.currency),
      supportingData,
      trace,
      note: indexNote ? `${reason}; ${indexNote}` : reason,
    };
  }

  private remember(conversationId: string, turn: ConversationTurn): void {
    if (this.config.maxTurns <= 0) return;
    const turns = [...this.history(conversationId), turn].slice(-this.config.maxTurns);
    this.conversations.set(conversationId, turns);
  }

  private async generateWithTimeout(
    model: LanguageModel,
    question: string,
    context: string,
    history: readonly ConversationTurn[],
    signal?: AbortSignal,
  ): Promise<string> {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new GenerationError(`Language model timed out after ${this.config.timeoutMs}ms`, "timeout"));
      }, this.config.timeoutMs);
    });
    const cancelled = new Promise<never>((_, reject) => {
      controller.signal.addEventListener("abort", () => {
        if (signal?.aborted) reject(new QueryCancelledError());
      }, { once: true });
    });

    try {
      return await Promise.race([model.generate(question, context, { signal: controller.signal, history }), timeout, cancelled]);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}

function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) throw new QueryCancelledError();
}
