import type { CostRecord, Insight } from "@costlens/types";
import { IndexUnavailableError } from "../infra/errors";
import type { Embedder } from "./embeddings";
import { formatMoney } from "./money";

// ────────────────────────────────────────────
// Semantic Index
//
// Derived cache of embeddings for CostRecords
// and Insights. Holds nothing that cannot be
// rebuilt by re-upserting the live entities.
// ────────────────────────────────────────────

export type EntityKind = "record" | "insight";

export type IndexMetadata = {
  kind: EntityKind;
  [key: string]: string | number;
};

export type IndexEntry = {
  entityId: string;
  text: string;
  vector: number[];
  metadata: IndexMetadata;
};

export type IndexDocument = {
  entityId: string;
  text: string;
  metadata: IndexMetadata;
};

export type IndexMatch = {
  entityId: string;
  score: number;
  metadata: IndexMetadata;
};

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

export class SemanticIndex {
  private readonly entries: Map<string, IndexEntry>;

  constructor(private readonly embedder: Embedder, entries: Iterable<IndexEntry> = []) {
    this.entries = new Map([...entries].map((e) => [e.entityId, e]));
  }

  /** Restore a persisted index. Entries made by a different embedder are useless and must be rebuilt instead. */
  static fromEntries(embedder: Embedder, entries: readonly IndexEntry[]): SemanticIndex {
    return new SemanticIndex(embedder, entries);
  }

  get size(): number {
    return this.entries.size;
  }

  get embedderName(): string {
    return this.embedder.name;
  }

  has(entityId: string): boolean {
    return this.entries.has(entityId);
  }

  async upsert(entityId: string, text: string, metadata: IndexMetadata): Promise<void> {
    await this.upsertMany([{ entityId, text, metadata }]);
  }

  /** Embeds only documents whose text changed since they were last indexed. */
  async upsertMany(docs: readonly IndexDocument[]): Promise<number> {
    const stale = docs.filter((d) => this.entries.get(d.entityId)?.text !== d.text);
    const fresh = docs.filter((d) => this.entries.get(d.entityId)?.text === d.text);
    for (const d of fresh) {
      const existing = this.entries.get(d.entityId);
      if (existing) this.entries.set(d.entityId, { ...existing, metadata: d.metadata });
    }
    if (stale.length === 0) return 0;

    const vectors = await this.embedder.embed(stale.map((d) => d.text));
    stale.forEach((d, i) => {
      this.entries.set(d.entityId, { entityId: d.entityId, text: d.text, vector: vectors[i], metadata: d.metadata });
    });
    return stale.length;
  }

  remove(entityId: string): boolean {
    return this.entries.delete(entityId);
  }

  /**
   * The `k` nearest entries by cosine similarity, best first (ties by id).
   * Embedding failures surface as IndexUnavailableError.
   */
  async query(text: string, k: number, filter?: { kind?: EntityKind }): Promise<IndexMatch[]> {
    if (k <= 0 || this.entries.size === 0) return [];

    let vector: number[];
    try {
      const [v] = await this.embedder.embed([text]);
      if (!v) throw new IndexUnavailableError("Embedder returned no vector");
      vector = v;
    } catch (e: unknown) {
      if (e instanceof IndexUnavailableError) throw e;
      throw new IndexUnavailableError(`Query embedding failed: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
    }

    const matches: IndexMatch[] = [];
    for (const entry of this.entries.values()) {
      if (filter?.kind && entry.metadata.kind !== filter.kind) continue;
      if (entry.vector.length !== vector.length) continue;
      matches.push({ entityId: entry.entityId, score: cosineSimilarity(vector, entry.vector), metadata: entry.metadata });
    }
    matches.sort((a, b) => b.score - a.score || (a.entityId < b.entityId ? -1 : a.entityId > b.entityId ? 1 : 0));
    return matches.slice(0, k);
  }

  /** Independent copy sharing the embedder, for building a new generation off to the side. */
  fork(): SemanticIndex {
    return new SemanticIndex(this.embedder, this.entries.values());
  }

  /** Drop everything and index `docs` from scratch. */
  async rebuild(docs: readonly IndexDocument[]): Promise<void> {
    this.entries.clear();
    await this.upsertMany(docs);
  }

  toEntries(): IndexEntry[] {
    return [...this.entries.values()].sort((a, b) => (a.entityId < b.entityId ? -1 : a.entityId > b.entityId ? 1 : 0));
  }
}

// ---------- documents ----------

export function recordDocument(r: CostRecord): IndexDocument {
  const dims = Object.keys(r.dimensions)
    .sort()
    .map((k) => `${k}=${r.dimensions[k]}`)
    .join(", ");
  const lines = [
    `Service: ${r.service}`,
    `Region: ${r.dimensions.region ?? "unknown"}`,
    `Cost: ${formatMoney(r.amountMicros, r.currency)}`,
    `Period: ${r.periodStart} to ${r.periodEnd}`,
  ];
  if (dims) lines.push(`Dimensions: ${dims}`);
  return {
    entityId: r.id,
    text: lines.join("\n"),
    metadata: {
      kind: "record",
      service: r.service,
      periodStart: r.periodStart,
      amountMicros: r.amountMicros,
    },
  };
}

export function insightDocument(i: Insight): IndexDocument {
  return {
    entityId: i.id,
    text: [
      `Optimization: ${i.title}`,
      `Category: ${i.category}`,
      `Service: ${i.service}`,
      `Priority: ${i.priority}`,
      `Potential savings: ${formatMoney(i.potentialSavingsMicros, i.currency)}`,
      i.description,
      i.recommendation,
    ].join("\n"),
    metadata: {
      kind: "insight",
      service: i.service,
      category: i.category,
      priority: i.priority,
    },
  };
}
