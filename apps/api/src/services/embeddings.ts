import OpenAI from "openai";
import { CacheManager, hashKey } from "../infra/cacheManager";
import { IndexUnavailableError } from "../infra/errors";

// ────────────────────────────────────────────
// Embedding capability
//
// Opaque text → fixed-length vector. The index
// never cares which implementation it gets.
// ────────────────────────────────────────────

export type Embedder = {
  /** Stable identifier; persisted vectors from another embedder are rebuilt. */
  readonly name: string;
  embed(texts: string[]): Promise<number[][]>;
};

const STOPWORDS = new Set([
  "a", "an", "and", "are", "as", "at", "be", "by", "do", "for", "from", "how", "i", "in", "is", "it",
  "me", "my", "of", "on", "or", "our", "so", "the", "to", "was", "we", "what", "which", "with", "you",
]);

export function tokenize(text: string): string[] {
  return (text.toLowerCase().match(/[a-z0-9]+/g) ?? [])
    .filter((t) => !STOPWORDS.has(t))
    .map((t) => (t.length > 3 && t.endsWith("s") && !t.endsWith("ss") ? t.slice(0, -1) : t));
}

function fnv1a(token: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    h ^= token.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

/**
 * Deterministic feature-hashing embedder. Used when no embedding API is
 * configured; good enough for keyword-level retrieval over a small corpus.
 */
export class HashingEmbedder implements Embedder {
  readonly name: string;

  constructor(private readonly dimensions = 256) {
    this.name = `hashing-${dimensions}`;
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((t) => this.embedOne(t));
  }

  private embedOne(text: string): number[] {
    const v = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(text)) {
      const h = fnv1a(token);
      v[h % this.dimensions] += h & 0x80000000 ? -1 : 1;
    }
    const norm = Math.sqrt(v.reduce((s, x) => s + x * x, 0));
    return norm === 0 ? v : v.map((x) => x / norm);
  }
}

export type OpenAIEmbedderOptions = {
  client: OpenAI;
  model: string;
  cacheTtlMs?: number;
  maxCacheEntries?: number;
};

/** OpenAI (or compatible) embeddings endpoint, cached per text. */
export class OpenAIEmbedder implements Embedder {
  readonly name: string;
  private readonly cache: CacheManager<number[]>;

  constructor(private readonly opts: OpenAIEmbedderOptions) {
    this.name = `openai:${opts.model}`;
    this.cache = new CacheManager<number[]>(opts.maxCacheEntries ?? 5000, opts.cacheTtlMs ?? 6 * 60 * 60_000);
  }

  async embed(texts: string[]): Promise<number[][]> {
    const keys = texts.map((t) => hashKey(`${this.opts.model}|${t}`, 32));
    const out: Array<number[] | undefined> = keys.map((k) => this.cache.get(k));
    const missing = texts.map((_, i) => i).filter((i) => out[i] === undefined);

    if (missing.length > 0) {
      const data = await this.request(missing.map((i) => texts[i]));
      for (const item of data) {
        const target = missing[item.index];
        if (target === undefined) continue;
        out[target] = item.embedding;
        this.cache.set(keys[target], item.embedding);
      }
    }

    return out.map((v, i) => {
      if (!v) throw new IndexUnavailableError(`Embedding missing for input ${i}`);
      return v;
    });
  }

  private async request(input: string[]): Promise<Array<{ index: number; embedding: number[] }>> {
    try {
      const res = await this.opts.client.embeddings.create({ model: this.opts.model, input });
      return res.data;
    } catch (e: unknown) {
      throw new IndexUnavailableError(`Embedding request failed: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
    }
  }
}
