import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { BlobServiceClient, type ContainerClient } from "@azure/storage-blob";
import { z } from "zod";
import { INSIGHT_CATEGORIES, PRIORITIES } from "@costlens/types";
import type { Env } from "../env";
import { getSPCredential } from "./azureClientFactory";
import { PersistenceError } from "./errors";
import { describeError, logEvent } from "./logger";

// ────────────────────────────────────────────
// Snapshot persistence
//
// One JSON document per tenant holding the
// canonical records, the current insights and
// the semantic index. Everything in it can be
// rebuilt by a forced resync, so a document
// that fails validation is dropped, not repaired.
// ────────────────────────────────────────────

const SNAPSHOT_VERSION = 1;

const DateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

const CostRecordSchema = z.object({
  id: z.string().min(1),
  service: z.string().min(1),
  amountMicros: z.number().int().nonnegative(),
  currency: z.string().min(1),
  periodStart: DateSchema,
  periodEnd: DateSchema,
  dimensions: z.record(z.string()),
  sourceIngestedAt: z.string(),
});

const SourceSignalSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("anomaly"),
    service: z.string(),
    observedAt: DateSchema,
    deviationScore: z.number(),
    severity: z.enum(["low", "medium", "high"]),
  }),
  z.object({
    kind: z.literal("trend"),
    service: z.string(),
    windowStart: DateSchema,
    windowEnd: DateSchema,
    deltaPct: z.number(),
    direction: z.enum(["increasing", "decreasing", "stable"]),
  }),
  z.object({
    kind: z.literal("footprint"),
    regions: z.array(z.string()),
  }),
  z.object({
    kind: z.literal("ranking"),
    service: z.string(),
    rank: z.number().int().positive(),
    sharePct: z.number(),
  }),
]);

const InsightSchema = z.object({
  id: z.string().min(1),
  category: z.enum(INSIGHT_CATEGORIES),
  service: z.string(),
  title: z.string(),
  description: z.string(),
  recommendation: z.string(),
  potentialSavingsMicros: z.number().int().nonnegative(),
  currency: z.string(),
  priority: z.enum(PRIORITIES),
  sourceSignal: SourceSignalSchema,
  firstSeenAt: z.string().optional(),
  lastSeenAt: z.string().optional(),
});

const IndexEntrySchema = z.object({
  entityId: z.string(),
  text: z.string(),
  vector: z.array(z.number()),
  metadata: z.object({ kind: z.enum(["record", "insight"]) }).catchall(z.union([z.string(), z.number()])),
});

export const SnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  tenantId: z.string(),
  generation: z.number().int().nonnegative(),
  lastSyncAt: z.string().nullable(),
  currency: z.string(),
  records: z.array(CostRecordSchema),
  insights: z.array(InsightSchema),
  index: z.object({
    embedder: z.string(),
    entries: z.array(IndexEntrySchema),
  }),
});

export type PersistedSnapshot = z.infer<typeof SnapshotSchema>;

export type SnapshotStore = {
  readonly kind: string;
  load(tenantId: string): Promise<PersistedSnapshot | null>;
  save(snapshot: PersistedSnapshot): Promise<void>;
  clear(tenantId: string): Promise<void>;
};

export function newSnapshotDocument(
  fields: Omit<PersistedSnapshot, "version">,
): PersistedSnapshot {
  return { version: SNAPSHOT_VERSION, ...fields };
}

/** Parse and validate a stored document. Anything invalid is logged and treated as absent. */
export function parseSnapshot(tenantId: string, raw: string): PersistedSnapshot | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e: unknown) {
    logEvent({ level: "warn", event: "snapshot_discarded", tenantId, detail: `unreadable JSON: ${describeError(e)}` });
    return null;
  }
  const parsed = SnapshotSchema.safeParse(json);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .slice(0, 5)
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    logEvent({ level: "warn", event: "snapshot_discarded", tenantId, detail });
    return null;
  }
  if (parsed.data.tenantId !== tenantId) {
    logEvent({ level: "warn", event: "snapshot_discarded", tenantId, detail: `belongs to ${parsed.data.tenantId}` });
    return null;
  }
  return parsed.data;
}

function snapshotName(tenantId: string): string {
  return `${tenantId.replace(/[^A-Za-z0-9_-]/g, "_")}.json`;
}

// ---------- file system ----------

export class FileSnapshotStore implements SnapshotStore {
  readonly kind = "file";

  constructor(private readonly dir: string) {}

  private pathFor(tenantId: string): string {
    return path.join(this.dir, snapshotName(tenantId));
  }

  async load(tenantId: string): Promise<PersistedSnapshot | null> {
    let raw: string;
    try {
      raw = await readFile(this.pathFor(tenantId), "utf-8");
    } catch (e: unknown) {
      if (isNotFound(e)) return null;
      throw new PersistenceError(`Failed to read snapshot: ${describeError(e)}`, { cause: e });
    }
    return parseSnapshot(tenantId, raw);
  }

  /** Write to a temp file, then rename over the old one. */
  async save(snapshot: PersistedSnapshot): Promise<void> {
    const target = this.pathFor(snapshot.tenantId);
    const temp = `${target}.${process.pid}.tmp`;
    try {
      await mkdir(this.dir, { recursive: true });
      await writeFile(temp, JSON.stringify(snapshot), "utf-8");
      await rename(temp, target);
    } catch (e: unknown) {
      await rm(temp, { force: true });
      throw new PersistenceError(`Failed to write snapshot: ${describeError(e)}`, { cause: e });
    }
  }

  async clear(tenantId: string): Promise<void> {
    await rm(this.pathFor(tenantId), { force: true });
  }
}

function isNotFound(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}

// ---------- Azure Blob Storage ----------

export class BlobSnapshotStore implements SnapshotStore {
  readonly kind = "blob";
  private ready: Promise<void> | null = null;

  constructor(private readonly container: ContainerClient) {}

  static fromEnv(env: Env, account: string): BlobSnapshotStore {
    const credential = getSPCredential(env);
    const service = new BlobServiceClient(`https://${account}.blob.core.windows.net`, credential);
    return new BlobSnapshotStore(service.getContainerClient(env.SNAPSHOT_CONTAINER));
  }

  private ensureContainer(): Promise<void> {
    this.ready ??= this.container.createIfNotExists().then(() => undefined);
    return this.ready;
  }

  async load(tenantId: string): Promise<PersistedSnapshot | null> {
    try {
      const blob = this.container.getBlobClient(snapshotName(tenantId));
      if (!(await blob.exists())) return null;
      const downloadResponse = await blob.download(0);
      return parseSnapshot(tenantId, await streamToString(downloadResponse.readableStreamBody));
    } catch (e: unknown) {
      throw new PersistenceError(`Failed to read snapshot blob: ${describeError(e)}`, { cause: e });
    }
  }

  async save(snapshot: PersistedSnapshot): Promise<void> {
    try {
      await this.ensureContainer();
      const body = JSON.stringify(snapshot);
      await this.container
        .getBlockBlobClient(snapshotName(snapshot.tenantId))
        .upload(body, Buffer.byteLength(body), { blobHTTPHeaders: { blobContentType: "application/json" } });
    } catch (e: unknown) {
      this.ready = null;
      throw new PersistenceError(`Failed to write snapshot blob: ${describeError(e)}`, { cause: e });
    }
  }

  async clear(tenantId: string): Promise<void> {
    await this.container.getBlobClient(snapshotName(tenantId)).deleteIfExists();
  }
}

/** Convert a ReadableStream to string. */
async function streamToString(stream: NodeJS.ReadableStream | undefined): Promise<string> {
  if (!stream) return "";
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

// ---------- in-memory ----------

/** Keeps serialized documents, so loads go through the same validation as the other stores. */
export class MemorySnapshotStore implements SnapshotStore {
  readonly kind = "memory";
  readonly documents = new Map<string, string>();

  async load(tenantId: string): Promise<PersistedSnapshot | null> {
    const raw = this.documents.get(tenantId);
    return raw === undefined ? null : parseSnapshot(tenantId, raw);
  }

  async save(snapshot: PersistedSnapshot): Promise<void> {
    this.documents.set(snapshot.tenantId, JSON.stringify(snapshot));
  }

  async clear(tenantId: string): Promise<void> {
    this.documents.delete(tenantId);
  }
}

export function snapshotStoreFromEnv(env: Env): SnapshotStore {
  if (env.SNAPSHOT_STORAGE_ACCOUNT) return BlobSnapshotStore.fromEnv(env, env.SNAPSHOT_STORAGE_ACCOUNT);
  return new FileSnapshotStore(path.resolve(env.SNAPSHOT_DIR));
}
