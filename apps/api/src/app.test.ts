import request from "supertest";
import { beforeEach, describe, expect, it, vi } from "vitest";
import type { IsoDate } from "@costlens/types";
import { createApp } from "./app";
import { loadEnv } from "./env";
import { MemorySnapshotStore } from "./infra/snapshotStore";
import type { BillingSource } from "./services/billingSource";
import { CostIntelligenceEngine, EngineRegistry, engineConfigFromEnv } from "./services/costEngine";
import { addDays } from "./services/dates";
import { HashingEmbedder } from "./services/embeddings";

const NOW = new Date("2024-03-14T12:00:00.000Z");

function payload(start: IsoDate, end: IsoDate) {
  const lineItems: Array<Record<string, unknown>> = [];
  for (let date = start; date <= end; date = addDays(date, 1)) {
    lineItems.push({ service: "EC2", amount: date < "2024-03-08" ? "100" : "150", currency: "USD", periodStart: date });
    lineItems.push({ service: "Storage", amount: "10", currency: "USD", periodStart: date });
  }
  return { lineItems };
}

describe("cost API", () => {
  let release: () => void;
  let registry: EngineRegistry;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const sources: Record<string, BillingSource> = {
      "sub-a": { name: "static", fetchCostAndUsage: async (start, end) => payload(start, end) },
      "sub-b": {
        name: "gated",
        fetchCostAndUsage: async (start, end) => {
          await gate;
          return payload(start, end);
        },
      },
    };
    const env = loadEnv({});
    registry = new EngineRegistry(["sub-a", "sub-b"], (tenantId) =>
      new CostIntelligenceEngine(engineConfigFromEnv(env, tenantId), {
        source: sources[tenantId],
        store: new MemorySnapshotStore(),
        embedder: new HashingEmbedder(),
        model: null,
        now: () => NOW,
        sleep: async () => undefined,
      }),
    );
    app = createApp({ registry, corsOrigin: "http://localhost:3000" });
  });

  it("reports health", async () => {
    const res = await request(app).get("/health").expect(200);
    expect(res.body).toMatchObject({ ok: true, service: "@costlens/api", tenants: 2 });
  });

  it("echoes a caller supplied request id", async () => {
    const res = await request(app).get("/health").set("x-request-id", "req-1").expect(200);
    expect(res.headers["x-request-id"]).toBe("req-1");
  });

  it("rejects subscriptions outside the allow-list", async () => {
    const res = await request(app).get("/api/summary?subscriptionId=sub-x").expect(403);
    expect(res.body).toEqual({ status: "error", message: "Subscription sub-x is not configured" });
  });

  describe("POST /api/sync", () => {
    it("runs a pass for the default subscription", async () => {
      const res = await request(app).post("/api/sync").send({ days: 14 }).expect(200);
      expect(res.body).toMatchObject({ status: "success", recordsIngested: 28, generation: 1 });

      const summary = await request(app).get("/api/summary").expect(200);
      expect(summary.body).toMatchObject({ tenantId: "sub-a", generation: 1, recordCount: 28, totalInsights: 3 });
      // EC2 spike and EC2 trend at 1500.00 each, plus 15% of EC2's 1750.00 as the top cost driver
      expect(summary.body.totalPotentialSavingsMicros).toBe(3_262_500_000);
      const other = await request(app).get("/api/summary?subscriptionId=sub-b").expect(200);
      expect(other.body).toMatchObject({ tenantId: "sub-b", generation: 0, recordCount: 0 });
    });

    it("validates the window", async () => {
      const res = await request(app).post("/api/sync").send({ days: 0 }).expect(400);
      expect(res.body).toEqual({ status: "error", message: "days: Number must be greater than or equal to 1" });
    });

    it("answers 409 while a pass is running and refuses to clear", async () => {
      const first = request(app).post("/api/sync?subscriptionId=sub-b").send({ days: 14 }).then((r) => r);
      await vi.waitFor(() => expect(registry.get("sub-b").isSyncing()).toBe(true));

      const second = await request(app).post("/api/sync?subscriptionId=sub-b").send({ days: 14 }).expect(409);
      expect(second.body).toEqual({ status: "skipped", reason: "A sync is already running for this tenant", recordsIngested: 0 });
      await request(app).post("/api/clear?subscriptionId=sub-b").expect(409);

      release();
      expect((await first).status).toBe(200);
    });
  });

  describe("reads", () => {
    beforeEach(async () => {
      await request(app).post("/api/sync").send({ days: 14 }).expect(200);
    });

    it("filters insights", async () => {
      const res = await request(app).get("/api/insights?category=right-sizing").expect(200);
      expect(res.body.insights).toHaveLength(1);
      expect(res.body.insights[0]).toMatchObject({ category: "right-sizing", service: "EC2" });
    });

    it("rejects unknown filter values", async () => {
      const res = await request(app).get("/api/insights?priority=Urgent").expect(400);
      expect(res.body.message).toMatch(/^priority: /);
    });

    it("serves the report as text", async () => {
      const res = await request(app).get("/api/report").expect(200);
      expect(res.headers["content-type"]).toMatch(/^text\/plain/);
      expect(res.text.split("\n")[0]).toBe("# Cost optimization report");
    });

    it("forecasts the requested horizon", async () => {
      const res = await request(app).get("/api/forecast?horizon=2").expect(200);
      expect(res.body.horizon).toBe(2);
      expect(res.body.byService.Storage).toHaveLength(2);
    });

    it("clears the tenant", async () => {
      await request(app).post("/api/clear").expect(200, { status: "success" });
      const summary = await request(app).get("/api/summary").expect(200);
      expect(summary.body).toMatchObject({ recordCount: 0, totalInsights: 0 });
    });
  });

  describe("POST /api/ask", () => {
    it("requires a question", async () => {
      const res = await request(app).post("/api/ask").send({ question: "  " }).expect(400);
      expect(res.body).toEqual({ status: "error", message: "question is required" });
    });

    it("rejects a malformed body", async () => {
      const res = await request(app)
        .post("/api/ask")
        .set("content-type", "application/json")
        .send('{"question":')
        .expect(400);
      expect(res.body).toEqual({ status: "error", message: "Malformed request body" });
    });

    it("answers without a model and keeps the conversation id", async () => {
      const res = await request(app).post("/api/ask").send({ question: "Where does my spend go?", conversationId: "c1" }).expect(200);
      expect(res.body).toMatchObject({ status: "degraded", conversationId: "c1", note: "no language model configured" });
    });

    it("starts a conversation when none is given", async () => {
      const res = await request(app).post("/api/ask").send({ question: "Where does my spend go?" }).expect(200);
      expect(res.body.conversationId).toMatch(/^[0-9a-f-]{36}$/);
    });
  });
});
