import type { Request, Response, Router } from "express";
import { z } from "zod";
import { INSIGHT_CATEGORIES, PRIORITIES, type ErrorResponse } from "@costlens/types";
import { toErrorResponse } from "../infra/errors";
import type { EngineRegistry } from "../services/costEngine";

const SyncBodySchema = z.object({
  days: z.coerce.number().int().min(1).max(365).optional(),
});

const InsightQuerySchema = z.object({
  category: z.enum(INSIGHT_CATEGORIES).optional(),
  priority: z.enum(PRIORITIES).optional(),
  service: z.string().min(1).optional(),
});

const ForecastQuerySchema = z.object({
  horizon: z.coerce.number().int().min(1).max(365).optional(),
});

export function badRequest(res: Response, message: string) {
  const body: ErrorResponse = { status: "error", message };
  res.status(400).json(body);
}

function issuesOf(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
}

export function registerCostRoutes(router: Router, registry: EngineRegistry) {
  const engineFor = (req: Request) => registry.get(req.subscriptionContext?.selected);

  router.post("/api/sync", (req: Request, res: Response) => {
    const parsed = SyncBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) return badRequest(res, issuesOf(parsed.error));

    engineFor(req)
      .sync(parsed.data.days, { bearerToken: req.auth?.bearerToken })
      .then((result) => {
        const code = result.status === "success" ? 200 : result.status === "skipped" ? 409 : 502;
        res.status(code).json(result);
      })
      .catch((e: unknown) => {
        res.status(500).json(toErrorResponse(e, "sync error"));
      });
  });

  router.get("/api/summary", (req: Request, res: Response) => {
    engineFor(req)
      .getSummary()
      .then((data) => res.json(data))
      .catch((e: unknown) => {
        res.status(500).json(toErrorResponse(e, "summary error"));
      });
  });

  router.get("/api/insights", (req: Request, res: Response) => {
    const parsed = InsightQuerySchema.safeParse({
      category: req.query.category,
      priority: req.query.priority,
      service: req.query.service,
    });
    if (!parsed.success) return badRequest(res, issuesOf(parsed.error));

    engineFor(req)
      .listInsights(parsed.data)
      .then((insights) => res.json({ insights }))
      .catch((e: unknown) => {
        res.status(500).json(toErrorResponse(e, "insights error"));
      });
  });

  router.get("/api/report", (req: Request, res: Response) => {
    engineFor(req)
      .generateReport()
      .then((text) => res.type("text/plain").send(text))
      .catch((e: unknown) => {
        res.status(500).json(toErrorResponse(e, "report error"));
      });
  });

  router.get("/api/forecast", (req: Request, res: Response) => {
    const parsed = ForecastQuerySchema.safeParse({ horizon: req.query.horizon });
    if (!parsed.success) return badRequest(res, issuesOf(parsed.error));

    engineFor(req)
      .getForecast(parsed.data.horizon)
      .then((data) => res.json(data))
      .catch((e: unknown) => {
        res.status(500).json(toErrorResponse(e, "forecast error"));
      });
  });

  router.post("/api/clear", (req: Request, res: Response) => {
    engineFor(req)
      .clear()
      .then((cleared) => {
        if (cleared) res.json({ status: "success" });
        else res.status(409).json({ status: "error", message: "A sync is running; try again when it finishes" } satisfies ErrorResponse);
      })
      .catch((e: unknown) => {
        res.status(500).json(toErrorResponse(e, "clear error"));
      });
  });
}
