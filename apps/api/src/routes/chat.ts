import { randomUUID } from "node:crypto";
import type { Request, Response, Router } from "express";
import { z } from "zod";
import { QueryCancelledError, toErrorResponse } from "../infra/errors";
import { logEvent } from "../infra/logger";
import type { EngineRegistry } from "../services/costEngine";
import { badRequest } from "./cost";

const AskBodySchema = z.object({
  question: z.string().trim().min(1).max(2000),
  conversationId: z.string().trim().min(1).max(128).optional(),
});

export function registerChatRoutes(router: Router, registry: EngineRegistry) {
  router.post("/api/ask", (req: Request, res: Response) => {
    const parsed = AskBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) return badRequest(res, "question is required");

    // A client that goes away cancels the model call.
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) controller.abort();
    });

    const tenantId = req.subscriptionContext?.selected;
    const conversationId = parsed.data.conversationId ?? randomUUID();
    registry
      .get(tenantId)
      .ask(parsed.data.question, conversationId, controller.signal)
      .then((answer) => res.json(answer))
      .catch((e: unknown) => {
        if (e instanceof QueryCancelledError) {
          logEvent({ level: "info", event: "query_cancelled", tenantId, requestId: req.requestId });
          return;
        }
        res.status(500).json(toErrorResponse(e, "ask error"));
      });
  });
}
