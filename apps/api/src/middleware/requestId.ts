import { randomUUID } from "node:crypto";
import type { Request, Response, NextFunction } from "express";
import { auditApiCall } from "../infra/logger";

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction) {
  const header = req.header("x-request-id");
  const id = header && header.length <= 128 ? header : randomUUID();
  req.requestId = id;
  res.setHeader("x-request-id", id);
  next();
}

/** One `api_call` log line per request, written when the response finishes. */
export function auditMiddleware(req: Request, res: Response, next: NextFunction) {
  const started = Date.now();
  res.on("finish", () => {
    auditApiCall(`${req.method} ${req.path}`, Date.now() - started, res.statusCode < 400, {
      requestId: req.requestId,
      tenantId: req.subscriptionContext?.selected ?? undefined,
      detail: String(res.statusCode),
    });
  });
  next();
}
