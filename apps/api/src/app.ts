import cors from "cors";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { ErrorResponse } from "@costlens/types";
import { bearerTokenMiddleware } from "./auth";
import { auditMiddleware, requestIdMiddleware } from "./middleware/requestId";
import { subscriptionContextMiddleware } from "./middleware/subscriptionContext";
import { registerAllRoutes } from "./routes/index";
import type { EngineRegistry } from "./services/costEngine";

export type AppOptions = {
  registry: EngineRegistry;
  corsOrigin: string;
};

export function createApp({ registry, corsOrigin }: AppOptions): Express {
  const app = express();
  app.use(express.json({ limit: "1mb" }));
  app.use(
    cors({
      origin: corsOrigin,
      credentials: true
    })
  );
  app.use(requestIdMiddleware);
  app.use(bearerTokenMiddleware);
  app.use(subscriptionContextMiddleware(registry.tenantIds, registry.defaultTenant));
  app.use(auditMiddleware);
  app.use((req: Request, res: Response, next: NextFunction) => {
    const rejected = req.subscriptionContext?.rejected;
    if (!rejected) return next();
    const body: ErrorResponse = { status: "error", message: `Subscription ${rejected} is not configured` };
    res.status(403).json(body);
  });

  registerAllRoutes(app, registry);

  // Malformed JSON bodies and anything else thrown synchronously.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = typeof err === "object" && err !== null && "status" in err && err.status === 400 ? 400 : 500;
    const body: ErrorResponse = { status: "error", message: status === 400 ? "Malformed request body" : "internal error" };
    res.status(status).json(body);
  });

  return app;
}
