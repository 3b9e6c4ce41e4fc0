import type { Request, Response, Router } from "express";
import type { EngineRegistry } from "../services/costEngine";
import { registerChatRoutes } from "./chat";
import { registerCostRoutes } from "./cost";

export function registerAllRoutes(router: Router, registry: EngineRegistry) {
  // Health check
  router.get("/health", (_req: Request, res: Response) => {
    res.json({ ok: true, service: "@costlens/api", tenants: registry.tenantIds.length, ts: new Date().toISOString() });
  });

  // Domain routes
  registerCostRoutes(router, registry);
  registerChatRoutes(router, registry);
}
