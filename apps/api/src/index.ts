import { config as dotenvConfig } from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";

// Load .env from monorepo root (cwd is apps/api/ in workspace mode)
const _here = dirname(fileURLToPath(import.meta.url)); // → apps/api/src
dotenvConfig({ path: resolve(_here, "../../../.env") });
dotenvConfig(); // Also try local apps/api/.env if present

import { createApp } from "./app";
import { loadEnv } from "./env";
import { logEvent } from "./infra/logger";
import { createEngineRegistry } from "./services/costEngine";

const env = loadEnv(process.env);
const registry = createEngineRegistry(env);

const app = createApp({ registry, corsOrigin: env.CORS_ORIGIN });

app.listen(env.PORT, () => {
  logEvent({ level: "info", event: "api_listening", detail: `http://localhost:${env.PORT}`, tenants: registry.tenantIds.length });
});
