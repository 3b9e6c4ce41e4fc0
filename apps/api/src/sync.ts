import { config as dotenvConfig } from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";

const _here = dirname(fileURLToPath(import.meta.url)); // → apps/api/src
dotenvConfig({ path: resolve(_here, "../../../.env") });
dotenvConfig();

import { loadEnv } from "./env";
import { describeError, logEvent } from "./infra/logger";
import { createEngineRegistry } from "./services/costEngine";

// One sync pass per configured tenant, for an external scheduler (cron,
// a container job). Exits non-zero when any tenant failed.

async function main(): Promise<number> {
  const env = loadEnv(process.env);
  const arg = process.argv[2];
  const days = arg ? Number(arg) : env.SYNC_DEFAULT_DAYS;
  if (!Number.isInteger(days) || days < 1 || days > 365) {
    logEvent({ level: "error", event: "sync_cli_usage", detail: "usage: sync [days 1-365]" });
    return 2;
  }

  const registry = createEngineRegistry(env);
  let failures = 0;
  for (const tenantId of registry.tenantIds) {
    const result = await registry.get(tenantId).runSync(days);
    if (result.status === "error") failures++;
  }
  return failures > 0 ? 1 : 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    logEvent({ level: "error", event: "sync_cli_failed", detail: describeError(e) });
    process.exitCode = 1;
  });
