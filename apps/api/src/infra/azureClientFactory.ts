import { ClientSecretCredential } from "@azure/identity";
import type { Env } from "../env";
import { TransientBillingError } from "./errors";
import { describeError, logEvent } from "./logger";
import { getArmToken } from "./oboTokenPool";

const ARM_SCOPE = "https://management.azure.com/.default";

export type ArmFetcher = {
  armToken: string;
  postJson: (url: string, body: unknown) => Promise<unknown>;
};

export async function getArmFetcher(env: Env, bearerToken: string): Promise<ArmFetcher> {
  const armToken = await getArmToken(env, bearerToken);
  return buildFetcher(armToken);
}

// ────────────────────────────────────────────
// SP fallback: no user bearer token required
// Uses ClientSecretCredential directly.
// ────────────────────────────────────────────

function ensureSPConfig(env: Env): { tenantId: string; clientId: string; clientSecret: string } {
  const tenantId = env.AZURE_AD_TENANT_ID;
  const clientId = env.AZURE_AD_CLIENT_ID;
  const clientSecret = env.AZURE_AD_CLIENT_SECRET;
  if (!tenantId || !clientId || !clientSecret) {
    throw new Error("SP not configured: AZURE_AD_TENANT_ID, CLIENT_ID, CLIENT_SECRET required");
  }
  return { tenantId, clientId, clientSecret };
}

export function hasSPConfig(env: Env): boolean {
  return Boolean(env.AZURE_AD_TENANT_ID && env.AZURE_AD_CLIENT_ID && env.AZURE_AD_CLIENT_SECRET);
}

export async function getArmFetcherSP(env: Env): Promise<ArmFetcher> {
  const credential = getSPCredential(env);
  const result = await credential.getToken(ARM_SCOPE);
  return buildFetcher(result.token);
}

/**
 * ARM fetcher that tries OBO when a bearer token is available and falls back to SP.
 */
export async function getArmFetcherAuto(env: Env, bearerToken: string | undefined): Promise<ArmFetcher> {
  if (bearerToken) {
    try {
      return await getArmFetcher(env, bearerToken);
    } catch (e: unknown) {
      logEvent({ level: "warn", event: "obo_fallback_sp", detail: describeError(e) });
    }
  }
  return getArmFetcherSP(env);
}

/** Get a ClientSecretCredential instance (for SDK clients like Storage). */
export function getSPCredential(env: Env): ClientSecretCredential {
  const { tenantId, clientId, clientSecret } = ensureSPConfig(env);
  return new ClientSecretCredential(tenantId, clientId, clientSecret);
}

// ── Internal helpers ──

/** 429 and 5xx are worth another attempt; everything else is final. */
export function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

async function request(url: string, init: RequestInit): Promise<unknown> {
  let res: Response;
  try {
    res = await fetch(url, init);
  } catch (e: unknown) {
    throw new TransientBillingError(`ARM request failed: ${describeError(e)}`, undefined, { cause: e });
  }
  if (!res.ok) {
    const message = `ARM ${res.status}: ${await res.text()}`;
    if (isTransientStatus(res.status)) throw new TransientBillingError(message, res.status);
    throw new Error(message);
  }
  return res.json();
}

function buildFetcher(armToken: string): ArmFetcher {
  const headers = { Authorization: `Bearer ${armToken}`, "Content-Type": "application/json" };
  return {
    armToken,
    postJson(url: string, body: unknown): Promise<unknown> {
      return request(url, { method: "POST", headers, body: JSON.stringify(body) });
    },
  };
}
