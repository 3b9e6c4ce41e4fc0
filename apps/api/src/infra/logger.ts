export type LogLevel = "info" | "warn" | "error";

export type LogEvent = {
  ts?: string;
  level: LogLevel;
  event: string;
  tenantId?: string;
  service?: string;
  period?: string;
  recordId?: string;
  route?: string;
  requestId?: string;
  durationMs?: number;
  detail?: string;
} & Record<string, unknown>;

export function logEvent(event: LogEvent): void {
  if (process.env.LOG_SILENT === "true") return;
  const line = JSON.stringify({ ...event, ts: event.ts || new Date().toISOString() });
  if (event.level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

export function auditApiCall(
  route: string,
  durationMs: number,
  success: boolean,
  extra?: { requestId?: string; tenantId?: string; detail?: string },
): void {
  logEvent({
    level: success ? "info" : "error",
    event: "api_call",
    route,
    durationMs,
    ...extra,
  });
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
