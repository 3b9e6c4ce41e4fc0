import { TransientBillingError } from "./errors";
import { describeError, logEvent } from "./logger";

export type RetryOptions = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  label: string;
  isRetryable?: (e: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Run `fn` up to `maxAttempts` times with exponential backoff
 * (base, 2×base, 4×base … capped at `maxDelayMs`). Non-retryable
 * errors and the last failure propagate unchanged.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const isRetryable = opts.isRetryable ?? ((e: unknown) => e instanceof TransientBillingError);
  const sleep = opts.sleep ?? defaultSleep;
  const maxDelay = opts.maxDelayMs ?? 30_000;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (e: unknown) {
      if (attempt >= opts.maxAttempts || !isRetryable(e)) throw e;
      const delay = Math.min(maxDelay, opts.baseDelayMs * 2 ** (attempt - 1));
      logEvent({
        level: "warn",
        event: "retry_scheduled",
        detail: `${opts.label} attempt ${attempt}/${opts.maxAttempts} failed: ${describeError(e)}`,
        durationMs: delay,
      });
      await sleep(delay);
    }
  }
}
