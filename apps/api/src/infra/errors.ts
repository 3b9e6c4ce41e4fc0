import type { ErrorResponse } from "@costlens/types";

export type CostEngineErrorCode =
  | "VALIDATION"
  | "CONVERSION"
  | "INSUFFICIENT_DATA"
  | "GENERATION"
  | "INDEX_UNAVAILABLE"
  | "TRANSIENT_BILLING"
  | "PERSISTENCE"
  | "QUERY_CANCELLED";

export abstract class CostEngineError extends Error {
  abstract readonly code: CostEngineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A raw billing entry that cannot become a CostRecord. Rejects only that entry. */
export class ValidationError extends CostEngineError {
  readonly code = "VALIDATION";

  constructor(
    message: string,
    readonly context: { index?: number; service?: string; period?: string } = {},
  ) {
    super(message);
  }
}

/** Missing currency rate. Aborts the whole batch. */
export class ConversionError extends CostEngineError {
  readonly code = "CONVERSION";

  constructor(readonly missingCurrencies: string[], readonly reportingCurrency: string) {
    super(`No conversion rate into ${reportingCurrency} for: ${missingCurrencies.join(", ")}`);
  }
}

export class InsufficientDataError extends CostEngineError {
  readonly code = "INSUFFICIENT_DATA";

  constructor(readonly service: string, readonly points: number, readonly required: number) {
    super(`${service}: ${points} historical point(s), ${required} required`);
  }
}

export class GenerationError extends CostEngineError {
  readonly code = "GENERATION";

  constructor(message: string, readonly reason: "timeout" | "quota" | "upstream" = "upstream", options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class IndexUnavailableError extends CostEngineError {
  readonly code = "INDEX_UNAVAILABLE";
}

export class TransientBillingError extends CostEngineError {
  readonly code = "TRANSIENT_BILLING";

  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class PersistenceError extends CostEngineError {
  readonly code = "PERSISTENCE";
}

export class QueryCancelledError extends CostEngineError {
  readonly code = "QUERY_CANCELLED";

  constructor() {
    super("Query cancelled");
  }
}

export function toErrorResponse(e: unknown, fallback = "internal error"): ErrorResponse {
  if (e instanceof Error && e.message) return { status: "error", message: e.message };
  return { status: "error", message: fallback };
}
