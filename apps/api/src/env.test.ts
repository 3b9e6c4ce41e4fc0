import { describe, expect, it } from "vitest";
import { loadEnv, parseSubscriptionIds } from "./env";

describe("loadEnv", () => {
  it("applies defaults", () => {
    const env = loadEnv({});
    expect(env.PORT).toBe(4000);
    expect(env.REPORTING_CURRENCY).toBe("USD");
    expect(env.ANOMALY_THRESHOLD).toBe(2.5);
    expect(env.QUERY_CONTEXT_CHARS).toBe(6000);
  });

  it("coerces numbers and rejects invalid values", () => {
    expect(loadEnv({ QUERY_TOP_K: "3" }).QUERY_TOP_K).toBe(3);
    expect(() => loadEnv({ BILLING_GRANULARITY: "hourly" })).toThrow(/^Invalid environment variables:\nBILLING_GRANULARITY: /);
  });
});

describe("CURRENCY_RATES", () => {
  it("parses rates and upper-cases currency codes", () => {
    expect(loadEnv({ CURRENCY_RATES: '{"eur": 1.1, "GBP": 1.27}' }).CURRENCY_RATES).toEqual({ EUR: 1.1, GBP: 1.27 });
    expect(loadEnv({}).CURRENCY_RATES).toEqual({});
  });

  it("fails at load time for non-positive rates and bad JSON", () => {
    expect(() => loadEnv({ CURRENCY_RATES: '{"EUR": 0}' })).toThrow(
      "Invalid environment variables:\nCURRENCY_RATES.EUR: Number must be greater than 0",
    );
    expect(() => loadEnv({ CURRENCY_RATES: "eur=1.1" })).toThrow(
      "Invalid environment variables:\nCURRENCY_RATES: expected a JSON object",
    );
  });
});

describe("parseSubscriptionIds", () => {
  it("splits and trims the list", () => {
    expect(parseSubscriptionIds(" sub-a, ,sub-b ")).toEqual(["sub-a", "sub-b"]);
    expect(parseSubscriptionIds(undefined)).toEqual([]);
  });
});
