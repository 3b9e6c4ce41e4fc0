import { describe, expect, it } from "vitest";
import { CacheManager, hashKey } from "./cacheManager";

describe("CacheManager", () => {
  it("expires entries after their ttl", () => {
    let now = 1_000;
    const cache = new CacheManager<string>(10, 100, () => now);
    cache.set("a", "x");
    cache.set("b", "y", 500);

    now = 1_100;
    expect(cache.get("a")).toBe("x");
    now = 1_101;
    expect(cache.get("a")).toBeUndefined();
    expect(cache.get("b")).toBe("y");
    expect(cache.stats()).toEqual({ hits: 2, misses: 1, size: 1 });
  });

  it("evicts the least recently used entry when full", () => {
    const cache = new CacheManager<number>(2);
    cache.set("a", 1);
    cache.set("b", 2);
    cache.get("a");
    cache.set("c", 3);

    expect(cache.get("b")).toBeUndefined();
    expect(cache.get("a")).toBe(1);
    expect(cache.get("c")).toBe(3);
  });

  it("invalidates single keys and clears", () => {
    const cache = new CacheManager<number>();
    cache.set("a", 1);
    cache.set("b", 2);

    expect(cache.invalidate("a")).toBe(true);
    expect(cache.invalidate("a")).toBe(false);
    cache.clear();
    expect(cache.stats().size).toBe(0);
  });
});

describe("hashKey", () => {
  it("is a stable hex prefix of the requested length", () => {
    expect(hashKey("EC2|2024-03-01")).toBe(hashKey("EC2|2024-03-01"));
    expect(hashKey("EC2|2024-03-01")).toMatch(/^[0-9a-f]{16}$/);
    expect(hashKey("EC2|2024-03-01", 24)).toHaveLength(24);
    expect(hashKey("EC2|2024-03-02")).not.toBe(hashKey("EC2|2024-03-01"));
  });
});
