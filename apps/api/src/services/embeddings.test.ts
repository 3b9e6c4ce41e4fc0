import { describe, expect, it } from "vitest";
import { HashingEmbedder, tokenize } from "./embeddings";

describe("tokenize", () => {
  it("drops stopwords and folds simple plurals", () => {
    expect(tokenize("What are the top Services by cost?")).toEqual(["top", "service", "cost"]);
    expect(tokenize("class access")).toEqual(["class", "access"]);
  });
});

describe("HashingEmbedder", () => {
  it("produces unit vectors of the configured size", async () => {
    const embedder = new HashingEmbedder(32);
    const [v] = await embedder.embed(["storage spend in eastus"]);

    expect(embedder.name).toBe("hashing-32");
    expect(v).toHaveLength(32);
    expect(Math.sqrt(v.reduce((s, x) => s + x * x, 0))).toBeCloseTo(1, 10);
  });

  it("is deterministic and returns zeros for empty text", async () => {
    const embedder = new HashingEmbedder(16);
    const [a, b, empty] = await embedder.embed(["EC2 cost", "EC2 cost", "the"]);
    expect(a).toEqual(b);
    expect(empty).toEqual(new Array(16).fill(0));
  });
});
