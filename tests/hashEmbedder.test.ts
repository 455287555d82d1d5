import { describe, expect, it } from "vitest";
import { HashEmbedder } from "../src/infra/ai/hashEmbedder.js";
import { cosineSimilarity, norm } from "../src/utils/vector.js";

describe("HashEmbedder", () => {
  it("rejects a non-positive dimension", () => {
    expect(() => new HashEmbedder(0)).toThrow(/positive integer/);
  });

  it("produces deterministic unit vectors of the configured dimension", async () => {
    const embedder = new HashEmbedder(32);
    const [first] = await embedder.embedTexts(["Cats chase mice."]);
    const again = await embedder.embedQuery("Cats chase mice.");

    expect(first).toHaveLength(32);
    expect(again).toEqual(first);
    expect(norm(first)).toBeCloseTo(1, 10);
  });

  it("returns a zero vector for text without words", async () => {
    const vector = await new HashEmbedder(8).embedQuery("  ... ");
    expect(vector).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
  });

  it("scores overlapping wording above unrelated wording", async () => {
    const embedder = new HashEmbedder(256);
    const query = await embedder.embedQuery("what do cats chase");
    const related = await embedder.embedQuery("Cats chase mice.");
    const unrelated = await embedder.embedQuery("Quarterly revenue grew steadily.");

    expect(cosineSimilarity(query, related)).toBeGreaterThan(cosineSimilarity(query, unrelated));
  });
});
