import { describe, expect, it } from "vitest";
import { normalizeText, tokenize } from "../src/utils/text.js";

describe("text utils", () => {
  it("normalizes line endings and trailing whitespace", () => {
    expect(normalizeText("  first line  \r\nsecond\rthird\n\n\n\nfourth\u2060 ")).toBe(
      "first line\nsecond\nthird\n\nfourth",
    );
  });

  it("tokenizes unicode words and adds singulars for plural ascii words", () => {
    expect(tokenize("Cats chase mice")).toEqual(["cats", "cat", "chase", "mice"]);
    expect(tokenize("class bus")).toEqual(["class", "bus"]);
    expect(tokenize("Caf\u00E9 \u00FCber 42")).toEqual(["caf\u00E9", "\u00FCber", "42"]);
  });
});
