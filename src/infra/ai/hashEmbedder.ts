import { tokenize } from "../../utils/text.js";
import { normalizeVector } from "../../utils/vector.js";
import { Embedder } from "./types.js";

/**
 * Feature-hashing embedder: every token adds 1 to bucket fnv1a(token) % dimension,
 * and the result is scaled to unit length. Needs no model or network, so the
 * pipeline stays usable offline; similar wording gives similar vectors.
 */
export class HashEmbedder implements Embedder {
  readonly model = "feature-hash";

  constructor(readonly dimension: number) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new Error(`HashEmbedder dimension must be a positive integer (got ${dimension}).`);
    }
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embedSync(text));
  }

  async embedQuery(text: string): Promise<number[]> {
    return this.embedSync(text);
  }

  private embedSync(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    for (const token of tokenize(text)) {
      vector[fnv1a(token) % this.dimension] += 1;
    }
    return normalizeVector(vector);
  }
}

export function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i += 1) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
