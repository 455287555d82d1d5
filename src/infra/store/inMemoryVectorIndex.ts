import { assertDimension, VectorIndex } from "../../domain/vectorIndex.js";
import { IndexEntry, RetrievalHit } from "../../domain/types.js";
import { cosineSimilarity } from "../../utils/vector.js";

/**
 * Linear-scan index. Entries live in a Map keyed by point id, so overwriting an
 * entry keeps its original insertion position and ties rank in insertion order.
 */
export class InMemoryVectorIndex implements VectorIndex {
  readonly backend = "memory" as const;

  private entries = new Map<string, IndexEntry>();

  constructor(readonly dimension: number) {}

  async add(entry: IndexEntry): Promise<void> {
    assertDimension(this.dimension, entry.vector);
    this.entries.set(entry.pointId, copyEntry(entry));
  }

  async upsert(entries: IndexEntry[]): Promise<number> {
    for (const entry of entries) {
      assertDimension(this.dimension, entry.vector);
    }
    for (const entry of entries) {
      this.entries.set(entry.pointId, copyEntry(entry));
    }
    return entries.length;
  }

  async replaceDocument(documentId: string, entries: IndexEntry[]): Promise<number> {
    for (const entry of entries) {
      assertDimension(this.dimension, entry.vector);
    }

    const keep = new Set(entries.map((entry) => entry.pointId));
    for (const [pointId, entry] of this.entries) {
      if (entry.documentId === documentId && !keep.has(pointId)) {
        this.entries.delete(pointId);
      }
    }
    for (const entry of entries) {
      this.entries.set(entry.pointId, copyEntry(entry));
    }
    return entries.length;
  }

  async search(queryVector: number[], topK: number): Promise<RetrievalHit[]> {
    if (topK <= 0 || this.entries.size === 0) {
      return [];
    }
    assertDimension(this.dimension, queryVector);

    const scored: RetrievalHit[] = [];
    for (const entry of this.entries.values()) {
      scored.push({
        id: entry.chunkId,
        documentId: entry.documentId,
        score: cosineSimilarity(queryVector, entry.vector),
        text: entry.text,
      });
    }

    // Array.prototype.sort is stable, so equal scores keep insertion order.
    return scored.sort((a, b) => b.score - a.score).slice(0, Math.floor(topK));
  }

  async countDocument(documentId: string): Promise<number> {
    let total = 0;
    for (const entry of this.entries.values()) {
      if (entry.documentId === documentId) {
        total += 1;
      }
    }
    return total;
  }

  async count(): Promise<number> {
    return this.entries.size;
  }

  async clear(): Promise<number> {
    const cleared = this.entries.size;
    this.entries.clear();
    return cleared;
  }
}

function copyEntry(entry: IndexEntry): IndexEntry {
  return { ...entry, vector: [...entry.vector] };
}
