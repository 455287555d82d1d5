import { v5 as uuidv5 } from "uuid";
import { DimensionMismatchError } from "./errors.js";
import { IndexEntry, RetrievalHit } from "./types.js";

// Fixed namespace so the same (document, chunk) pair always maps to the same point.
const POINT_ID_NAMESPACE = "5b8f1c3e-9a4d-4f0b-8e6a-2d7c1f9e0a34";

export type VectorBackend = "memory" | "pgvector";

export type EmbedFn = (text: string) => Promise<number[]>;

export interface IndexItem {
  documentId: string;
  chunkId: string;
  text: string;
}

export interface VectorIndex {
  readonly backend: VectorBackend;
  readonly dimension: number;
  add(entry: IndexEntry): Promise<void>;
  upsert(entries: IndexEntry[]): Promise<number>;
  /** Upserts `entries` and removes every other point stored for `documentId`. */
  replaceDocument(documentId: string, entries: IndexEntry[]): Promise<number>;
  search(queryVector: number[], topK: number): Promise<RetrievalHit[]>;
  countDocument(documentId: string): Promise<number>;
  count(): Promise<number>;
  clear(): Promise<number>;
}

export function createPointId(documentId: string, chunkId: string): string {
  return uuidv5(`${documentId}:${chunkId}`, POINT_ID_NAMESPACE);
}

export function toIndexEntry(item: IndexItem, vector: number[]): IndexEntry {
  return {
    pointId: createPointId(item.documentId, item.chunkId),
    chunkId: item.chunkId,
    documentId: item.documentId,
    text: item.text,
    vector,
  };
}

export async function indexMany(
  index: VectorIndex,
  items: IndexItem[],
  embed: EmbedFn,
): Promise<number> {
  if (items.length === 0) {
    return 0;
  }

  const entries: IndexEntry[] = [];
  for (const item of items) {
    entries.push(toIndexEntry(item, await embed(item.text)));
  }
  return index.upsert(entries);
}

export function assertDimension(expected: number, vector: number[]): void {
  if (vector.length !== expected) {
    throw new DimensionMismatchError(expected, vector.length);
  }
}
