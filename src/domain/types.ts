export type DocumentSource = "manual" | "web";

export interface DocumentMetadata {
  source: DocumentSource;
  title?: string;
  url?: string;
  tags?: string[];
}

export interface DocumentInput {
  id: string;
  text: string;
  metadata?: DocumentMetadata;
}

export interface Chunk {
  chunkId: string;
  documentId: string;
  ordinal: number;
  text: string;
}

export interface IndexEntry {
  pointId: string;
  chunkId: string;
  documentId: string;
  text: string;
  vector: number[];
}

export interface RetrievalHit {
  /** Chunk id of the matched entry. */
  id: string;
  documentId: string;
  score: number;
  text: string;
}

export interface AnswerSource {
  id: string;
  score: number;
  text: string;
}

export interface AskResult {
  question: string;
  answer: string;
  sources: AnswerSource[];
}
