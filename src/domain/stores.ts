import { AnswerSource, DocumentInput, DocumentMetadata } from "./types.js";

export interface StoredDocument {
  id: string;
  text: string;
  metadata: DocumentMetadata;
  createdAt: string;
  updatedAt: string;
}

export interface DocumentStore {
  upsertDocuments(documents: DocumentInput[]): Promise<number>;
  getTexts(ids: string[]): Promise<Map<string, string>>;
  count(): Promise<number>;
}

export interface InteractionInput {
  question: string;
  answer: string;
  sources: AnswerSource[];
}

export interface InteractionRecord extends InteractionInput {
  id: string;
  createdAt: string;
}

export interface InteractionHistory {
  record(interaction: InteractionInput): Promise<InteractionRecord>;
  recent(limit: number): Promise<InteractionRecord[]>;
}
