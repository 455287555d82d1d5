import { createHash } from "node:crypto";
import { ExtractionError, RagOperationError } from "../domain/errors.js";
import { DocumentStore, InteractionHistory, InteractionRecord } from "../domain/stores.js";
import { AskResult, DocumentInput, RetrievalHit } from "../domain/types.js";
import { toIndexEntry, VectorBackend, VectorIndex } from "../domain/vectorIndex.js";
import { Embedder, GenerateOptions, LanguageModel } from "../infra/ai/types.js";
import { PageLoader } from "../infra/parsers/webPageLoader.js";
import {
  buildGroundedPrompt,
  LLM_NOT_CONFIGURED_ANSWER,
  NO_RELEVANT_INFORMATION_ANSWER,
  UNKNOWN_ANSWER,
} from "../pipelines/answering.js";
import { chunkDocument, ChunkerOptions, resolveChunkerOptions } from "../pipelines/chunking.js";
import { createLogger, Logger } from "../utils/logger.js";
import { roundScore } from "../utils/vector.js";

export const MAX_TOP_K = 10;
export const DEFAULT_SEARCH_K = 5;
export const DEFAULT_ASK_K = 3;
export const DEFAULT_HISTORY_LIMIT = 10;
export const MAX_HISTORY_LIMIT = 100;

const DEFAULT_GENERATION: GenerateOptions = { maxTokens: 256, temperature: 0.1 };

export interface RagServiceDeps {
  vectorIndex: VectorIndex;
  embedder: Embedder | null;
  llm: LanguageModel | null;
  documentStore?: DocumentStore | null;
  history?: InteractionHistory | null;
  pageLoader?: PageLoader | null;
  chunker?: Partial<ChunkerOptions>;
  generation?: GenerateOptions;
  logger?: Logger;
}

export interface IngestUrlResult {
  doc_id: string;
  title: string | null;
  url: string;
  indexed_chunks: number;
}

export interface DocumentText {
  id: string;
  text: string;
}

export interface IndexStats {
  backend: VectorBackend;
  dimension: number;
  entries: number;
  documents: number | null;
  embedding_model: string | null;
  llm_model: string | null;
  history_enabled: boolean;
}

/**
 * Owns the document -> chunk -> index entry lifecycle and the read path
 * (query -> vector -> hits -> grounded answer). Optional collaborators are
 * checked at each call; a missing one degrades the operation instead of failing it.
 */
export class RagService {
  private readonly vectorIndex: VectorIndex;

  private readonly embedder: Embedder | null;

  private readonly llm: LanguageModel | null;

  private readonly documentStore: DocumentStore | null;

  private readonly history: InteractionHistory | null;

  private readonly pageLoader: PageLoader | null;

  private readonly chunkerOptions: ChunkerOptions;

  private readonly generation: GenerateOptions;

  private readonly logger: Logger;

  constructor(deps: RagServiceDeps) {
    this.vectorIndex = deps.vectorIndex;
    this.embedder = deps.embedder;
    this.llm = deps.llm;
    this.documentStore = deps.documentStore ?? null;
    this.history = deps.history ?? null;
    this.pageLoader = deps.pageLoader ?? null;
    this.chunkerOptions = resolveChunkerOptions(deps.chunker);
    this.generation = deps.generation ?? DEFAULT_GENERATION;
    this.logger = deps.logger ?? createLogger("rag");
  }

  /** Returns the number of chunks written across all documents. */
  async index(documents: DocumentInput[]): Promise<number> {
    const embedder = this.embedder;
    if (!embedder) {
      this.logger.warn("No embedding provider configured; skipping indexing", {
        documents: documents.length,
      });
      return 0;
    }

    let written = 0;
    for (const document of documents) {
      try {
        written += await this.indexDocument(document, embedder);
      } catch (error) {
        throw new RagOperationError("index", { documentId: document.id }, error);
      }
    }
    return written;
  }

  async search(query: string, k: number = DEFAULT_SEARCH_K): Promise<RetrievalHit[]> {
    const trimmed = query.trim();
    const topK = clampTopK(k);
    if (!trimmed || topK < 1) {
      return [];
    }

    if (!this.embedder) {
      this.logger.warn("No embedding provider configured; search returns no hits");
      return [];
    }

    try {
      const queryVector = await this.embedder.embedQuery(trimmed);
      const hits = await this.vectorIndex.search(queryVector, topK);
      return hits.map((hit) => ({ ...hit, score: roundScore(hit.score) }));
    } catch (error) {
      throw new RagOperationError("search", { query }, error);
    }
  }

  async ask(question: string, k: number = DEFAULT_ASK_K): Promise<AskResult> {
    const llm = this.llm;
    if (!llm) {
      return { question, answer: LLM_NOT_CONFIGURED_ANSWER, sources: [] };
    }

    const hits = await this.search(question, k);
    if (hits.length === 0) {
      const result: AskResult = { question, answer: NO_RELEVANT_INFORMATION_ANSWER, sources: [] };
      await this.recordInteraction(result);
      return result;
    }

    let generated: string;
    try {
      generated = await llm.generate(buildGroundedPrompt(question, hits), this.generation);
    } catch (error) {
      throw new RagOperationError("ask", { query: question }, error);
    }

    const result: AskResult = {
      question,
      answer: generated.trim() || UNKNOWN_ANSWER,
      sources: hits.map((hit) => ({ id: hit.id, score: hit.score, text: hit.text })),
    };
    await this.recordInteraction(result);
    return result;
  }

  async ingestUrl(url: string): Promise<IngestUrlResult> {
    if (!this.pageLoader) {
      throw new RagOperationError("ingest_url", { url }, new Error("No page loader configured."));
    }

    try {
      const page = await this.pageLoader.fetch(url);
      const documentId = createUrlDocumentId(url);
      const indexed = await this.index([
        {
          id: documentId,
          text: page.text,
          metadata: page.title ? { source: "web", title: page.title, url } : { source: "web", url },
        },
      ]);

      this.logger.info("Ingested web page", { url, documentId, chunks: indexed });
      return { doc_id: documentId, title: page.title, url, indexed_chunks: indexed };
    } catch (error) {
      if (error instanceof ExtractionError || error instanceof RagOperationError) {
        throw error;
      }
      throw new RagOperationError("ingest_url", { url }, error);
    }
  }

  /** Newest first; `null` when no history store is configured. */
  async listHistory(limit: number = DEFAULT_HISTORY_LIMIT): Promise<InteractionRecord[] | null> {
    if (!this.history) {
      return null;
    }
    const bounded = Number.isFinite(limit)
      ? Math.min(MAX_HISTORY_LIMIT, Math.max(1, Math.floor(limit)))
      : DEFAULT_HISTORY_LIMIT;
    return this.history.recent(bounded);
  }

  /**
   * Raw texts of indexed documents in request order; unknown ids are left out.
   * `null` when no document store is configured.
   */
  async getDocuments(ids: string[]): Promise<DocumentText[] | null> {
    if (!this.documentStore) {
      return null;
    }
    const unique = [...new Set(ids)];
    const texts = await this.documentStore.getTexts(unique);
    return unique.flatMap((id) => {
      const text = texts.get(id);
      return text === undefined ? [] : [{ id, text }];
    });
  }

  async describe(): Promise<IndexStats> {
    return {
      backend: this.vectorIndex.backend,
      dimension: this.vectorIndex.dimension,
      entries: await this.vectorIndex.count(),
      documents: this.documentStore ? await this.documentStore.count() : null,
      embedding_model: this.embedder?.model ?? null,
      llm_model: this.llm?.model ?? null,
      history_enabled: this.history !== null,
    };
  }

  private async indexDocument(document: DocumentInput, embedder: Embedder): Promise<number> {
    const chunks = chunkDocument(document.id, document.text, this.chunkerOptions);

    let written = 0;
    if (chunks.length === 0) {
      // Re-ingesting an id as empty text still removes its previous chunks.
      await this.vectorIndex.replaceDocument(document.id, []);
    } else {
      const vectors = await embedder.embedTexts(chunks.map((chunk) => chunk.text));
      if (vectors.length !== chunks.length) {
        throw new Error("Embedding count mismatch.");
      }

      const entries = chunks.map((chunk, position) =>
        toIndexEntry(
          { documentId: document.id, chunkId: chunk.chunkId, text: chunk.text },
          vectors[position],
        ),
      );
      written = await this.vectorIndex.replaceDocument(document.id, entries);
    }

    if (this.documentStore) {
      await this.documentStore.upsertDocuments([document]);
    }
    this.logger.debug("Indexed document", { documentId: document.id, chunks: written });
    return written;
  }

  private async recordInteraction(result: AskResult): Promise<void> {
    if (!this.history) {
      return;
    }
    try {
      await this.history.record({
        question: result.question,
        answer: result.answer,
        sources: result.sources,
      });
    } catch (error) {
      this.logger.error("Failed to record interaction", { error });
    }
  }
}

export function clampTopK(k: number): number {
  if (!Number.isFinite(k)) {
    return 0;
  }
  return Math.min(MAX_TOP_K, Math.floor(k));
}

export function createUrlDocumentId(url: string): string {
  return createHash("sha1").update(url).digest("hex").slice(0, 16);
}
