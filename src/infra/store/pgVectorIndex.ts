import { assertDimension, VectorIndex } from "../../domain/vectorIndex.js";
import { IndexEntry, RetrievalHit } from "../../domain/types.js";
import { SqlQueryable } from "../db/postgres.js";

interface PgHitRow {
  chunk_id: string;
  document_id: string;
  content: string;
  score: number | string | null;
}

interface PgCountRow {
  count: string;
}

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]{0,62}$/;

/**
 * One pgvector table per collection. The table and its indexes are created on
 * first use; every point is keyed by its deterministic UUID.
 */
export class PgVectorIndex implements VectorIndex {
  readonly backend = "pgvector" as const;

  private readonly table: string;

  private initPromise: Promise<void> | null = null;

  constructor(
    private readonly db: SqlQueryable,
    readonly collection: string,
    readonly dimension: number,
  ) {
    if (!IDENTIFIER_PATTERN.test(collection)) {
      throw new Error(
        `Invalid collection name "${collection}": use letters, digits and underscores (max 63 chars).`,
      );
    }
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new Error(`Vector dimension must be a positive integer (got ${dimension}).`);
    }
    this.table = `"${collection}"`;
  }

  initialize(): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = this.createCollection().catch((error: unknown) => {
        this.initPromise = null;
        throw error;
      });
    }
    return this.initPromise;
  }

  async add(entry: IndexEntry): Promise<void> {
    await this.upsert([entry]);
  }

  async upsert(entries: IndexEntry[]): Promise<number> {
    if (entries.length === 0) {
      return 0;
    }
    const batch = this.prepare(entries);
    await this.initialize();

    await this.db.query(
      `
        INSERT INTO ${this.table} (point_id, document_id, chunk_id, content, embedding)
        SELECT i.point_id, i.document_id, i.chunk_id, i.content, i.embedding::vector
        FROM unnest($1::uuid[], $2::text[], $3::text[], $4::text[], $5::text[])
          AS i(point_id, document_id, chunk_id, content, embedding)
        ON CONFLICT (point_id) DO UPDATE SET
          document_id = EXCLUDED.document_id,
          chunk_id = EXCLUDED.chunk_id,
          content = EXCLUDED.content,
          embedding = EXCLUDED.embedding
      `,
      [
        batch.map((entry) => entry.pointId),
        batch.map((entry) => entry.documentId),
        batch.map((entry) => entry.chunkId),
        batch.map((entry) => entry.text),
        batch.map((entry) => toVectorLiteral(entry.vector)),
      ],
    );
    return entries.length;
  }

  async replaceDocument(documentId: string, entries: IndexEntry[]): Promise<number> {
    const batch = this.prepare(entries);
    await this.initialize();

    await this.db.query(
      `
        WITH stale AS (
          DELETE FROM ${this.table}
          WHERE document_id = $1 AND point_id <> ALL($2::uuid[])
        )
        INSERT INTO ${this.table} (point_id, document_id, chunk_id, content, embedding)
        SELECT i.point_id, $1, i.chunk_id, i.content, i.embedding::vector
        FROM unnest($2::uuid[], $3::text[], $4::text[], $5::text[])
          AS i(point_id, chunk_id, content, embedding)
        ON CONFLICT (point_id) DO UPDATE SET
          document_id = EXCLUDED.document_id,
          chunk_id = EXCLUDED.chunk_id,
          content = EXCLUDED.content,
          embedding = EXCLUDED.embedding
      `,
      [
        documentId,
        batch.map((entry) => entry.pointId),
        batch.map((entry) => entry.chunkId),
        batch.map((entry) => entry.text),
        batch.map((entry) => toVectorLiteral(entry.vector)),
      ],
    );
    return entries.length;
  }

  async search(queryVector: number[], topK: number): Promise<RetrievalHit[]> {
    if (topK <= 0) {
      return [];
    }
    assertDimension(this.dimension, queryVector);
    await this.initialize();

    const result = await this.db.query<PgHitRow>(
      `
        SELECT
          chunk_id,
          document_id,
          content,
          (1 - (embedding <=> $1::vector)) AS score
        FROM ${this.table}
        ORDER BY embedding <=> $1::vector ASC, seq ASC
        LIMIT $2
      `,
      [toVectorLiteral(queryVector), Math.floor(topK)],
    );

    return result.rows.map((row) => ({
      id: row.chunk_id,
      documentId: row.document_id,
      score: toFiniteScore(row.score),
      text: row.content,
    }));
  }

  async countDocument(documentId: string): Promise<number> {
    await this.initialize();
    const result = await this.db.query<PgCountRow>(
      `SELECT COUNT(*)::text AS count FROM ${this.table} WHERE document_id = $1`,
      [documentId],
    );
    return Number(result.rows[0]?.count ?? 0);
  }

  async count(): Promise<number> {
    await this.initialize();
    const result = await this.db.query<PgCountRow>(
      `SELECT COUNT(*)::text AS count FROM ${this.table}`,
    );
    return Number(result.rows[0]?.count ?? 0);
  }

  async clear(): Promise<number> {
    await this.initialize();
    const result = await this.db.query<PgCountRow>(
      `WITH deleted AS (DELETE FROM ${this.table} RETURNING 1) SELECT COUNT(*)::text AS count FROM deleted`,
    );
    return Number(result.rows[0]?.count ?? 0);
  }

  private async createCollection(): Promise<void> {
    await this.db.query(`CREATE EXTENSION IF NOT EXISTS vector`);
    await this.db.query(`
      CREATE TABLE IF NOT EXISTS ${this.table} (
        point_id UUID PRIMARY KEY,
        seq BIGSERIAL,
        document_id TEXT NOT NULL,
        chunk_id TEXT NOT NULL,
        content TEXT NOT NULL,
        embedding VECTOR(${this.dimension}) NOT NULL
      )
    `);
    await this.db.query(
      `CREATE INDEX IF NOT EXISTS "${this.collection}_document_id_idx" ON ${this.table} (document_id)`,
    );
    await this.db.query(`
      CREATE INDEX IF NOT EXISTS "${this.collection}_embedding_idx"
      ON ${this.table} USING hnsw (embedding vector_cosine_ops)
    `);
  }

  // ON CONFLICT cannot touch the same row twice in one statement, so the last entry per point wins.
  private prepare(entries: IndexEntry[]): IndexEntry[] {
    const byPoint = new Map<string, IndexEntry>();
    for (const entry of entries) {
      assertDimension(this.dimension, entry.vector);
      byPoint.set(entry.pointId, entry);
    }
    return [...byPoint.values()];
  }
}

function toVectorLiteral(values: number[]): string {
  return `[${values.join(",")}]`;
}

function toFiniteScore(value: number | string | null): number {
  const score = Number(value);
  return Number.isFinite(score) ? score : 0;
}
