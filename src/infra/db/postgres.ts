import { Pool, QueryResultRow } from "pg";

/** Minimal query surface the pgvector index needs; `pg.Pool` and test fakes both fit. */
export interface SqlQueryable {
  query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<{ rows: R[] }>;
}

export function createPostgresPool(databaseUrl: string): Pool {
  return new Pool({
    connectionString: databaseUrl,
    max: 10,
  });
}

export function fromPool(pool: Pool): SqlQueryable {
  return {
    query: async <R extends QueryResultRow>(text: string, values?: unknown[]) => {
      const result = await pool.query<R>(text, values);
      return { rows: result.rows };
    },
  };
}
