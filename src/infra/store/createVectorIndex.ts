import { AppConfig } from "../../config/env.js";
import { VectorIndex } from "../../domain/vectorIndex.js";
import { createPostgresPool, fromPool } from "../db/postgres.js";
import { InMemoryVectorIndex } from "./inMemoryVectorIndex.js";
import { PgVectorIndex } from "./pgVectorIndex.js";

export interface VectorIndexBootstrapResult {
  vectorIndex: VectorIndex;
  close: () => Promise<void>;
}

export async function createVectorIndex(
  config: AppConfig,
): Promise<VectorIndexBootstrapResult> {
  if (config.vectorBackend === "memory") {
    return {
      vectorIndex: new InMemoryVectorIndex(config.vectorDimension),
      close: async () => {},
    };
  }

  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is required when VECTOR_BACKEND=pgvector.");
  }

  const pool = createPostgresPool(config.databaseUrl);
  const vectorIndex = new PgVectorIndex(
    fromPool(pool),
    config.vectorCollection,
    config.vectorDimension,
  );

  try {
    await vectorIndex.initialize();
  } catch (error) {
    await pool.end();
    throw error;
  }

  return {
    vectorIndex,
    close: async () => {
      await pool.end();
    },
  };
}
