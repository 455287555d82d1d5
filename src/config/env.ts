import { z } from "zod";
import { LogLevel } from "../utils/logger.js";

const booleanFlag = z
  .enum(["true", "false"])
  .default("true")
  .transform((value) => value === "true");

const envSchema = z.object({
  VECTOR_BACKEND: z.enum(["memory", "pgvector"]).default("memory"),
  DATABASE_URL: z.string().optional(),
  VECTOR_COLLECTION: z.string().default("documents"),
  VECTOR_DIMENSION: z.coerce.number().int().positive().default(1536),
  EMBEDDING_PROVIDER: z.enum(["none", "hash", "openai", "ollama"]).optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  LLM_PROVIDER: z.enum(["none", "ollama", "openai"]).default("none"),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(256),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  OLLAMA_BASE_URL: z.string().default("http://127.0.0.1:11434"),
  OLLAMA_CHAT_MODEL: z.string().default("qwen2.5:7b-instruct"),
  OLLAMA_EMBEDDING_MODEL: z.string().default("nomic-embed-text"),
  CHUNK_MAX_CHARS: z.coerce.number().int().positive().default(700),
  CHUNK_TARGET_CHARS: z.coerce.number().int().positive().default(350),
  CHUNK_MIN_CHARS: z.coerce.number().int().positive().default(120),
  CHUNK_OVERLAP_BLOCKS: z.coerce.number().int().min(0).default(1),
  HISTORY_ENABLED: booleanFlag,
  WEB_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(25000),
  WEB_MIN_TEXT_CHARS: z.coerce.number().int().min(0).default(200),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  MCP_TRANSPORT: z.enum(["stdio", "http"]).default("stdio"),
  MCP_HOST: z.string().default("0.0.0.0"),
  MCP_PORT: z.coerce.number().int().positive().default(3000),
});

export type EmbeddingProvider = "none" | "hash" | "openai" | "ollama";

export type LlmProvider = "none" | "ollama" | "openai";

export interface AppConfig {
  vectorBackend: "memory" | "pgvector";
  databaseUrl: string | null;
  vectorCollection: string;
  vectorDimension: number;
  embeddingProvider: EmbeddingProvider;
  llmProvider: LlmProvider;
  llmMaxTokens: number;
  llmTemperature: number;
  openaiApiKey: string | null;
  openaiBaseUrl: string;
  openaiEmbeddingModel: string;
  openaiChatModel: string;
  ollamaBaseUrl: string;
  ollamaChatModel: string;
  ollamaEmbeddingModel: string;
  chunk: {
    maxChars: number;
    targetChars: number;
    minChars: number;
    overlapBlocks: number;
  };
  historyEnabled: boolean;
  webFetchTimeoutMs: number;
  webMinTextChars: number;
  logLevel: LogLevel;
  transport: "stdio" | "http";
  host: string;
  port: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  const openaiApiKey = parsed.OPENAI_API_KEY?.trim() || null;

  if (parsed.VECTOR_BACKEND === "pgvector" && !parsed.DATABASE_URL) {
    throw new Error("VECTOR_BACKEND=pgvector requires DATABASE_URL.");
  }

  const embeddingProvider = parsed.EMBEDDING_PROVIDER ?? (openaiApiKey ? "openai" : "hash");
  if (embeddingProvider === "openai" && !openaiApiKey) {
    throw new Error("EMBEDDING_PROVIDER=openai requires OPENAI_API_KEY.");
  }
  if (parsed.LLM_PROVIDER === "openai" && !openaiApiKey) {
    throw new Error("LLM_PROVIDER=openai requires OPENAI_API_KEY.");
  }

  if (
    parsed.CHUNK_MIN_CHARS > parsed.CHUNK_TARGET_CHARS ||
    parsed.CHUNK_TARGET_CHARS > parsed.CHUNK_MAX_CHARS
  ) {
    throw new Error(
      "Chunk sizes must satisfy CHUNK_MIN_CHARS <= CHUNK_TARGET_CHARS <= CHUNK_MAX_CHARS.",
    );
  }

  return {
    vectorBackend: parsed.VECTOR_BACKEND,
    databaseUrl: parsed.DATABASE_URL ?? null,
    vectorCollection: parsed.VECTOR_COLLECTION,
    vectorDimension: parsed.VECTOR_DIMENSION,
    embeddingProvider,
    llmProvider: parsed.LLM_PROVIDER,
    llmMaxTokens: parsed.LLM_MAX_TOKENS,
    llmTemperature: parsed.LLM_TEMPERATURE,
    openaiApiKey,
    openaiBaseUrl: parsed.OPENAI_BASE_URL.replace(/\/+$/, ""),
    openaiEmbeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
    openaiChatModel: parsed.OPENAI_CHAT_MODEL,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL.replace(/\/+$/, ""),
    ollamaChatModel: parsed.OLLAMA_CHAT_MODEL,
    ollamaEmbeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
    chunk: {
      maxChars: parsed.CHUNK_MAX_CHARS,
      targetChars: parsed.CHUNK_TARGET_CHARS,
      minChars: parsed.CHUNK_MIN_CHARS,
      overlapBlocks: parsed.CHUNK_OVERLAP_BLOCKS,
    },
    historyEnabled: parsed.HISTORY_ENABLED,
    webFetchTimeoutMs: parsed.WEB_FETCH_TIMEOUT_MS,
    webMinTextChars: parsed.WEB_MIN_TEXT_CHARS,
    logLevel: parsed.LOG_LEVEL,
    transport: parsed.MCP_TRANSPORT,
    host: parsed.MCP_HOST,
    port: parsed.MCP_PORT,
  };
}
