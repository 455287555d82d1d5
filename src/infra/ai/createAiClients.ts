import { AppConfig } from "../../config/env.js";
import { DimensionMismatchError } from "../../domain/errors.js";
import { Logger } from "../../utils/logger.js";
import { HashEmbedder } from "./hashEmbedder.js";
import { OllamaChatModel, OllamaEmbedder } from "./ollamaClient.js";
import { OpenAiChatModel, OpenAiEmbedder } from "./openAiClient.js";
import { Embedder, LanguageModel } from "./types.js";

export interface AiClients {
  embedder: Embedder | null;
  llm: LanguageModel | null;
}

export function createAiClients(config: AppConfig, logger: Logger): AiClients {
  return {
    embedder: createEmbedder(config, logger.child("embedder")),
    llm: createLanguageModel(config, logger.child("llm")),
  };
}

/**
 * Embeds one short string and compares the real vector length with
 * VECTOR_DIMENSION. An unreachable provider is logged, not fatal: it may come up later.
 */
export async function verifyEmbeddingDimension(
  embedder: Embedder,
  expected: number,
  logger: Logger,
): Promise<void> {
  try {
    await embedder.embedQuery("dimension check");
  } catch (error) {
    if (error instanceof DimensionMismatchError) {
      throw new Error(
        `Embedding model ${embedder.model} returns ${error.actual}-dimensional vectors but VECTOR_DIMENSION=${expected}.`,
        { cause: error },
      );
    }
    logger.warn("Could not verify the embedding dimension at startup", {
      model: embedder.model,
      error,
    });
  }
}

function createEmbedder(config: AppConfig, logger: Logger): Embedder | null {
  switch (config.embeddingProvider) {
    case "none":
      return null;
    case "hash":
      return new HashEmbedder(config.vectorDimension);
    case "openai":
      return new OpenAiEmbedder(openAiOptions(config, logger));
    case "ollama":
      return new OllamaEmbedder(ollamaOptions(config, logger));
  }
}

function createLanguageModel(config: AppConfig, logger: Logger): LanguageModel | null {
  switch (config.llmProvider) {
    case "none":
      return null;
    case "openai":
      return new OpenAiChatModel(openAiOptions(config, logger));
    case "ollama":
      return new OllamaChatModel(ollamaOptions(config, logger));
  }
}

function openAiOptions(config: AppConfig, logger: Logger) {
  if (!config.openaiApiKey) {
    throw new Error("OpenAI provider requires OPENAI_API_KEY.");
  }
  return {
    apiKey: config.openaiApiKey,
    baseUrl: config.openaiBaseUrl,
    embeddingModel: config.openaiEmbeddingModel,
    chatModel: config.openaiChatModel,
    dimension: config.vectorDimension,
    logger,
  };
}

function ollamaOptions(config: AppConfig, logger: Logger) {
  return {
    baseUrl: config.ollamaBaseUrl,
    chatModel: config.ollamaChatModel,
    embeddingModel: config.ollamaEmbeddingModel,
    dimension: config.vectorDimension,
    logger,
  };
}
