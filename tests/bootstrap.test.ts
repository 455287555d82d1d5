import { afterEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "../src/config/env.js";
import { createAiClients, verifyEmbeddingDimension } from "../src/infra/ai/createAiClients.js";
import { HashEmbedder } from "../src/infra/ai/hashEmbedder.js";
import { OllamaChatModel, OllamaEmbedder } from "../src/infra/ai/ollamaClient.js";
import { OpenAiChatModel, OpenAiEmbedder } from "../src/infra/ai/openAiClient.js";
import { createVectorIndex } from "../src/infra/store/createVectorIndex.js";
import { InMemoryVectorIndex } from "../src/infra/store/inMemoryVectorIndex.js";
import { createRecordingLogger, jsonResponse } from "./helpers.js";

describe("createAiClients", () => {
  it("uses the hashing embedder and no language model by default", () => {
    const { embedder, llm } = createAiClients(loadConfig({ VECTOR_DIMENSION: "128" }), createRecordingLogger());

    expect(embedder).toBeInstanceOf(HashEmbedder);
    expect(embedder?.dimension).toBe(128);
    expect(llm).toBeNull();
  });

  it("builds the configured providers", () => {
    const openai = createAiClients(
      loadConfig({ OPENAI_API_KEY: "test-secret", LLM_PROVIDER: "openai" }),
      createRecordingLogger(),
    );
    expect(openai.embedder).toBeInstanceOf(OpenAiEmbedder);
    expect(openai.llm).toBeInstanceOf(OpenAiChatModel);
    expect(openai.llm?.model).toBe("gpt-4o-mini");

    const ollama = createAiClients(
      loadConfig({ EMBEDDING_PROVIDER: "ollama", LLM_PROVIDER: "ollama" }),
      createRecordingLogger(),
    );
    expect(ollama.embedder).toBeInstanceOf(OllamaEmbedder);
    expect(ollama.llm).toBeInstanceOf(OllamaChatModel);
    expect(ollama.llm?.model).toBe("qwen2.5:7b-instruct");
  });

  it("returns no embedder for the none provider", () => {
    const { embedder } = createAiClients(loadConfig({ EMBEDDING_PROVIDER: "none" }), createRecordingLogger());
    expect(embedder).toBeNull();
  });
});

describe("verifyEmbeddingDimension", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("fails when the provider returns vectors of another length", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn<typeof fetch>(async () => jsonResponse({ embedding: new Array<number>(768).fill(0.5) })),
    );
    const config = loadConfig({ EMBEDDING_PROVIDER: "ollama" });
    const { embedder } = createAiClients(config, createRecordingLogger());
    if (!embedder) {
      throw new Error("expected an embedder");
    }

    await expect(verifyEmbeddingDimension(embedder, config.vectorDimension, createRecordingLogger())).rejects.toThrow(
      "Embedding model nomic-embed-text returns 768-dimensional vectors but VECTOR_DIMENSION=1536.",
    );
  });

  it("passes for a matching embedder", async () => {
    const logger = createRecordingLogger();
    await expect(verifyEmbeddingDimension(new HashEmbedder(16), 16, logger)).resolves.toBeUndefined();
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("logs and continues when the provider is unreachable", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn<typeof fetch>(async () => {
        throw new TypeError("fetch failed");
      }),
    );
    const config = loadConfig({ EMBEDDING_PROVIDER: "ollama" });
    const logger = createRecordingLogger();
    const { embedder } = createAiClients(config, logger);
    if (!embedder) {
      throw new Error("expected an embedder");
    }

    await expect(verifyEmbeddingDimension(embedder, config.vectorDimension, logger)).resolves.toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith("Could not verify the embedding dimension at startup", {
      model: "nomic-embed-text",
      error: expect.any(TypeError),
    });
  });
});

describe("createVectorIndex", () => {
  it("creates the in-memory backend with the configured dimension", async () => {
    const { vectorIndex, close } = await createVectorIndex(loadConfig({ VECTOR_DIMENSION: "8" }));

    expect(vectorIndex).toBeInstanceOf(InMemoryVectorIndex);
    expect(vectorIndex.dimension).toBe(8);
    await expect(close()).resolves.toBeUndefined();
  });
});
