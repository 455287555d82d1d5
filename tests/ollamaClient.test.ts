import { afterEach, beforeEach, describe, expect, it, Mock, vi } from "vitest";
import { DimensionMismatchError } from "../src/domain/errors.js";
import { OllamaChatModel, OllamaEmbedder } from "../src/infra/ai/ollamaClient.js";
import { createRecordingLogger, jsonResponse, requestBody, RecordingLogger } from "./helpers.js";

const GENERATION = { maxTokens: 64, temperature: 0 };

describe("OllamaChatModel", () => {
  let fetchMock: Mock<typeof fetch>;
  let logger: RecordingLogger;
  let model: OllamaChatModel;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal("fetch", fetchMock);
    logger = createRecordingLogger();
    model = new OllamaChatModel({
      baseUrl: "http://ollama.test",
      chatModel: "test-chat",
      embeddingModel: "test-embed",
      dimension: 3,
      logger,
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("returns the chat message content", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ message: { role: "assistant", content: " Paris. " } }));

    await expect(model.generate("Capital of France?", GENERATION)).resolves.toBe("Paris.");

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://ollama.test/api/chat");
    expect(requestBody(init)).toEqual({
      model: "test-chat",
      stream: false,
      messages: [{ role: "user", content: "Capital of France?" }],
      options: { num_predict: 64, temperature: 0 },
    });
  });

  it("falls back to the generate endpoint when chat is empty", async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ message: { role: "assistant", content: "" } }))
      .mockResolvedValueOnce(jsonResponse({ response: "From generate" }));

    await expect(model.generate("prompt", GENERATION)).resolves.toBe("From generate");

    const [url, init] = fetchMock.mock.calls[1];
    expect(url).toBe("http://ollama.test/api/generate");
    expect(requestBody(init)).toEqual({
      model: "test-chat",
      stream: false,
      prompt: "prompt",
      options: { num_predict: 64, temperature: 0 },
    });
  });

  it("logs the response keys and returns an empty string when both are unusable", async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ message: { content: "" } }))
      .mockResolvedValueOnce(jsonResponse({ response: "" }));

    await expect(model.generate("prompt", GENERATION)).resolves.toBe("");

    expect(logger.error).toHaveBeenCalledWith(
      "Ollama returned empty output from both chat and generate",
      {
        model: "test-chat",
        host: "http://ollama.test",
        chatKeys: ["message", "message.content"],
        generateKeys: ["response"],
      },
    );
  });

  it("returns an empty string when the request fails", async () => {
    fetchMock.mockRejectedValueOnce(new Error("connect ECONNREFUSED"));

    await expect(model.generate("prompt", GENERATION)).resolves.toBe("");
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it("treats a non-OK status as a failure", async () => {
    fetchMock.mockResolvedValueOnce(new Response("model not found", { status: 404 }));

    await expect(model.generate("prompt", GENERATION)).resolves.toBe("");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

describe("OllamaEmbedder", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("embeds every text and keeps the input order", async () => {
    const fetchMock = vi.fn<typeof fetch>(async (_input, init) => {
      const body = requestBody(init);
      const prompt = typeof body === "object" && body !== null && "prompt" in body ? String(body.prompt) : "";
      return jsonResponse({ embedding: [prompt.length, 0, 1] });
    });
    vi.stubGlobal("fetch", fetchMock);
    const embedder = new OllamaEmbedder({
      baseUrl: "http://ollama.test",
      chatModel: "test-chat",
      embeddingModel: "test-embed",
      dimension: 3,
      logger: createRecordingLogger(),
    });

    const vectors = await embedder.embedTexts(["a", "bbb", "cc", "dddd", "eeeee"]);

    expect(vectors).toEqual([
      [1, 0, 1],
      [3, 0, 1],
      [2, 0, 1],
      [4, 0, 1],
      [5, 0, 1],
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(5);
    expect(fetchMock.mock.calls[0][0]).toBe("http://ollama.test/api/embeddings");
  });

  it("rejects an empty embedding", async () => {
    vi.stubGlobal("fetch", vi.fn<typeof fetch>(async () => jsonResponse({ embedding: [] })));
    const embedder = new OllamaEmbedder({
      baseUrl: "http://ollama.test",
      chatModel: "test-chat",
      embeddingModel: "test-embed",
      dimension: 3,
      logger: createRecordingLogger(),
    });

    await expect(embedder.embedQuery("hello")).rejects.toThrow("Ollama embeddings returned empty vector.");
  });

  it("rejects vectors whose length differs from the configured dimension", async () => {
    vi.stubGlobal("fetch", vi.fn<typeof fetch>(async () => jsonResponse({ embedding: [0.1, 0.2] })));
    const embedder = new OllamaEmbedder({
      baseUrl: "http://ollama.test",
      chatModel: "test-chat",
      embeddingModel: "test-embed",
      dimension: 3,
      logger: createRecordingLogger(),
    });

    const embedding = embedder.embedQuery("hello");
    await expect(embedding).rejects.toBeInstanceOf(DimensionMismatchError);
    await expect(embedding).rejects.toThrow("Vector dimension mismatch: expected 3, got 2.");
  });
});
