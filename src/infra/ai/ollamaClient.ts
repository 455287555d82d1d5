import { DimensionMismatchError } from "../../domain/errors.js";
import { Logger } from "../../utils/logger.js";
import { describeResponseShape, extractGeneratedText } from "./responseText.js";
import { Embedder, GenerateOptions, LanguageModel } from "./types.js";

interface OllamaClientOptions {
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
  dimension: number;
  logger: Logger;
}

interface OllamaEmbeddingsResponse {
  embedding?: number[];
}

const EMBEDDING_CONCURRENCY = 4;

export class OllamaEmbedder implements Embedder {
  readonly model: string;

  readonly dimension: number;

  constructor(private readonly options: OllamaClientOptions) {
    this.model = options.embeddingModel;
    this.dimension = options.dimension;
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const workers = Math.min(EMBEDDING_CONCURRENCY, texts.length);
    const embeddings: number[][] = new Array(texts.length);
    let cursor = 0;

    const runWorker = async () => {
      while (cursor < texts.length) {
        const index = cursor;
        cursor += 1;
        embeddings[index] = await this.embedQuery(texts[index]);
      }
    };

    await Promise.all(Array.from({ length: workers }, () => runWorker()));
    return embeddings;
  }

  async embedQuery(query: string): Promise<number[]> {
    const response = await fetch(`${this.options.baseUrl}/api/embeddings`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.embeddingModel,
        prompt: query,
      }),
    });

    if (!response.ok) {
      throw new Error(
        `Ollama embeddings failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = (await response.json()) as OllamaEmbeddingsResponse;
    if (!data.embedding || data.embedding.length === 0) {
      throw new Error("Ollama embeddings returned empty vector.");
    }
    if (data.embedding.length !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, data.embedding.length);
    }
    return data.embedding;
  }
}

/**
 * Chat first, then the plain generate endpoint when chat yields no text.
 * Transport failures and unusable payloads both end in "".
 */
export class OllamaChatModel implements LanguageModel {
  readonly model: string;

  constructor(private readonly options: OllamaClientOptions) {
    this.model = options.chatModel;
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const { logger, baseUrl } = this.options;
    const modelOptions = {
      num_predict: options.maxTokens,
      temperature: options.temperature,
    };

    try {
      const chat = await this.post("/api/chat", {
        model: this.model,
        stream: false,
        messages: [{ role: "user", content: prompt }],
        options: modelOptions,
      });
      const text = extractGeneratedText(chat);
      if (text) {
        return text;
      }

      logger.warn("Ollama chat returned empty content; falling back to generate", {
        model: this.model,
        host: baseUrl,
      });
      const generated = await this.post("/api/generate", {
        model: this.model,
        stream: false,
        prompt,
        options: modelOptions,
      });
      const fallback = extractGeneratedText(generated);
      if (fallback) {
        return fallback;
      }

      logger.error("Ollama returned empty output from both chat and generate", {
        model: this.model,
        host: baseUrl,
        chatKeys: describeResponseShape(chat),
        generateKeys: describeResponseShape(generated),
      });
      return "";
    } catch (error) {
      logger.error("Ollama generation failed", { model: this.model, host: baseUrl, error });
      return "";
    }
  }

  private async post(path: string, body: Record<string, unknown>): Promise<unknown> {
    const response = await fetch(`${this.options.baseUrl}${path}`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      throw new Error(`Ollama ${path} failed (${response.status}): ${await response.text()}`);
    }
    return response.json();
  }
}
