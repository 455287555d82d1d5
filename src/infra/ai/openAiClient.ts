import { DimensionMismatchError } from "../../domain/errors.js";
import { Logger } from "../../utils/logger.js";
import { describeResponseShape, extractGeneratedText } from "./responseText.js";
import { Embedder, GenerateOptions, LanguageModel } from "./types.js";

interface OpenAiClientOptions {
  apiKey: string;
  baseUrl: string;
  embeddingModel: string;
  chatModel: string;
  dimension: number;
  logger: Logger;
}

interface EmbeddingResponse {
  data: Array<{
    embedding: number[];
    index: number;
  }>;
}

export class OpenAiEmbedder implements Embedder {
  readonly model: string;

  readonly dimension: number;

  constructor(private readonly options: OpenAiClientOptions) {
    this.model = options.embeddingModel;
    this.dimension = options.dimension;
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const response = await fetch(`${this.options.baseUrl}/embeddings`, {
      method: "POST",
      headers: buildHeaders(this.options.apiKey),
      body: JSON.stringify({
        model: this.options.embeddingModel,
        input: texts,
        dimensions: this.options.dimension,
      }),
    });

    if (!response.ok) {
      throw new Error(
        `OpenAI embeddings failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = (await response.json()) as EmbeddingResponse;
    const embeddings = data.data
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
    const wrong = embeddings.find((embedding) => embedding.length !== this.dimension);
    if (wrong) {
      throw new DimensionMismatchError(this.dimension, wrong.length);
    }
    return embeddings;
  }

  async embedQuery(query: string): Promise<number[]> {
    const [embedding] = await this.embedTexts([query]);
    if (!embedding) {
      throw new Error("OpenAI embeddings returned no vector.");
    }
    return embedding;
  }
}

export class OpenAiChatModel implements LanguageModel {
  readonly model: string;

  constructor(private readonly options: OpenAiClientOptions) {
    this.model = options.chatModel;
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const { logger } = this.options;
    try {
      const chat = await this.post("/chat/completions", {
        model: this.model,
        messages: [{ role: "user", content: prompt }],
        max_tokens: options.maxTokens,
        temperature: options.temperature,
      });
      const text = extractGeneratedText(chat);
      if (text) {
        return text;
      }

      logger.warn("OpenAI chat returned empty content; falling back to completions", {
        model: this.model,
      });
      const completion = await this.post("/completions", {
        model: this.model,
        prompt,
        max_tokens: options.maxTokens,
        temperature: options.temperature,
      });
      const fallback = extractGeneratedText(completion);
      if (fallback) {
        return fallback;
      }

      logger.error("OpenAI returned no usable text from chat or completions", {
        model: this.model,
        chatKeys: describeResponseShape(chat),
        completionKeys: describeResponseShape(completion),
      });
      return "";
    } catch (error) {
      logger.error("OpenAI generation failed", { model: this.model, error });
      return "";
    }
  }

  private async post(path: string, body: Record<string, unknown>): Promise<unknown> {
    const response = await fetch(`${this.options.baseUrl}${path}`, {
      method: "POST",
      headers: buildHeaders(this.options.apiKey),
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      throw new Error(`OpenAI ${path} failed (${response.status}): ${await response.text()}`);
    }
    return response.json();
  }
}

function buildHeaders(apiKey: string): Record<string, string> {
  return {
    Authorization: `Bearer ${apiKey}`,
    "Content-Type": "application/json",
  };
}
