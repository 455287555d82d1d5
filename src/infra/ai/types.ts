export interface Embedder {
  readonly model: string;
  readonly dimension: number;
  embedTexts(texts: string[]): Promise<number[][]>;
  embedQuery(text: string): Promise<number[]>;
}

export interface GenerateOptions {
  maxTokens: number;
  temperature: number;
}

export interface LanguageModel {
  readonly model: string;
  /** Returns the generated text, or "" when the provider produced nothing usable. */
  generate(prompt: string, options: GenerateOptions): Promise<string>;
}
