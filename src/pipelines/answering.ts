import { RetrievalHit } from "../domain/types.js";

export const LLM_NOT_CONFIGURED_ANSWER =
  "No language model is configured, so no answer can be generated. Use search to inspect the matching passages.";

export const NO_RELEVANT_INFORMATION_ANSWER =
  "No relevant information was found in the indexed documents.";

export const UNKNOWN_ANSWER = "I don't know.";

export function buildContextBlock(hits: RetrievalHit[]): string {
  return hits
    .map((hit, index) => `[${index + 1}] (score=${hit.score}, id=${hit.id}) ${hit.text}`)
    .join("\n\n");
}

export function buildGroundedPrompt(question: string, hits: RetrievalHit[]): string {
  return [
    "You are a careful assistant. Answer the question using only the context snippets below.",
    "Cite the snippets you rely on by their number, for example [1] or [2][3].",
    `If the context does not contain the answer, reply exactly: "${UNKNOWN_ANSWER}"`,
    "",
    "Context:",
    buildContextBlock(hits),
    "",
    `Question: ${question}`,
    "Answer:",
  ].join("\n");
}
