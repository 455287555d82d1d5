const WORD_REGEX = /[\p{L}\p{N}]+/gu;

const ZERO_WIDTH_REGEX = /[\u200B-\u200D\u2060\uFEFF]/g;

/**
 * Canonical form used before chunking: unified line endings, no zero-width
 * characters, no trailing whitespace per line, at most one blank line in a row.
 */
export function normalizeText(text: string): string {
  return text
    .replace(/\r\n?/g, "\n")
    .replace(ZERO_WIDTH_REGEX, "")
    .split("\n")
    .map((line) => line.replace(/\s+$/g, ""))
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/**
 * Lowercased word tokens in order of appearance, duplicates kept. Plural
 * forms of longer ASCII words also emit their singular ("cats" -> "cats", "cat").
 */
export function tokenize(text: string): string[] {
  const words = text.toLowerCase().match(WORD_REGEX) ?? [];
  const tokens: string[] = [];

  for (const word of words) {
    tokens.push(word);
    if (word.length >= 4 && word.endsWith("s") && !word.endsWith("ss") && /^[a-z]+$/.test(word)) {
      tokens.push(word.slice(0, -1));
    }
  }

  return tokens;
}
