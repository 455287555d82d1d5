import { Chunk } from "../domain/types.js";
import { normalizeText } from "../utils/text.js";

export interface ChunkerOptions {
  /** Upper bound for a chunk; an oversized sentence or a restored context block may exceed it. */
  maxChars: number;
  /** A chunk is emitted once it reaches this size (and `minChars`). */
  targetChars: number;
  /** Blocks below this size are merged forward. */
  minChars: number;
  /** Trailing blocks of the previous chunk repeated at the start of the next one. */
  overlapBlocks: number;
  /** Line grouping size used when the text has no blank-line paragraphs. */
  pseudoParagraphChars: number;
  boilerplateMinChars: number;
  boilerplateMaxChars: number;
  boilerplatePhrases: string[];
  breadcrumbMaxChars: number;
  headingMaxChars: number;
  headingWords: string[];
  contextWords: string[];
}

export const DEFAULT_CHUNKER_OPTIONS: ChunkerOptions = {
  maxChars: 700,
  targetChars: 350,
  minChars: 120,
  overlapBlocks: 1,
  pseudoParagraphChars: 300,
  boilerplateMinChars: 2,
  boilerplateMaxChars: 80,
  boilerplatePhrases: [
    "cookie",
    "privacy",
    "subscribe",
    "sign in",
    "sign up",
    "log in",
    "login",
    "terms of use",
    "terms of service",
    "all rights reserved",
    "accept all",
  ],
  breadcrumbMaxChars: 150,
  headingMaxChars: 80,
  headingWords: [
    "chapter",
    "section",
    "part",
    "appendix",
    "introduction",
    "overview",
    "summary",
    "conclusion",
    "background",
    "references",
    "faq",
    "step",
  ],
  contextWords: [
    "it",
    "its",
    "this",
    "that",
    "these",
    "those",
    "they",
    "their",
    "he",
    "she",
    "also",
    "therefore",
    "however",
    "thus",
    "moreover",
    "furthermore",
    "additionally",
    "hence",
  ],
};

const SEPARATOR_CHARS = /[-=_*~#|.+\\/<>\u2022\u00B7\u2013\u2014]/;

export function resolveChunkerOptions(overrides: Partial<ChunkerOptions> = {}): ChunkerOptions {
  const options = { ...DEFAULT_CHUNKER_OPTIONS, ...overrides };
  if (options.minChars > options.targetChars || options.targetChars > options.maxChars) {
    throw new Error(
      `Invalid chunk sizes: expected minChars <= targetChars <= maxChars (got ${options.minChars}/${options.targetChars}/${options.maxChars}).`,
    );
  }
  return { ...options, overlapBlocks: Math.max(0, Math.floor(options.overlapBlocks)) };
}

export function chunkDocument(
  documentId: string,
  text: string,
  overrides: Partial<ChunkerOptions> = {},
): Chunk[] {
  return splitIntoChunks(text, overrides).map((chunkText, ordinal) => ({
    chunkId: `${documentId}#chunk${ordinal}`,
    documentId,
    ordinal,
    text: chunkText,
  }));
}

export function splitIntoChunks(
  text: string,
  overrides: Partial<ChunkerOptions> = {},
): string[] {
  const options = resolveChunkerOptions(overrides);
  const normalized = normalizeText(text);
  if (!normalized) {
    return [];
  }

  const blocks = mergeTinyBlocks(extractBlocks(normalized, options), options.minChars);
  const chunks = restoreLeadingContext(accumulateChunks(blocks, options), options);

  return chunks
    .map((parts) => parts.join("\n\n").trim())
    .filter((chunk) => chunk.length > 0);
}

export function extractBlocks(normalized: string, options: ChunkerOptions): string[] {
  const candidates = normalized.includes("\n\n")
    ? normalized.split(/\n{2,}/).map((paragraph) => paragraph.split("\n"))
    : groupLines(normalized.split("\n"), options.pseudoParagraphChars);

  const blocks: string[] = [];
  for (const lines of candidates) {
    blocks.push(...cleanBlock(lines, options));
  }
  return blocks;
}

function groupLines(lines: string[], threshold: number): string[][] {
  const groups: string[][] = [];
  let current: string[] = [];
  let length = 0;

  for (const line of lines) {
    current.push(line);
    length += line.trim().length;
    if (length >= threshold) {
      groups.push(current);
      current = [];
      length = 0;
    }
  }
  if (current.length > 0) {
    groups.push(current);
  }
  return groups;
}

function cleanBlock(rawLines: string[], options: ChunkerOptions): string[] {
  const lines = rawLines
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !isBoilerplateLine(line, options));

  const blocks: string[] = [];
  let run: string[] = [];
  const flushRun = () => {
    if (run.length > 0) {
      blocks.push(run.join(" "));
      run = [];
    }
  };

  for (const line of lines) {
    if (looksLikeHeading(line, options)) {
      flushRun();
      blocks.push(line);
      continue;
    }
    run.push(line);
  }
  flushRun();

  return blocks;
}

export function isBoilerplateLine(line: string, options: ChunkerOptions): boolean {
  if (line.length <= options.boilerplateMinChars) {
    return true;
  }

  const lower = line.toLowerCase();
  if (
    line.length < options.boilerplateMaxChars &&
    options.boilerplatePhrases.some((phrase) => lower.includes(phrase))
  ) {
    return true;
  }

  const visible = [...line.replace(/\s+/g, "")];
  const separators = visible.filter((char) => SEPARATOR_CHARS.test(char)).length;
  if (visible.length > 0 && separators / visible.length >= 0.8) {
    return true;
  }

  return line.length < options.breadcrumbMaxChars && line.split(" / ").length - 1 >= 3;
}

export function looksLikeHeading(line: string, options: ChunkerOptions): boolean {
  if (line.length > options.headingMaxChars || /[.!?,;]$/.test(line)) {
    return false;
  }
  if (/^#{1,6}\s+\S/.test(line) || /^\d+(\.\d+)*[.)]?\s+\p{Lu}/u.test(line)) {
    return true;
  }

  const lower = line.toLowerCase();
  if (options.headingWords.some((word) => new RegExp(`^${escapeRegExp(word)}\\b`).test(lower))) {
    return true;
  }

  const words = line.split(/\s+/).filter((word) => /\p{L}/u.test(word));
  return words.length >= 2 && words.every((word) => /^\p{Lu}/u.test(word));
}

export function mergeTinyBlocks(blocks: string[], minChars: number): string[] {
  const merged: string[] = [];
  let pending: string[] = [];

  for (const block of blocks) {
    pending.push(block);
    const joined = pending.join("\n");
    if (joined.length >= minChars) {
      merged.push(joined);
      pending = [];
    }
  }

  if (pending.length > 0) {
    const rest = pending.join("\n");
    if (merged.length > 0) {
      merged[merged.length - 1] = `${merged[merged.length - 1]}\n${rest}`;
    } else {
      merged.push(rest);
    }
  }

  return merged;
}

export function splitBySentences(text: string, maxChars: number): string[] {
  const sentences = text.split(/(?<=[.!?])\s+/).filter((sentence) => sentence.length > 0);
  const pieces: string[] = [];
  let current = "";

  for (const sentence of sentences) {
    if (current && current.length + 1 + sentence.length > maxChars) {
      pieces.push(current);
      current = sentence;
      continue;
    }
    current = current ? `${current} ${sentence}` : sentence;
  }
  if (current) {
    pieces.push(current);
  }

  return pieces;
}

function accumulateChunks(blocks: string[], options: ChunkerOptions): string[][] {
  const chunks: string[][] = [];
  let current: string[] = [];
  // Leading entries of `current` copied from the previous chunk.
  let seeded = 0;

  const size = (parts: string[]) => parts.join("\n\n").length;
  const flush = () => {
    chunks.push(current);
    current = options.overlapBlocks > 0 ? current.slice(-options.overlapBlocks) : [];
    seeded = current.length;
  };

  for (const block of blocks) {
    const pieces = block.length > options.maxChars ? splitBySentences(block, options.maxChars) : [block];

    for (const piece of pieces) {
      if (current.length > 0 && size([...current, piece]) > options.maxChars) {
        if (current.length > seeded) {
          flush();
        }
        // The overlap seed does not fit beside this piece and is dropped. With overlap
        // on, this is the only case where restoreLeadingContext adds context back, and
        // the restored block can push the chunk past maxChars.
        if (current.length > 0 && size([...current, piece]) > options.maxChars) {
          current = [];
          seeded = 0;
        }
      }

      current.push(piece);
      const length = size(current);
      if (length >= options.targetChars && length >= options.minChars) {
        flush();
      }
    }
  }

  if (current.length > seeded) {
    chunks.push(current);
  }

  return chunks;
}

function restoreLeadingContext(chunks: string[][], options: ChunkerOptions): string[][] {
  const pattern = new RegExp(`^(?:${options.contextWords.map(escapeRegExp).join("|")})\\b`, "i");

  return chunks.map((parts, index) => {
    if (index === 0 || parts.length === 0 || !pattern.test(parts[0])) {
      return parts;
    }
    const previous = chunks[index - 1];
    const context = previous[previous.length - 1];
    if (context === undefined || context === parts[0]) {
      return parts;
    }
    return [context, ...parts];
  });
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
