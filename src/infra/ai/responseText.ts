type Extractor = (payload: Record<string, unknown>) => unknown;

// Checked in order; the first non-blank string wins.
const EXTRACTORS: Array<[name: string, extract: Extractor]> = [
  ["message.content", (payload) => field(payload.message, "content")],
  ["response", (payload) => payload.response],
  ["choices[0].message.content", (payload) => field(field(firstOf(payload.choices), "message"), "content")],
  ["choices[0].text", (payload) => field(firstOf(payload.choices), "text")],
  ["output_text", (payload) => payload.output_text],
  ["content", (payload) => payload.content],
];

/**
 * Pulls generated text out of the response shapes returned by chat and
 * completion endpoints. Returns "" when no known shape carries text.
 */
export function extractGeneratedText(payload: unknown): string {
  if (typeof payload === "string") {
    return payload.trim();
  }
  if (!isRecord(payload)) {
    return "";
  }

  for (const [, extract] of EXTRACTORS) {
    const value = extract(payload);
    if (typeof value === "string" && value.trim()) {
      return value.trim();
    }
  }
  return "";
}

/** Top-level keys (and nested keys of known containers) for logging without the content. */
export function describeResponseShape(payload: unknown): string[] {
  if (!isRecord(payload)) {
    return [payload === null ? "null" : typeof payload];
  }

  const keys: string[] = [];
  for (const [key, value] of Object.entries(payload)) {
    keys.push(key);
    if (key === "message" && isRecord(value)) {
      keys.push(...Object.keys(value).map((nested) => `message.${nested}`));
    }
  }
  return keys;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function field(value: unknown, key: string): unknown {
  return isRecord(value) ? value[key] : undefined;
}

function firstOf(value: unknown): unknown {
  return Array.isArray(value) ? value[0] : undefined;
}
