export class ExtractionError extends Error {
  constructor(
    readonly url: string,
    reason: string,
  ) {
    super(`Could not extract readable text from ${url}: ${reason}`);
    this.name = "ExtractionError";
  }
}

export class DimensionMismatchError extends Error {
  constructor(
    readonly expected: number,
    readonly actual: number,
  ) {
    super(`Vector dimension mismatch: expected ${expected}, got ${actual}.`);
    this.name = "DimensionMismatchError";
  }
}

export type RagOperation = "index" | "search" | "ask" | "ingest_url";

export interface RagOperationContext {
  documentId?: string;
  query?: string;
  url?: string;
}

/** Unexpected failure inside an orchestrator operation, tagged with what was being processed. */
export class RagOperationError extends Error {
  constructor(
    readonly operation: RagOperation,
    readonly context: RagOperationContext,
    cause: unknown,
  ) {
    super(
      `${operation} failed (${describeContext(context)}): ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause },
    );
    this.name = "RagOperationError";
  }
}

function describeContext(context: RagOperationContext): string {
  const parts = Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`);
  return parts.length > 0 ? parts.join(", ") : "no context";
}
