import { Mock, vi } from "vitest";
import { Logger } from "../src/utils/logger.js";

export interface RecordingLogger extends Logger {
  debug: Mock<Logger["debug"]>;
  info: Mock<Logger["info"]>;
  warn: Mock<Logger["warn"]>;
  error: Mock<Logger["error"]>;
}

export function createRecordingLogger(): RecordingLogger {
  const logger: RecordingLogger = {
    debug: vi.fn<Logger["debug"]>(),
    info: vi.fn<Logger["info"]>(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>(),
    child: () => logger,
  };
  return logger;
}

export function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    ...init,
    headers: { "content-type": "application/json" },
  });
}

export function requestBody(init: RequestInit | undefined): unknown {
  return JSON.parse(String(init?.body));
}
