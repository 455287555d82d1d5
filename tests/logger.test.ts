import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger } from "../src/utils/logger.js";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes scoped lines with json fields to stderr", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    createLogger("rag").child("index").warn("slow batch", { documents: 3 });

    expect(spy).toHaveBeenCalledTimes(1);
    const [line, fields] = spy.mock.calls[0];
    expect(line).toMatch(/^\d{4}-\d{2}-\d{2}T\S+ WARN  \[rag:index\] slow batch$/);
    expect(fields).toBe('{"documents":3}');
  });

  it("drops entries below the configured level", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = createLogger("rag", "warn");
    logger.debug("hidden");
    logger.info("hidden");
    logger.error("shown");

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0]).toHaveLength(1);
  });

  it("serializes errors by name and message", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    createLogger("rag").error("failed", { error: new Error("boom") });

    expect(spy.mock.calls[0][1]).toBe('{"error":{"name":"Error","message":"boom"}}');
  });
});
