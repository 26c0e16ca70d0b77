import { afterEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "../lib/config.js";
import { logger } from "../lib/logger.js";

describe("loadConfig", () => {
  it("reads keys and applies defaults", () => {
    expect(loadConfig({ MOUSER_API_KEY: " test-key ", PORT: "8080" })).toEqual({
      mouserApiKey: "test-key",
      geminiApiKey: null,
      geminiModel: "models/gemini-2.5-flash",
      port: 8080
    });
  });

  it("falls back to the default port", () => {
    expect(loadConfig({ PORT: "abc" }).port).toBe(3000);
  });
});

describe("logger", () => {
  const original = process.env.LOG_LEVEL;

  afterEach(() => {
    if (original === undefined) delete process.env.LOG_LEVEL;
    else process.env.LOG_LEVEL = original;
    vi.restoreAllMocks();
  });

  it("writes tagged lines at or above the configured level", () => {
    process.env.LOG_LEVEL = "info";
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);

    logger.info("[test] hello", { lineItemId: 1 });
    logger.debug("[test] hidden");

    expect(info).toHaveBeenCalledTimes(1);
    expect(info.mock.calls[0][0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] INFO \[test\] hello$/);
    expect(info.mock.calls[0][1]).toEqual({ lineItemId: 1 });
    expect(debug).not.toHaveBeenCalled();
  });

  it("adds error details to the context", () => {
    process.env.LOG_LEVEL = "debug";
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    logger.error("[test] failed", new TypeError("bad input"), { lineItemId: 2 });

    expect(error.mock.calls[0][1]).toMatchObject({
      lineItemId: 2,
      errorName: "TypeError",
      errorMessage: "bad input"
    });
  });

  it("stays quiet when silenced", () => {
    process.env.LOG_LEVEL = "silent";
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    logger.error("[test] failed");

    expect(error).not.toHaveBeenCalled();
  });
});
