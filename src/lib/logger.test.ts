import { afterEach, describe, it, expect, vi } from "vitest";
import { createLogger, createRateLimiter } from "./logger";

describe("logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes messages and forwards extra arguments", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    createLogger("Decoder").warn("dropped", 3);
    expect(warn).toHaveBeenCalledWith("[Decoder] dropped", 3);
  });

  it("child loggers nest their prefix", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    createLogger("Pipeline").child("run").warn("idle");
    expect(warn).toHaveBeenCalledWith("[Pipeline:run] idle");
  });

  it("timestamps errors", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    createLogger("Pipeline").error("gone");
    expect(error.mock.calls[0][0]).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[Pipeline\] gone$/,
    );
  });

  it("routes log() to the console method for its level", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = createLogger("Pipeline");
    logger.log("info", "stopped", { records: 2 }, { force: true });
    logger.log("warn", "slow");
    expect(info).toHaveBeenCalledWith("[Pipeline] stopped", { records: 2 });
    expect(warn).toHaveBeenCalledWith("[Pipeline] slow", "");
  });
});

describe("createRateLimiter", () => {
  it("allows one event per interval", () => {
    let t = 0;
    const allow = createRateLimiter(2000, () => t);
    expect(allow()).toBe(true);
    t = 1999;
    expect(allow()).toBe(false);
    t = 2000;
    expect(allow()).toBe(true);
    t = 2500;
    expect(allow()).toBe(false);
  });
});
