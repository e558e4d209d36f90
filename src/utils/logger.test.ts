import { describe, it, expect, vi, afterEach } from "vitest";
import { isLogLevel, logger } from "./logger";

describe("logger", () => {
  afterEach(() => {
    logger.setProduction(false);
    logger.setLevel("debug");
    vi.restoreAllMocks();
  });

  it("should prefix messages and append JSON metadata", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);

    logger.info("Created page", { path: "T-01-01" });

    expect(info).toHaveBeenCalledWith("[INFO] [telegraph] Created page", '{"path":"T-01-01"}');
  });

  it("should skip debug output in production", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);

    logger.setProduction(true);
    logger.debug("hidden");

    expect(debug).not.toHaveBeenCalled();
  });

  it("should drop messages below the configured level", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.setLevel("warn");
    logger.info("quiet");
    logger.warn("loud");

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[WARN] [telegraph] loud", "");
  });

  it("should recognise level names", () => {
    expect(isLogLevel("silent")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});
