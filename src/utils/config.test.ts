import { describe, it, expect, vi, afterEach } from "vitest";
import { DEFAULT_CONFIG, loadConfig } from "./config";
import { logger } from "./logger";

describe("loadConfig", () => {
  afterEach(() => {
    logger.setProduction(false);
    logger.setLevel("debug");
    vi.restoreAllMocks();
  });

  it("should fall back to defaults", () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it("should read TELEGRAPH_* variables", () => {
    const config = loadConfig({
      TELEGRAPH_ACCESS_TOKEN: "test-secret",
      TELEGRAPH_DOMAIN: "https://graph.org/",
      TELEGRAPH_TIMEOUT_MS: "5000",
    });

    expect(config).toEqual({ accessToken: "test-secret", domain: "graph.org", timeoutMs: 5000 });
  });

  it("should keep the default timeout when the value is invalid", () => {
    const warn = vi.spyOn(logger, "warn").mockImplementation(() => undefined);

    expect(loadConfig({ TELEGRAPH_TIMEOUT_MS: "soon" }).timeoutMs).toBe(30000);
    expect(loadConfig({ TELEGRAPH_TIMEOUT_MS: "-1" }).timeoutMs).toBe(30000);
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it("should apply LOG_LEVEL to the logger", () => {
    const setLevel = vi.spyOn(logger, "setLevel");

    loadConfig({ LOG_LEVEL: "WARN" });

    expect(setLevel).toHaveBeenCalledWith("warn");
  });

  it("should warn about an unknown LOG_LEVEL", () => {
    const warn = vi.spyOn(logger, "warn").mockImplementation(() => undefined);

    loadConfig({ LOG_LEVEL: "loud" });

    expect(warn).toHaveBeenCalledWith("Ignoring unknown LOG_LEVEL", { value: "loud" });
  });

  it("should switch the logger to production mode", () => {
    const setProduction = vi.spyOn(logger, "setProduction");

    loadConfig({ NODE_ENV: "production" });

    expect(setProduction).toHaveBeenCalledWith(true);
  });
});
