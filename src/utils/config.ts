import type { Env } from "@/types/env";
import { isLogLevel, logger } from "./logger";

export interface TelegraphConfig {
  domain: string;
  timeoutMs: number;
  accessToken?: string;
}

export const DEFAULT_CONFIG: TelegraphConfig = {
  domain: "telegra.ph",
  timeoutMs: 30000,
};

/**
 * Load configuration from environment with fallback to defaults.
 * Also applies NODE_ENV and LOG_LEVEL to the shared logger.
 */
export function loadConfig(env: Env = process.env): TelegraphConfig {
  const config: TelegraphConfig = { ...DEFAULT_CONFIG };

  if (env.TELEGRAPH_ACCESS_TOKEN) {
    config.accessToken = env.TELEGRAPH_ACCESS_TOKEN;
  }

  if (env.TELEGRAPH_DOMAIN) {
    // Accept "https://telegra.ph/" as well as the bare host
    config.domain = env.TELEGRAPH_DOMAIN.replace(/^https?:\/\//, "").replace(/\/+$/, "");
  }

  if (env.TELEGRAPH_TIMEOUT_MS) {
    const timeoutMs = parseInt(env.TELEGRAPH_TIMEOUT_MS, 10);
    if (Number.isNaN(timeoutMs) || timeoutMs <= 0) {
      logger.warn("Ignoring invalid TELEGRAPH_TIMEOUT_MS, keeping default", {
        value: env.TELEGRAPH_TIMEOUT_MS,
        default: DEFAULT_CONFIG.timeoutMs,
      });
    } else {
      config.timeoutMs = timeoutMs;
    }
  }

  logger.setProduction(env.NODE_ENV === "production");

  if (env.LOG_LEVEL) {
    const level = env.LOG_LEVEL.toLowerCase();
    if (isLogLevel(level)) {
      logger.setLevel(level);
    } else {
      logger.warn("Ignoring unknown LOG_LEVEL", { value: env.LOG_LEVEL });
    }
  }

  return config;
}
