/**
 * Console logger shared by the SDK
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  setProduction(isProduction: boolean): void;
  setLevel(level: LogLevel): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

class SimpleLogger implements Logger {
  private isProduction = false;
  private level: LogLevel = "debug";

  setProduction(isProduction: boolean): void {
    this.isProduction = isProduction;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private enabled(level: Exclude<LogLevel, "silent">): boolean {
    if (level === "debug" && this.isProduction) {
      return false;
    }
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private format(level: string, message: string): string {
    return `[${level}] [telegraph] ${message}`;
  }

  debug(message: string, meta?: LogMeta): void {
    if (this.enabled("debug")) {
      console.debug(this.format("DEBUG", message), meta ? JSON.stringify(meta) : "");
    }
  }

  info(message: string, meta?: LogMeta): void {
    if (this.enabled("info")) {
      console.info(this.format("INFO", message), meta ? JSON.stringify(meta) : "");
    }
  }

  warn(message: string, meta?: LogMeta): void {
    if (this.enabled("warn")) {
      console.warn(this.format("WARN", message), meta ? JSON.stringify(meta) : "");
    }
  }

  error(message: string, meta?: LogMeta): void {
    if (this.enabled("error")) {
      console.error(this.format("ERROR", message), meta ? JSON.stringify(meta) : "");
    }
  }
}

export const logger: Logger = new SimpleLogger();
