import type { Logger, LogLevel } from "./types.js";

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

export function resolveLogLevel(value: string | undefined, fallback: LogLevel = "warn"): LogLevel {
  const lower = value?.trim().toLowerCase();
  return lower !== undefined && isLogLevel(lower) ? lower : fallback;
}

export class PrefixLogger implements Logger {
  private prefix: string;
  private threshold: number;

  constructor(scope: string, level: LogLevel = resolveLogLevel(process.env.WORLDTALK_LOG_LEVEL)) {
    // biome-ignore lint/suspicious/noControlCharactersInRegex: strips control chars from the scope
    const safeScope = scope.replace(/[\x00-\x1f\x7f]/g, "_").slice(0, 64);
    this.prefix = `[${safeScope}]`;
    this.threshold = LEVELS[level];
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.threshold <= LEVELS.info) console.log(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.threshold <= LEVELS.warn) console.warn(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  error(message: string, data?: Record<string, unknown>): void {
    if (this.threshold <= LEVELS.error) console.error(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.threshold <= LEVELS.debug) console.debug(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }
}

export function createLogger(scope: string): Logger {
  return new PrefixLogger(scope);
}
