import pino from "pino";

// Set log level via env LOG_LEVEL (default: info)
const logger = pino({
  level: process.env.LOG_LEVEL || "info",
  transport:
    process.env.NODE_ENV === "production" || process.env.VITEST
      ? undefined
      : {
          target: "pino-pretty",
          options: { colorize: true },
        },
});

export interface LogMeta {
  source?: string;
  url?: string;
  duration?: number;
  count?: number;
  error?: string;
  [key: string]: unknown;
}

export class Logger {
  static info(message: string, meta?: LogMeta): void {
    logger.info(meta || {}, message);
  }
  static warn(message: string, meta?: LogMeta): void {
    logger.warn(meta || {}, message);
  }
  static error(message: string, error?: Error, meta?: LogMeta): void {
    const errorMeta = {
      ...meta,
      error: error?.message,
      stack: error?.stack,
    };
    logger.error(errorMeta, message);
  }
  static debug(message: string, meta?: LogMeta): void {
    logger.debug(meta || {}, message);
  }
  // Convenience methods for common logging patterns
  static sourceAttempt(source: string): void {
    this.info(`Trying data source: ${source}`, { source });
  }
  static sourceFailed(source: string, error: Error): void {
    this.warn(`Source ${source} failed: ${error.message}`, {
      source,
      error: error.message,
    });
  }
  static pricesExtracted(source: string, count: number, duration?: number): void {
    this.info(`Extracted ${count} prices`, { source, count, duration });
  }
  static cacheHit(cache: string, ageMs: number): void {
    this.info(`Using cached ${cache}`, { cache, ageMs });
  }
  static cacheMiss(cache: string, reason: string): void {
    this.debug(`Cache miss for ${cache}: ${reason}`, { cache, reason });
  }
}
