/**
 * Structured logging with Winston
 */

import winston from 'winston';
import { getErrorMessage } from './errors.js';
import { getCorrelationId } from './correlation.js';

// Winston logger instance
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
    }),
  ],
});

/** Query parameters whose values never reach the log */
const SENSITIVE_PARAMS = /^(key|api_?key|access_?token|token|apikey|secret)$/i;

/**
 * Mask credential values in a URL's query string.
 * Strings that do not parse as URLs are returned unchanged.
 */
export function maskUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }
  for (const name of [...parsed.searchParams.keys()]) {
    if (SENSITIVE_PARAMS.test(name)) {
      parsed.searchParams.set(name, '***');
    }
  }
  return parsed.toString();
}

/** Enrich metadata with the request ID from async context */
function enrichWithCorrelation(meta?: Record<string, unknown>): Record<string, unknown> {
  const correlationId = getCorrelationId();
  const base = meta ?? {};
  if (correlationId === 'none') return base;
  return { requestId: correlationId, ...base };
}

/** Check if enriched metadata has any keys */
function hasContent(enriched: Record<string, unknown>): boolean {
  return Object.keys(enriched).length > 0;
}

/**
 * Proxy logger that tags entries with the current request ID
 */
export class ProxyLogger {
  info(message: string, meta?: Record<string, unknown>): void {
    const enriched = enrichWithCorrelation(meta);
    logger.info(message, hasContent(enriched) ? enriched : undefined);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    const enriched = enrichWithCorrelation(meta);
    logger.warn(message, hasContent(enriched) ? enriched : undefined);
  }

  error(message: string, error?: unknown): void {
    const correlationId = getCorrelationId();
    const corrMeta = correlationId !== 'none' ? { requestId: correlationId } : {};

    if (error instanceof Error) {
      logger.error(message, { ...corrMeta, error: error.message, stack: error.stack });
    } else if (error != null && typeof error === 'object') {
      logger.error(message, { ...corrMeta, ...error });
    } else {
      const base = error !== undefined ? { error: getErrorMessage(error) } : {};
      const merged = { ...corrMeta, ...base };
      logger.error(message, Object.keys(merged).length > 0 ? merged : undefined);
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    const enriched = enrichWithCorrelation(meta);
    logger.debug(message, hasContent(enriched) ? enriched : undefined);
  }
}

/**
 * Performance timer utility
 */
export class PerformanceTimer {
  private startTime: number;

  constructor(private operation: string) {
    this.startTime = Date.now();
    proxyLogger.debug(`Starting: ${operation}`);
  }

  /** Finish the measurement and return the elapsed milliseconds */
  end(success: boolean, errorMessage?: string): number {
    const duration = Date.now() - this.startTime;

    if (success) {
      proxyLogger.debug(`Completed: ${this.operation} (${duration}ms)`);
    } else {
      proxyLogger.warn(`Failed: ${this.operation} (${duration}ms)`, { errorMessage });
    }
    return duration;
  }
}

// Export singleton instance
export const proxyLogger = new ProxyLogger();
