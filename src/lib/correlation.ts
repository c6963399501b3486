/**
 * Request Context
 * Provides per-request correlation IDs for tracing a tile request through
 * cache lookup, upstream fetch and cache write.
 * Uses AsyncLocalStorage to propagate context through async operations.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

/** Correlation context carried through async operations */
export interface CorrelationContext {
  correlationId: string;
  /** Timestamp (ms) when the request arrived */
  arrivalTimestamp: number;
  /** Current processing stage */
  stage: ProcessingStage;
}

/** Processing stages of a proxied request */
export type ProcessingStage =
  | 'arrival'
  | 'cache-lookup'
  | 'resolve'
  | 'upstream-fetch'
  | 'cache-write'
  | 'completed'
  | 'failed';

const storage = new AsyncLocalStorage<CorrelationContext>();

/** Generate a new correlation ID */
export function generateCorrelationId(): string {
  return `req-${randomUUID()}`;
}

/** Get the current correlation context (if any) */
export function getCorrelationContext(): CorrelationContext | undefined {
  return storage.getStore();
}

/** Get the current correlation ID, or 'none' if not in a context */
export function getCorrelationId(): string {
  return storage.getStore()?.correlationId ?? 'none';
}

/** Update the current processing stage */
export function setProcessingStage(stage: ProcessingStage): void {
  const ctx = storage.getStore();
  if (ctx) {
    ctx.stage = stage;
  }
}

/** Run a function within a new correlation context */
export function runWithCorrelation<T>(correlationId: string, fn: () => T): T {
  const context: CorrelationContext = {
    correlationId,
    arrivalTimestamp: Date.now(),
    stage: 'arrival',
  };
  return storage.run(context, fn);
}

/**
 * Close out a request context: a request that did not fail is marked
 * completed. Returns the milliseconds since arrival.
 */
export function finishRequest(context: CorrelationContext, now: number = Date.now()): number {
  if (context.stage !== 'failed') {
    context.stage = 'completed';
  }
  return now - context.arrivalTimestamp;
}
