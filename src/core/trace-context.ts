/**
 * Trace Context Module
 *
 * AsyncLocalStorage-based trace context so every log line written while a
 * tick is being scored carries the same identifiers, without passing them
 * through the pipeline by hand.
 *
 * - traceId: "<sessionId>:<tick>", one per tick
 * - correlationId: the session id, shared by all ticks of a session
 * - spanId: short random id for this particular attempt
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface TraceContext {
  /** Root trace ID */
  traceId: string;
  /** Batch grouping ID */
  correlationId?: string;
  /** Current span ID for this operation */
  spanId?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<TraceContext>();

/**
 * Run a function with trace context.
 * All descendant async operations inherit this context automatically.
 *
 * @example
 * ```ts
 * await withTraceContext(createTickTraceContext('s-1', 4), async () => {
 *   // All logs here automatically get traceId='s-1:4'
 *   logger.info('Scoring tick');
 * });
 * ```
 */
export function withTraceContext<T>(context: TraceContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Get the current trace context (if any).
 */
export function getTraceContext(): TraceContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Generate a short span ID.
 */
export function generateSpanId(): string {
  return randomUUID().slice(0, 8);
}

/**
 * Create the trace context for one tick of an evaluation session.
 */
export function createTickTraceContext(sessionId: string, tick: number): TraceContext {
  return {
    traceId: `${sessionId}:${String(tick)}`,
    correlationId: sessionId,
    spanId: generateSpanId(),
  };
}
