/**
 * Tick reward core
 *
 * Turns a chronological batch of environment events into one bounded,
 * deterministic reward per simulation tick.
 */

export * from './types/index.js';
export * from './reward/index.js';
export * from './config/index.js';
export * from './ports/index.js';

export {
  ConfigError,
  RewardCancelledError,
  RewardError,
  SchemaViolationError,
  SessionClosedError,
  isSchemaViolation,
  type RewardErrorCode,
  type SchemaViolationReason,
} from './core/reward-errors.js';
export { TimeoutError, withTimeout } from './core/timeout.js';
export { Mutex } from './core/mutex.js';
export { InMemoryMetrics, NoOpMetrics, createMetrics } from './core/metrics.js';
export { createLogger, type LoggerConfig } from './core/logger.js';
export { createTickTraceContext, getTraceContext, withTraceContext } from './core/trace-context.js';

export { ReplayEventSource } from './adapters/replay-source.js';
export { LoggerDiagnosticSink } from './adapters/logger-diagnostic-sink.js';
export { loadReplayFile, parseReplay } from './adapters/replay-file.js';
