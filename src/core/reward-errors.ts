/**
 * Reward Error Types
 *
 * Typed error classes for the reward pipeline. Only schema violations,
 * cancellation and session misuse ever reach the caller; every other
 * condition is absorbed and reported as a warning.
 */

/**
 * Error codes for classification.
 */
export type RewardErrorCode =
  | 'SCHEMA_VIOLATION'
  | 'INVALID_CONFIG'
  | 'CANCELLED'
  | 'SESSION_CLOSED';

/**
 * Base reward error class.
 */
export class RewardError extends Error {
  constructor(
    message: string,
    public readonly code: RewardErrorCode
  ) {
    super(message);
    this.name = 'RewardError';
  }
}

/**
 * Why a record was rejected.
 */
export type SchemaViolationReason =
  | 'invalid_record'
  | 'non_finite_value'
  | 'negative_timestamp'
  | 'invalid_timestamp'
  | 'out_of_order';

/**
 * An event batch is malformed.
 * Fatal for the call; normalization state is never touched.
 */
export class SchemaViolationError extends RewardError {
  constructor(
    public readonly reason: SchemaViolationReason,
    public readonly index: number,
    detail: string
  ) {
    super(
      index >= 0 ? `Event ${String(index)}: ${detail}` : `Event batch: ${detail}`,
      'SCHEMA_VIOLATION'
    );
    this.name = 'SchemaViolationError';
  }
}

/**
 * Configuration failed validation or names an unknown strategy.
 */
export class ConfigError extends RewardError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, 'INVALID_CONFIG');
    this.name = 'ConfigError';
  }
}

/**
 * The caller aborted before normalization state was touched.
 */
export class RewardCancelledError extends RewardError {
  constructor() {
    super('Reward computation cancelled before state update', 'CANCELLED');
    this.name = 'RewardCancelledError';
  }
}

/**
 * A tick was requested after the session was torn down.
 */
export class SessionClosedError extends RewardError {
  constructor(public readonly sessionId: string) {
    super(`Session ${sessionId} is closed`, 'SESSION_CLOSED');
    this.name = 'SessionClosedError';
  }
}

/**
 * Type guard for schema violations (the only fatal input error).
 */
export function isSchemaViolation(error: unknown): error is SchemaViolationError {
  return error instanceof SchemaViolationError;
}
