/**
 * Reward result and diagnostic types.
 */

/**
 * The externally visible result of one reward computation.
 * Invariant: -1 <= value <= 1.
 */
export interface ScalarReward {
  /** Bounded reward handed to the evaluator */
  value: number;
  /** Discounted aggregate before normalization */
  raw: number;
  /** Whether the value went through standardization */
  normalized: boolean;
}

/**
 * Running statistics owned by one normalizer.
 */
export interface NormalizationState {
  count: number;
  runningMean: number;
  runningVariance: number;
}

/**
 * Non-fatal conditions absorbed by the pipeline and reported in diagnostics.
 */
export type RewardWarningCode =
  | 'EMPTY_INPUT'
  | 'NORMALIZATION_DEGENERATE'
  | 'OUT_OF_RANGE_OUTPUT'
  | 'LATENCY_EXCEEDED'
  | 'RAW_OVERFLOW'
  | 'SOURCE_UNAVAILABLE';

export interface RewardWarning {
  code: RewardWarningCode;
  message: string;
  detail?: Record<string, unknown>;
}

/**
 * Per-call phases.
 *
 * validating -> aggregating -> normalizing -> completed
 * validating -> failed (schema violation only)
 * validating -> completed (empty input)
 * aggregating -> completed (normalize disabled)
 */
export type RewardPhase = 'validating' | 'aggregating' | 'normalizing' | 'completed' | 'failed';

/**
 * Structured record forwarded to the diagnostic sink after each call.
 */
export interface RewardDiagnostic {
  raw: number;
  normalizedValue: number;
  normalized: boolean;
  runningMean: number;
  runningVariance: number;
  count: number;
  configFingerprint: string;
  warnings: RewardWarning[];
  phases: RewardPhase[];
  durationMs: number;
  /** Set when the call ran inside an evaluation session */
  sessionId?: string | undefined;
  tick?: number | undefined;
}

/**
 * Reward plus the diagnostic record describing how it was produced.
 */
export interface RewardOutcome {
  reward: ScalarReward;
  diagnostic: RewardDiagnostic;
}
