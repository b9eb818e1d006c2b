/**
 * Reward pipeline exports.
 */

export { validateEvents, isValidBatch } from './validator.js';
export {
  aggregate,
  aggregateMean,
  getAggregationStrategy,
  type AggregationStrategy,
} from './aggregator.js';
export {
  RunningStatsNormalizer,
  createInitialState,
  createNormalizer,
  decayForWindow,
  stepNormalization,
  type DegenerateReason,
  type NormalizationOutcome,
  type NormalizationStep,
  type NormalizationStrategy,
  type NormalizerParams,
} from './normalizer.js';
export {
  PhaseTracker,
  RewardOrchestrator,
  sanitizeRaw,
  type ComputeRewardOptions,
  type RewardOrchestratorDeps,
} from './orchestrator.js';
export {
  EvaluationSession,
  type EvaluationSessionDeps,
  type EvaluationSessionOptions,
  type SessionState,
  type TickResult,
} from './session.js';
export { canonicalJson, fingerprintConfig } from './fingerprint.js';
