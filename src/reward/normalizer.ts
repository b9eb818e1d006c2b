/**
 * Adaptive normalization of raw rewards.
 *
 * Keeps an exponentially weighted running mean and variance and squashes the
 * standardized raw value through tanh. The statistics are the only mutable
 * state in the pipeline; every update goes through one FIFO mutex and is
 * committed in a single assignment, so a call either fully updates the state
 * or leaves it untouched.
 */

import type { NormalizationStrategyName, RewardConfig } from '../config/config-schema.js';
import { Mutex } from '../core/mutex.js';
import { ConfigError, RewardCancelledError } from '../core/reward-errors.js';
import type { NormalizationState, RewardWarning } from '../types/reward.js';

export interface NormalizerParams {
  /** Decay per update; 2 / (windowSize + 1) for the exponential strategy */
  decay: number;
  epsilon: number;
  varianceFloor: number;
  /** Ignore `decay` and weight every sample equally */
  cumulative: boolean;
}

export type DegenerateReason = 'cold_start' | 'low_variance' | 'non_finite_statistics';

/**
 * Result of one normalization step.
 */
export interface NormalizationStep {
  value: number;
  /** State after the step (equal to the input state when not committed) */
  nextState: NormalizationState;
  degenerate: DegenerateReason | null;
  /** Value had to be clamped back into [-1, 1] */
  clamped: boolean;
}

export interface NormalizationOutcome {
  value: number;
  /** Standardization was applied (false on the tanh(raw) fallback) */
  standardized: boolean;
  warnings: RewardWarning[];
  /** Snapshot taken inside the critical section, right after the update */
  state: NormalizationState;
}

/**
 * Capability interface for normalization strategies.
 */
export interface NormalizationStrategy {
  readonly name: NormalizationStrategyName;
  normalize(raw: number, signal?: AbortSignal): Promise<NormalizationOutcome>;
  snapshot(): NormalizationState;
  /** Clear the statistics once queued updates finish; resolves to the state before the clear */
  reset(): Promise<NormalizationState>;
}

export function createInitialState(): NormalizationState {
  return { count: 0, runningMean: 0, runningVariance: 0 };
}

/**
 * Decay factor whose effective window is roughly `windowSize` samples.
 */
export function decayForWindow(windowSize: number): number {
  return 2 / (windowSize + 1);
}

/**
 * One normalization step as a pure function of (raw, state).
 *
 * The update rate is max(decay, 1/count): the first sample seeds the mean,
 * early samples follow exact Welford statistics, and once 1/count drops
 * below the decay the window takes over.
 */
export function stepNormalization(
  raw: number,
  state: NormalizationState,
  params: NormalizerParams
): NormalizationStep {
  const count = state.count + 1;
  const alpha = params.cumulative ? 1 / count : Math.max(params.decay, 1 / count);
  const { runningMean, runningVariance } = updateMoments(raw, state, alpha);

  if (!Number.isFinite(runningMean) || !Number.isFinite(runningVariance)) {
    // Not committed: the true moments are outside the double range
    return { ...bound(Math.tanh(raw)), nextState: state, degenerate: 'non_finite_statistics' };
  }

  const nextState: NormalizationState = { count, runningMean, runningVariance };

  if (count < 2) {
    return { ...bound(Math.tanh(raw)), nextState, degenerate: 'cold_start' };
  }
  if (runningVariance < params.varianceFloor) {
    return { ...bound(Math.tanh(raw)), nextState, degenerate: 'low_variance' };
  }

  const z = (raw - runningMean) / Math.sqrt(runningVariance + params.epsilon);
  return { ...bound(Math.tanh(z)), nextState, degenerate: null };
}

/**
 * Weighted mean/variance update. A full-weight sample replaces the moments
 * outright, so a finite raw always seeds a fresh state.
 */
function updateMoments(
  raw: number,
  state: NormalizationState,
  alpha: number
): Pick<NormalizationState, 'runningMean' | 'runningVariance'> {
  if (alpha >= 1) {
    return { runningMean: raw, runningVariance: 0 };
  }
  const keep = 1 - alpha;
  const delta = raw - state.runningMean;
  return {
    runningMean: state.runningMean + alpha * delta,
    // Distributed so the sum only overflows when the result itself would
    runningVariance: keep * state.runningVariance + keep * alpha * delta * delta,
  };
}

function bound(value: number): { value: number; clamped: boolean } {
  if (Number.isNaN(value)) {
    return { value: 0, clamped: true };
  }
  if (value > 1) return { value: 1, clamped: true };
  if (value < -1) return { value: -1, clamped: true };
  return { value, clamped: false };
}

/**
 * Normalizer owning one NormalizationState for the lifetime of a session.
 */
export class RunningStatsNormalizer implements NormalizationStrategy {
  readonly name: NormalizationStrategyName;
  private state: NormalizationState;
  private readonly params: NormalizerParams;
  private readonly mutex = new Mutex();

  constructor(
    name: NormalizationStrategyName,
    params: NormalizerParams,
    initialState: NormalizationState = createInitialState()
  ) {
    assertState(initialState);
    this.name = name;
    this.params = params;
    this.state = { ...initialState };
  }

  /**
   * Update the statistics with `raw` and return the bounded value.
   *
   * Cancellation is honoured until the lock is held; after that the update
   * runs to completion without yielding.
   */
  async normalize(raw: number, signal?: AbortSignal): Promise<NormalizationOutcome> {
    if (signal?.aborted) {
      throw new RewardCancelledError();
    }
    return this.mutex.runExclusive(() => {
      if (signal?.aborted) {
        throw new RewardCancelledError();
      }
      const step = stepNormalization(raw, this.state, this.params);
      this.state = step.nextState;
      return toOutcome(step, raw);
    });
  }

  snapshot(): NormalizationState {
    return { ...this.state };
  }

  /**
   * Clear the statistics (session teardown).
   *
   * Runs under the same lock as updates, so an update queued before the
   * reset lands in the returned state and never in the cleared one.
   */
  async reset(): Promise<NormalizationState> {
    return this.mutex.runExclusive(() => {
      const previous = this.state;
      this.state = createInitialState();
      return { ...previous };
    });
  }
}

function toOutcome(step: NormalizationStep, raw: number): NormalizationOutcome {
  const warnings: RewardWarning[] = [];
  if (step.degenerate) {
    warnings.push({
      code: 'NORMALIZATION_DEGENERATE',
      message: 'Standardization bypassed, using tanh(raw)',
      detail: {
        reason: step.degenerate,
        count: step.nextState.count,
        runningVariance: step.nextState.runningVariance,
      },
    });
  }
  if (step.clamped) {
    warnings.push({
      code: 'OUT_OF_RANGE_OUTPUT',
      message: 'Normalized value clamped to [-1, 1]',
      detail: { raw },
    });
  }
  return {
    value: step.value,
    standardized: step.degenerate === null,
    warnings,
    state: { ...step.nextState },
  };
}

function assertState(state: NormalizationState): void {
  if (
    !Number.isInteger(state.count) ||
    state.count < 0 ||
    !Number.isFinite(state.runningMean) ||
    !Number.isFinite(state.runningVariance) ||
    state.runningVariance < 0
  ) {
    throw new ConfigError('Invalid normalization state', [JSON.stringify(state)]);
  }
}

const NORMALIZATION_MODES = new Map<string, NormalizationStrategyName>([
  ['exponential', 'exponential'],
  ['cumulative', 'cumulative'],
]);

/**
 * Build the configured normalization strategy, optionally resuming from a
 * previously taken snapshot.
 */
export function createNormalizer(
  config: Pick<RewardConfig, 'normalization' | 'windowSize' | 'epsilon' | 'varianceFloor'>,
  initialState?: NormalizationState
): NormalizationStrategy {
  const name = NORMALIZATION_MODES.get(config.normalization);
  if (!name) {
    throw new ConfigError(`Unknown normalization strategy "${config.normalization}"`);
  }
  return new RunningStatsNormalizer(
    name,
    {
      decay: decayForWindow(config.windowSize),
      epsilon: config.epsilon,
      varianceFloor: config.varianceFloor,
      cumulative: name === 'cumulative',
    },
    initialState
  );
}
