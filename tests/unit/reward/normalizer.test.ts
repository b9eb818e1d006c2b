import { describe, it, expect } from 'vitest';
import {
  RunningStatsNormalizer,
  createInitialState,
  createNormalizer,
  decayForWindow,
  stepNormalization,
  type NormalizerParams,
} from '../../../src/reward/normalizer.js';
import { ConfigError, RewardCancelledError } from '../../../src/core/reward-errors.js';
import { DEFAULT_REWARD_CONFIG } from '../../../src/config/config-schema.js';
import type { NormalizationState } from '../../../src/types/reward.js';

const PARAMS: NormalizerParams = {
  decay: decayForWindow(100),
  epsilon: 1e-6,
  varianceFloor: 1e-9,
  cumulative: false,
};

/** Fixed repeating draw: mean 0.4, population variance 0.1 */
const PATTERN = [0.2, 0.8, 0.5, -0.1, 0.6];

describe('decayForWindow', () => {
  it('should map the window to 2 / (window + 1)', () => {
    expect(decayForWindow(100)).toBe(2 / 101);
    expect(decayForWindow(1)).toBe(1);
  });
});

describe('stepNormalization', () => {
  it('should seed the statistics and bypass standardization on the first call', () => {
    const step = stepNormalization(0.5, createInitialState(), PARAMS);
    expect(step.value).toBe(Math.tanh(0.5));
    expect(step.degenerate).toBe('cold_start');
    expect(step.nextState).toEqual({ count: 1, runningMean: 0.5, runningVariance: 0 });
  });

  it('should standardize once two samples exist', () => {
    const first = stepNormalization(1, createInitialState(), PARAMS);
    const second = stepNormalization(3, first.nextState, PARAMS);

    expect(second.nextState).toEqual({ count: 2, runningMean: 2, runningVariance: 1 });
    expect(second.degenerate).toBeNull();
    expect(second.value).toBeCloseTo(Math.tanh(1 / Math.sqrt(1 + 1e-6)), 12);
  });

  it('should bypass standardization when variance is below the floor', () => {
    const first = stepNormalization(1, createInitialState(), PARAMS);
    const second = stepNormalization(1, first.nextState, PARAMS);
    expect(second.degenerate).toBe('low_variance');
    expect(second.value).toBe(Math.tanh(1));
    expect(second.nextState.count).toBe(2);
  });

  it('should seed the state from a huge but finite first sample', () => {
    const step = stepNormalization(1e160, createInitialState(), PARAMS);
    expect(step.degenerate).toBe('cold_start');
    expect(step.nextState).toEqual({ count: 1, runningMean: 1e160, runningVariance: 0 });
    expect(step.value).toBe(1);
  });

  it('should commit a variance that fits even when the unweighted sum would not', () => {
    const state: NormalizationState = { count: 10, runningMean: 0, runningVariance: 1.7e308 };
    const step = stepNormalization(1.48e154, state, PARAMS);
    expect(step.degenerate).toBeNull();
    expect(step.nextState.count).toBe(11);
    const alpha = 1 / 11;
    const keep = 1 - alpha;
    expect(step.nextState.runningVariance).toBe(
      keep * 1.7e308 + keep * alpha * 1.48e154 * 1.48e154
    );
    expect(Number.isFinite(step.nextState.runningVariance)).toBe(true);
  });

  it('should not commit when the squared deviation itself overflows', () => {
    const seeded = stepNormalization(0, createInitialState(), PARAMS).nextState;
    const step = stepNormalization(1e160, seeded, PARAMS);
    expect(step.degenerate).toBe('non_finite_statistics');
    expect(step.nextState).toBe(seeded);
  });

  it('should not commit statistics that overflow', () => {
    const state: NormalizationState = { count: 2, runningMean: 0, runningVariance: 1 };
    const step = stepNormalization(Number.MAX_VALUE, state, PARAMS);
    expect(step.degenerate).toBe('non_finite_statistics');
    expect(step.nextState).toBe(state);
    expect(step.value).toBe(1);
  });

  it('should keep every output inside [-1, 1]', () => {
    let state = createInitialState();
    for (const raw of [1e6, -1e6, 0, 42, -0.001, 1e-12, 7e5, -3]) {
      const step = stepNormalization(raw, state, PARAMS);
      expect(step.value).toBeGreaterThanOrEqual(-1);
      expect(step.value).toBeLessThanOrEqual(1);
      state = step.nextState;
    }
  });
});

describe('RunningStatsNormalizer', () => {
  it('should converge toward the sample statistics within the window tolerance', async () => {
    const normalizer = new RunningStatsNormalizer('exponential', PARAMS);
    for (let i = 0; i < 200; i++) {
      await normalizer.normalize(PATTERN[i % PATTERN.length] ?? 0);
    }
    const state = normalizer.snapshot();
    expect(state.count).toBe(200);
    expect(Math.abs(state.runningMean - 0.4)).toBeLessThan(0.02);
    expect(Math.abs(state.runningVariance - 0.1)).toBeLessThan(0.01);
  });

  it('should match exact sample statistics in cumulative mode', async () => {
    const normalizer = new RunningStatsNormalizer('cumulative', { ...PARAMS, cumulative: true });
    for (let i = 0; i < 200; i++) {
      await normalizer.normalize(PATTERN[i % PATTERN.length] ?? 0);
    }
    const state = normalizer.snapshot();
    expect(state.runningMean).toBeCloseTo(0.4, 10);
    expect(state.runningVariance).toBeCloseTo(0.1, 10);
  });

  it('should report cold start as a degenerate warning', async () => {
    const normalizer = new RunningStatsNormalizer('exponential', PARAMS);
    const outcome = await normalizer.normalize(0.3);
    expect(outcome.standardized).toBe(false);
    expect(outcome.warnings.map((w) => w.code)).toEqual(['NORMALIZATION_DEGENERATE']);
    expect(outcome.warnings[0]?.detail).toEqual({
      reason: 'cold_start',
      count: 1,
      runningVariance: 0,
    });
    expect(outcome.state).toEqual({ count: 1, runningMean: 0.3, runningVariance: 0 });
  });

  it('should produce bit-identical output for identical state and input', async () => {
    const state: NormalizationState = { count: 12, runningMean: 0.21, runningVariance: 0.07 };
    const a = new RunningStatsNormalizer('exponential', PARAMS, state);
    const b = new RunningStatsNormalizer('exponential', PARAMS, state);

    const first = await a.normalize(0.6);
    const second = await b.normalize(0.6);

    expect(Object.is(first.value, second.value)).toBe(true);
    expect(a.snapshot()).toEqual(b.snapshot());
  });

  it('should serialize concurrent updates in call order', async () => {
    const raws = [0.5, -0.2, 0.9, 0.1, 0.4, -0.6, 0.3, 0.8];
    const normalizer = new RunningStatsNormalizer('exponential', PARAMS);

    const outcomes = await Promise.all(raws.map((raw) => normalizer.normalize(raw)));

    let expected = createInitialState();
    raws.forEach((raw, i) => {
      const step = stepNormalization(raw, expected, PARAMS);
      expected = step.nextState;
      expect(outcomes[i]?.value).toBe(step.value);
    });
    expect(normalizer.snapshot()).toEqual(expected);
  });

  it('should leave state untouched when already aborted', async () => {
    const normalizer = new RunningStatsNormalizer('exponential', PARAMS);
    const controller = new AbortController();
    controller.abort();

    await expect(normalizer.normalize(0.5, controller.signal)).rejects.toBeInstanceOf(
      RewardCancelledError
    );
    expect(normalizer.snapshot()).toEqual(createInitialState());
  });

  it('should drop a waiting call that is aborted before it gets the lock', async () => {
    const normalizer = new RunningStatsNormalizer('exponential', PARAMS);
    const controller = new AbortController();

    const first = normalizer.normalize(0.5);
    const second = normalizer.normalize(0.9, controller.signal);
    controller.abort();

    await expect(second).rejects.toBeInstanceOf(RewardCancelledError);
    await first;
    expect(normalizer.snapshot()).toEqual({ count: 1, runningMean: 0.5, runningVariance: 0 });
  });

  it('should clear statistics on reset', async () => {
    const normalizer = new RunningStatsNormalizer('exponential', PARAMS);
    await normalizer.normalize(1);
    await normalizer.normalize(2);
    const previous = await normalizer.reset();
    expect(previous).toEqual({ count: 2, runningMean: 1.5, runningVariance: 0.25 });
    expect(normalizer.snapshot()).toEqual(createInitialState());
  });

  it('should apply an update queued before reset, then clear', async () => {
    const normalizer = new RunningStatsNormalizer('exponential', PARAMS);

    const update = normalizer.normalize(0.7);
    const previous = await normalizer.reset();

    await expect(update).resolves.toMatchObject({ value: Math.tanh(0.7) });
    expect(previous).toEqual({ count: 1, runningMean: 0.7, runningVariance: 0 });
    expect(normalizer.snapshot()).toEqual(createInitialState());
  });

  it('should return snapshots that cannot mutate internal state', async () => {
    const normalizer = new RunningStatsNormalizer('exponential', PARAMS);
    await normalizer.normalize(1);
    const snapshot = normalizer.snapshot();
    snapshot.count = 99;
    expect(normalizer.snapshot().count).toBe(1);
  });

  it('should reject an invalid initial state', () => {
    expect(
      () =>
        new RunningStatsNormalizer('exponential', PARAMS, {
          count: -1,
          runningMean: 0,
          runningVariance: 0,
        })
    ).toThrow(ConfigError);
  });
});

describe('createNormalizer', () => {
  it('should build the configured strategy', () => {
    expect(createNormalizer(DEFAULT_REWARD_CONFIG).name).toBe('exponential');
    expect(createNormalizer({ ...DEFAULT_REWARD_CONFIG, normalization: 'cumulative' }).name).toBe(
      'cumulative'
    );
  });

  it('should resume from a snapshot', () => {
    const state: NormalizationState = { count: 5, runningMean: 0.2, runningVariance: 0.3 };
    expect(createNormalizer(DEFAULT_REWARD_CONFIG, state).snapshot()).toEqual(state);
  });
});
