import { describe, it, expect } from 'vitest';
import { canonicalJson, fingerprintConfig } from '../../../src/reward/fingerprint.js';
import { DEFAULT_REWARD_CONFIG } from '../../../src/config/config-schema.js';

describe('canonicalJson', () => {
  it('sorts keys at every level and drops undefined', () => {
    expect(canonicalJson({ b: 1, a: { d: [2, { y: 1, x: 0 }], c: undefined } })).toBe(
      '{"a":{"d":[2,{"x":0,"y":1}]},"b":1}'
    );
  });
});

describe('fingerprintConfig', () => {
  it('is a 12 character hex digest', () => {
    expect(fingerprintConfig(DEFAULT_REWARD_CONFIG)).toMatch(/^[0-9a-f]{12}$/);
  });

  it('ignores property order', () => {
    const reordered = {
      normalization: DEFAULT_REWARD_CONFIG.normalization,
      aggregation: DEFAULT_REWARD_CONFIG.aggregation,
      varianceFloor: DEFAULT_REWARD_CONFIG.varianceFloor,
      epsilon: DEFAULT_REWARD_CONFIG.epsilon,
      latencyBudgetMs: DEFAULT_REWARD_CONFIG.latencyBudgetMs,
      normalize: DEFAULT_REWARD_CONFIG.normalize,
      clipRange: DEFAULT_REWARD_CONFIG.clipRange,
      windowSize: DEFAULT_REWARD_CONFIG.windowSize,
      discountRate: DEFAULT_REWARD_CONFIG.discountRate,
    };
    expect(fingerprintConfig(reordered)).toBe(fingerprintConfig(DEFAULT_REWARD_CONFIG));
  });

  it('changes with any value', () => {
    expect(fingerprintConfig({ ...DEFAULT_REWARD_CONFIG, windowSize: 101 })).not.toBe(
      fingerprintConfig(DEFAULT_REWARD_CONFIG)
    );
  });
});
