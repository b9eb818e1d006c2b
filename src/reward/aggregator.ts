/**
 * Time-discounted aggregation of a validated batch into one raw scalar.
 *
 * Every strategy is a single streaming pass: O(N) time, O(1) extra space.
 * Weights for large timestamps underflow toward zero; those events simply
 * stop contributing.
 */

import type { AggregationStrategyName } from '../config/config-schema.js';
import { ConfigError } from '../core/reward-errors.js';
import type { ValidatedEventSequence } from '../types/event.js';

/**
 * Capability interface for aggregation strategies.
 */
export interface AggregationStrategy {
  readonly name: AggregationStrategyName;
  aggregate(events: ValidatedEventSequence, discountRate: number): number;
}

/**
 * raw = Σ value_i · exp(−discountRate · timestamp_i)
 *
 * discountRate = 0 degenerates to an unweighted sum.
 */
export function aggregate(events: ValidatedEventSequence, discountRate: number): number {
  assertDiscountRate(discountRate);
  let raw = 0;
  for (const event of events) {
    raw += event.value * Math.exp(-discountRate * event.timestamp);
  }
  return raw;
}

/**
 * Weighted mean: the discounted sum divided by the sum of weights.
 * Returns 0 when every weight has underflowed.
 */
export function aggregateMean(events: ValidatedEventSequence, discountRate: number): number {
  assertDiscountRate(discountRate);
  let weighted = 0;
  let totalWeight = 0;
  for (const event of events) {
    const weight = Math.exp(-discountRate * event.timestamp);
    weighted += event.value * weight;
    totalWeight += weight;
  }
  return totalWeight > 0 ? weighted / totalWeight : 0;
}

function assertDiscountRate(discountRate: number): void {
  if (!Number.isFinite(discountRate) || discountRate < 0) {
    throw new ConfigError(`discountRate must be a finite number >= 0, got ${String(discountRate)}`);
  }
}

const AGGREGATION_REGISTRY = new Map<string, AggregationStrategy>([
  ['discounted-sum', { name: 'discounted-sum', aggregate }],
  ['discounted-mean', { name: 'discounted-mean', aggregate: aggregateMean }],
]);

/**
 * Look up an aggregation strategy by its configured name.
 */
export function getAggregationStrategy(name: string): AggregationStrategy {
  const strategy = AGGREGATION_REGISTRY.get(name);
  if (!strategy) {
    throw new ConfigError(`Unknown aggregation strategy "${name}"`);
  }
  return strategy;
}
