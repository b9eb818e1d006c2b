/**
 * RewardOrchestrator - runs one reward computation per call.
 *
 * Pipeline per call:
 * 1. VALIDATING: shape and ordering check (schema violations abort the call)
 * 2. AGGREGATING: discounted reduction to one raw scalar
 * 3. NORMALIZING: running-statistics standardization + tanh (critical section)
 * 4. COMPLETED: clip, build the diagnostic record, hand it to the sink
 *
 * Everything except a schema violation is absorbed and reported as a
 * warning; the caller always gets a reward in [-1, 1] or an explicit error.
 */

import { performance } from 'node:perf_hooks';
import type { RewardConfig } from '../config/config-schema.js';
import { resolveRewardConfig } from '../config/config-loader.js';
import { createMetrics } from '../core/metrics.js';
import { isSchemaViolation } from '../core/reward-errors.js';
import { withTimeout } from '../core/timeout.js';
import type { IDiagnosticSink } from '../ports/diagnostics.js';
import type { EventRecord, TickContext, ValidatedEventSequence } from '../types/event.js';
import type { Logger } from '../types/logger.js';
import type { Metrics } from '../types/metrics.js';
import type {
  NormalizationState,
  RewardDiagnostic,
  RewardOutcome,
  RewardPhase,
  RewardWarning,
  ScalarReward,
} from '../types/reward.js';
import { getAggregationStrategy, type AggregationStrategy } from './aggregator.js';
import { fingerprintConfig } from './fingerprint.js';
import { createNormalizer, type NormalizationStrategy } from './normalizer.js';
import { validateEvents } from './validator.js';

const DEFAULT_DIAGNOSTIC_TIMEOUT_MS = 50;

/**
 * Allowed phase transitions within one call.
 */
const PHASE_TRANSITIONS: Record<RewardPhase, readonly RewardPhase[]> = {
  validating: ['aggregating', 'completed', 'failed'],
  aggregating: ['normalizing', 'completed'],
  normalizing: ['completed'],
  completed: [],
  failed: [],
};

/**
 * Records the phases a call went through and rejects illegal jumps.
 */
export class PhaseTracker {
  private readonly history: RewardPhase[] = ['validating'];

  get current(): RewardPhase {
    return this.history[this.history.length - 1] ?? 'validating';
  }

  transition(next: RewardPhase): void {
    if (!PHASE_TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal reward phase transition: ${this.current} -> ${next}`);
    }
    this.history.push(next);
  }

  get phases(): RewardPhase[] {
    return [...this.history];
  }
}

export interface RewardOrchestratorDeps {
  logger: Logger;
  /** Shared with the owning session; built from config when omitted */
  normalizer?: NormalizationStrategy | undefined;
  diagnostics?: IDiagnosticSink | undefined;
  metrics?: Metrics | undefined;
  /** Bound on a single diagnostic delivery (default: 50ms) */
  diagnosticTimeoutMs?: number | undefined;
  /** Monotonic clock in ms, for the latency budget */
  now?: (() => number) | undefined;
}

export interface ComputeRewardOptions {
  /** Aborts the call if triggered before the normalization lock is taken */
  signal?: AbortSignal | undefined;
  /** Tick snapshot, copied into the diagnostic record */
  context?: TickContext | undefined;
  /** Warnings raised before the call (e.g. by the event source), reported first */
  carriedWarnings?: readonly RewardWarning[] | undefined;
}

export class RewardOrchestrator {
  readonly config: RewardConfig;
  readonly fingerprint: string;
  private readonly logger: Logger;
  private readonly aggregation: AggregationStrategy;
  private readonly normalizer: NormalizationStrategy;
  private readonly diagnostics: IDiagnosticSink | undefined;
  private readonly metrics: Metrics;
  private readonly diagnosticTimeoutMs: number;
  private readonly now: () => number;

  constructor(config: Partial<RewardConfig>, deps: RewardOrchestratorDeps) {
    this.config = resolveRewardConfig(config);
    this.fingerprint = fingerprintConfig(this.config);
    this.logger = deps.logger.child({ component: 'orchestrator' });
    this.aggregation = getAggregationStrategy(this.config.aggregation);
    this.normalizer = deps.normalizer ?? createNormalizer(this.config);
    this.diagnostics = deps.diagnostics;
    this.metrics = deps.metrics ?? createMetrics();
    this.diagnosticTimeoutMs = deps.diagnosticTimeoutMs ?? DEFAULT_DIAGNOSTIC_TIMEOUT_MS;
    this.now = deps.now ?? (() => performance.now());
  }

  /**
   * Compute the reward for one batch.
   *
   * @throws SchemaViolationError when the batch is malformed
   * @throws RewardCancelledError when aborted before the state update
   */
  async computeReward(
    events: readonly EventRecord[],
    options: ComputeRewardOptions = {}
  ): Promise<ScalarReward> {
    const { reward } = await this.evaluate(events, options);
    return reward;
  }

  /**
   * Compute the reward and return the diagnostic record alongside it.
   */
  async evaluate(
    events: readonly EventRecord[],
    options: ComputeRewardOptions = {}
  ): Promise<RewardOutcome> {
    const startedAt = this.now();
    const tracker = new PhaseTracker();
    const warnings: RewardWarning[] = [...(options.carriedWarnings ?? [])];

    let validated: ValidatedEventSequence;
    try {
      validated = validateEvents(events);
    } catch (error) {
      if (isSchemaViolation(error)) {
        tracker.transition('failed');
        this.metrics.counter('reward_schema_violations_total', { reason: error.reason });
        this.logger.warn(
          { reason: error.reason, index: error.index, phases: tracker.phases },
          `Rejected event batch: ${error.message}`
        );
      }
      throw error;
    }

    let reward: ScalarReward;
    let state: NormalizationState;

    if (validated.isEmpty) {
      tracker.transition('completed');
      warnings.push({ code: 'EMPTY_INPUT', message: 'Empty event batch, neutral reward returned' });
      reward = { value: 0, raw: 0, normalized: false };
      state = this.normalizer.snapshot();
    } else {
      tracker.transition('aggregating');
      const raw = sanitizeRaw(this.aggregation.aggregate(validated, this.config.discountRate), warnings);

      if (!this.config.normalize) {
        tracker.transition('completed');
        reward = { value: this.clip(raw, warnings), raw, normalized: false };
        state = this.normalizer.snapshot();
      } else {
        tracker.transition('normalizing');
        const outcome = await this.normalizer.normalize(raw, options.signal);
        warnings.push(...outcome.warnings);
        tracker.transition('completed');
        reward = { value: this.clip(outcome.value, warnings), raw, normalized: outcome.standardized };
        state = outcome.state;
      }
    }

    const durationMs = this.now() - startedAt;
    if (durationMs > this.config.latencyBudgetMs) {
      warnings.push({
        code: 'LATENCY_EXCEEDED',
        message: 'Reward computation exceeded its latency budget',
        detail: { durationMs, budgetMs: this.config.latencyBudgetMs },
      });
      this.logger.warn(
        { durationMs, budgetMs: this.config.latencyBudgetMs },
        'Reward computation over latency budget'
      );
    }

    const diagnostic: RewardDiagnostic = {
      raw: reward.raw,
      normalizedValue: reward.value,
      normalized: reward.normalized,
      runningMean: state.runningMean,
      runningVariance: state.runningVariance,
      count: state.count,
      configFingerprint: this.fingerprint,
      warnings,
      phases: tracker.phases,
      durationMs,
      sessionId: options.context?.sessionId,
      tick: options.context?.tick,
    };

    this.record(diagnostic);
    this.publish(diagnostic);

    return { reward, diagnostic };
  }

  getNormalizationState(): NormalizationState {
    return this.normalizer.snapshot();
  }

  /**
   * Clamp into the configured clip range, flagging the clamp.
   */
  private clip(value: number, warnings: RewardWarning[]): number {
    const [lo, hi] = this.config.clipRange;
    const clipped = Math.min(hi, Math.max(lo, value));
    if (clipped !== value && !warnings.some((w) => w.code === 'OUT_OF_RANGE_OUTPUT')) {
      warnings.push({
        code: 'OUT_OF_RANGE_OUTPUT',
        message: `Value clamped into [${String(lo)}, ${String(hi)}]`,
        detail: { value, clipped },
      });
    }
    return clipped;
  }

  private record(diagnostic: RewardDiagnostic): void {
    this.metrics.counter('reward_computations_total');
    this.metrics.histogram('reward_compute_duration_ms', diagnostic.durationMs);
    this.metrics.gauge('reward_running_mean', diagnostic.runningMean);
    this.metrics.gauge('reward_running_variance', diagnostic.runningVariance);
    for (const warning of diagnostic.warnings) {
      this.metrics.counter('reward_warnings_total', { code: warning.code });
    }
    this.logger.debug(
      {
        raw: diagnostic.raw,
        value: diagnostic.normalizedValue,
        count: diagnostic.count,
        warnings: diagnostic.warnings.map((w) => w.code),
      },
      'Reward computed'
    );
  }

  /**
   * Fire-and-forget delivery to the diagnostic sink.
   */
  private publish(diagnostic: RewardDiagnostic): void {
    const sink = this.diagnostics;
    if (!sink) return;
    void this.deliver(sink, diagnostic);
  }

  private async deliver(sink: IDiagnosticSink, diagnostic: RewardDiagnostic): Promise<void> {
    try {
      await withTimeout(
        Promise.resolve().then(() => sink.record(diagnostic)),
        this.diagnosticTimeoutMs,
        'Diagnostic delivery'
      );
    } catch (error) {
      this.metrics.counter('reward_diagnostic_failures_total');
      this.logger.warn(
        { error: error instanceof Error ? error.message : String(error) },
        'Diagnostic delivery failed'
      );
    }
  }
}

/**
 * Replace overflowed aggregates with the nearest finite value.
 */
export function sanitizeRaw(raw: number, warnings: RewardWarning[]): number {
  if (Number.isFinite(raw)) return raw;
  const sanitized = Number.isNaN(raw) ? 0 : Math.sign(raw) * Number.MAX_VALUE;
  warnings.push({
    code: 'RAW_OVERFLOW',
    message: 'Aggregated value overflowed, replaced with nearest finite value',
    detail: { raw: String(raw), sanitized },
  });
  return sanitized;
}
