/**
 * EvaluationSession - one isolated reward stream, driven tick by tick.
 *
 * Each tick is a request/response: the session hands the orchestrator a
 * batch (given by the caller or pulled from the event source) together with
 * a read-only TickContext, then delivers the reward to the consumer. The
 * normalization statistics live exactly as long as the session and are
 * cleared by teardown().
 *
 * Boundary calls (source, consumer) are bounded by `boundaryTimeoutMs` and
 * fall back instead of retrying:
 * - source timeout/failure -> empty batch + SOURCE_UNAVAILABLE
 * - consumer timeout/failure -> logged, tick result still returned
 */

import { randomUUID } from 'node:crypto';
import type { RewardConfig } from '../config/config-schema.js';
import { DEFAULT_CONFIG } from '../config/config-schema.js';
import { resolveRewardConfig } from '../config/config-loader.js';
import { createMetrics } from '../core/metrics.js';
import { ConfigError, SessionClosedError } from '../core/reward-errors.js';
import { TimeoutError, withTimeout } from '../core/timeout.js';
import { createTickTraceContext, withTraceContext } from '../core/trace-context.js';
import type { IDiagnosticSink } from '../ports/diagnostics.js';
import type { IEventSource } from '../ports/event-source.js';
import type { IRewardConsumer } from '../ports/evaluator.js';
import type { EventRecord, TickContext } from '../types/event.js';
import type { Logger } from '../types/logger.js';
import type { Metrics } from '../types/metrics.js';
import type {
  NormalizationState,
  RewardDiagnostic,
  RewardWarning,
  ScalarReward,
} from '../types/reward.js';
import { createNormalizer, type NormalizationStrategy } from './normalizer.js';
import { RewardOrchestrator } from './orchestrator.js';

export interface EvaluationSessionDeps {
  logger: Logger;
  source?: IEventSource | undefined;
  consumer?: IRewardConsumer | undefined;
  diagnostics?: IDiagnosticSink | undefined;
  metrics?: Metrics | undefined;
  /** Monotonic clock in ms, for the latency budget */
  now?: (() => number) | undefined;
}

export interface EvaluationSessionOptions {
  sessionId?: string | undefined;
  /** Timeout for each boundary call (default: 50ms) */
  boundaryTimeoutMs?: number | undefined;
  /** Resume statistics from an earlier snapshot */
  initialState?: NormalizationState | undefined;
}

export interface TickResult {
  tick: number;
  reward: ScalarReward;
  diagnostic: RewardDiagnostic;
}

export interface SessionState {
  sessionId: string;
  tick: number;
  closed: boolean;
  normalization: NormalizationState;
}

export class EvaluationSession {
  readonly id: string;
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private readonly source: IEventSource | undefined;
  private readonly consumer: IRewardConsumer | undefined;
  private readonly boundaryTimeoutMs: number;
  private readonly normalizer: NormalizationStrategy;
  private readonly orchestrator: RewardOrchestrator;
  private tick = 0;
  private closed = false;

  constructor(
    config: Partial<RewardConfig>,
    deps: EvaluationSessionDeps,
    options: EvaluationSessionOptions = {}
  ) {
    const rewardConfig = resolveRewardConfig(config);
    this.id = options.sessionId ?? randomUUID();
    this.logger = deps.logger.child({ component: 'session', sessionId: this.id });
    this.metrics = deps.metrics ?? createMetrics();
    this.source = deps.source;
    this.consumer = deps.consumer;
    this.boundaryTimeoutMs = options.boundaryTimeoutMs ?? DEFAULT_CONFIG.session.boundaryTimeoutMs;
    this.normalizer = createNormalizer(rewardConfig, options.initialState);
    this.orchestrator = new RewardOrchestrator(rewardConfig, {
      logger: this.logger,
      normalizer: this.normalizer,
      diagnostics: deps.diagnostics,
      metrics: this.metrics,
      diagnosticTimeoutMs: this.boundaryTimeoutMs,
      now: deps.now,
    });
  }

  get configFingerprint(): string {
    return this.orchestrator.fingerprint;
  }

  /**
   * Score one tick.
   *
   * @param batch Events for this tick; pulled from the event source when omitted
   * @throws SessionClosedError after teardown(), or when teardown() lands
   *   while the event source is being read
   * @throws SchemaViolationError when the batch is malformed
   */
  async runTick(batch?: readonly EventRecord[], signal?: AbortSignal): Promise<TickResult> {
    if (this.closed) {
      throw new SessionClosedError(this.id);
    }
    if (!batch && !this.source) {
      throw new ConfigError('No event batch given and no event source configured');
    }

    this.tick++;
    const context: TickContext = Object.freeze({ sessionId: this.id, tick: this.tick });

    return withTraceContext(createTickTraceContext(this.id, context.tick), async () => {
      const carriedWarnings: RewardWarning[] = [];
      const events = batch ?? (await this.pullBatch(context, carriedWarnings));
      if (this.closed) {
        // Torn down while the source was answering
        throw new SessionClosedError(this.id);
      }

      const { reward, diagnostic } = await this.orchestrator.evaluate(events, {
        signal,
        context,
        carriedWarnings,
      });

      await this.deliver(reward, context);
      return { tick: context.tick, reward, diagnostic };
    });
  }

  /**
   * Close the session and clear its statistics.
   *
   * Ticks already holding or queued for the normalizer finish first; ticks
   * still waiting on the event source are rejected with SessionClosedError.
   *
   * @returns The statistics as they were before the reset
   */
  async teardown(): Promise<NormalizationState> {
    this.closed = true;
    const finalState = await this.normalizer.reset();
    this.logger.info({ ticks: this.tick, finalState }, 'Session torn down');
    return finalState;
  }

  getState(): SessionState {
    return {
      sessionId: this.id,
      tick: this.tick,
      closed: this.closed,
      normalization: this.normalizer.snapshot(),
    };
  }

  private async pullBatch(
    context: TickContext,
    warnings: RewardWarning[]
  ): Promise<readonly EventRecord[]> {
    const source = this.source;
    if (!source) return [];

    try {
      return await withTimeout(
        Promise.resolve().then(() => source.nextBatch(context)),
        this.boundaryTimeoutMs,
        `Event source ${source.name}`
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const timedOut = error instanceof TimeoutError;
      warnings.push({
        code: 'SOURCE_UNAVAILABLE',
        message: timedOut
          ? 'Event source timed out, tick scored as empty'
          : 'Event source failed, tick scored as empty',
        detail: { source: source.name, error: message, timedOut },
      });
      this.metrics.counter('reward_source_failures_total', { source: source.name });
      this.logger.warn({ source: source.name, error: message, timedOut }, 'Event source unavailable');
      return [];
    }
  }

  private async deliver(reward: ScalarReward, context: TickContext): Promise<void> {
    const consumer = this.consumer;
    if (!consumer) return;

    try {
      await withTimeout(
        Promise.resolve().then(() => consumer.consume(reward, context)),
        this.boundaryTimeoutMs,
        'Reward delivery'
      );
    } catch (error) {
      this.metrics.counter('reward_delivery_failures_total');
      this.logger.warn(
        { tick: context.tick, error: error instanceof Error ? error.message : String(error) },
        'Reward delivery failed'
      );
    }
  }
}
