import { z } from 'zod';

/**
 * Registered aggregation strategies. `discounted-sum` is canonical.
 */
export const AGGREGATION_STRATEGIES = ['discounted-sum', 'discounted-mean'] as const;
export type AggregationStrategyName = (typeof AGGREGATION_STRATEGIES)[number];

/**
 * Registered normalization strategies. `exponential` is canonical.
 */
export const NORMALIZATION_STRATEGIES = ['exponential', 'cumulative'] as const;
export type NormalizationStrategyName = (typeof NORMALIZATION_STRATEGIES)[number];

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

/**
 * Output clip range. Both bounds must sit inside [-1, 1] so the reward
 * invariant holds whatever the configuration says.
 */
const clipRangeSchema = z
  .tuple([z.number().finite(), z.number().finite()])
  .refine(([lo, hi]) => lo >= -1 && lo <= hi && hi <= 1, {
    message: 'clipRange must satisfy -1 <= lo <= hi <= 1',
  });

const rewardConfigShape = z.object({
  /** Exponential decay per unit of timestamp (>= 0) */
  discountRate: z.number().finite().nonnegative(),
  /** Effective window of the running statistics; decay = 2 / (windowSize + 1) */
  windowSize: z.number().int().positive(),
  clipRange: clipRangeSchema,
  /** When false the normalizer is skipped and raw is clamped into clipRange */
  normalize: z.boolean(),
  /** Soft per-call budget; exceeding it only flags the call */
  latencyBudgetMs: z.number().finite().positive(),
  /** Added to the variance before the square root */
  epsilon: z.number().finite().positive(),
  /** Below this variance standardization is bypassed */
  varianceFloor: z.number().finite().nonnegative(),
  aggregation: z.enum(AGGREGATION_STRATEGIES),
  normalization: z.enum(NORMALIZATION_STRATEGIES),
});

export const rewardConfigSchema = rewardConfigShape.strict();

export type RewardConfig = z.infer<typeof rewardConfigSchema>;

const sessionConfigShape = z.object({
  /** Timeout for calls to the event source, evaluator and diagnostic sink */
  boundaryTimeoutMs: z.number().finite().positive(),
});

const loggingConfigShape = z.object({
  level: z.enum(LOG_LEVELS),
  pretty: z.boolean(),
  logDir: z.string().min(1),
  maxFiles: z.number().int().positive(),
});

const pathsConfigShape = z.object({
  data: z.string().min(1),
  config: z.string().min(1),
  logs: z.string().min(1),
});

/**
 * Reward configuration file schema (data/config/reward.json).
 * Every section and field is optional; defaults fill the gaps.
 */
export const rewardConfigFileSchema = z
  .object({
    /** Schema version for migrations */
    version: z.number().int().positive(),
    reward: rewardConfigShape.partial().strict().optional(),
    session: sessionConfigShape.partial().strict().optional(),
    logging: loggingConfigShape.partial().strict().optional(),
  })
  .strict();

export type RewardConfigFile = z.infer<typeof rewardConfigFileSchema>;

/**
 * Merged application configuration.
 *
 * Result of merging, lowest priority first:
 * 1. Hardcoded defaults
 * 2. Config file values
 * 3. Environment variables
 */
export const mergedConfigSchema = z.object({
  reward: rewardConfigSchema,
  session: sessionConfigShape,
  logging: loggingConfigShape,
  paths: pathsConfigShape,
});

export type MergedConfig = z.infer<typeof mergedConfigSchema>;

export const DEFAULT_REWARD_CONFIG: RewardConfig = {
  discountRate: 0.05,
  windowSize: 100,
  clipRange: [-1, 1],
  normalize: true,
  latencyBudgetMs: 5,
  epsilon: 1e-6,
  varianceFloor: 1e-9,
  aggregation: 'discounted-sum',
  normalization: 'exponential',
};

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: MergedConfig = {
  reward: DEFAULT_REWARD_CONFIG,
  session: {
    boundaryTimeoutMs: 50,
  },
  logging: {
    level: 'info',
    pretty: true,
    logDir: 'data/logs',
    maxFiles: 10,
  },
  paths: {
    data: 'data',
    config: 'data/config',
    logs: 'data/logs',
  },
};

/**
 * Current config file schema version.
 */
export const CONFIG_FILE_VERSION = 1;
