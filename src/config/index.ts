/**
 * Config module exports.
 */

export type {
  AggregationStrategyName,
  MergedConfig,
  NormalizationStrategyName,
  RewardConfig,
  RewardConfigFile,
} from './config-schema.js';
export {
  AGGREGATION_STRATEGIES,
  CONFIG_FILE_VERSION,
  DEFAULT_CONFIG,
  DEFAULT_REWARD_CONFIG,
  NORMALIZATION_STRATEGIES,
  rewardConfigSchema,
} from './config-schema.js';
export {
  CONFIG_FILE_NAME,
  ConfigLoader,
  createConfigLoader,
  loadConfig,
  resolveRewardConfig,
} from './config-loader.js';
