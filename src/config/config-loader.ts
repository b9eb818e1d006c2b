import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ZodError } from 'zod';
import { ConfigError } from '../core/reward-errors.js';
import type { MergedConfig, RewardConfig, RewardConfigFile } from './config-schema.js';
import {
  CONFIG_FILE_VERSION,
  DEFAULT_CONFIG,
  DEFAULT_REWARD_CONFIG,
  mergedConfigSchema,
  rewardConfigFileSchema,
  rewardConfigSchema,
} from './config-schema.js';

export const CONFIG_FILE_NAME = 'reward.json';

/**
 * ConfigLoader - loads and merges configuration from multiple sources.
 *
 * Priority (highest wins):
 * 1. Environment variables
 * 2. Config file (data/config/reward.json)
 * 3. Hardcoded defaults
 *
 * The merged result is validated again after environment overrides.
 */
export class ConfigLoader {
  private readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;
  private loadedConfig: RewardConfigFile | null = null;
  private warnings: string[] = [];

  constructor(configPath = DEFAULT_CONFIG.paths.config, env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.env = env;
  }

  /**
   * Load and merge configuration from all sources.
   */
  async load(): Promise<MergedConfig> {
    this.warnings = [];
    this.loadedConfig = await this.loadConfigFile();

    const defaults = this.deepClone(DEFAULT_CONFIG);
    defaults.paths.config = this.configPath;

    const config = this.loadedConfig ? this.mergeConfigFile(defaults, this.loadedConfig) : defaults;

    this.mergeEnvironment(config);

    return this.validate(config, 'Invalid configuration');
  }

  /**
   * Get the raw loaded config file (for debugging).
   */
  getLoadedConfigFile(): RewardConfigFile | null {
    return this.loadedConfig;
  }

  /**
   * Non-fatal problems found by the last load(), for logging once a logger exists.
   */
  getWarnings(): string[] {
    return [...this.warnings];
  }

  private async loadConfigFile(): Promise<RewardConfigFile | null> {
    const filePath = join(this.configPath, CONFIG_FILE_NAME);

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        // No file - defaults apply
        return null;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Failed to read ${filePath}: ${message}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Failed to parse ${filePath}: ${message}`);
    }

    const result = rewardConfigFileSchema.safeParse(json);
    if (!result.success) {
      throw new ConfigError(`Invalid config file ${filePath}`, formatIssues(result.error));
    }

    if (result.data.version > CONFIG_FILE_VERSION) {
      // Logger isn't built yet at this point; the caller logs these later
      this.warnings.push(
        `Config file version (${String(result.data.version)}) is newer than supported (${String(CONFIG_FILE_VERSION)})`
      );
    }

    return result.data;
  }

  private mergeConfigFile(config: MergedConfig, file: RewardConfigFile): MergedConfig {
    return this.validate(
      {
        ...config,
        reward: { ...config.reward, ...file.reward },
        session: { ...config.session, ...file.session },
        logging: { ...config.logging, ...file.logging },
      },
      'Invalid configuration after applying config file'
    );
  }

  private validate(candidate: unknown, message: string): MergedConfig {
    const result = mergedConfigSchema.safeParse(candidate);
    if (!result.success) {
      throw new ConfigError(message, formatIssues(result.error));
    }
    return result.data;
  }

  /**
   * Override config with environment variables.
   */
  private mergeEnvironment(config: MergedConfig): void {
    const discountRate = this.env['REWARD_DISCOUNT_RATE'];
    if (discountRate) {
      config.reward.discountRate = parseNumber('REWARD_DISCOUNT_RATE', discountRate);
    }

    const windowSize = this.env['REWARD_WINDOW_SIZE'];
    if (windowSize) {
      config.reward.windowSize = parseNumber('REWARD_WINDOW_SIZE', windowSize);
    }

    const normalize = this.env['REWARD_NORMALIZE'];
    if (normalize) {
      config.reward.normalize = parseBoolean('REWARD_NORMALIZE', normalize);
    }

    const latencyBudget = this.env['REWARD_LATENCY_BUDGET_MS'];
    if (latencyBudget) {
      config.reward.latencyBudgetMs = parseNumber('REWARD_LATENCY_BUDGET_MS', latencyBudget);
    }

    const aggregation = this.env['REWARD_AGGREGATION'];
    const normalization = this.env['REWARD_NORMALIZATION'];
    if (aggregation || normalization) {
      // Strategy names are checked by the merged schema
      const strategies = rewardConfigSchema
        .pick({ aggregation: true, normalization: true })
        .safeParse({
          aggregation: aggregation ?? config.reward.aggregation,
          normalization: normalization ?? config.reward.normalization,
        });
      if (!strategies.success) {
        throw new ConfigError('Invalid strategy in environment', formatIssues(strategies.error));
      }
      config.reward.aggregation = strategies.data.aggregation;
      config.reward.normalization = strategies.data.normalization;
    }

    const boundaryTimeout = this.env['SESSION_BOUNDARY_TIMEOUT_MS'];
    if (boundaryTimeout) {
      config.session.boundaryTimeoutMs = parseNumber('SESSION_BOUNDARY_TIMEOUT_MS', boundaryTimeout);
    }

    const logLevel = this.env['LOG_LEVEL'];
    if (logLevel === 'debug' || logLevel === 'info' || logLevel === 'warn' || logLevel === 'error') {
      config.logging.level = logLevel;
    }

    const dataPath = this.env['DATA_PATH'];
    if (dataPath) {
      config.paths.data = dataPath;
      config.paths.logs = join(dataPath, 'logs');
      config.logging.logDir = config.paths.logs;
    }
  }

  private deepClone<T>(obj: T): T {
    return structuredClone(obj);
  }
}

/**
 * Merge a partial reward configuration over the defaults and validate it.
 * Used when the core is embedded without going through the loader.
 */
export function resolveRewardConfig(overrides: Partial<RewardConfig> = {}): RewardConfig {
  const result = rewardConfigSchema.safeParse({
    ...DEFAULT_REWARD_CONFIG,
    ...overrides,
  });
  if (!result.success) {
    throw new ConfigError('Invalid reward configuration', formatIssues(result.error));
  }
  return result.data;
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

function parseNumber(name: string, raw: string): number {
  const parsed = Number(raw);
  if (raw.trim() === '' || Number.isNaN(parsed)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  return parsed;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function parseBoolean(name: string, raw: string): boolean {
  const normalized = raw.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  throw new ConfigError(`${name} must be true/false, got "${raw}"`);
}

/**
 * Factory function for creating a config loader.
 */
export function createConfigLoader(configPath?: string): ConfigLoader {
  return new ConfigLoader(configPath);
}

/**
 * Load configuration from default paths.
 */
export async function loadConfig(configPath?: string): Promise<MergedConfig> {
  return createConfigLoader(configPath).load();
}
