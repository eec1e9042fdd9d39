/**
 * Configuration
 *
 * DEFAULT_CONFIG < environment < explicit overrides (CLI flags)
 */

import { BulkEngineError } from '../bulk-engine/types';
import type { UnbalancedBlockPolicy } from '../bulk-engine/types';

export interface BulkConfig {
  bulkSize: number;
  /** Where FileConsumer writes bulk files */
  logDir: string;
  maxConcurrency?: number;
  unbalancedBlocks: UnbalancedBlockPolicy;
  writeFiles: boolean;
  debug: boolean;
}

export const DEFAULT_CONFIG: BulkConfig = {
  bulkSize: 3,
  logDir: process.cwd(),
  unbalancedBlocks: 'ignore',
  writeFiles: true,
  debug: false,
};

export class ConfigError extends BulkEngineError {
  constructor(key: string, value: unknown, expected: string) {
    super(`Invalid ${key}: ${String(value)} (expected ${expected})`, 'INVALID_CONFIG', { key, value });
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

/**
 * Build the effective configuration
 */
export function loadConfig(overrides: Partial<BulkConfig> = {}, env: Env = process.env): BulkConfig {
  const config: BulkConfig = { ...DEFAULT_CONFIG, ...fromEnv(env) };

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(config, { [key]: value });
    }
  }

  validate(config);
  return config;
}

function fromEnv(env: Env): Partial<BulkConfig> {
  const config: Partial<BulkConfig> = {};

  if (env.BULK_SIZE !== undefined) {
    config.bulkSize = parsePositiveInt('bulkSize', env.BULK_SIZE);
  }
  if (env.BULK_LOG_DIR) {
    config.logDir = env.BULK_LOG_DIR;
  }
  if (env.BULK_MAX_CONCURRENCY !== undefined) {
    config.maxConcurrency = parsePositiveInt('maxConcurrency', env.BULK_MAX_CONCURRENCY);
  }
  if (env.BULK_UNBALANCED_BLOCKS !== undefined) {
    config.unbalancedBlocks = parseUnbalancedPolicy(env.BULK_UNBALANCED_BLOCKS);
  }
  if (env.BULK_WRITE_FILES !== undefined) {
    config.writeFiles = env.BULK_WRITE_FILES !== 'false';
  }
  if (env.DEBUG !== undefined) {
    config.debug = env.DEBUG === 'true';
  }

  return config;
}

/**
 * Parse a positive integer, rejecting partial numbers like "3abc"
 */
export function parsePositiveInt(key: string, raw: string): number {
  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(value) || value <= 0) {
    throw new ConfigError(key, raw, 'a positive integer');
  }
  return value;
}

export function parseUnbalancedPolicy(raw: string): UnbalancedBlockPolicy {
  const normalized = raw.trim().toLowerCase();
  if (normalized === 'ignore' || normalized === 'reject') {
    return normalized;
  }
  throw new ConfigError('unbalancedBlocks', raw, '"ignore" or "reject"');
}

function validate(config: BulkConfig): void {
  if (!Number.isInteger(config.bulkSize) || config.bulkSize <= 0) {
    throw new ConfigError('bulkSize', config.bulkSize, 'a positive integer');
  }
  if (
    config.maxConcurrency !== undefined &&
    (!Number.isInteger(config.maxConcurrency) || config.maxConcurrency <= 0)
  ) {
    throw new ConfigError('maxConcurrency', config.maxConcurrency, 'a positive integer');
  }
  if (config.logDir.length === 0) {
    throw new ConfigError('logDir', config.logDir, 'a directory path');
  }
}
