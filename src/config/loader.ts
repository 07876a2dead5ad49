/**
 * Configuration Loader
 *
 * Loads configuration from YAML files with environment-specific overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { RuntimeConfigSchema, type RuntimeConfig } from '../types/schemas/config.js';
import { ConfigurationError } from '../utils/errors.js';
import { parseOrThrow } from '../utils/validation.js';
import type { LogLevel } from '../utils/logger.js';

export type Environment = 'production' | 'development' | 'test';

/**
 * Configuration Schema (matches runtime.yaml structure once overrides are applied)
 */
export type Config = RuntimeConfig;

/**
 * camelCase view of the limiter-related settings
 */
export interface LimiterConfig {
  maxConcurrentPerTag: number;
  runnerConcurrency: number;
  terminationTimeoutMs: number;
  logLevel: LogLevel | 'silent';
  loggerName: string;
}

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects; arrays and scalars from source replace target
 */
function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const output: ConfigRecord = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = output[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

function resolveEnvironment(environment?: Environment): Environment {
  const env = environment ?? process.env.NODE_ENV;
  return env === 'production' || env === 'test' ? env : 'development';
}

/**
 * Load configuration from YAML file
 *
 * @throws {ConfigurationError} If the file is missing, unparsable or invalid
 */
export function loadConfig(configPath?: string, environment?: Environment): Config {
  const finalPath = configPath ?? join(findPackageRoot(), 'config', 'runtime.yaml');

  let document: unknown;
  try {
    document = yaml.load(readFileSync(finalPath, 'utf8'));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigurationError(
        `Configuration file not found: ${finalPath}. ` +
          `Please ensure config/runtime.yaml exists in the project root.`,
        [],
        error
      );
    }
    throw new ConfigurationError(
      `Failed to load configuration: ${String(error)}`,
      [],
      error instanceof Error ? error : undefined
    );
  }

  if (!isRecord(document)) {
    throw new ConfigurationError(`Failed to load configuration: ${finalPath} is not a YAML mapping`);
  }

  const { environments, ...base } = document;
  let merged: ConfigRecord = base;
  if (isRecord(environments)) {
    const override = environments[resolveEnvironment(environment)];
    if (isRecord(override)) {
      merged = deepMerge(base, override);
    }
  }

  return validateConfig(merged);
}

/**
 * Validate configuration values
 *
 * @throws {ConfigurationError} Listing every invalid field as "<path> <message>"
 */
export function validateConfig(config: unknown): Config {
  return parseOrThrow(RuntimeConfigSchema, config, 'Configuration');
}

/**
 * Global configuration instance
 */
let globalConfig: Config | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(configPath?: string, environment?: Environment): Config {
  globalConfig = loadConfig(configPath, environment);
  return globalConfig;
}

/**
 * Get global configuration
 */
export function getConfig(): Config {
  if (!globalConfig) {
    globalConfig = initializeConfig();
  }
  return globalConfig;
}

/**
 * Reset global configuration (for testing)
 */
export function resetConfig(): void {
  globalConfig = null;
}

/**
 * Convert YAML config (snake_case) to LimiterConfig (camelCase)
 */
export function getLimiterConfig(): LimiterConfig {
  const config = getConfig();

  return {
    maxConcurrentPerTag: config.tagged_limiter.max_concurrent_per_tag,
    runnerConcurrency: config.task_runner.concurrency,
    terminationTimeoutMs: config.task_runner.termination_timeout_ms,
    logLevel: config.logging.level,
    loggerName: config.logging.name,
  };
}
