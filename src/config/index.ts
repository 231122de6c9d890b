/**
 * Configuration management module
 * Handles loading, merging, and validating configuration from multiple sources
 */

import { cosmiconfig } from 'cosmiconfig';
import { parse as parseYaml } from 'yaml';
import path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_FILE_NAMES, ENV_VARS } from './defaults.js';
import { ConfigurationError, errorMessage } from '../errors.js';

// Re-export schema types
export * from './schema.js';
export * from './defaults.js';
export * from './providers.js';

/**
 * Configuration loader using cosmiconfig
 */
const explorer = cosmiconfig('docsurvey', {
  searchPlaces: CONFIG_FILE_NAMES,
  loaders: {
    '.yaml': (_filepath: string, content: string) => parseYaml(content),
    '.yml': (_filepath: string, content: string) => parseYaml(content),
    noExt: (_filepath: string, content: string) => parseYaml(content),
  },
});

/**
 * Options for loadConfig()
 */
export interface LoadConfigOptions {
  /** Directory to search for a config file (defaults to process.cwd()) */
  cwd?: string;
  /** Explicit config file; takes precedence over searching */
  configPath?: string;
  /** Environment to read overrides from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
}

export interface LoadedConfig {
  config: Config;
  /** Path of the file the config was read from, or null when using defaults */
  filepath: string | null;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge configuration objects
 * Arrays and scalars in source replace those in target
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Load the config file, either the explicit one or the first found by search
 */
async function loadFileConfig(
  options: LoadConfigOptions
): Promise<{ data: Record<string, unknown>; filepath: string | null }> {
  let result: Awaited<ReturnType<typeof explorer.search>>;
  try {
    result = options.configPath
      ? await explorer.load(path.resolve(options.configPath))
      : await explorer.search(options.cwd);
  } catch (error) {
    const source = options.configPath ?? 'configuration file';
    throw new ConfigurationError(`Failed to read ${source}: ${errorMessage(error)}`, { cause: error });
  }

  if (!result || result.isEmpty) {
    return { data: {}, filepath: result?.filepath ?? null };
  }

  if (!isPlainObject(result.config)) {
    throw new ConfigurationError(`Configuration file ${result.filepath} must contain a mapping at the top level`);
  }

  return { data: result.config, filepath: result.filepath };
}

/**
 * Load configuration overrides from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  const provider = env[ENV_VARS.AI_PROVIDER];
  if (provider) {
    config.ai_providers = { default: provider };
  }

  const level = env[ENV_VARS.DETECTION_LEVEL];
  if (level) {
    const parsed = Number(level);
    if (!Number.isInteger(parsed) || parsed < 1) {
      throw new ConfigurationError(
        `${ENV_VARS.DETECTION_LEVEL} must be a positive integer, got "${level}"`
      );
    }
    config.project_detection = { level: parsed };
  }

  if (env[ENV_VARS.LOG_LEVEL] === 'debug') {
    config.output = { verbose: true };
  }

  return config;
}

/**
 * Format zod issues as "path: message" lines
 */
function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate a merged configuration object
 */
export function validateConfig(raw: Record<string, unknown>): Config {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(result.error.issues)}`);
  }
  return result.data;
}

/**
 * Load and merge configuration from all sources
 * Priority: env vars > config file > defaults
 *
 * @throws ConfigurationError when the file is malformed or a value is out of range
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const { data, filepath } = await loadFileConfig(options);
  const envConfig = loadEnvConfig(options.env);

  let merged = deepMerge(DEFAULT_CONFIG, data);
  merged = deepMerge(merged, envConfig);

  return { config: validateConfig(merged), filepath };
}

/**
 * Apply CLI overrides on top of a loaded configuration
 */
export function applyOverrides(
  config: Config,
  overrides: { provider?: string; level?: number; concurrency?: number; verbose?: boolean }
): Config {
  const patch: Record<string, unknown> = {};

  if (overrides.provider !== undefined) {
    patch.ai_providers = { default: overrides.provider };
  }
  if (overrides.level !== undefined) {
    patch.project_detection = { level: overrides.level };
  }
  if (overrides.concurrency !== undefined) {
    patch.analysis = { concurrency: overrides.concurrency };
  }
  if (overrides.verbose) {
    patch.output = { verbose: true };
  }

  return validateConfig(deepMerge(config, patch));
}
