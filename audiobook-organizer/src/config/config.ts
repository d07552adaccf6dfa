import { readFile } from 'fs/promises';
import { join, relative, isAbsolute, resolve } from 'path';
import { homedir } from 'os';
import type { Config, ResolverConfig, ResolverProvider } from './types.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { logger } from '../utils/logger.js';
import { isAccessible } from '../utils/fs-utils.js';
import { ConfigError, errorMessage } from '../utils/errors.js';

/** Partial config as found in a config file or the environment */
export type ConfigOverride = Partial<Omit<Config, 'resolver'>> & {
  resolver?: Partial<ResolverConfig>;
};

const PROVIDERS: readonly ResolverProvider[] = ['ollama', 'local'];

export function isResolverProvider(value: unknown): value is ResolverProvider {
  return typeof value === 'string' && (PROVIDERS as readonly string[]).includes(value);
}

/**
 * Load configuration from file
 */
async function loadConfigFile(path: string): Promise<ConfigOverride | null> {
  if (!(await isAccessible(path))) {
    return null;
  }

  try {
    const content = await readFile(path, 'utf-8');
    const config = JSON.parse(content) as ConfigOverride;
    logger.debug(`Loaded config from: ${path}`);
    return config;
  } catch (error) {
    logger.warn(`Failed to parse config file: ${path}`);
    logger.debug(`Error: ${errorMessage(error)}`);
    return null;
  }
}

function parseFlag(value: string): boolean {
  return value.toLowerCase() === 'true';
}

/**
 * Read overrides from environment variables
 */
export function configFromEnv(env: NodeJS.ProcessEnv): ConfigOverride {
  const config: ConfigOverride = {};
  const resolver: Partial<ResolverConfig> = {};

  if (env.INPUT_PATH) config.inputPath = env.INPUT_PATH;
  if (env.OUTPUT_PATH) config.outputPath = env.OUTPUT_PATH;
  if (env.CONFIG_PATH) config.trackerPath = join(env.CONFIG_PATH, 'tracker.json');
  // TRACKER_PATH wins over the CONFIG_PATH default
  if (env.TRACKER_PATH) config.trackerPath = env.TRACKER_PATH;
  if (env.DEBUG) config.debug = parseFlag(env.DEBUG);
  if (env.DRY_RUN) config.dryRun = parseFlag(env.DRY_RUN);

  if (env.AI_PROVIDER) {
    if (!isResolverProvider(env.AI_PROVIDER)) {
      throw new ConfigError(`unknown AI_PROVIDER "${env.AI_PROVIDER}"`);
    }
    resolver.provider = env.AI_PROVIDER;
  }
  if (env.AI_ENDPOINT) resolver.apiEndpoint = env.AI_ENDPOINT;
  if (env.AI_MODEL) resolver.model = env.AI_MODEL;
  if (env.AI_TIMEOUT_MS) {
    const timeoutMs = Number.parseInt(env.AI_TIMEOUT_MS, 10);
    if (Number.isNaN(timeoutMs)) {
      throw new ConfigError(`AI_TIMEOUT_MS must be a number, got "${env.AI_TIMEOUT_MS}"`);
    }
    resolver.timeoutMs = timeoutMs;
  }

  if (Object.keys(resolver).length > 0) {
    config.resolver = resolver;
  }
  return config;
}

/**
 * Merge configurations with precedence (later wins)
 */
export function mergeConfigs(...configs: Array<ConfigOverride | null>): Config {
  const merged: Config = {
    ...DEFAULT_CONFIG,
    resolver: { ...DEFAULT_CONFIG.resolver },
  };

  for (const config of configs) {
    if (!config) continue;

    if (config.inputPath !== undefined) merged.inputPath = config.inputPath;
    if (config.outputPath !== undefined) merged.outputPath = config.outputPath;
    if (config.trackerPath !== undefined) merged.trackerPath = config.trackerPath;
    if (config.debug !== undefined) merged.debug = config.debug;
    if (config.dryRun !== undefined) merged.dryRun = config.dryRun;
    if (config.writeSidecar !== undefined) merged.writeSidecar = config.writeSidecar;
    // Resolved confidence levels are lowercase
    if (config.acceptedConfidence) {
      merged.acceptedConfidence = config.acceptedConfidence.map(level => level.trim().toLowerCase());
    }
    if (config.ignoreFilePatterns) merged.ignoreFilePatterns = config.ignoreFilePatterns;
    if (config.resolver) {
      merged.resolver = {
        ...merged.resolver,
        ...config.resolver,
      };
    }
  }

  return merged;
}

/**
 * Returns true when `child` is `parent` or lies somewhere below it
 */
function isSameOrInside(parent: string, child: string): boolean {
  const rel = relative(resolve(parent), resolve(child));
  return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
}

/**
 * Validates the configuration
 * @throws ConfigError if configuration is invalid
 */
export function validateConfig(config: Config): void {
  for (const key of ['inputPath', 'outputPath', 'trackerPath'] as const) {
    if (typeof config[key] !== 'string' || config[key].trim() === '') {
      throw new ConfigError(`${key} must be a non-empty path`);
    }
  }

  if (isSameOrInside(config.inputPath, config.outputPath)) {
    throw new ConfigError('outputPath must not be inside inputPath');
  }

  if (!isResolverProvider(config.resolver.provider)) {
    throw new ConfigError(`unknown resolver provider "${String(config.resolver.provider)}"`);
  }

  if (!(config.resolver.timeoutMs > 0)) {
    throw new ConfigError('resolver.timeoutMs must be greater than 0');
  }

  if (config.acceptedConfidence.length === 0) {
    throw new ConfigError('acceptedConfidence must list at least one level');
  }

  for (const pattern of config.ignoreFilePatterns) {
    try {
      new RegExp(pattern);
    } catch (error) {
      throw new ConfigError(`invalid ignore pattern "${pattern}": ${errorMessage(error)}`);
    }
  }
}

/**
 * Load configuration with hierarchy:
 * 1. Environment variables (highest priority)
 * 2. Explicit config file path
 * 3. ~/.config/audiobook-organizer/config.json
 * 4. ./audiobook-organizer.json
 * 5. Default config (lowest priority)
 *
 * CLI flags are applied on top by the caller.
 */
export async function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
  const configs: Array<ConfigOverride | null> = [];

  // Try local config
  configs.push(await loadConfigFile('./audiobook-organizer.json'));

  // Try user config
  const userConfigPath = join(homedir(), '.config', 'audiobook-organizer', 'config.json');
  configs.push(await loadConfigFile(userConfigPath));

  // Try explicit config path
  if (configPath) {
    const explicitConfig = await loadConfigFile(configPath);
    if (!explicitConfig) {
      throw new ConfigError(`config file not found or invalid: ${configPath}`);
    }
    configs.push(explicitConfig);
  }

  configs.push(configFromEnv(env));

  const config = mergeConfigs(...configs);
  validateConfig(config);
  return config;
}
