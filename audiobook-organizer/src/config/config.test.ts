import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { configFromEnv, loadConfig, mergeConfigs, validateConfig } from './config.js';
import { DEFAULT_CONFIG } from './defaults.js';
import type { Config } from './types.js';

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'audiobook-organizer-config-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeConfig(content: unknown): Promise<string> {
    const configPath = path.join(tempDir, 'config.json');
    await fs.writeFile(configPath, JSON.stringify(content, null, 2));
    return configPath;
  }

  it('should merge a partial config file with defaults', async () => {
    const configPath = await writeConfig({
      inputPath: '/books/incoming',
      outputPath: '/books/library',
      resolver: { model: 'qwen2.5:7b' },
    });

    const config = await loadConfig(configPath, {});

    expect(config.inputPath).toBe('/books/incoming');
    expect(config.outputPath).toBe('/books/library');
    expect(config.trackerPath).toBe('/config/tracker.json');
    expect(config.resolver).toEqual({
      provider: 'ollama',
      model: 'qwen2.5:7b',
      apiEndpoint: 'http://localhost:11434',
      timeoutMs: 30000,
    });
    expect(config.acceptedConfidence).toEqual(['high', 'very_high']);
  });

  it('should let environment variables override the config file', async () => {
    const configPath = await writeConfig({ outputPath: '/books/library', dryRun: false });

    const config = await loadConfig(configPath, {
      OUTPUT_PATH: '/srv/audiobooks',
      CONFIG_PATH: '/srv/state',
      DRY_RUN: 'TRUE',
      AI_MODEL: 'llama3',
      AI_TIMEOUT_MS: '5000',
    });

    expect(config.outputPath).toBe('/srv/audiobooks');
    expect(config.trackerPath).toBe(path.join('/srv/state', 'tracker.json'));
    expect(config.dryRun).toBe(true);
    expect(config.resolver.model).toBe('llama3');
    expect(config.resolver.timeoutMs).toBe(5000);
  });

  it('should throw error for missing explicit file', async () => {
    const configPath = path.join(tempDir, 'nonexistent.json');

    await expect(loadConfig(configPath, {})).rejects.toThrow('config file not found or invalid');
  });

  it('should throw error for invalid JSON in explicit file', async () => {
    const configPath = path.join(tempDir, 'invalid.json');
    await fs.writeFile(configPath, 'invalid json{{{');

    await expect(loadConfig(configPath, {})).rejects.toThrow('config file not found or invalid');
  });

  it('should reject an output root inside the input root', async () => {
    const configPath = await writeConfig({ inputPath: '/books', outputPath: '/books/library' });

    await expect(loadConfig(configPath, {})).rejects.toThrow('outputPath must not be inside inputPath');
  });
});

describe('configFromEnv', () => {
  it('should prefer TRACKER_PATH over CONFIG_PATH', () => {
    const config = configFromEnv({ CONFIG_PATH: '/state', TRACKER_PATH: '/elsewhere/ledger.json' });

    expect(config.trackerPath).toBe('/elsewhere/ledger.json');
  });

  it('should treat only "true" as a true flag', () => {
    expect(configFromEnv({ DEBUG: 'true' }).debug).toBe(true);
    expect(configFromEnv({ DEBUG: 'yes' }).debug).toBe(false);
  });

  it('should return no resolver section when no AI variables are set', () => {
    expect(configFromEnv({ INPUT_PATH: '/in' })).toEqual({ inputPath: '/in' });
  });

  it('should reject an unknown provider', () => {
    expect(() => configFromEnv({ AI_PROVIDER: 'openai' })).toThrow('unknown AI_PROVIDER "openai"');
  });

  it('should reject a non-numeric timeout', () => {
    expect(() => configFromEnv({ AI_TIMEOUT_MS: 'soon' })).toThrow('AI_TIMEOUT_MS must be a number');
  });
});

describe('mergeConfigs', () => {
  it('should apply later configs over earlier ones', () => {
    const config = mergeConfigs(
      { inputPath: '/a', resolver: { model: 'first' } },
      null,
      { inputPath: '/b', resolver: { provider: 'local' } }
    );

    expect(config.inputPath).toBe('/b');
    expect(config.resolver.model).toBe('first');
    expect(config.resolver.provider).toBe('local');
  });

  it('should lowercase accepted confidence levels', () => {
    const config = mergeConfigs({ acceptedConfidence: ['HIGH', ' Very_High '] });

    expect(config.acceptedConfidence).toEqual(['high', 'very_high']);
  });

  it('should not mutate the defaults', () => {
    mergeConfigs({ resolver: { model: 'changed' } });

    expect(DEFAULT_CONFIG.resolver.model).toBe('mixtral');
  });
});

describe('validateConfig', () => {
  function withOverrides(overrides: Partial<Config>): Config {
    return { ...DEFAULT_CONFIG, resolver: { ...DEFAULT_CONFIG.resolver }, ...overrides };
  }

  it('should accept the defaults', () => {
    expect(() => validateConfig(withOverrides({}))).not.toThrow();
  });

  it('should reject an empty input path', () => {
    expect(() => validateConfig(withOverrides({ inputPath: '  ' }))).toThrow('inputPath must be a non-empty path');
  });

  it('should reject output equal to input', () => {
    expect(() => validateConfig(withOverrides({ inputPath: '/books', outputPath: '/books/' }))).toThrow(
      'outputPath must not be inside inputPath'
    );
  });

  it('should allow sibling directories that share a prefix', () => {
    expect(() => validateConfig(withOverrides({ inputPath: '/books', outputPath: '/books-library' }))).not.toThrow();
  });

  it('should reject a non-positive timeout', () => {
    const config = withOverrides({});
    config.resolver.timeoutMs = 0;

    expect(() => validateConfig(config)).toThrow('resolver.timeoutMs must be greater than 0');
  });

  it('should reject an empty confidence list', () => {
    expect(() => validateConfig(withOverrides({ acceptedConfidence: [] }))).toThrow(
      'acceptedConfidence must list at least one level'
    );
  });

  it('should reject invalid ignore patterns', () => {
    expect(() => validateConfig(withOverrides({ ignoreFilePatterns: ['('] }))).toThrow('invalid ignore pattern "("');
  });
});
