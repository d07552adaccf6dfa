#!/usr/bin/env node

import { buildApplication, buildCommand, run } from '@stricli/core';
import type { CommandContext } from '@stricli/core';
import { loadConfig, validateConfig } from './config/config.js';
import type { Config, ResolverProvider } from './config/types.js';
import { createMetadataResolver } from './metadata/index.js';
import { StatusTracker } from './tracker/tracker.js';
import { OrganizeOrchestrator } from './pipeline/orchestrator.js';
import type { RunSummary } from './pipeline/types.js';
import { logger } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';

const VERSION = '0.1.0';

interface OrganizeFlags {
  config?: string;
  input?: string;
  output?: string;
  tracker?: string;
  provider?: ResolverProvider;
  model?: string;
  endpoint?: string;
  sidecar: boolean;
  prune: boolean;
  'dry-run': boolean;
  debug: boolean;
}

/**
 * Apply explicitly passed CLI flags over the loaded configuration
 */
function applyFlags(config: Config, flags: OrganizeFlags): Config {
  return {
    ...config,
    inputPath: flags.input ?? config.inputPath,
    outputPath: flags.output ?? config.outputPath,
    trackerPath: flags.tracker ?? config.trackerPath,
    // Boolean flags default to false, so they can only switch a setting on
    debug: config.debug || flags.debug,
    dryRun: config.dryRun || flags['dry-run'],
    writeSidecar: config.writeSidecar || flags.sidecar,
    resolver: {
      ...config.resolver,
      provider: flags.provider ?? config.resolver.provider,
      model: flags.model ?? config.resolver.model,
      apiEndpoint: flags.endpoint ?? config.resolver.apiEndpoint,
    },
  };
}

/**
 * Format duration in human-readable format
 */
function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(2)}s`;
  return `${(ms / 60000).toFixed(2)}m`;
}

function printSummary(summary: RunSummary, dryRun: boolean): void {
  const { counts } = summary;

  logger.info('');
  logger.info('='.repeat(60));
  logger.info(dryRun ? 'RUN SUMMARY (DRY RUN)' : 'RUN SUMMARY');
  logger.info('='.repeat(60));
  logger.info(`Folders found:        ${summary.foldersFound}`);
  logger.info(`Organized:            ${counts.organized}`);
  if (dryRun) {
    logger.info(`Would organize:       ${counts['dry-run']}`);
  }
  logger.info(`Skipped (no meta):    ${counts['no-metadata']}`);
  logger.info(`Skipped (low conf.):  ${counts['low-confidence']}`);
  logger.info(`Already tracked:      ${counts['already-tracked']}`);
  logger.info(`Duration:             ${formatDuration(summary.duration)}`);
  logger.info('');
}

const organizeCommand = buildCommand({
  docs: {
    brief: 'Organize audiobook folders into Author/Series/Title using resolved metadata',
  },
  parameters: {
    flags: {
      config: {
        kind: 'parsed',
        brief: 'Path to configuration file',
        parse: String,
        optional: true,
      },
      input: {
        kind: 'parsed',
        brief: 'Input directory to scan (overrides config and INPUT_PATH)',
        parse: String,
        optional: true,
      },
      output: {
        kind: 'parsed',
        brief: 'Output library root (overrides config and OUTPUT_PATH)',
        parse: String,
        optional: true,
      },
      tracker: {
        kind: 'parsed',
        brief: 'Tracker file path (overrides config and TRACKER_PATH)',
        parse: String,
        optional: true,
      },
      provider: {
        kind: 'enum',
        brief: 'Metadata resolver',
        values: ['ollama', 'local'] as const,
        optional: true,
      },
      model: {
        kind: 'parsed',
        brief: 'Ollama model name',
        parse: String,
        optional: true,
      },
      endpoint: {
        kind: 'parsed',
        brief: 'Ollama API endpoint',
        parse: String,
        optional: true,
      },
      sidecar: {
        kind: 'boolean',
        brief: 'Write book-metadata.json into each organized folder',
        default: false,
      },
      prune: {
        kind: 'boolean',
        brief: 'Remove tracker entries whose source folder no longer exists',
        default: false,
      },
      'dry-run': {
        kind: 'boolean',
        brief: 'Preview actions without copying files or updating the tracker',
        default: false,
      },
      debug: {
        kind: 'boolean',
        brief: 'Enable debug logging',
        default: false,
      },
    },
    aliases: {
      c: 'config',
      i: 'input',
      o: 'output',
      t: 'tracker',
      d: 'debug',
    },
  },
  async func(this: CommandContext, flags: OrganizeFlags): Promise<void> {
    if (flags.debug) {
      logger.setDebug(true);
    }

    logger.info(`audiobook-organizer v${VERSION}`);

    let config: Config;
    try {
      config = applyFlags(await loadConfig(flags.config), flags);
      validateConfig(config);
    } catch (error) {
      logger.error(`Failed to load configuration: ${errorMessage(error)}`);
      process.exitCode = 1;
      return;
    }

    logger.setDebug(config.debug);
    logger.debug(`Config: ${JSON.stringify(config, null, 2)}`);

    if (config.dryRun) {
      logger.info('[DRY RUN MODE] - No files will be copied and the tracker will not change');
    }

    try {
      const tracker = await StatusTracker.load(config.trackerPath);

      if (flags.prune) {
        if (config.dryRun) {
          logger.info('[DRY RUN] Skipping tracker prune');
        } else {
          const removed = await tracker.pruneMissing(config.inputPath);
          logger.info(`Pruned ${removed.length} stale tracker entries`);
          for (const key of removed) {
            logger.debug(`  Removed: ${key}`);
          }
        }
      }

      const orchestrator = new OrganizeOrchestrator({
        config,
        resolver: createMetadataResolver(config.resolver),
        tracker,
      });

      const summary = await orchestrator.run(record => {
        logger.debug(`Scanning: ${record.relativePath} (${record.audioFiles.length} audio files)`);
      });

      printSummary(summary, config.dryRun);
      logger.success('Audiobook organizer completed');
    } catch (error) {
      logger.error(errorMessage(error));
      process.exitCode = 1;
    }
  },
});

const app = buildApplication(organizeCommand, {
  name: 'audiobook-organizer',
  versionInfo: {
    currentVersion: VERSION,
  },
});

await run(app, process.argv.slice(2), { process });
