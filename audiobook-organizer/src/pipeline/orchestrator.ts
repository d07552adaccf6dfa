import { join } from 'path';
import type { Config } from '../config/types.js';
import type { MetadataResolver } from '../metadata/types.js';
import type { ScanRecord } from '../scanner/types.js';
import type { StatusTracker } from '../tracker/tracker.js';
import type { TrackerExtras, TrackerStatus } from '../tracker/types.js';
import type { FolderOutcome, FolderOutcomeKind, FolderProgressCallback, RunSummary } from './types.js';
import { scanAudiobookFolders } from '../scanner/traverser.js';
import { organizeBook, resolveTargetDir } from '../organizer/organizer.js';
import { logger } from '../utils/logger.js';
import { errorMessage, OrganizeError } from '../utils/errors.js';
import { isAccessible, isDirectory, readTextIfExists } from '../utils/fs-utils.js';

/** Sentinel file that bypasses the tracker and the confidence gate */
export const FORCE_MARKER = '.force_process';

/** Optional free-text hint passed to the resolver */
export const HINT_FILE = 'metadata_hint.txt';

export interface OrchestratorOptions {
  config: Config;
  resolver: MetadataResolver;
  tracker: StatusTracker;
}

function emptyCounts(): Record<FolderOutcomeKind, number> {
  return {
    'already-tracked': 0,
    'no-metadata': 0,
    'low-confidence': 0,
    'dry-run': 0,
    organized: 0,
  };
}

/**
 * Drives scan → tracker check → resolve → confidence gate → organize → record,
 * one folder at a time
 */
export class OrganizeOrchestrator {
  private readonly config: Config;
  private readonly resolver: MetadataResolver;
  private readonly tracker: StatusTracker;

  constructor(options: OrchestratorOptions) {
    this.config = options.config;
    this.resolver = options.resolver;
    this.tracker = options.tracker;
  }

  /**
   * Process every audiobook folder under the input root
   */
  async run(progressCallback?: FolderProgressCallback): Promise<RunSummary> {
    const startTime = new Date();
    const outcomes: FolderOutcome[] = [];
    const counts = emptyCounts();

    if (!(await isDirectory(this.config.inputPath))) {
      throw new Error(`Input path is not a directory: ${this.config.inputPath}`);
    }

    logger.info(`Scanning: ${this.config.inputPath}`);
    logger.debug(`Using ${this.resolver.name} resolver, ${this.tracker.size} tracked folders`);

    const folders = scanAudiobookFolders(this.config.inputPath, {
      ignoreFilePatterns: this.config.ignoreFilePatterns,
    });

    for await (const record of folders) {
      if (progressCallback) {
        progressCallback(record);
      }

      const outcome = await this.processFolder(record);
      outcomes.push(outcome);
      counts[outcome.kind]++;
    }

    const endTime = new Date();
    return {
      foldersFound: outcomes.length,
      counts,
      outcomes,
      duration: endTime.getTime() - startTime.getTime(),
      startTime,
      endTime,
    };
  }

  /**
   * Run one folder through the decision sequence
   */
  async processFolder(record: ScanRecord): Promise<FolderOutcome> {
    const { relativePath } = record;
    const forced = await isAccessible(join(record.fullPath, FORCE_MARKER));

    const existing = this.tracker.getStatus(relativePath);
    if (existing && !forced) {
      logger.debug(`Already ${existing}: ${relativePath}`);
      return { relativePath, kind: 'already-tracked', forced };
    }

    if (forced) {
      logger.info(`Force processing: ${relativePath}`);
    } else {
      logger.info(`Found candidate: ${relativePath}`);
    }

    const hint = await this.readHint(record);
    const metadata = await this.resolver.resolve({ record, hint });

    if (!metadata) {
      logger.warn(`No metadata for: ${relativePath}`);
      await this.record(relativePath, 'skipped', { reason: 'no metadata' });
      return { relativePath, kind: 'no-metadata', forced };
    }

    const confidence = metadata.titleConfidence;
    if (!this.config.acceptedConfidence.includes(confidence) && !forced) {
      logger.warn(`Metadata confidence too low (${confidence}) for: ${relativePath}`);
      await this.record(relativePath, 'skipped', {
        reason: 'low confidence',
        ai_confidence: confidence,
      });
      return { relativePath, kind: 'low-confidence', forced, confidence };
    }

    if (this.config.dryRun) {
      const targetDir = resolveTargetDir(metadata, this.config.outputPath);
      logger.info(`[DRY RUN] Would organize ${relativePath} -> ${targetDir}`);
      return { relativePath, kind: 'dry-run', forced, confidence, targetDir };
    }

    let targetDir: string;
    try {
      const result = await organizeBook(record.fullPath, metadata, this.config.outputPath, {
        writeSidecar: this.config.writeSidecar,
      });
      targetDir = result.targetDir;
      logger.success(`Organized ${relativePath} -> ${targetDir} (${result.copiedFiles.length} files)`);
    } catch (error) {
      throw new OrganizeError(relativePath, error);
    }

    await this.record(relativePath, 'processed', {
      ai_confidence: confidence,
      output_path: targetDir,
      source_path: record.fullPath,
    });
    return { relativePath, kind: 'organized', forced, confidence, targetDir };
  }

  /**
   * Trimmed content of the hint file; an unreadable hint is dropped
   */
  private async readHint(record: ScanRecord): Promise<string | undefined> {
    try {
      const text = await readTextIfExists(join(record.fullPath, HINT_FILE));
      return text?.trim() || undefined;
    } catch (error) {
      logger.warn(`Ignoring unreadable ${HINT_FILE} in ${record.relativePath}: ${errorMessage(error)}`);
      return undefined;
    }
  }

  /**
   * Write a decision to the tracker; in dry-run mode only log it
   */
  private async record(relativePath: string, status: TrackerStatus, extras: TrackerExtras): Promise<void> {
    if (this.config.dryRun) {
      logger.info(`[DRY RUN] Would mark ${relativePath} as ${status}`);
      return;
    }
    await this.tracker.markStatus(relativePath, status, extras);
  }
}
