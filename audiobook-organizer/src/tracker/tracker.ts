import { mkdir, rename, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import type { TrackerDocument, TrackerEntry, TrackerExtras, TrackerStatus } from './types.js';
import { TRACKER_STATUSES } from './types.js';
import { isJsonObject } from '../metadata/normalize.js';
import { logger } from '../utils/logger.js';
import { errorMessage, TrackerLoadError } from '../utils/errors.js';
import { isDirectory, readTextIfExists } from '../utils/fs-utils.js';

function isTrackerStatus(value: unknown): value is TrackerStatus {
  return typeof value === 'string' && (TRACKER_STATUSES as readonly string[]).includes(value);
}

/**
 * Check the shape of a parsed tracker document
 */
function parseDocument(trackerPath: string, content: string): Map<string, TrackerEntry> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new TrackerLoadError(trackerPath, `invalid JSON (${errorMessage(error)})`, { cause: error });
  }

  if (!isJsonObject(parsed)) {
    throw new TrackerLoadError(trackerPath, 'expected a JSON object');
  }

  const entries = new Map<string, TrackerEntry>();
  for (const [key, value] of Object.entries(parsed)) {
    if (!isJsonObject(value)) {
      throw new TrackerLoadError(trackerPath, `entry "${key}" is not an object`);
    }
    const { status, timestamp } = value;
    if (!isTrackerStatus(status)) {
      throw new TrackerLoadError(trackerPath, `entry "${key}" has unknown status ${JSON.stringify(status)}`);
    }
    if (typeof timestamp !== 'string') {
      throw new TrackerLoadError(trackerPath, `entry "${key}" has no timestamp`);
    }
    entries.set(key, { ...value, status, timestamp });
  }
  return entries;
}

/**
 * Persisted ledger of per-folder processing decisions.
 *
 * The whole document is loaded once and rewritten after every mark, so a
 * crash loses at most the decision in flight. Not safe for concurrent runs.
 */
export class StatusTracker {
  private constructor(
    readonly trackerPath: string,
    private readonly tracked: Map<string, TrackerEntry>
  ) {}

  /**
   * Load the tracker; a missing file is an empty tracker, anything unreadable is fatal
   */
  static async load(trackerPath: string): Promise<StatusTracker> {
    let content: string | null;
    try {
      content = await readTextIfExists(trackerPath);
    } catch (error) {
      throw new TrackerLoadError(trackerPath, errorMessage(error), { cause: error });
    }

    if (content === null) {
      logger.debug(`No tracker at ${trackerPath}, starting empty`);
      return new StatusTracker(trackerPath, new Map());
    }

    const tracked = parseDocument(trackerPath, content);
    logger.debug(`Loaded ${tracked.size} tracker entries from ${trackerPath}`);
    return new StatusTracker(trackerPath, tracked);
  }

  getStatus(relativePath: string): TrackerStatus | undefined {
    return this.getEntry(relativePath)?.status;
  }

  getEntry(relativePath: string): TrackerEntry | undefined {
    return this.tracked.get(relativePath);
  }

  /** Snapshot of the whole mapping */
  entries(): TrackerDocument {
    return Object.fromEntries(
      [...this.tracked].map(([key, entry]): [string, TrackerEntry] => [key, structuredClone(entry)])
    );
  }

  get size(): number {
    return this.tracked.size;
  }

  /**
   * Set or overwrite the entry for a folder and persist immediately
   */
  async markStatus(
    relativePath: string,
    status: TrackerStatus,
    extras: TrackerExtras = {}
  ): Promise<TrackerEntry> {
    const entry: TrackerEntry = {
      ...extras,
      status,
      timestamp: new Date().toISOString(),
    };
    this.tracked.set(relativePath, entry);
    await this.save();
    return entry;
  }

  /**
   * Drop entries whose source folder no longer exists under `inputRoot`.
   * Returns the removed keys.
   */
  async pruneMissing(inputRoot: string): Promise<string[]> {
    const removed: string[] = [];
    for (const key of [...this.tracked.keys()]) {
      if (!(await isDirectory(join(inputRoot, ...key.split('/'))))) {
        this.tracked.delete(key);
        removed.push(key);
      }
    }

    if (removed.length > 0) {
      await this.save();
    }
    return removed;
  }

  private async save(): Promise<void> {
    await mkdir(dirname(this.trackerPath), { recursive: true });
    const tempPath = `${this.trackerPath}.tmp`;
    const document: TrackerDocument = Object.fromEntries(this.tracked);
    await writeFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
    await rename(tempPath, this.trackerPath);
  }
}
