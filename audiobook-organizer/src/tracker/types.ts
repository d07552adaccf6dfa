import type { JsonValue } from '../metadata/types.js';

/** Recorded processing decision for a folder */
export type TrackerStatus = 'processed' | 'skipped';

export const TRACKER_STATUSES: readonly TrackerStatus[] = ['processed', 'skipped'];

/**
 * One folder's entry in the tracker document
 */
export interface TrackerEntry {
  status: TrackerStatus;
  /** UTC ISO-8601 time of the last update */
  timestamp: string;
  [field: string]: JsonValue;
}

/** Extra fields stored alongside status and timestamp */
export type TrackerExtras = Record<string, JsonValue>;

/** Relative folder path → entry */
export type TrackerDocument = Record<string, TrackerEntry>;
