import type { ScanRecord } from '../scanner/types.js';

/**
 * How a folder left the pipeline in this run
 */
export type FolderOutcomeKind =
  | 'already-tracked' // tracker already holds a decision
  | 'no-metadata' // resolver failed or returned nothing
  | 'low-confidence' // title confidence below the accepted levels
  | 'dry-run' // accepted, but nothing was written
  | 'organized'; // copied into the output tree

export interface FolderOutcome {
  relativePath: string;
  kind: FolderOutcomeKind;
  /** Whether .force_process was present */
  forced: boolean;
  confidence?: string;
  targetDir?: string;
}

/**
 * Aggregated run results
 */
export interface RunSummary {
  foldersFound: number;
  counts: Record<FolderOutcomeKind, number>;
  outcomes: FolderOutcome[];
  duration: number;
  startTime: Date;
  endTime: Date;
}

/**
 * Progress callback, called before each folder is processed
 */
export type FolderProgressCallback = (record: ScanRecord) => void;
