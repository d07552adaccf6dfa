import type { ScanRecord } from '../scanner/types.js';

/** JSON value as found in resolver replies and the tracker document */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** Author as returned by a resolver: a display string or name parts */
export type AuthorName =
  | { kind: 'scalar'; value: string }
  | { kind: 'structured'; first?: string; last?: string };

/** Title as returned by a resolver: a plain string or main title plus subtitle */
export type BookTitle =
  | { kind: 'scalar'; value: string }
  | { kind: 'structured'; main?: string; subtitle?: string };

/** Confidence level used when a reply carries none */
export const DEFAULT_CONFIDENCE = 'low';

/**
 * Book metadata after normalization at the resolver boundary
 */
export interface BookMetadata {
  author?: AuthorName;
  title?: BookTitle;
  series?: string;
  seriesSequence?: string;
  publishYear?: string;
  narrator?: string;
  /** Qualitative trust in the title ("low", "high", "very_high", ...) */
  titleConfidence: string;
  /** The document as the resolver returned it */
  document: JsonObject;
}

/** Input handed to a resolver for one folder */
export interface ResolveRequest {
  record: ScanRecord;
  /** Free-text hint from metadata_hint.txt, if the folder has one */
  hint?: string;
}

/**
 * A source of book metadata for scanned folders
 */
export interface MetadataResolver {
  /** Provider name (e.g., "ollama", "local") */
  readonly name: string;

  /**
   * Resolve metadata for a folder.
   * Returns null when nothing usable came back; failures never throw.
   */
  resolve(request: ResolveRequest): Promise<BookMetadata | null>;
}
