/**
 * Configuration types for audiobook-organizer
 */

/** Metadata resolver backends */
export type ResolverProvider = 'ollama' | 'local';

/** Metadata resolver configuration */
export interface ResolverConfig {
  /** Which resolver answers metadata requests */
  provider: ResolverProvider;
  /** Model name for the LLM provider (e.g., "mixtral", "qwen2.5:7b") */
  model: string;
  /** Ollama API endpoint */
  apiEndpoint: string;
  /** Per-request timeout; a timed-out request counts as no metadata */
  timeoutMs: number;
  /** Maximum tokens per request */
  maxTokens?: number;
}

export interface Config {
  /** Root directory scanned for audiobook folders */
  inputPath: string;
  /** Root of the Author/Series/Title output tree */
  outputPath: string;
  /** JSON document holding per-folder processing decisions */
  trackerPath: string;
  debug: boolean;
  dryRun: boolean;
  /** Write book-metadata.json next to the copied files */
  writeSidecar: boolean;
  /** Title confidence levels that allow a folder to be organized */
  acceptedConfidence: string[];
  /** Regex patterns for entry names the scanner ignores */
  ignoreFilePatterns: string[];
  resolver: ResolverConfig;
}
