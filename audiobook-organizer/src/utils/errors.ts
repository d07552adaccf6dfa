/**
 * Format an unknown thrown value for log output
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Configuration is missing, malformed or contradictory */
export class ConfigError extends Error {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = 'ConfigError';
  }
}

/** The persisted tracker document could not be read or has the wrong shape */
export class TrackerLoadError extends Error {
  constructor(
    readonly trackerPath: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Cannot load tracker ${trackerPath}: ${reason}`, options);
    this.name = 'TrackerLoadError';
  }
}

/** Copying a folder into the output tree failed */
export class OrganizeError extends Error {
  constructor(
    readonly relativePath: string,
    cause: unknown
  ) {
    super(`Failed to organize ${relativePath}: ${errorMessage(cause)}`, { cause });
    this.name = 'OrganizeError';
  }
}
