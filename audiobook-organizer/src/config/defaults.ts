import type { Config } from './types.js';

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: Config = {
  inputPath: '/data/input',
  outputPath: '/data/output',
  trackerPath: '/config/tracker.json',
  debug: false,
  dryRun: false,
  writeSidecar: false,
  acceptedConfidence: ['high', 'very_high'],
  ignoreFilePatterns: [
    '^\\._', // macOS resource fork files (AppleDouble format)
    '^\\.DS_Store$', // macOS folder metadata
    '^Thumbs\\.db$', // Windows thumbnails
  ],
  resolver: {
    provider: 'ollama',
    model: 'mixtral',
    apiEndpoint: 'http://localhost:11434',
    timeoutMs: 30000,
  },
};
