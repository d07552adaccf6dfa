import type { ResolverConfig } from '../config/types.js';
import type { MetadataResolver } from './types.js';
import { OllamaResolver } from './providers/ollama.js';
import { LocalResolver } from './providers/local.js';

export type {
  AuthorName,
  BookTitle,
  BookMetadata,
  JsonObject,
  JsonValue,
  MetadataResolver,
  ResolveRequest,
} from './types.js';
export { normalizeMetadata } from './normalize.js';
export { OllamaResolver } from './providers/ollama.js';
export { LocalResolver } from './providers/local.js';

/**
 * Create a metadata resolver from config.
 */
export function createMetadataResolver(config: ResolverConfig): MetadataResolver {
  switch (config.provider) {
    case 'ollama':
      return new OllamaResolver({
        model: config.model,
        apiEndpoint: config.apiEndpoint,
        timeoutMs: config.timeoutMs,
        maxTokens: config.maxTokens,
      });

    case 'local':
      return new LocalResolver();

    default:
      throw new Error(`Unknown metadata resolver provider: ${String(config.provider)}`);
  }
}
