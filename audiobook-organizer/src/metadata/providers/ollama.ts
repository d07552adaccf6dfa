import { Ollama } from 'ollama';
import type { BookMetadata, MetadataResolver, ResolveRequest } from '../types.js';
import { normalizeMetadata } from '../normalize.js';
import { buildMetadataPrompt, readTextPreviews } from '../prompt.js';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';

export interface OllamaResolverConfig {
  model: string;
  apiEndpoint?: string; // Default: http://127.0.0.1:11434
  timeoutMs: number;
  maxTokens?: number;
}

/**
 * Clean LLM response to extract valid JSON.
 * Removes markdown code blocks and any text around the outermost object.
 */
export function cleanJsonResponse(response: string): string {
  let cleaned = response.trim();

  // Remove markdown code blocks (```json ... ``` or ``` ... ```)
  cleaned = cleaned.replace(/^```(?:json)?\s*/i, '');
  cleaned = cleaned.replace(/\s*```\s*$/, '');

  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');
  if (start >= 0 && end >= start) {
    cleaned = cleaned.substring(start, end + 1);
  }

  return cleaned.trim();
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Resolves metadata by asking a model served by Ollama
 */
export class OllamaResolver implements MetadataResolver {
  readonly name = 'ollama';
  private client: Ollama;
  private config: OllamaResolverConfig;

  constructor(config: OllamaResolverConfig) {
    this.config = config;
    this.client = new Ollama({
      host: config.apiEndpoint || 'http://127.0.0.1:11434',
      // Every request gets its own deadline; an aborted fetch rejects like a network error
      fetch: (input, init) => fetch(input, { ...init, signal: AbortSignal.timeout(config.timeoutMs) }),
    });
  }

  async resolve(request: ResolveRequest): Promise<BookMetadata | null> {
    const previews = await readTextPreviews(request.record);
    const prompt = buildMetadataPrompt(request.record, previews, request.hint);
    logger.debug(`Querying ${this.config.model} for: ${request.record.relativePath}`);

    const document = await this.queryWithRetry(prompt, false);
    if (document === undefined) {
      return null;
    }

    const metadata = normalizeMetadata(document);
    if (!metadata) {
      logger.warn(`Model reply for ${request.record.relativePath} held no metadata`);
    }
    return metadata;
  }

  private async queryWithRetry(prompt: string, isRetry: boolean): Promise<unknown> {
    let raw: string;
    try {
      // Add JSON instruction to prompt if this is a retry
      const finalPrompt = isRetry
        ? `${prompt}\n\nIMPORTANT: Your previous response was not valid JSON. Please respond with ONLY valid JSON, no markdown formatting, no code blocks, no extra text. Start with { and end with }.`
        : prompt;

      const response = await this.client.generate({
        model: this.config.model,
        prompt: finalPrompt,
        format: 'json',
        stream: false,
        options: {
          num_predict: this.config.maxTokens,
        },
      });
      raw = response.response;
    } catch (error) {
      logger.warn(`Ollama query failed: ${errorMessage(error)}`);
      return undefined;
    }

    const parsed = parseJson(raw) ?? parseJson(cleanJsonResponse(raw));
    if (parsed !== undefined) {
      return parsed;
    }

    if (isRetry) {
      logger.warn('Failed to parse model reply as JSON after retry');
      logger.debug(`Raw response: ${raw}`);
      return undefined;
    }

    logger.debug('JSON parse failed, retrying with explicit instruction...');
    return this.queryWithRetry(prompt, true);
  }
}
