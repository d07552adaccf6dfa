import type { AuthorName, BookMetadata, BookTitle, JsonObject, JsonValue } from './types.js';
import { DEFAULT_CONFIDENCE } from './types.js';

/** Keys that make a reply count as metadata */
const KNOWN_FIELDS = [
  'author',
  'title',
  'series',
  'series_sequence',
  'series_index',
  'publish_year',
  'year',
  'narrator',
] as const;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Non-empty trimmed text from a string or number field */
function text(value: JsonValue | undefined): string | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? undefined : trimmed;
  }
  return undefined;
}

function normalizeAuthor(value: JsonValue | undefined): AuthorName | undefined {
  const scalar = text(value);
  if (scalar !== undefined) {
    return { kind: 'scalar', value: scalar };
  }
  if (isJsonObject(value)) {
    const first = text(value.first);
    const last = text(value.last);
    if (first !== undefined || last !== undefined) {
      return { kind: 'structured', first, last };
    }
  }
  return undefined;
}

function normalizeTitle(value: JsonValue | undefined): BookTitle | undefined {
  const scalar = text(value);
  if (scalar !== undefined) {
    return { kind: 'scalar', value: scalar };
  }
  if (isJsonObject(value)) {
    const main = text(value.main);
    const subtitle = text(value.subtitle);
    if (main !== undefined || subtitle !== undefined) {
      return { kind: 'structured', main, subtitle };
    }
  }
  return undefined;
}

function normalizeConfidence(value: JsonValue | undefined): string {
  if (isJsonObject(value) && typeof value.title === 'string' && value.title.trim() !== '') {
    return value.title.trim().toLowerCase();
  }
  return DEFAULT_CONFIDENCE;
}

/**
 * Turn a resolver reply into BookMetadata.
 * Returns null for anything that is not an object or carries none of the known fields.
 */
export function normalizeMetadata(document: unknown): BookMetadata | null {
  if (!isJsonObject(document)) {
    return null;
  }

  if (!KNOWN_FIELDS.some(field => document[field] !== undefined && document[field] !== null)) {
    return null;
  }

  return {
    author: normalizeAuthor(document.author),
    title: normalizeTitle(document.title),
    series: text(document.series),
    seriesSequence: text(document.series_sequence) ?? text(document.series_index),
    publishYear: text(document.publish_year) ?? text(document.year),
    narrator: text(document.narrator),
    titleConfidence: normalizeConfidence(document.confidence),
    document,
  };
}
