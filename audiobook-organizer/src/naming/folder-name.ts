import type { AuthorName, BookMetadata, BookTitle } from '../metadata/types.js';

/** Path segments for one book under the output root */
export interface FolderNames {
  author: string;
  /** Omitted when the book has no series */
  series?: string;
  title: string;
}

export const UNKNOWN_AUTHOR = 'Unknown';
export const UNTITLED = 'Untitled';

// Path separators, Windows-reserved characters and control characters
const UNSAFE_CHARACTERS = /[/\\:*?"<>|\u0000-\u001f\u007f]/g;

/**
 * Make a string usable as a single path segment.
 * "." and ".." style names become hyphens.
 */
export function sanitizeSegment(value: string): string {
  const sanitized = value.trim().replace(UNSAFE_CHARACTERS, '-');
  return /^\.+$/.test(sanitized) ? '-'.repeat(sanitized.length) : sanitized;
}

function authorSegment(author: AuthorName | undefined): string {
  if (!author) {
    return UNKNOWN_AUTHOR;
  }

  const rendered =
    author.kind === 'scalar'
      ? sanitizeSegment(author.value)
      : sanitizeSegment([author.last, author.first].filter(part => part?.trim()).join(', '));

  return rendered === '' ? UNKNOWN_AUTHOR : rendered;
}

function titleParts(title: BookTitle | undefined): { main?: string; subtitle?: string } {
  if (!title) return {};
  return title.kind === 'scalar' ? { main: title.value } : { main: title.main, subtitle: title.subtitle };
}

function titleSegment(metadata: BookMetadata): string {
  const parts: string[] = [];

  if (metadata.seriesSequence) {
    parts.push(`Vol ${sanitizeSegment(metadata.seriesSequence)}`);
  }

  if (metadata.publishYear) {
    parts.push(sanitizeSegment(metadata.publishYear));
  }

  const { main, subtitle } = titleParts(metadata.title);
  parts.push((main && sanitizeSegment(main)) || UNTITLED);

  const cleanSubtitle = subtitle && sanitizeSegment(subtitle);
  if (cleanSubtitle) {
    parts.push(cleanSubtitle);
  }

  // Narrator rides on the last component, never a component of its own
  const narrator = metadata.narrator && sanitizeSegment(metadata.narrator);
  if (narrator) {
    parts[parts.length - 1] += ` {${narrator}}`;
  }

  return parts.join(' - ');
}

/**
 * Derive author, series and title folder names from book metadata
 */
export function synthesizeFolderNames(metadata: BookMetadata): FolderNames {
  const names: FolderNames = {
    author: authorSegment(metadata.author),
    title: titleSegment(metadata),
  };

  const series = metadata.series && sanitizeSegment(metadata.series);
  if (series) {
    names.series = series;
  }

  return names;
}
