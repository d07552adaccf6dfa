import * as fs from 'fs/promises';
import * as path from 'path';
import type { ScanRecord } from '../scanner/types.js';

/** Sidecar text files whose first lines are shown to the model */
const PREVIEW_EXTENSIONS = new Set(['.txt', '.nfo', '.json', '.opf']);
const PREVIEW_LINES = 5;
const MAX_LISTED_FILES = 50;

/**
 * Read the first lines of small text files in the folder.
 * Returns a map of filename → preview for files that exist and are readable.
 */
export async function readTextPreviews(
  record: ScanRecord,
  maxFileSize: number = 100 * 1024, // 100 KB limit for text files
): Promise<Record<string, string>> {
  const previews: Record<string, string> = {};

  for (const fileName of record.files) {
    if (!PREVIEW_EXTENSIONS.has(path.extname(fileName).toLowerCase())) {
      continue;
    }

    try {
      const fullPath = path.join(record.fullPath, fileName);
      const stats = await fs.stat(fullPath);

      // Skip directories and files that are too large
      if (!stats.isFile() || stats.size > maxFileSize) {
        continue;
      }

      const content = await fs.readFile(fullPath, 'utf-8');
      previews[fileName] = content.split(/\r?\n/).slice(0, PREVIEW_LINES).join('\n');
    } catch {
      // Unreadable sidecars add nothing to the prompt
      continue;
    }
  }

  return previews;
}

/**
 * Build the LLM prompt for audiobook metadata extraction.
 */
export function buildMetadataPrompt(
  record: ScanRecord,
  previews: Record<string, string>,
  hint?: string,
): string {
  const parts = [
    'You are helping organize audiobook folders into an Author/Series/Title library.',
    '',
    `Folder: ${record.folderName}`,
  ];

  if (record.parentName) {
    parts.push(`Parent folder: ${record.parentName}`);
  }
  parts.push(`Relative path: ${record.relativePath}`);
  parts.push('');

  if (hint) {
    parts.push('Hint from the library owner:');
    parts.push(hint);
    parts.push('');
  }

  parts.push(`Files (${record.files.length} total, ${record.audioFiles.length} audio):`);
  for (const fileName of record.files.slice(0, MAX_LISTED_FILES)) {
    parts.push(`  - ${fileName}`);
  }
  if (record.files.length > MAX_LISTED_FILES) {
    parts.push(`  ... (${record.files.length - MAX_LISTED_FILES} more files)`);
  }
  parts.push('');

  if (Object.keys(previews).length > 0) {
    parts.push('Text file previews:');
    parts.push('');
    for (const [fileName, content] of Object.entries(previews)) {
      parts.push(`--- ${fileName} ---`);
      parts.push(content);
      parts.push('');
    }
  }

  parts.push(`TASK:

Identify the audiobook in this folder using the folder names, file names,
any hint, and the text file previews.

CONFIDENCE:
- "very_high": several sources agree on author and title
- "high": one reliable source names author and title
- "low": guessed, ambiguous or conflicting information

Respond with valid JSON only. Omit fields you cannot determine:
{
  "author": { "first": "Jane", "last": "Austen" },
  "title": { "main": "Emma", "subtitle": "A Novel" },
  "series": "Optional Series Name",
  "series_sequence": 1,
  "publish_year": 1815,
  "narrator": "Narrator Name",
  "confidence": { "title": "high" }
}`);

  return parts.join('\n');
}
