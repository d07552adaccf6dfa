import { readdir } from 'fs/promises';
import { basename, extname, join, relative, resolve, sep } from 'path';
import type { ScanOptions, ScanRecord } from './types.js';
import { logger } from '../utils/logger.js';
import { isRegularFile, readDirSafe } from '../utils/fs-utils.js';

/** Extensions recognized as audiobook audio, lowercase */
export const AUDIO_EXTENSIONS: ReadonlySet<string> = new Set([
  '.mp3',
  '.m4a',
  '.m4b',
  '.flac',
  '.ogg',
  '.aac',
  '.wav',
]);

export function isAudioFile(fileName: string): boolean {
  return AUDIO_EXTENSIONS.has(extname(fileName).toLowerCase());
}

/**
 * Convert a relative path to the "/"-joined form used as tracker key
 */
export function toTrackingKey(relativePath: string): string {
  return relativePath.split(sep).join('/');
}

function compileIgnorePatterns(patterns: string[] = []): RegExp[] {
  return patterns.map(pattern => new RegExp(pattern));
}

/**
 * Walk the tree below `root` and yield one record per folder that directly
 * contains audio files. The root itself is not reported.
 */
export async function* scanAudiobookFolders(
  root: string,
  options: ScanOptions = {}
): AsyncGenerator<ScanRecord> {
  const rootPath = resolve(root);
  const ignore = compileIgnorePatterns(options.ignoreFilePatterns);
  const isIgnored = (name: string): boolean => ignore.some(regex => regex.test(name));

  // An unreadable root is an error, unlike unreadable subdirectories
  const rootEntries = await readdir(rootPath, { withFileTypes: true });

  for (const entry of sortByName(rootEntries)) {
    if (entry.isDirectory() && !isIgnored(entry.name)) {
      yield* walkFolder(rootPath, join(rootPath, entry.name), isIgnored);
    }
  }
}

async function* walkFolder(
  rootPath: string,
  folderPath: string,
  isIgnored: (name: string) => boolean
): AsyncGenerator<ScanRecord> {
  const entries = await readDirSafe(folderPath);
  if (entries === null) {
    return;
  }

  const visible = sortByName(entries).filter(entry => !isIgnored(entry.name));
  const audioFiles: string[] = [];
  for (const entry of visible) {
    if (isAudioFile(entry.name) && (await isRegularFile(folderPath, entry))) {
      audioFiles.push(entry.name);
    }
  }

  const relativePath = toTrackingKey(relative(rootPath, folderPath));

  if (audioFiles.length > 0) {
    const parentRelative = relativePath.split('/').slice(0, -1);
    yield {
      relativePath,
      fullPath: folderPath,
      folderName: basename(folderPath),
      parentName: parentRelative.length > 0 ? parentRelative[parentRelative.length - 1] : '',
      files: visible.map(entry => entry.name),
      audioFiles,
    };
  } else {
    logger.debug(`No audio files in: ${relativePath}`);
  }

  for (const entry of visible) {
    if (entry.isDirectory()) {
      yield* walkFolder(rootPath, join(folderPath, entry.name), isIgnored);
    }
  }
}

function sortByName<T extends { name: string }>(entries: T[]): T[] {
  return [...entries].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}
