import * as fs from 'fs/promises';
import * as path from 'path';
import type { BookMetadata } from '../metadata/types.js';
import { synthesizeFolderNames } from '../naming/folder-name.js';
import { logger } from '../utils/logger.js';
import { isRegularFile } from '../utils/fs-utils.js';

/** Sidecar written next to the copied files when enabled */
export const SIDECAR_FILE_NAME = 'book-metadata.json';

export interface OrganizeOptions {
  /** Write the resolver's metadata document as book-metadata.json */
  writeSidecar?: boolean;
}

export interface OrganizeResult {
  targetDir: string;
  copiedFiles: string[];
}

/**
 * Compute the book's directory under the output root:
 * author/[series/]title
 */
export function resolveTargetDir(metadata: BookMetadata, outputRoot: string): string {
  const names = synthesizeFolderNames(metadata);
  return names.series
    ? path.join(outputRoot, names.author, names.series, names.title)
    : path.join(outputRoot, names.author, names.title);
}

/**
 * Copy the regular files of `sourceDir` into the normalized target directory.
 * Sources are left untouched; existing files at the destination are overwritten.
 */
export async function organizeBook(
  sourceDir: string,
  metadata: BookMetadata,
  outputRoot: string,
  options: OrganizeOptions = {}
): Promise<OrganizeResult> {
  const targetDir = resolveTargetDir(metadata, outputRoot);
  await fs.mkdir(targetDir, { recursive: true });

  const entries = await fs.readdir(sourceDir, { withFileTypes: true });
  const copiedFiles: string[] = [];

  for (const entry of entries) {
    if (!(await isRegularFile(sourceDir, entry))) {
      continue;
    }

    const srcPath = path.join(sourceDir, entry.name);
    const destPath = path.join(targetDir, entry.name);

    logger.debug(`  Copying: ${entry.name}`);
    await fs.copyFile(srcPath, destPath);

    const stats = await fs.stat(srcPath);
    await fs.utimes(destPath, stats.atime, stats.mtime);

    copiedFiles.push(entry.name);
  }

  if (options.writeSidecar) {
    await fs.writeFile(
      path.join(targetDir, SIDECAR_FILE_NAME),
      `${JSON.stringify(metadata.document, null, 2)}\n`,
      'utf-8'
    );
  }

  return { targetDir, copiedFiles };
}
