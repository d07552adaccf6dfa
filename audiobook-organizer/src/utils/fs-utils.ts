import { readdir, readFile, stat } from 'fs/promises';
import type { Dirent } from 'fs';
import { join } from 'path';
import { logger } from './logger.js';
import { errorMessage } from './errors.js';

/**
 * Check if a path is accessible
 */
export async function isAccessible(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path exists and is a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Read directory entries safely, returning null when the directory cannot be read
 */
export async function readDirSafe(path: string): Promise<Dirent[] | null> {
  try {
    return await readdir(path, { withFileTypes: true });
  } catch (error) {
    logger.warn(`Cannot read directory: ${path}`);
    logger.debug(`Error: ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Check if a directory entry is a regular file, following symlinks.
 * Dangling links are not files.
 */
export async function isRegularFile(dirPath: string, entry: Dirent): Promise<boolean> {
  if (entry.isFile()) {
    return true;
  }
  if (!entry.isSymbolicLink()) {
    return false;
  }
  try {
    return (await stat(join(dirPath, entry.name))).isFile();
  } catch {
    return false;
  }
}

/**
 * Read a UTF-8 text file, returning null if it does not exist
 */
export async function readTextIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}
