/**
 * File Operations
 * 
 * Async filesystem helpers with ENOENT folded into return values.
 */

import { 
  mkdir, 
  stat, 
  rename, 
  unlink,
  access,
  constants,
} from 'node:fs/promises';
import type { Stats } from 'node:fs';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Stat a path, returning null if it doesn't exist
 */
export async function safeStat(filePath: string): Promise<Stats | null> {
  try {
    return await stat(filePath);
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return null;
    }
    throw error;
  }
}

export async function pathExists(filePath: string): Promise<boolean> {
  return (await safeStat(filePath)) !== null;
}

/**
 * Delete a file only if it exists and is zero bytes long.
 * Returns true when a file was removed.
 */
export async function removeIfEmpty(filePath: string): Promise<boolean> {
  const stats = await safeStat(filePath);
  if (!stats || !stats.isFile() || stats.size > 0) {
    return false;
  }
  await unlink(filePath);
  return true;
}

/**
 * Check the current process may create files in a directory
 */
export async function isWritableDir(dirPath: string): Promise<boolean> {
  try {
    await access(dirPath, constants.W_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Rename a file, refusing to replace an existing target
 */
export async function moveFile(
  source: string,
  destination: string
): Promise<void> {
  if (await pathExists(destination)) {
    const error: NodeJS.ErrnoException = new Error(`Destination already exists: ${destination}`);
    error.code = 'EEXIST';
    throw error;
  }
  await rename(source, destination);
}

export { isErrnoException };
