/**
 * Path Utilities
 */

import { extname, basename } from 'node:path';

const INVALID_FILENAME_CHARS = /[<>:"/\\|?*]/g;

/**
 * Replace characters that are invalid in filenames on common filesystems
 */
export function sanitizeFilename(filename: string): string {
  return filename.replace(INVALID_FILENAME_CHARS, '_');
}

export function hasInvalidFilenameChars(filename: string): boolean {
  return /[<>:"/\\|?*]/.test(filename);
}

/**
 * Get base filename without extension
 */
export function getBasename(filename: string): string {
  const ext = extname(filename);
  return basename(filename, ext);
}

/**
 * Ensure an extension starts with a dot ("mkv" -> ".mkv")
 */
export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim();
  if (trimmed === '') return '';
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}
