/**
 * File Operations
 *
 * Moving or copying a selection into a subfolder, and the shared summary
 * text for bulk rename, move and copy runs.
 */

import { copyFile, constants, stat, unlink, utimes } from 'node:fs/promises';
import { basename, extname, join, resolve } from 'node:path';
import {
  createLogger,
  ensureDir,
  getErrorMessage,
  isErrnoException,
  moveFile,
  pathExists,
  safeStat,
} from '@vidtool/utils';
import { InvalidArgumentError, TooManyCollisionsError } from '@vidtool/core';
import { MAX_INCREMENT } from './outputPath.js';

const log = createLogger({ module: 'file-ops' });

/** Failure lines shown before the "... and N more" notice */
export const MAX_LISTED_ERRORS = 5;

export type FileOperation = 'rename' | 'move' | 'copy';

const PAST_TENSE: Record<FileOperation, string> = {
  rename: 'Renamed',
  move: 'Moved',
  copy: 'Copied',
};

export interface OperationSummary {
  operation: FileOperation;
  succeeded: number;
  /** Left alone on purpose, e.g. a rename whose target exists */
  skipped: number;
  /** `<filename>: <message>` per failed file */
  errors: string[];
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

export function formatOperationSummary(summary: OperationSummary): string {
  const verb = PAST_TENSE[summary.operation];
  const { succeeded, skipped, errors } = summary;

  const lines = errors.length === 0
    ? [`Successfully ${verb.toLowerCase()} ${plural(succeeded, 'file')}.`]
    : [`${verb} ${plural(succeeded, 'file')} successfully.`];

  if (skipped > 0) {
    lines.push(`${plural(skipped, 'file')} skipped.`);
  }

  if (errors.length > 0) {
    lines.push(`${plural(errors.length, 'operation')} failed:`, '', ...errors.slice(0, MAX_LISTED_ERRORS));
    const hidden = errors.length - MAX_LISTED_ERRORS;
    if (hidden > 0) {
      lines.push(`... and ${plural(hidden, 'more error')}`);
    }
  }

  return lines.join('\n');
}

/**
 * `<dir>/<name>`, or the first free `<stem>_<n><ext>` when that is taken
 */
export async function uniqueTarget(directory: string, name: string): Promise<string> {
  const candidate = join(directory, name);
  if (!(await pathExists(candidate))) {
    return candidate;
  }

  const extension = extname(name);
  const stem = basename(name, extension);
  for (let counter = 1; counter <= MAX_INCREMENT; counter++) {
    const next = join(directory, `${stem}_${counter}${extension}`);
    if (!(await pathExists(next))) {
      return next;
    }
  }

  throw new TooManyCollisionsError(candidate, MAX_INCREMENT);
}

/**
 * Copy keeping timestamps; never replaces an existing target
 */
async function copyPreserving(source: string, target: string): Promise<void> {
  const stats = await stat(source);
  await copyFile(source, target, constants.COPYFILE_EXCL);
  await utimes(target, stats.atime, stats.mtime);
}

async function relocate(source: string, target: string): Promise<void> {
  try {
    await moveFile(source, target);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'EXDEV') {
      throw error;
    }
    await copyPreserving(source, target);
    await unlink(source);
  }
}

export interface SubfolderOptions {
  /** Directory the folder name is resolved against */
  baseDir: string;
  /** Folder name or relative path, e.g. `done` or `archive/2024` */
  folder: string;
  copy?: boolean;
  /** Create the folder when missing (default: true) */
  createFolder?: boolean;
}

export interface PlacedFile {
  source: string;
  target: string;
}

export interface SubfolderResult extends OperationSummary {
  targetDir: string;
  placed: PlacedFile[];
}

export async function moveToSubfolder(
  files: readonly string[],
  options: SubfolderOptions
): Promise<SubfolderResult> {
  const folder = options.folder.trim();
  if (folder === '') {
    throw new InvalidArgumentError('subfolder', 'a folder name is required');
  }

  const operation: FileOperation = options.copy ? 'copy' : 'move';
  const targetDir = resolve(options.baseDir, folder);
  const existing = await safeStat(targetDir);

  if (existing && !existing.isDirectory()) {
    throw new InvalidArgumentError('subfolder', `${targetDir} is not a directory`);
  }
  if (!existing) {
    if (options.createFolder === false) {
      throw new InvalidArgumentError('subfolder', `${targetDir} does not exist and folder creation is off`);
    }
    await ensureDir(targetDir);
    log.info({ targetDir }, 'Created folder');
  }

  const result: SubfolderResult = { operation, succeeded: 0, skipped: 0, errors: [], targetDir, placed: [] };

  for (const source of files) {
    try {
      const target = await uniqueTarget(targetDir, basename(source));
      if (operation === 'copy') {
        await copyPreserving(source, target);
      } else {
        await relocate(source, target);
      }
      result.placed.push({ source, target });
      result.succeeded++;
      log.info({ operation, source, target }, 'File placed');
    } catch (error) {
      result.errors.push(`${basename(source)}: ${getErrorMessage(error)}`);
      log.error({ operation, source, error: getErrorMessage(error) }, 'File operation failed');
    }
  }

  return result;
}
