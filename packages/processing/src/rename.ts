/**
 * Renaming
 *
 * Two flavours: appending a file's resolution to its name, and a regex
 * find/replace over a selection. The regex rename is planned first so the
 * caller can show every new name before anything on disk changes.
 */

import { basename, dirname, extname, join } from 'node:path';
import {
  createLogger,
  getBasename,
  getErrorMessage,
  hasInvalidFilenameChars,
  isErrnoException,
  moveFile,
  pathExists,
} from '@vidtool/utils';
import { InvalidArgumentError } from '@vidtool/core';
import type { MediaInfo } from '@vidtool/media';
import type { OperationSummary } from './fileOperations.js';

const log = createLogger({ module: 'rename' });

/**
 * `<stem>-<W>x<H><ext>` beside the original
 */
export function resolutionFilename(file: string, mediaInfo: MediaInfo): string {
  return join(dirname(file), `${getBasename(file)}-${mediaInfo.resolution}${extname(file)}`);
}

/**
 * Rename a file in place to carry its resolution. Returns the new path,
 * or null when a file with that name already exists.
 */
export async function renameWithResolution(file: string, mediaInfo: MediaInfo): Promise<string | null> {
  const target = resolutionFilename(file, mediaInfo);

  try {
    await moveFile(file, target);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'EEXIST') {
      log.info({ file, target }, 'Target exists, not renaming');
      return null;
    }
    throw error;
  }

  log.info({ from: file, to: target }, 'Renamed');
  return target;
}

// ============================================
// REGEX RENAME
// ============================================

export type RenameStatus = 'ok' | 'unchanged' | 'exists' | 'empty-name' | 'invalid-characters';

export interface RenamePlanEntry {
  source: string;
  /** Equal to the source name unless the status is `ok` or `exists` */
  newName: string;
  target: string;
  status: RenameStatus;
}

export interface RegexRenameOptions {
  caseSensitive?: boolean;
}

/**
 * Compile a find pattern; every match in a name is replaced
 */
export function compileFindPattern(find: string, caseSensitive = false): RegExp {
  if (find === '') {
    throw new InvalidArgumentError('find pattern', 'must not be empty');
  }
  try {
    return new RegExp(find, caseSensitive ? 'g' : 'gi');
  } catch (error) {
    throw new InvalidArgumentError('find pattern', getErrorMessage(error));
  }
}

/**
 * Work out the new name of every file. `replace` takes `$1`, `$<name>`
 * and `$&` references. Nothing is renamed.
 */
export async function planRegexRename(
  files: readonly string[],
  find: string,
  replace: string,
  options: RegexRenameOptions = {}
): Promise<RenamePlanEntry[]> {
  const pattern = compileFindPattern(find, options.caseSensitive);
  const claimed = new Set<string>();
  const plan: RenamePlanEntry[] = [];

  for (const source of files) {
    const name = basename(source);
    const replaced = name.replace(pattern, replace);
    const entry = (newName: string, status: RenameStatus): RenamePlanEntry => ({
      source,
      newName,
      target: join(dirname(source), newName),
      status,
    });

    if (replaced === name) {
      plan.push(entry(name, 'unchanged'));
    } else if (replaced.trim() === '') {
      plan.push(entry(name, 'empty-name'));
    } else if (hasInvalidFilenameChars(replaced)) {
      plan.push(entry(name, 'invalid-characters'));
    } else {
      const target = join(dirname(source), replaced);
      const taken = claimed.has(target) || await pathExists(target);
      claimed.add(target);
      plan.push(entry(replaced, taken ? 'exists' : 'ok'));
    }
  }

  return plan;
}

function planError(entry: RenamePlanEntry): string | null {
  const name = basename(entry.source);
  switch (entry.status) {
    case 'empty-name':
      return `${name}: the new name would be empty`;
    case 'invalid-characters':
      return `${name}: the new name contains invalid characters`;
    default:
      return null;
  }
}

/**
 * Carry out the `ok` entries of a plan. Entries whose target exists are
 * skipped; unusable names count as failures.
 */
export async function applyRenamePlan(plan: readonly RenamePlanEntry[]): Promise<OperationSummary> {
  const summary: OperationSummary = { operation: 'rename', succeeded: 0, skipped: 0, errors: [] };

  for (const entry of plan) {
    const problem = planError(entry);
    if (problem) {
      summary.errors.push(problem);
      continue;
    }
    if (entry.status === 'exists') {
      log.info({ source: entry.source, target: entry.target }, 'Target exists, not renaming');
      summary.skipped++;
      continue;
    }
    if (entry.status !== 'ok') continue;

    try {
      await moveFile(entry.source, entry.target);
      summary.succeeded++;
      log.info({ from: entry.source, to: entry.target }, 'Renamed');
    } catch (error) {
      summary.errors.push(`${basename(entry.source)}: ${getErrorMessage(error)}`);
      log.error({ source: entry.source, error: getErrorMessage(error) }, 'Rename failed');
    }
  }

  return summary;
}
