/**
 * Rename Command
 *
 * Appends each file's resolution to its name, or with --find rewrites
 * names by regex.
 */

import chalk from 'chalk';
import type { Command } from 'commander';
import { getErrorMessage } from '@vidtool/utils';
import {
  applyRenamePlan,
  formatOperationSummary,
  planRegexRename,
  renameWithResolution,
  type RenamePlanEntry,
  type RenameStatus,
} from '@vidtool/processing';
import { createProber } from '../lib/context.js';
import { fail, printError, printJson, printSuccess, printWarning, wantsJson } from '../lib/output.js';

interface RenameFlags {
  find?: string;
  replace?: string;
  caseSensitive?: boolean;
  dryRun?: boolean;
}

interface RenameOutcome {
  file: string;
  renamed: string | null;
  error?: string;
}

const STATUS_LABELS: Record<RenameStatus, string> = {
  'ok': chalk.green('OK'),
  'unchanged': chalk.gray('no change'),
  'exists': chalk.yellow('file exists'),
  'empty-name': chalk.red('empty name'),
  'invalid-characters': chalk.red('invalid characters'),
};

function printPlan(plan: readonly RenamePlanEntry[]): void {
  for (const entry of plan) {
    console.log(`${entry.source} -> ${chalk.cyan(entry.newName)} [${STATUS_LABELS[entry.status]}]`);
  }
}

async function regexRename(files: string[], options: RenameFlags, command: Command): Promise<void> {
  const json = wantsJson(command);

  try {
    const plan = await planRegexRename(files, options.find ?? '', options.replace ?? '', {
      caseSensitive: options.caseSensitive === true,
    });

    if (options.dryRun) {
      if (json) printJson(plan);
      else printPlan(plan);
      return;
    }

    const summary = await applyRenamePlan(plan);
    if (json) {
      printJson({ plan, summary });
    } else {
      console.log(formatOperationSummary(summary));
    }
    if (summary.errors.length > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    fail(error);
  }
}

export async function renameCommand(files: string[], options: RenameFlags, command: Command): Promise<void> {
  if (options.find !== undefined) {
    await regexRename(files, options, command);
    return;
  }

  const json = wantsJson(command);
  const prober = createProber();
  const outcomes: RenameOutcome[] = [];

  for (const file of files) {
    try {
      const renamed = await renameWithResolution(file, await prober.getMediaInfo(file));
      outcomes.push({ file, renamed });
      if (json) continue;

      if (renamed) {
        printSuccess(`${file} -> ${renamed}`);
      } else {
        printWarning(`${file}: target already exists, not renamed`);
      }
    } catch (error) {
      outcomes.push({ file, renamed: null, error: getErrorMessage(error) });
      if (!json) printError(`${file}: ${getErrorMessage(error)}`);
    }
  }

  if (json) {
    printJson(outcomes);
  }
  if (outcomes.some(outcome => outcome.error !== undefined)) {
    process.exitCode = 1;
  }
}
