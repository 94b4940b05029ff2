/**
 * Select Command
 * 
 * Prints the files matching name and media criteria, one per line, so the
 * list can feed another command.
 */

import type { Command } from 'commander';
import { BatchFilter, selectFiles } from '@vidtool/processing';
import { createProber } from '../lib/context.js';
import { buildFilterCriteria, type SelectFlags } from '../lib/options.js';
import { fail, printJson, printWarning, wantsJson } from '../lib/output.js';

export async function selectCommand(files: string[], options: SelectFlags, command: Command): Promise<void> {
  try {
    const filter = new BatchFilter(buildFilterCriteria(options));
    const selected = await selectFiles(files, filter, createProber());

    if (wantsJson(command)) {
      printJson(selected);
      return;
    }
    if (selected.length === 0) {
      printWarning('No files match');
      return;
    }
    for (const file of selected) {
      console.log(file);
    }
  } catch (error) {
    fail(error);
  }
}
