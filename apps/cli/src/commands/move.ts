/**
 * Move Command
 * 
 * Moves or copies files into a subfolder, numbering clashing names.
 */

import { resolve } from 'node:path';
import type { Command } from 'commander';
import { formatOperationSummary, moveToSubfolder } from '@vidtool/processing';
import { fail, printJson, wantsJson } from '../lib/output.js';

interface MoveFlags {
  into: string;
  base?: string;
  copy?: boolean;
  /** false when --no-create is given */
  create?: boolean;
}

export async function moveCommand(files: string[], options: MoveFlags, command: Command): Promise<void> {
  try {
    const result = await moveToSubfolder(files, {
      baseDir: resolve(options.base ?? '.'),
      folder: options.into,
      copy: options.copy === true,
      createFolder: options.create !== false,
    });

    if (wantsJson(command)) {
      printJson(result);
    } else {
      console.log(formatOperationSummary(result));
    }
    if (result.errors.length > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    fail(error);
  }
}
