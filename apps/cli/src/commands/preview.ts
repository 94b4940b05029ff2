/**
 * Preview Command
 * 
 * Prints the output path each file would get, without encoding.
 */

import chalk from 'chalk';
import type { Command } from 'commander';
import { createProber, openConfigStore, openPresetStore } from '../lib/context.js';
import { applyEncodeFlags, buildGenerator, type EncodeFlags, type OutputFlags } from '../lib/options.js';
import { fail, printJson, wantsJson } from '../lib/output.js';

export async function previewCommand(
  files: string[],
  options: EncodeFlags & OutputFlags,
  command: Command
): Promise<void> {
  try {
    const saved = openConfigStore().load();
    const base = options.preset !== undefined
      ? openPresetStore().getPreset(options.preset).options
      : saved.encoding;
    const encoding = applyEncodeFlags(base, options);
    const generator = buildGenerator(saved.output, encoding, options);

    const entries = await generator.previewOutputPaths(files, encoding, createProber());

    if (wantsJson(command)) {
      printJson(entries);
      return;
    }

    for (const entry of entries) {
      if (entry.output === null) {
        console.log(`${entry.input} ${chalk.red(`✗ ${entry.error ?? 'no output path'}`)}`);
        continue;
      }
      const marker = entry.exists ? chalk.yellow(' (exists)') : '';
      console.log(`${entry.input} -> ${chalk.cyan(entry.output)}${marker}`);
    }
  } catch (error) {
    fail(error);
  }
}
