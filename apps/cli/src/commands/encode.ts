/**
 * Encode Command
 * 
 * Runs a batch over the given files with the saved settings, a preset
 * and any flags layered on top. Ctrl-C cancels the batch; outputs that
 * already finished are kept.
 */

import { basename } from 'node:path';
import ora from 'ora';
import chalk from 'chalk';
import type { Command } from 'commander';
import { formatDuration } from '@vidtool/utils';
import {
  formatBatchSummary,
  formatBytes,
  formatProgress,
  runBatch,
  type BatchSummary,
  type FileResult,
} from '@vidtool/processing';
import { createProber, createRunner, openConfigStore, openPresetStore } from '../lib/context.js';
import { applyEncodeFlags, buildGenerator, type EncodeFlags, type OutputFlags } from '../lib/options.js';
import { fail, printInfo, printJson, printWarning, wantsJson } from '../lib/output.js';

export interface EncodeOptions extends EncodeFlags, OutputFlags {
  save?: boolean;
}

function describeOutput({ output, result }: FileResult): string {
  if (!result) return output ?? '';
  return `${result.outputPath} (${formatBytes(result.outputSize)} in ${formatDuration(result.elapsedMs)})`;
}

export async function encodeCommand(files: string[], options: EncodeOptions, command: Command): Promise<void> {
  const json = wantsJson(command);
  const spinner = ora({ isEnabled: !json });
  const controller = new AbortController();

  const onInterrupt = (): void => {
    if (!controller.signal.aborted) {
      spinner.text = chalk.yellow('Cancelling...');
      controller.abort();
    }
  };

  let summary: BatchSummary;
  try {
    const store = openConfigStore();
    const saved = store.load();
    const base = options.preset !== undefined
      ? openPresetStore().getPreset(options.preset).options
      : saved.encoding;
    const encoding = applyEncodeFlags(base, options);
    const generator = buildGenerator(saved.output, encoding, options);

    if (options.save) {
      store.save({ encoding, output: saved.output });
      printInfo(`Saved settings to ${store.path}`);
    }

    let label = '';
    process.on('SIGINT', onInterrupt);
    try {
      summary = await runBatch({
        files,
        options: encoding,
        generator,
        runner: createRunner(),
        prober: createProber(),
        signal: controller.signal,
        onFileStart: (file, output, index, total) => {
          label = `[${index + 1}/${total}] ${basename(file)}`;
          spinner.start(`${label} -> ${output}`);
        },
        onProgress: (_file, progress) => {
          if (!controller.signal.aborted) {
            spinner.text = `${label} ${formatProgress(progress)}`;
          }
        },
        onFileComplete: (result) => {
          switch (result.status) {
            case 'success':
              spinner.succeed(`${label} -> ${describeOutput(result)}`);
              break;
            case 'skipped':
              spinner.info(`${label} skipped, ${result.output ?? 'output'} exists`);
              break;
            case 'failed':
              spinner.fail(result.error ?? label);
              break;
            case 'cancelled':
              break;
          }
        },
      });
    } finally {
      process.off('SIGINT', onInterrupt);
      spinner.stop();
    }
  } catch (error) {
    fail(error);
  }

  if (json) {
    printJson(summary);
  } else {
    if (summary.cancelled) {
      printWarning('Cancelled');
    }
    console.log();
    console.log(formatBatchSummary(summary));
  }

  if (summary.failed > 0 || summary.cancelled) {
    process.exitCode = 1;
  }
}
