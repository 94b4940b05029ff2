/**
 * Batch Runner
 *
 * Encodes a list of files one after another with a single options record
 * and output path generator. A failing file is recorded and the batch moves
 * on; cancellation stops it. Finished outputs are always kept.
 */

import { basename } from 'node:path';
import { createLogger, getErrorMessage } from '@vidtool/utils';
import {
  CancelledError,
  CommandNotFoundError,
  InvalidArgumentError,
  type EncodingOptions,
} from '@vidtool/core';
import type { MediaProber } from '@vidtool/media';
import { EncodeJob } from './encodeJob.js';
import { MAX_LISTED_ERRORS } from './fileOperations.js';
import type { OutputPathGenerator } from './outputPath.js';
import type { ProgressSnapshot } from './progressParser.js';
import type { EncodeResult, TranscoderRunner } from './types.js';

const log = createLogger({ module: 'batch' });

export type FileStatus = 'success' | 'skipped' | 'failed' | 'cancelled';

export interface FileResult {
  input: string;
  output: string | null;
  status: FileStatus;
  /** `<filename>: <message>` for failures */
  error?: string;
  result?: EncodeResult;
}

export interface BatchSummary {
  total: number;
  successful: number;
  failed: number;
  skipped: number;
  /** Files interrupted mid-encode or never started because of a cancel */
  notProcessed: number;
  cancelled: boolean;
  results: FileResult[];
}

export interface BatchCallbacks {
  onFileStart?: (file: string, output: string, index: number, total: number) => void;
  onProgress?: (file: string, progress: ProgressSnapshot) => void;
  onLine?: (file: string, line: string) => void;
  /** Fires after a file succeeds, is skipped or fails; `completed` counts those */
  onFileComplete?: (result: FileResult, completed: number, total: number) => void;
}

export interface BatchRequest extends BatchCallbacks {
  files: readonly string[];
  options: EncodingOptions;
  generator: OutputPathGenerator;
  runner: TranscoderRunner;
  prober: MediaProber;
  signal?: AbortSignal;
}

export async function runBatch(request: BatchRequest): Promise<BatchSummary> {
  const { files, options, generator, runner, prober, signal } = request;

  if (files.length === 0) {
    throw new InvalidArgumentError('files', 'no files selected for encoding');
  }
  if (!(await runner.isAvailable())) {
    throw new CommandNotFoundError(runner.command);
  }

  const results: FileResult[] = [];
  let completed = 0;
  let cancelled = false;

  log.info({ files: files.length }, 'Starting batch');

  for (const [index, file] of files.entries()) {
    if (signal?.aborted) {
      log.info('Batch cancelled before next file');
      cancelled = true;
      break;
    }

    let output: string | null = null;
    let fileResult: FileResult;

    try {
      const job = new EncodeJob({ runner, prober });
      await job.addInput(file);

      output = await generator.generateOutputPath(file, job.mediaInfo[0] ?? null, options);
      request.onFileStart?.(file, output, index, files.length);

      if (await generator.shouldSkip(output)) {
        log.info({ file, output }, 'Output exists, skipping');
        fileResult = { input: file, output, status: 'skipped' };
      } else {
        job
          .setOutput(output)
          .setOverwrite(generator.overwritePolicy === 'overwrite')
          .setSignal(signal)
          .setLineCallback(request.onLine ? (line) => request.onLine?.(file, line) : null)
          .setProgressCallback(request.onProgress ? (progress) => request.onProgress?.(file, progress) : null);
        await job.applyOptions(options);

        const result = await job.run();
        fileResult = { input: file, output, status: 'success', result };
      }
    } catch (error) {
      if (error instanceof CancelledError) {
        log.info({ file }, 'Batch cancelled');
        results.push({ input: file, output, status: 'cancelled' });
        cancelled = true;
        break;
      }

      log.error({ file, error: getErrorMessage(error) }, 'File failed');
      fileResult = {
        input: file,
        output,
        status: 'failed',
        error: `${basename(file)}: ${getErrorMessage(error)}`,
      };
    }

    results.push(fileResult);
    completed++;
    request.onFileComplete?.(fileResult, completed, files.length);
  }

  const finished = results.filter(r => r.status !== 'cancelled').length;
  const summary: BatchSummary = {
    total: files.length,
    successful: results.filter(r => r.status === 'success').length,
    failed: results.filter(r => r.status === 'failed').length,
    skipped: results.filter(r => r.status === 'skipped').length,
    notProcessed: files.length - finished,
    cancelled,
    results,
  };

  log.info({
    successful: summary.successful,
    failed: summary.failed,
    skipped: summary.skipped,
    notProcessed: summary.notProcessed,
    cancelled,
  }, 'Batch finished');

  return summary;
}

export function formatBatchSummary(summary: BatchSummary): string {
  const lines = [
    summary.cancelled ? 'Encoding cancelled:' : 'Encoding completed:',
    `✓ ${summary.successful} successful`,
    `✗ ${summary.failed} failed`,
  ];
  if (summary.skipped > 0) {
    lines.push(`- ${summary.skipped} skipped`);
  }
  if (summary.notProcessed > 0) {
    lines.push(`- ${summary.notProcessed} cancelled or not processed`);
  }

  const errors = summary.results
    .filter(r => r.status === 'failed')
    .map(r => r.error ?? `${basename(r.input)}: unknown error`);

  if (errors.length > 0) {
    lines.push('', 'Errors:', ...errors.slice(0, MAX_LISTED_ERRORS));
    if (errors.length > MAX_LISTED_ERRORS) {
      lines.push(`... and ${errors.length - MAX_LISTED_ERRORS} more errors`);
    }
  }

  return lines.join('\n');
}
