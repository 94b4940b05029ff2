/**
 * Streaming Executor
 *
 * Runs a long-lived external command, reading stdout and stderr line by
 * line. Every line passes through the progress parser; the caller can
 * observe raw lines and progress snapshots and cancel through an
 * AbortSignal.
 */

import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { createLogger, formatCommandLine, isErrnoException } from '@vidtool/utils';
import { CommandNotFoundError, PermissionDeniedError } from '@vidtool/core';
import { ProgressInfo, type ProgressSnapshot } from './progressParser.js';

const log = createLogger({ module: 'executor' });

export interface StreamingOptions {
  onLine?: (line: string) => void;
  onProgress?: (progress: ProgressSnapshot) => void;
  signal?: AbortSignal;
  totalDurationMs?: number;
  maxCapturedLines?: number;
  killGraceMs?: number;
  cwd?: string;
}

export interface ExecutionResult {
  success: boolean;
  cancelled: boolean;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** Last captured output lines, oldest first */
  lines: string[];
}

function mapSpawnError(command: string, error: Error): Error {
  if (isErrnoException(error)) {
    if (error.code === 'ENOENT') {
      return new CommandNotFoundError(command, error);
    }
    if (error.code === 'EACCES' || error.code === 'EPERM') {
      return new PermissionDeniedError(command, 'execute', error);
    }
  }
  return error;
}

export async function executeStreaming(
  command: string,
  args: string[],
  options: StreamingOptions = {}
): Promise<ExecutionResult> {
  const {
    onLine,
    onProgress,
    signal,
    totalDurationMs = 0,
    maxCapturedLines = 200,
    killGraceMs = 3000,
    cwd,
  } = options;

  if (signal?.aborted) {
    return { success: false, cancelled: true, exitCode: null, signal: null, lines: [] };
  }

  log.info({ command: formatCommandLine(command, args) }, 'Executing');

  const child = spawn(command, args, {
    cwd,
    stdio: ['ignore', 'pipe', 'pipe'],
  });

  const progress = new ProgressInfo();
  const lines: string[] = [];
  let cancelled = false;
  let callbackError: unknown = null;
  let killTimer: NodeJS.Timeout | null = null;

  const isRunning = (): boolean => child.exitCode === null && child.signalCode === null;

  const terminate = (): void => {
    if (killTimer !== null || !isRunning()) return;
    child.kill('SIGTERM');
    killTimer = setTimeout(() => {
      if (isRunning()) {
        log.warn({ pid: child.pid }, 'Process ignored SIGTERM, sending SIGKILL');
        child.kill('SIGKILL');
      }
    }, killGraceMs);
  };

  const onAbort = (): void => {
    cancelled = true;
    terminate();
  };
  signal?.addEventListener('abort', onAbort, { once: true });

  const handleLine = (line: string): void => {
    if (cancelled || callbackError !== null) return;
    if (signal?.aborted) {
      onAbort();
      return;
    }

    log.debug({ line }, 'output');
    lines.push(line);
    if (lines.length > maxCapturedLines) {
      lines.shift();
    }

    try {
      onLine?.(line);
      if (progress.updateFromLine(line)) {
        progress.calculateProgress(totalDurationMs);
        onProgress?.(progress.snapshot());
      }
    } catch (error) {
      callbackError = error;
      terminate();
    }
  };

  const readLines = (stream: Readable | null): void => {
    if (!stream) return;
    createInterface({ input: stream, crlfDelay: Infinity }).on('line', handleLine);
  };
  readLines(child.stdout);
  readLines(child.stderr);

  return new Promise((resolve, reject) => {
    let settled = false;

    const cleanup = (): void => {
      settled = true;
      signal?.removeEventListener('abort', onAbort);
      if (killTimer !== null) clearTimeout(killTimer);
    };

    child.on('error', (error) => {
      if (settled) return;
      cleanup();
      // Spawned but failing later: make sure nothing is left behind
      if (child.pid !== undefined && isRunning()) child.kill('SIGKILL');
      reject(mapSpawnError(command, error));
    });

    child.on('close', (exitCode, exitSignal) => {
      if (settled) return;
      cleanup();

      if (callbackError !== null) {
        reject(callbackError);
        return;
      }

      log.debug({ exitCode, signal: exitSignal, cancelled }, 'Process finished');
      resolve({
        success: !cancelled && exitCode === 0,
        cancelled,
        exitCode,
        signal: exitSignal,
        lines,
      });
    });
  });
}
