/**
 * FFmpeg Wrapper
 * 
 * Binds the streaming executor to the resolved ffmpeg binary, and
 * launches ffplay for playback.
 */

import {
  createLogger,
  executeCommand,
  isErrnoException,
  safeStat,
  type CommandResult,
} from '@vidtool/utils';
import {
  assertBinaryAvailable,
  CommandNotFoundError,
  getBinaryPath,
  InputNotFoundError,
  isBinaryAvailable,
  PermissionDeniedError,
  SubprocessFailedError,
} from '@vidtool/core';
import { executeStreaming, type ExecutionResult, type StreamingOptions } from './executor.js';
import type { TranscoderRunner } from './types.js';

const log = createLogger({ module: 'ffmpeg' });

export class FFmpeg implements TranscoderRunner {
  readonly command: string;

  constructor(ffmpegPath: string = getBinaryPath('ffmpeg')) {
    this.command = ffmpegPath;
  }

  run(args: string[], options: StreamingOptions = {}): Promise<ExecutionResult> {
    return executeStreaming(this.command, args, options);
  }

  /**
   * Check if FFmpeg answers `-version`
   */
  isAvailable(): Promise<boolean> {
    return isBinaryAvailable(this.command);
  }

  assertAvailable(): Promise<void> {
    return assertBinaryAvailable(this.command);
  }
}

export class FFplay {
  readonly command: string;

  constructor(ffplayPath: string = getBinaryPath('ffplay')) {
    this.command = ffplayPath;
  }

  /**
   * Play a file and wait for the player to close
   */
  async play(filePath: string, options: { signal?: AbortSignal } = {}): Promise<void> {
    if (!(await safeStat(filePath))) {
      throw new InputNotFoundError(filePath);
    }

    log.info({ file: filePath }, 'Starting playback');

    let result: CommandResult;
    try {
      result = await executeCommand(this.command, ['-hide_banner', '-autoexit', filePath], {
        timeout: 0,
        signal: options.signal,
      });
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new CommandNotFoundError(this.command, error);
      }
      if (isErrnoException(error) && (error.code === 'EACCES' || error.code === 'EPERM')) {
        throw new PermissionDeniedError(this.command, 'execute', error);
      }
      throw error;
    }

    if (result.exitCode !== 0 && !options.signal?.aborted) {
      throw new SubprocessFailedError(this.command, result.exitCode, result.stderr.trim());
    }
  }
}
