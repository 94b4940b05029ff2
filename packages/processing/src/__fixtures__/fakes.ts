/**
 * In-process stand-ins for the transcoder and the prober
 */

import { writeFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { MediaInfo, type MediaProber } from '@vidtool/media';
import { MetadataExtractionFailedError } from '@vidtool/core';
import type { ExecutionResult, StreamingOptions } from '../executor.js';
import { ProgressInfo } from '../progressParser.js';
import type { TranscoderRunner } from '../types.js';

export interface FakeMedia {
  duration?: number;
  width?: number;
  height?: number;
  size?: number;
}

export function makeMediaInfo(file: string, media: FakeMedia = {}): MediaInfo {
  const { duration = 60, width = 1920, height = 1080, size = 52428800 } = media;
  return new MediaInfo({
    file,
    filename: basename(file),
    formatName: 'matroska,webm',
    formatLongName: 'Matroska / WebM',
    duration,
    size,
    bitrate: 5000000,
    streams: [
      { index: 0, kind: 'video', codecName: 'h264', codecLongName: 'H.264', bitRate: null, width, height },
      { index: 1, kind: 'audio', codecName: 'aac', codecLongName: 'AAC', bitRate: 192000, channels: 2 },
    ],
  });
}

export class FakeProber implements MediaProber {
  readonly probed: string[] = [];
  private readonly media = new Map<string, FakeMedia>();
  private readonly broken = new Set<string>();

  set(file: string, media: FakeMedia): this {
    this.media.set(file, media);
    return this;
  }

  fail(file: string): this {
    this.broken.add(file);
    return this;
  }

  async getMediaInfo(file: string): Promise<MediaInfo> {
    this.probed.push(file);
    if (this.broken.has(file)) {
      throw new MetadataExtractionFailedError(file, 'invalid data found when processing input');
    }
    return makeMediaInfo(file, this.media.get(file));
  }
}

export type RunBehaviour = (args: string[], options: StreamingOptions) => Promise<ExecutionResult>;

export class FakeRunner implements TranscoderRunner {
  readonly command = 'fake-ffmpeg';
  readonly calls: string[][] = [];
  available = true;
  private behaviour: RunBehaviour;

  constructor(behaviour: RunBehaviour = writeOutput()) {
    this.behaviour = behaviour;
  }

  async run(args: string[], options: StreamingOptions = {}): Promise<ExecutionResult> {
    this.calls.push(args);
    return this.behaviour(args, options);
  }

  async isAvailable(): Promise<boolean> {
    return this.available;
  }
}

function outputOf(args: string[]): string {
  const output = args[args.length - 1];
  if (output === undefined) throw new Error('no output argument');
  return output;
}

function result(overrides: Partial<ExecutionResult> = {}): ExecutionResult {
  return { success: true, cancelled: false, exitCode: 0, signal: null, lines: [], ...overrides };
}

/**
 * Replays lines through the callbacks the way the executor does
 */
export function emitLines(lines: readonly string[], options: StreamingOptions): void {
  const progress = new ProgressInfo();
  for (const line of lines) {
    options.onLine?.(line);
    if (progress.updateFromLine(line)) {
      progress.calculateProgress(options.totalDurationMs ?? 0);
      options.onProgress?.(progress.snapshot());
    }
  }
}

export function writeOutput(content = 'encoded-bytes', lines: readonly string[] = []): RunBehaviour {
  return async (args, options) => {
    emitLines(lines, options);
    await writeFile(outputOf(args), content);
    return result({ lines: [...lines] });
  };
}

export function failWith(exitCode: number, lines: readonly string[], partial = ''): RunBehaviour {
  return async (args) => {
    await writeFile(outputOf(args), partial);
    return result({ success: false, exitCode, lines: [...lines] });
  };
}

export function cancelAfterStart(): RunBehaviour {
  return async (args) => {
    await writeFile(outputOf(args), '');
    return result({ success: false, cancelled: true, exitCode: null, signal: 'SIGTERM' });
  };
}

export function succeedWithoutOutput(): RunBehaviour {
  return async () => result();
}

export function succeedWithEmptyOutput(): RunBehaviour {
  return async (args) => {
    await writeFile(outputOf(args), '');
    return result();
  };
}
