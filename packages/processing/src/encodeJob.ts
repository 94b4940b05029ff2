/**
 * Encode Job
 *
 * One transcoder invocation: validated inputs with their probed metadata,
 * an output path and the option fragments in between. `run()` executes it
 * and checks that a non-empty output was actually produced.
 */

import { dirname, join } from 'node:path';
import {
  createLogger,
  ensureDir,
  getBasename,
  isErrnoException,
  isWritableDir,
  normalizeExtension,
  pathExists,
  removeIfEmpty,
  safeStat,
} from '@vidtool/utils';
import {
  CancelledError,
  InputNotFoundError,
  InvalidArgumentError,
  isVidToolError,
  MetadataExtractionFailedError,
  NotAFileError,
  OutputNotProducedError,
  PermissionDeniedError,
  SubprocessFailedError,
  type EncodingOptions,
} from '@vidtool/core';
import type { MediaInfo, MediaProber } from '@vidtool/media';
import { EVEN_RESOLUTION_FILTER, FFmpegCommandBuilder } from './commandBuilder.js';
import type { ExecutionResult } from './executor.js';
import type { ProgressSnapshot } from './progressParser.js';
import type { EncodeResult, TranscoderRunner } from './types.js';

const log = createLogger({ module: 'encode-job' });

// Output lines kept in SubprocessFailedError
const ERROR_TAIL_LINES = 20;

export interface EncodeJobDeps {
  runner: TranscoderRunner;
  prober: MediaProber;
}

export interface AddInputOptions {
  /** Probe the file and count its duration towards progress */
  probe?: boolean;
}

export class EncodeJob {
  private readonly runner: TranscoderRunner;
  private readonly prober: MediaProber;
  private readonly command = new FFmpegCommandBuilder();
  private readonly inputs: string[] = [];
  private readonly infos: MediaInfo[] = [];
  private output: string | null = null;
  private overwrite = false;
  private progressCallback: ((progress: ProgressSnapshot) => void) | null = null;
  private lineCallback: ((line: string) => void) | null = null;
  private signal: AbortSignal | undefined;

  /** Sum of the probed input durations */
  totalDurationMs = 0;

  constructor(deps: EncodeJobDeps) {
    this.runner = deps.runner;
    this.prober = deps.prober;
  }

  get inputFiles(): readonly string[] {
    return this.inputs;
  }

  get mediaInfo(): readonly MediaInfo[] {
    return this.infos;
  }

  get outputPath(): string | null {
    return this.output;
  }

  async addInput(file: string, options: AddInputOptions = {}): Promise<this> {
    const { probe = true } = options;

    const stats = await safeStat(file);
    if (!stats) {
      throw new InputNotFoundError(file);
    }
    if (!stats.isFile()) {
      throw new NotAFileError(file);
    }

    if (probe) {
      let info: MediaInfo;
      try {
        info = await this.prober.getMediaInfo(file);
      } catch (error) {
        if (isVidToolError(error)) throw error;
        throw new MetadataExtractionFailedError(file, 'probe failed', error);
      }
      this.infos.push(info);
      this.totalDurationMs += info.durationMs;
    }

    this.inputs.push(file);
    this.command.addInput(file);
    return this;
  }

  setOutput(file: string): this {
    this.output = file;
    return this;
  }

  /**
   * `<dir>/<stem><suffix><ext>` next to the indexed input
   */
  setOutputFromInput(suffix: string, extension: string, index: number = 0): this {
    const input = this.inputs[index];
    if (input === undefined) {
      throw new InvalidArgumentError('input index', `no input at index ${index}`);
    }
    this.output = join(dirname(input), `${getBasename(input)}${suffix}${normalizeExtension(extension)}`);
    return this;
  }

  mapAllStreams(inputIndex: number | string): this {
    this.command.map(inputIndex);
    return this;
  }

  excludeVideo(): this {
    this.command.excludeVideo();
    return this;
  }

  excludeAudio(): this {
    this.command.excludeAudio();
    return this;
  }

  excludeSubtitles(): this {
    this.command.excludeSubtitles();
    return this;
  }

  excludeData(): this {
    this.command.excludeData();
    return this;
  }

  setVideoCodec(codec: string): this {
    this.command.setVideoCodec(codec);
    return this;
  }

  setAudioCodec(codec: string): this {
    this.command.setAudioCodec(codec);
    return this;
  }

  setSubtitleCodec(codec: string): this {
    this.command.setSubtitleCodec(codec);
    return this;
  }

  setCrf(crf: number): this {
    this.command.setCrf(crf);
    return this;
  }

  /**
   * Round odd dimensions down to the nearest even size
   */
  fixResolution(): this {
    this.command.addVideoFilter(EVEN_RESOLUTION_FILTER);
    return this;
  }

  fixErrors(): this {
    this.command.addArgs('-err_detect', 'ignore_err');
    return this;
  }

  /**
   * Keep every stream and copy all subtitle tracks
   */
  copySubtitles(): this {
    return this.mapAllStreams(0).setSubtitleCodec('copy');
  }

  encodeX265(): this {
    return this.setVideoCodec('libx265').setCrf(28);
  }

  /**
   * Extra flags, split on whitespace
   */
  customFlags(flags: readonly string[]): this {
    const args = flags.join(' ').split(/\s+/).filter(arg => arg !== '');
    this.command.addArgs(...args);
    return this;
  }

  setOverwrite(overwrite: boolean): this {
    this.overwrite = overwrite;
    return this;
  }

  setProgressCallback(callback: ((progress: ProgressSnapshot) => void) | null): this {
    this.progressCallback = callback;
    return this;
  }

  setLineCallback(callback: ((line: string) => void) | null): this {
    this.lineCallback = callback;
    return this;
  }

  setSignal(signal: AbortSignal | undefined): this {
    this.signal = signal;
    return this;
  }

  /**
   * Translate an options record into fragments
   */
  async applyOptions(options: EncodingOptions): Promise<this> {
    if (options.encodeVideo) {
      this.setVideoCodec(options.videoCodec);
    }
    if (options.encodeAudio) {
      this.setAudioCodec(options.audioCodec);
    }

    switch (options.subtitles) {
      case 'None':
        this.excludeSubtitles();
        break;
      case 'All':
        this.copySubtitles();
        break;
      case 'srt':
        await this.addSidecarSubtitles();
        break;
      case 'First':
        // ffmpeg picks one subtitle stream by default
        break;
    }

    if (options.noData) {
      this.excludeData();
    }
    if (options.fixResolution) {
      this.fixResolution();
    }
    if (options.fixErr) {
      this.fixErrors();
    }
    if (options.useCrf) {
      this.setCrf(options.crfValue);
    }
    return this;
  }

  buildArgs(): string[] {
    if (this.inputs.length === 0) {
      throw new InvalidArgumentError('inputs', 'at least one input is required');
    }
    const command = this.command.clone().setOutput(this.requireOutput());
    command.addGlobalArg('-hide_banner');
    if (this.overwrite) {
      command.addGlobalArg('-y');
    }
    if (this.progressCallback) {
      command.addGlobalArg('-stats', '-loglevel', 'error', '-progress', '-');
    }
    return command.build();
  }

  async run(): Promise<EncodeResult> {
    const args = this.buildArgs();
    const output = this.requireOutput();
    const outputDir = dirname(output);

    try {
      await ensureDir(outputDir);
    } catch (error) {
      if (isErrnoException(error) && (error.code === 'EACCES' || error.code === 'EPERM')) {
        throw new PermissionDeniedError(outputDir, 'create', error);
      }
      throw error;
    }
    if (!(await isWritableDir(outputDir))) {
      throw new PermissionDeniedError(outputDir, 'write to');
    }

    // Zero-byte leftover from an interrupted run
    await removeIfEmpty(output);

    log.info({ inputs: this.inputs, output }, 'Encoding');
    const startTime = Date.now();

    let result: ExecutionResult;
    try {
      result = await this.runner.run(args, {
        onLine: this.lineCallback ?? undefined,
        onProgress: this.progressCallback ?? undefined,
        signal: this.signal,
        totalDurationMs: this.totalDurationMs,
      });
    } catch (error) {
      await removeIfEmpty(output);
      throw error;
    }

    if (result.cancelled) {
      await removeIfEmpty(output);
      throw new CancelledError();
    }

    if (!result.success) {
      await removeIfEmpty(output);
      throw new SubprocessFailedError(
        this.runner.command,
        result.exitCode,
        result.lines.slice(-ERROR_TAIL_LINES).join('\n')
      );
    }

    const stats = await safeStat(output);
    if (!stats) {
      throw new OutputNotProducedError(output, 'missing');
    }
    if (stats.size === 0) {
      await removeIfEmpty(output);
      throw new OutputNotProducedError(output, 'empty');
    }

    const elapsedMs = Date.now() - startTime;
    log.info({ output, size: stats.size, elapsedMs }, 'Encoding complete');

    return {
      outputPath: output,
      outputSize: stats.size,
      exitCode: result.exitCode ?? 0,
      elapsedMs,
    };
  }

  private requireOutput(): string {
    if (this.output === null) {
      throw new InvalidArgumentError('output', 'output file not specified');
    }
    return this.output;
  }

  private async addSidecarSubtitles(): Promise<void> {
    const video = this.inputs[0];
    if (video === undefined) {
      throw new InvalidArgumentError('inputs', 'add the video before applying subtitle options');
    }

    const srtFile = join(dirname(video), `${getBasename(video)}.srt`);
    if (await pathExists(srtFile)) {
      log.info({ file: srtFile }, 'Adding srt file');
      await this.addInput(srtFile, { probe: false });
    } else {
      log.warn({ file: srtFile }, 'SRT file does not exist, skipping');
    }
  }
}
