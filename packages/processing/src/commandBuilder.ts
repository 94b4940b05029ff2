/**
 * FFmpeg Command Builder
 * 
 * Fluent API for assembling an ffmpeg argument list: inputs, option
 * fragments in insertion order, then the output file.
 */

import { CRF_MAX, CRF_MIN, InvalidArgumentError } from '@vidtool/core';

/** Scale to the nearest even width and height, keeping the aspect ratio */
export const EVEN_RESOLUTION_FILTER = 'scale=trunc(oh*a/2)*2:trunc(ow/a/2)*2';

export class FFmpegCommandBuilder {
  private globalArgs: string[] = [];
  private inputs: string[] = [];
  private fragments: string[] = [];
  private outputFile = '';

  /**
   * Add global option(s), placed before the first input
   */
  addGlobalArg(...args: string[]): this {
    this.globalArgs.push(...args);
    return this;
  }

  addInput(file: string): this {
    this.inputs.push(file);
    return this;
  }

  /**
   * Append raw output options
   */
  addArgs(...args: string[]): this {
    this.fragments.push(...args);
    return this;
  }

  /**
   * Map every stream of an input
   */
  map(spec: number | string): this {
    return this.addArgs('-map', String(spec));
  }

  excludeVideo(): this {
    return this.addArgs('-vn');
  }

  excludeAudio(): this {
    return this.addArgs('-an');
  }

  excludeSubtitles(): this {
    return this.addArgs('-sn');
  }

  excludeData(): this {
    return this.addArgs('-dn');
  }

  setVideoCodec(codec: string): this {
    return this.addArgs('-vcodec', codec);
  }

  setAudioCodec(codec: string): this {
    return this.addArgs('-acodec', codec);
  }

  setSubtitleCodec(codec: string): this {
    return this.addArgs('-scodec', codec);
  }

  setCrf(crf: number): this {
    if (!Number.isInteger(crf) || crf < CRF_MIN || crf > CRF_MAX) {
      throw new InvalidArgumentError('crf', `must be an integer between ${CRF_MIN} and ${CRF_MAX}, got ${crf}`);
    }
    return this.addArgs('-crf', String(crf));
  }

  addVideoFilter(filter: string): this {
    return this.addArgs('-vf', filter);
  }

  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    if (this.inputs.length === 0) {
      throw new InvalidArgumentError('inputs', 'at least one input is required');
    }
    if (!this.outputFile) {
      throw new InvalidArgumentError('output', 'output file not specified');
    }

    const args: string[] = [...this.globalArgs];
    for (const input of this.inputs) {
      args.push('-i', input);
    }
    args.push(...this.fragments);
    args.push(this.outputFile);
    return args;
  }

  /**
   * Clone the builder
   */
  clone(): FFmpegCommandBuilder {
    const cloned = new FFmpegCommandBuilder();
    cloned.globalArgs = [...this.globalArgs];
    cloned.inputs = [...this.inputs];
    cloned.fragments = [...this.fragments];
    cloned.outputFile = this.outputFile;
    return cloned;
  }
}
