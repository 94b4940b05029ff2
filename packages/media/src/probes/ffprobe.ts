/**
 * FFProbe Wrapper
 * 
 * Safe wrapper for ffprobe command execution.
 * Extracts format and stream metadata in JSON format.
 */

import { z } from 'zod';
import {
  executeCommand,
  isErrnoException,
  getErrorMessage,
  createLogger,
  type CommandResult,
} from '@vidtool/utils';
import {
  CommandNotFoundError,
  MetadataExtractionFailedError,
  PermissionDeniedError,
} from '@vidtool/core';
import { MediaInfo } from '../mediaInfo.js';
import type { MediaProber } from '../types.js';

const log = createLogger({ module: 'ffprobe' });

// ffprobe prints numbers as strings in some fields and as numbers in others
const numeric = z.union([z.number(), z.string()]).optional();

const streamSchema = z.object({
  index: z.number(),
  codec_type: z.string().default('data'),
  codec_name: z.string().optional(),
  codec_long_name: z.string().optional(),
  profile: z.string().optional(),
  bit_rate: numeric,
  // Video specific
  width: z.number().optional(),
  height: z.number().optional(),
  coded_width: z.number().optional(),
  coded_height: z.number().optional(),
  display_aspect_ratio: z.string().optional(),
  pix_fmt: z.string().optional(),
  r_frame_rate: z.string().optional(),
  avg_frame_rate: z.string().optional(),
  // Audio specific
  sample_rate: numeric,
  channels: z.number().optional(),
  channel_layout: z.string().optional(),
  tags: z.record(z.string()).optional(),
}).passthrough();

export const ffprobeResultSchema = z.object({
  format: z.object({
    filename: z.string(),
    nb_streams: z.number().optional(),
    format_name: z.string().default('unknown'),
    format_long_name: z.string().default('unknown'),
    duration: numeric,
    size: numeric,
    bit_rate: numeric,
    tags: z.record(z.string()).optional(),
  }).passthrough(),
  streams: z.array(streamSchema).default([]),
});

export type FFProbeResult = z.infer<typeof ffprobeResultSchema>;
export type FFProbeStream = z.infer<typeof streamSchema>;

export class FFProbe implements MediaProber {
  private ffprobePath: string;

  constructor(ffprobePath: string = 'ffprobe') {
    this.ffprobePath = ffprobePath;
  }

  /**
   * Probe a media file and return its validated JSON description
   */
  async probe(filePath: string): Promise<FFProbeResult> {
    const args = [
      '-v', 'quiet',
      '-print_format', 'json',
      '-show_format',
      '-show_streams',
      filePath,
    ];

    let result: CommandResult;
    try {
      result = await executeCommand(this.ffprobePath, args, {
        timeout: 60000, // 1 minute timeout
      });
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new CommandNotFoundError(this.ffprobePath, error);
      }
      if (isErrnoException(error) && (error.code === 'EACCES' || error.code === 'EPERM')) {
        throw new PermissionDeniedError(this.ffprobePath, 'execute', error);
      }
      throw new MetadataExtractionFailedError(filePath, getErrorMessage(error), error);
    }

    if (result.exitCode !== 0) {
      const reason = result.stderr.trim() || `ffprobe exited with code ${result.exitCode}`;
      throw new MetadataExtractionFailedError(filePath, reason);
    }

    let json: unknown;
    try {
      json = JSON.parse(result.stdout);
    } catch (error) {
      throw new MetadataExtractionFailedError(
        filePath,
        `unparseable ffprobe output: ${result.stdout.substring(0, 200)}`,
        error
      );
    }

    const parsed = ffprobeResultSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new MetadataExtractionFailedError(
        filePath,
        `unexpected ffprobe output at ${issue?.path.join('.') ?? '?'}: ${issue?.message ?? parsed.error.message}`
      );
    }
    return parsed.data;
  }

  async getMediaInfo(filePath: string): Promise<MediaInfo> {
    log.debug({ file: filePath }, 'Probing');
    return MediaInfo.fromProbe(filePath, await this.probe(filePath));
  }

  /**
   * Check if ffprobe is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      const result = await executeCommand(this.ffprobePath, ['-version'], {
        timeout: 5000,
      });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }
}
