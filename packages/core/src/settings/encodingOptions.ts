/**
 * Encoding Options
 * 
 * The option set a transcode is configured from. Persisted documents use
 * snake_case keys; everything past the parsing boundary works on the
 * camelCase record with every default filled in.
 */

import { z, type ZodIssue } from 'zod';
import { normalizeExtension } from '@vidtool/utils';
import { InvalidArgumentError } from '../errors/index.js';

export const SUBTITLE_MODES = ['None', 'First', 'All', 'srt'] as const;
export type SubtitleMode = typeof SUBTITLE_MODES[number];

export const CRF_MIN = 4;
export const CRF_MAX = 63;

export const encodingOptionsShape = {
  output_suffix: z.string().default('_copy'),
  output_extension: z.string().min(1).transform(normalizeExtension).default('.mkv'),
  append_res: z.boolean().default(false),
  encode_video: z.boolean().default(false),
  video_codec: z.string().min(1).default('libx265'),
  encode_audio: z.boolean().default(false),
  audio_codec: z.string().min(1).default('aac'),
  subtitles: z.enum(SUBTITLE_MODES).default('First'),
  no_data: z.boolean().default(false),
  fix_resolution: z.boolean().default(false),
  fix_err: z.boolean().default(false),
  use_crf: z.boolean().default(false),
  crf_value: z.coerce.number().int().min(CRF_MIN).max(CRF_MAX).default(28),
};

export const rawEncodingOptionsSchema = z.object(encodingOptionsShape);

export type RawEncodingOptions = z.output<typeof rawEncodingOptionsSchema>;

export interface EncodingOptions {
  outputSuffix: string;
  outputExtension: string;
  appendRes: boolean;
  encodeVideo: boolean;
  videoCodec: string;
  encodeAudio: boolean;
  audioCodec: string;
  subtitles: SubtitleMode;
  noData: boolean;
  fixResolution: boolean;
  fixErr: boolean;
  useCrf: boolean;
  crfValue: number;
}

export function toEncodingOptions(raw: RawEncodingOptions): EncodingOptions {
  return {
    outputSuffix: raw.output_suffix,
    outputExtension: raw.output_extension,
    appendRes: raw.append_res,
    encodeVideo: raw.encode_video,
    videoCodec: raw.video_codec,
    encodeAudio: raw.encode_audio,
    audioCodec: raw.audio_codec,
    subtitles: raw.subtitles,
    noData: raw.no_data,
    fixResolution: raw.fix_resolution,
    fixErr: raw.fix_err,
    useCrf: raw.use_crf,
    crfValue: raw.crf_value,
  };
}

export function serializeEncodingOptions(options: EncodingOptions): RawEncodingOptions {
  return {
    output_suffix: options.outputSuffix,
    output_extension: options.outputExtension,
    append_res: options.appendRes,
    encode_video: options.encodeVideo,
    video_codec: options.videoCodec,
    encode_audio: options.encodeAudio,
    audio_codec: options.audioCodec,
    subtitles: options.subtitles,
    no_data: options.noData,
    fix_resolution: options.fixResolution,
    fix_err: options.fixErr,
    use_crf: options.useCrf,
    crf_value: options.crfValue,
  };
}

export const encodingOptionsSchema = rawEncodingOptionsSchema.transform(toEncodingOptions);

function issueToError(issue: ZodIssue): InvalidArgumentError {
  return new InvalidArgumentError(issue.path.join('.') || 'options', issue.message);
}

/**
 * Parse a persisted option mapping, failing on the first invalid value
 */
export function parseEncodingOptions(input: unknown): EncodingOptions {
  const result = encodingOptionsSchema.safeParse(input ?? {});
  if (!result.success) {
    const [first] = result.error.issues;
    throw first ? issueToError(first) : new InvalidArgumentError('options', result.error.message);
  }
  return result.data;
}

/**
 * Parse a schema, dropping top-level keys whose values are invalid so
 * their defaults apply instead. Used for documents read back from disk.
 */
export function parseLenient<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown
): { value: z.output<T>; dropped: string[] } {
  const source: Record<string, unknown> =
    typeof input === 'object' && input !== null && !Array.isArray(input) ? { ...input } : {};
  const dropped: string[] = [];

  for (;;) {
    const result = schema.safeParse(source);
    if (result.success) {
      return { value: result.data, dropped };
    }
    const keys = new Set(
      result.error.issues
        .map(issue => issue.path[0])
        .filter((key): key is string => typeof key === 'string' && key in source)
    );
    if (keys.size === 0) {
      throw new InvalidArgumentError('options', result.error.message);
    }
    for (const key of keys) {
      delete source[key];
      dropped.push(key);
    }
  }
}

export function defaultEncodingOptions(): EncodingOptions {
  return parseEncodingOptions({});
}
