/**
 * Command-line flags layered over the persisted settings
 */

import { z } from 'zod';
import {
  InvalidArgumentError,
  parseEncodingOptions,
  serializeEncodingOptions,
  type EncodingOptions,
  type OutputSettings,
} from '@vidtool/core';
import {
  getOutputPreset,
  OutputPathGenerator,
  type BatchFilterCriteria,
  type GeneratorOptions,
  type NumericRange,
} from '@vidtool/processing';

export interface EncodeFlags {
  preset?: string;
  videoCodec?: string;
  audioCodec?: string;
  crf?: string;
  subtitles?: string;
  /** false when --no-data is given */
  data?: boolean;
  fixResolution?: boolean;
  fixErrors?: boolean;
  suffix?: string;
  extension?: string;
  appendRes?: boolean;
}

export interface OutputFlags {
  outputDir?: string;
  sourceRoot?: string;
  subdir?: string;
  pattern?: string;
  overwrite?: string;
  outputPreset?: string;
}

/**
 * Apply flags to a base options record. A codec flag also turns its
 * encode switch on; --crf turns CRF on. The result is validated.
 */
export function applyEncodeFlags(base: EncodingOptions, flags: EncodeFlags): EncodingOptions {
  const raw: Record<string, unknown> = { ...serializeEncodingOptions(base) };

  if (flags.videoCodec !== undefined) {
    raw['encode_video'] = true;
    raw['video_codec'] = flags.videoCodec;
  }
  if (flags.audioCodec !== undefined) {
    raw['encode_audio'] = true;
    raw['audio_codec'] = flags.audioCodec;
  }
  if (flags.crf !== undefined) {
    raw['use_crf'] = true;
    raw['crf_value'] = flags.crf;
  }
  if (flags.subtitles !== undefined) raw['subtitles'] = flags.subtitles;
  if (flags.data === false) raw['no_data'] = true;
  if (flags.fixResolution) raw['fix_resolution'] = true;
  if (flags.fixErrors) raw['fix_err'] = true;
  if (flags.suffix !== undefined) raw['output_suffix'] = flags.suffix;
  if (flags.extension !== undefined) raw['output_extension'] = flags.extension;
  if (flags.appendRes) raw['append_res'] = true;

  return parseEncodingOptions(raw);
}

/**
 * Generator from the saved output settings, or from a named output
 * preset, with the directory and naming flags applied on top
 */
export function buildGenerator(
  output: OutputSettings,
  encoding: EncodingOptions,
  flags: OutputFlags & Pick<EncodeFlags, 'suffix' | 'appendRes'>,
  options: GeneratorOptions = {}
): OutputPathGenerator {
  let generator: OutputPathGenerator;

  if (flags.outputPreset !== undefined) {
    generator = getOutputPreset(flags.outputPreset, options);
    const current = generator.settings;
    generator.setNamingOptions({
      ...current,
      suffix: flags.suffix ?? current.suffix,
      extension: encoding.outputExtension,
      includeResolution: current.includeResolution || flags.appendRes === true,
    });
  } else {
    generator = OutputPathGenerator.fromSettings(output, encoding, options);
  }

  if (flags.outputDir !== undefined) generator.setOutputDirectory(flags.outputDir);
  if (flags.sourceRoot !== undefined) generator.setSourceRoot(flags.sourceRoot);
  if (flags.subdir !== undefined) generator.setSubdirectoryPattern(flags.subdir);
  if (flags.pattern !== undefined) generator.setFilenamePattern(flags.pattern);
  if (flags.overwrite !== undefined) generator.setOverwritePolicy(flags.overwrite);

  return generator;
}

/**
 * Command-line text to a config value: true/false become booleans,
 * null clears a nullable setting, anything else is left to the schema
 */
export function parseConfigValue(value: string): unknown {
  switch (value) {
    case 'true':
      return true;
    case 'false':
      return false;
    case 'null':
      return null;
    default:
      return value;
  }
}

export interface SelectFlags {
  ext?: string;
  include?: string[];
  exclude?: string[];
  minSize?: string;
  maxSize?: string;
  minDuration?: string;
  maxDuration?: string;
  minWidth?: string;
  maxWidth?: string;
  minHeight?: string;
  maxHeight?: string;
  videoCodec?: string;
  audioCodec?: string;
}

const FLAG_NAMES: Record<string, string> = {
  minSize: '--min-size',
  maxSize: '--max-size',
  minDuration: '--min-duration',
  maxDuration: '--max-duration',
  minWidth: '--min-width',
  maxWidth: '--max-width',
  minHeight: '--min-height',
  maxHeight: '--max-height',
};

const bound = z.coerce.number().finite().nonnegative().optional();

const boundsSchema = z.object({
  minSize: bound,
  maxSize: bound,
  minDuration: bound,
  maxDuration: bound,
  minWidth: bound,
  maxWidth: bound,
  minHeight: bound,
  maxHeight: bound,
});

/**
 * Repeatable option collector for commander
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value.split(',').map(item => item.trim()).filter(item => item !== '');
}

function range(min: number | undefined, max: number | undefined): NumericRange | undefined {
  return min === undefined && max === undefined ? undefined : { min, max };
}

/**
 * Selection flags to filter criteria; comma lists for extensions and codecs
 */
export function buildFilterCriteria(flags: SelectFlags): BatchFilterCriteria {
  const result = boundsSchema.safeParse(flags);
  if (!result.success) {
    const [first] = result.error.issues;
    const key = first?.path[0];
    const field = typeof key === 'string' ? FLAG_NAMES[key] ?? key : 'selection';
    throw new InvalidArgumentError(field, 'expected a non-negative number');
  }
  const bounds = result.data;

  return {
    extensions: splitList(flags.ext),
    include: flags.include,
    exclude: flags.exclude,
    sizeMb: range(bounds.minSize, bounds.maxSize),
    durationSec: range(bounds.minDuration, bounds.maxDuration),
    width: range(bounds.minWidth, bounds.maxWidth),
    height: range(bounds.minHeight, bounds.maxHeight),
    videoCodecs: splitList(flags.videoCodec),
    audioCodecs: splitList(flags.audioCodec),
  };
}
