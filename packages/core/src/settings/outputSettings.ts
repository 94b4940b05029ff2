/**
 * Output Settings
 * 
 * Where and under which name encoded files are written.
 */

import { z } from 'zod';

export const OVERWRITE_POLICIES = ['skip', 'overwrite', 'increment'] as const;
export type OverwritePolicy = typeof OVERWRITE_POLICIES[number];

export const DEFAULT_FILENAME_PATTERN = '{stem}{suffix}{extension}';

export function isOverwritePolicy(value: string): value is OverwritePolicy {
  return OVERWRITE_POLICIES.some(policy => policy === value);
}

export const outputSettingsShape = {
  output_directory: z.string().min(1).nullable().default(null),
  subdirectory_pattern: z.string().default(''),
  filename_pattern: z.string().min(1).default(DEFAULT_FILENAME_PATTERN),
  include_codec: z.boolean().default(false),
  include_quality: z.boolean().default(false),
  include_date: z.boolean().default(false),
  overwrite_policy: z.enum(OVERWRITE_POLICIES).default('skip'),
  preserve_directory_structure: z.boolean().default(true),
  source_root: z.string().min(1).nullable().default(null),
};

export const rawOutputSettingsSchema = z.object(outputSettingsShape);

export type RawOutputSettings = z.output<typeof rawOutputSettingsSchema>;

export interface OutputSettings {
  outputDirectory: string | null;
  subdirectoryPattern: string;
  filenamePattern: string;
  includeCodec: boolean;
  includeQuality: boolean;
  includeDate: boolean;
  overwritePolicy: OverwritePolicy;
  preserveDirectoryStructure: boolean;
  sourceRoot: string | null;
}

export function toOutputSettings(raw: RawOutputSettings): OutputSettings {
  return {
    outputDirectory: raw.output_directory,
    subdirectoryPattern: raw.subdirectory_pattern,
    filenamePattern: raw.filename_pattern,
    includeCodec: raw.include_codec,
    includeQuality: raw.include_quality,
    includeDate: raw.include_date,
    overwritePolicy: raw.overwrite_policy,
    preserveDirectoryStructure: raw.preserve_directory_structure,
    sourceRoot: raw.source_root,
  };
}

export function serializeOutputSettings(settings: OutputSettings): RawOutputSettings {
  return {
    output_directory: settings.outputDirectory,
    subdirectory_pattern: settings.subdirectoryPattern,
    filename_pattern: settings.filenamePattern,
    include_codec: settings.includeCodec,
    include_quality: settings.includeQuality,
    include_date: settings.includeDate,
    overwrite_policy: settings.overwritePolicy,
    preserve_directory_structure: settings.preserveDirectoryStructure,
    source_root: settings.sourceRoot,
  };
}

export const outputSettingsSchema = rawOutputSettingsSchema.transform(toOutputSettings);
