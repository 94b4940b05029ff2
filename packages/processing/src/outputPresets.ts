/**
 * Output Presets
 *
 * Named output path configurations for common layouts.
 */

import { InvalidArgumentError } from '@vidtool/core';
import { OutputPathGenerator, type GeneratorOptions } from './outputPath.js';

export const OUTPUT_PRESETS = [
  'Same Directory',
  'Encoded Subdirectory',
  'Codec Subdirectory',
  'Date Subdirectory',
  'Resolution + Codec',
  'Quality Testing',
  'Archive Organization',
  'Custom Directory',
] as const;

export type OutputPresetName = typeof OUTPUT_PRESETS[number];

export function isOutputPresetName(name: string): name is OutputPresetName {
  return OUTPUT_PRESETS.some(preset => preset === name);
}

function configure(generator: OutputPathGenerator, name: OutputPresetName): OutputPathGenerator {
  switch (name) {
    case 'Same Directory':
      return generator.setNamingOptions({ suffix: '_encoded' });
    case 'Encoded Subdirectory':
      return generator
        .setSubdirectoryPattern('encoded')
        .setNamingOptions({ suffix: '' });
    case 'Codec Subdirectory':
      return generator
        .setSubdirectoryPattern('{codec}')
        .setNamingOptions({ suffix: '', includeQuality: true });
    case 'Date Subdirectory':
      return generator
        .setSubdirectoryPattern('{date}')
        .setNamingOptions({ suffix: '' });
    case 'Resolution + Codec':
      return generator.setNamingOptions({ suffix: '', includeResolution: true, includeCodec: true });
    case 'Quality Testing':
      return generator
        .setSubdirectoryPattern('quality_test')
        .setNamingOptions({ suffix: '', includeQuality: true, includeDate: true })
        .setOverwritePolicy('increment');
    case 'Archive Organization':
      return generator
        .setSubdirectoryPattern('archived/{codec}')
        .setNamingOptions({ suffix: '_archived', includeResolution: true });
    case 'Custom Directory':
      // The caller sets the directory
      return generator.setNamingOptions({ suffix: '_processed' });
  }
}

/**
 * Get a fresh generator configured for a named layout
 */
export function getOutputPreset(name: string, options: GeneratorOptions = {}): OutputPathGenerator {
  if (!isOutputPresetName(name)) {
    throw new InvalidArgumentError('output preset', `unknown preset '${name}'`);
  }
  return configure(new OutputPathGenerator(options), name);
}
