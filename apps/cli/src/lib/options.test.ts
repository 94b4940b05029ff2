import { describe, it, expect } from 'vitest';
import {
  defaultEncodingOptions,
  InvalidArgumentError,
  outputSettingsSchema,
} from '@vidtool/core';
import { applyEncodeFlags, buildFilterCriteria, buildGenerator, collect, parseConfigValue } from './options.js';

describe('applyEncodeFlags', () => {
  it('keeps the base options when no flag is given', () => {
    expect(applyEncodeFlags(defaultEncodingOptions(), {})).toEqual(defaultEncodingOptions());
  });

  it('switches encoding on with a codec and CRF on with a value', () => {
    const options = applyEncodeFlags(defaultEncodingOptions(), {
      videoCodec: 'libx264',
      audioCodec: 'libopus',
      crf: '23',
    });

    expect(options).toMatchObject({
      encodeVideo: true,
      videoCodec: 'libx264',
      encodeAudio: true,
      audioCodec: 'libopus',
      useCrf: true,
      crfValue: 23,
    });
  });

  it('maps the switches and normalizes the extension', () => {
    const options = applyEncodeFlags(defaultEncodingOptions(), {
      data: false,
      fixResolution: true,
      fixErrors: true,
      appendRes: true,
      suffix: '_small',
      extension: 'mp4',
      subtitles: 'None',
    });

    expect(options).toMatchObject({
      noData: true,
      fixResolution: true,
      fixErr: true,
      appendRes: true,
      outputSuffix: '_small',
      outputExtension: '.mp4',
      subtitles: 'None',
    });
  });

  it('rejects values the options schema does not accept', () => {
    expect(() => applyEncodeFlags(defaultEncodingOptions(), { crf: '99' })).toThrow(InvalidArgumentError);
    expect(() => applyEncodeFlags(defaultEncodingOptions(), { subtitles: 'Some' })).toThrow(InvalidArgumentError);
  });
});

describe('buildGenerator', () => {
  const output = outputSettingsSchema.parse({});

  it('follows the saved settings', async () => {
    const generator = buildGenerator(output, defaultEncodingOptions(), {});
    expect(await generator.generateOutputPath('/videos/movie.mp4', null, defaultEncodingOptions()))
      .toBe('/videos/movie_copy.mkv');
  });

  it('starts from an output preset and keeps the chosen extension', async () => {
    const encoding = applyEncodeFlags(defaultEncodingOptions(), { extension: 'mp4' });
    const generator = buildGenerator(output, encoding, {
      outputPreset: 'Encoded Subdirectory',
      outputDir: '/out',
    });

    expect(await generator.generateOutputPath('/videos/movie.mp4', null, encoding))
      .toBe('/out/encoded/movie.mp4');
  });

  it('applies directory and pattern flags', async () => {
    const generator = buildGenerator(output, defaultEncodingOptions(), {
      outputDir: '/out',
      subdir: 'batch',
      pattern: '{stem}-final{extension}',
    });

    expect(await generator.generateOutputPath('/videos/movie.mp4')).toBe('/out/batch/movie-final.mkv');
  });

  it('rejects unknown policies and presets', () => {
    expect(() => buildGenerator(output, defaultEncodingOptions(), { overwrite: 'replace' }))
      .toThrow(InvalidArgumentError);
    expect(() => buildGenerator(output, defaultEncodingOptions(), { outputPreset: 'Nowhere' }))
      .toThrow(InvalidArgumentError);
  });
});

describe('parseConfigValue', () => {
  it('reads booleans and null', () => {
    expect(parseConfigValue('true')).toBe(true);
    expect(parseConfigValue('false')).toBe(false);
    expect(parseConfigValue('null')).toBeNull();
  });

  it('leaves other text as it is', () => {
    expect(parseConfigValue('22')).toBe('22');
    expect(parseConfigValue('{stem}{suffix}{extension}')).toBe('{stem}{suffix}{extension}');
  });
});

describe('buildFilterCriteria', () => {
  it('turns flags into ranges and lists', () => {
    expect(buildFilterCriteria({
      ext: 'mkv, mp4',
      include: ['*s01*'],
      minSize: '100',
      maxDuration: '3600',
      minWidth: '1280',
      videoCodec: 'hevc,h264',
    })).toEqual({
      extensions: ['mkv', 'mp4'],
      include: ['*s01*'],
      exclude: undefined,
      sizeMb: { min: 100, max: undefined },
      durationSec: { min: undefined, max: 3600 },
      width: { min: 1280, max: undefined },
      height: undefined,
      videoCodecs: ['hevc', 'h264'],
      audioCodecs: undefined,
    });
  });

  it('names the flag that is not a number', () => {
    expect(() => buildFilterCriteria({ maxHeight: 'tall' })).toThrow(
      'Invalid --max-height: expected a non-negative number'
    );
    expect(() => buildFilterCriteria({ minSize: '-5' })).toThrow(InvalidArgumentError);
  });

  it('collects repeated globs', () => {
    expect(collect('*.mkv', collect('*.mp4', []))).toEqual(['*.mp4', '*.mkv']);
  });
});
