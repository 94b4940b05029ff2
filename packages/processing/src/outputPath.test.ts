import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  defaultEncodingOptions,
  InvalidArgumentError,
  TooManyCollisionsError,
  outputSettingsSchema,
  type EncodingOptions,
} from '@vidtool/core';
import { pathExists } from '@vidtool/utils';
import { OutputPathGenerator } from './outputPath.js';
import { getOutputPreset } from './outputPresets.js';
import { FakeProber, makeMediaInfo } from './__fixtures__/fakes.js';

// 2024-03-05 14:07:09 local time
const now = (): Date => new Date(2024, 2, 5, 14, 7, 9);

const info = makeMediaInfo('/videos/movie.mp4', { duration: 83.45, width: 1920, height: 1080, size: 52428800 });

function options(overrides: Partial<EncodingOptions> = {}): EncodingOptions {
  return { ...defaultEncodingOptions(), ...overrides };
}

describe('OutputPathGenerator', () => {
  let generator: OutputPathGenerator;

  beforeEach(() => {
    generator = new OutputPathGenerator({ now });
  });

  describe('defaults', () => {
    it('writes next to the input with the _encoded suffix', async () => {
      expect(await generator.generateOutputPath('/videos/movie.mp4')).toBe('/videos/movie_encoded.mkv');
    });

    it('is deterministic for the same inputs', async () => {
      generator.setNamingOptions({ suffix: '', includeResolution: true, includeCodec: true, includeDate: true });
      const first = await generator.generateOutputPath('/videos/movie.mp4', info, options());
      const second = await generator.generateOutputPath('/videos/movie.mp4', info, options());
      expect(first).toBe(second);
      expect(first).toBe('/videos/movie_1920x1080_x265_20240305.mkv');
    });

    it('normalizes the extension', async () => {
      generator.setNamingOptions({ suffix: '_small', extension: 'mp4' });
      expect(await generator.generateOutputPath('/videos/movie.mkv')).toBe('/videos/movie_small.mp4');
    });
  });

  describe('dynamic suffix', () => {
    it('prefixes an underscore when the parts do not start with one', async () => {
      generator.setNamingOptions({ suffix: 'hevc' });
      expect(await generator.generateOutputPath('/videos/movie.mp4')).toBe('/videos/movie_hevc.mkv');

      generator.setNamingOptions({ suffix: '', includeResolution: true });
      expect(await generator.generateOutputPath('/videos/movie.mp4', info)).toBe('/videos/movie_1920x1080.mkv');
    });

    it('leaves the name bare when every part is empty', async () => {
      generator.setNamingOptions({ suffix: '' });
      expect(await generator.generateOutputPath('/videos/movie.mp4', info, options())).toBe('/videos/movie.mkv');
    });

    it('joins every enabled part in order', async () => {
      generator.setNamingOptions({
        suffix: '_enc',
        includeResolution: true,
        includeCodec: true,
        includeQuality: true,
        includeDate: true,
      });
      const output = await generator.generateOutputPath(
        '/videos/movie.mp4',
        info,
        options({ useCrf: true, crfValue: 23 })
      );
      expect(output).toBe('/videos/movie_enc_1920x1080_x265_crf23_20240305.mkv');
    });

    it('cleans codec names and leaves out copy', async () => {
      generator.setNamingOptions({ suffix: '', includeCodec: true });
      expect(await generator.generateOutputPath('/v/a.mp4', null, options({ videoCodec: 'h264_nvenc' })))
        .toBe('/v/a_h264nvenc.mkv');
      expect(await generator.generateOutputPath('/v/a.mp4', null, options({ videoCodec: 'copy' })))
        .toBe('/v/a.mkv');
    });

    it('adds quality only when CRF is enabled', async () => {
      generator.setNamingOptions({ suffix: '', includeQuality: true });
      expect(await generator.generateOutputPath('/v/a.mp4', null, options({ useCrf: false, crfValue: 23 })))
        .toBe('/v/a.mkv');
      expect(await generator.generateOutputPath('/v/a.mp4', null, options({ useCrf: true, crfValue: 23 })))
        .toBe('/v/a_crf23.mkv');
    });

    it('appends the probed resolution even when the encode fixes odd sizes', async () => {
      const odd = makeMediaInfo('/v/odd.avi', { width: 721, height: 405 });
      generator
        .setNamingOptions({ suffix: '', includeResolution: true })
        .setFilenamePattern('{stem}{suffix}_{resolution}{extension}');
      expect(await generator.generateOutputPath('/v/odd.avi', odd, options({ fixResolution: true })))
        .toBe('/v/odd_721x405_721x405.mkv');
    });
  });

  describe('filename pattern', () => {
    it('resolves every placeholder', async () => {
      generator.setFilenamePattern(
        '{stem}-{resolution}-{width}x{height}-{duration}s-{size_mb}MB-{codec}-q{quality}-{date}-{time}{extension}'
      );
      const output = await generator.generateOutputPath('/videos/movie.mp4', info, options({ crfValue: 23 }));
      expect(output).toBe('/videos/movie-1920x1080-1920x1080-83s-50MB-libx265-q23-2024-03-05-140709.mkv');
    });

    it('falls back to the base suffix for {suffix}', async () => {
      generator.setFilenamePattern('{date}_{stem}{suffix}{extension}');
      expect(await generator.generateOutputPath('/v/a.mp4')).toBe('/v/2024-03-05_a_encoded.mkv');
    });

    it('keeps placeholders it cannot resolve', async () => {
      generator.setFilenamePattern('{stem}-{resolution}-{codec}-{nope}{extension}');
      expect(await generator.generateOutputPath('/v/a.mp4')).toBe('/v/a-{resolution}-{codec}-{nope}.mkv');
    });

    it('does not expand placeholders that appear inside substituted values', async () => {
      generator.setFilenamePattern('{codec}{extension}');
      expect(await generator.generateOutputPath('/v/a.mp4', null, options({ videoCodec: '{stem}' })))
        .toBe('/v/{stem}.mkv');
    });

    it('replaces characters that are invalid in filenames', async () => {
      generator.setFilenamePattern('{stem}: <draft>?{extension}');
      expect(await generator.generateOutputPath('/v/a.mp4')).toBe('/v/a_ _draft__.mkv');

      generator.setFilenamePattern('{codec}{extension}');
      expect(await generator.generateOutputPath('/v/a.mp4', null, options({ videoCodec: 'a/b|c' })))
        .toBe('/v/a_b_c.mkv');
    });

    it('rejects an empty pattern', () => {
      expect(() => generator.setFilenamePattern('  ')).toThrow(InvalidArgumentError);
    });
  });

  describe('directories', () => {
    it('nests subdirectory segments and resolves them', async () => {
      generator.setOutputDirectory('/out').setSubdirectoryPattern('archived/{codec}');
      expect(await generator.generateOutputPath('/videos/movie.mp4', null, options()))
        .toBe('/out/archived/libx265/movie_encoded.mkv');
    });

    it('puts the subdirectory under the input directory without an output directory', async () => {
      generator.setSubdirectoryPattern('{date}');
      expect(await generator.generateOutputPath('/videos/movie.mp4')).toBe('/videos/2024-03-05/movie_encoded.mkv');
    });

    it('drops segments that would leave the output directory', async () => {
      generator.setOutputDirectory('/out').setSubdirectoryPattern('../escape/./x');
      expect(await generator.generateOutputPath('/videos/movie.mp4')).toBe('/out/escape/x/movie_encoded.mkv');
    });

    it('mirrors the layout below the source root', async () => {
      generator.setOutputDirectory('/out').setSourceRoot('/videos');
      expect(await generator.generateOutputPath('/videos/season1/ep1.mkv')).toBe('/out/season1/ep1_encoded.mkv');
      expect(await generator.generateOutputPath('/videos/ep0.mkv')).toBe('/out/ep0_encoded.mkv');
      expect(await generator.generateOutputPath('/other/ep2.mkv')).toBe('/out/ep2_encoded.mkv');
    });

    it('flattens when structure preservation is off', async () => {
      generator.setOutputDirectory('/out').setSourceRoot('/videos').setPreserveDirectoryStructure(false);
      expect(await generator.generateOutputPath('/videos/season1/ep1.mkv')).toBe('/out/ep1_encoded.mkv');
    });
  });

  describe('overwrite policy', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'vidtool-output-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('rejects unknown policies', () => {
      expect(() => generator.setOverwritePolicy('replace')).toThrow(InvalidArgumentError);
    });

    it('returns the candidate for skip and overwrite', async () => {
      const input = join(dir, 'movie.mp4');
      await writeFile(join(dir, 'movie_encoded.mkv'), 'x');

      generator.setOverwritePolicy('skip');
      const skipped = await generator.generateOutputPath(input);
      expect(skipped).toBe(join(dir, 'movie_encoded.mkv'));
      expect(await generator.shouldSkip(skipped)).toBe(true);

      generator.setOverwritePolicy('overwrite');
      expect(await generator.generateOutputPath(input)).toBe(join(dir, 'movie_encoded.mkv'));
      expect(await generator.shouldSkip(skipped)).toBe(false);
    });

    it('does not skip outputs that do not exist', async () => {
      expect(await generator.shouldSkip(join(dir, 'missing.mkv'))).toBe(false);
    });

    it('treats a zero-byte leftover as absent', async () => {
      const input = join(dir, 'movie.mp4');
      const stub = join(dir, 'movie_encoded.mkv');
      await writeFile(stub, '');

      expect(await generator.shouldSkip(stub)).toBe(false);

      generator.setOverwritePolicy('increment');
      expect(await generator.generateOutputPath(input)).toBe(stub);
      const [entry] = await generator.previewOutputPaths([input]);
      expect(entry).toEqual({ input, output: stub, exists: false });
    });

    it('increments past existing files', async () => {
      generator.setOverwritePolicy('increment');
      const input = join(dir, 'movie.mp4');
      expect(await generator.generateOutputPath(input)).toBe(join(dir, 'movie_encoded.mkv'));

      await writeFile(join(dir, 'movie_encoded.mkv'), 'x');
      await writeFile(join(dir, 'movie_encoded_001.mkv'), 'x');
      expect(await generator.generateOutputPath(input)).toBe(join(dir, 'movie_encoded_002.mkv'));
    });

    it('gives up after 999 attempts', async () => {
      generator.setOverwritePolicy('increment');
      await writeFile(join(dir, 'movie_encoded.mkv'), 'x');
      for (let i = 1; i <= 999; i++) {
        await writeFile(join(dir, `movie_encoded_${String(i).padStart(3, '0')}.mkv`), 'x');
      }
      await expect(generator.generateOutputPath(join(dir, 'movie.mp4'))).rejects.toBeInstanceOf(TooManyCollisionsError);
    });

    it('never creates directories or files', async () => {
      generator.setOutputDirectory(join(dir, 'out')).setSubdirectoryPattern('encoded');
      await generator.generateOutputPath(join(dir, 'movie.mp4'));
      expect(await pathExists(join(dir, 'out'))).toBe(false);
    });
  });

  describe('fromSettings', () => {
    it('combines output settings with the naming options', async () => {
      const output = outputSettingsSchema.parse({
        output_directory: '/out',
        subdirectory_pattern: '{codec}',
        include_quality: true,
        overwrite_policy: 'increment',
      });
      const encoding = options({ outputSuffix: '_copy', outputExtension: 'mp4', appendRes: true, useCrf: true });
      const built = OutputPathGenerator.fromSettings(output, encoding, { now });

      expect(built.settings).toMatchObject({
        outputDirectory: '/out',
        suffix: '_copy',
        extension: '.mp4',
        includeResolution: true,
        includeQuality: true,
        overwritePolicy: 'increment',
      });
      expect(await built.generateOutputPath('/videos/movie.mkv', info, encoding))
        .toBe('/out/libx265/movie_copy_1920x1080_crf28.mp4');
    });
  });

  describe('previewOutputPaths', () => {
    it('probes only when media info is needed', async () => {
      const prober = new FakeProber();
      await generator.previewOutputPaths(['/v/a.mp4'], null, prober);
      expect(prober.probed).toEqual([]);

      generator.setFilenamePattern('{stem}_{height}p{extension}');
      const preview = await generator.previewOutputPaths(['/v/a.mp4'], null, prober);
      expect(prober.probed).toEqual(['/v/a.mp4']);
      expect(preview).toEqual([{ input: '/v/a.mp4', output: '/v/a_1080p.mkv', exists: false }]);
    });

    it('continues without media info when probing fails', async () => {
      const prober = new FakeProber().fail('/v/broken.mp4');
      generator.setNamingOptions({ suffix: '_x', includeResolution: true });
      const preview = await generator.previewOutputPaths(['/v/broken.mp4', '/v/ok.mp4'], null, prober);
      expect(preview.map(entry => entry.output)).toEqual(['/v/broken_x.mkv', '/v/ok_x_1920x1080.mkv']);
    });

    it('reports errors per entry', async () => {
      const dir = await mkdtemp(join(tmpdir(), 'vidtool-preview-'));
      try {
        generator.setOverwritePolicy('increment');
        await writeFile(join(dir, 'a_encoded.mkv'), 'x');
        for (let i = 1; i <= 999; i++) {
          await writeFile(join(dir, `a_encoded_${String(i).padStart(3, '0')}.mkv`), 'x');
        }
        const preview = await generator.previewOutputPaths([join(dir, 'a.mp4'), join(dir, 'b.mp4')]);
        expect(preview[0]).toMatchObject({ output: null, exists: false });
        expect(preview[0]?.error).toMatch(/^Too many existing files/);
        expect(preview[1]).toEqual({ input: join(dir, 'b.mp4'), output: join(dir, 'b_encoded.mkv'), exists: false });
      } finally {
        await rm(dir, { recursive: true, force: true });
      }
    });
  });
});

describe('output presets', () => {
  it('configures the archive layout', async () => {
    const generator = getOutputPreset('Archive Organization', { now });
    expect(await generator.generateOutputPath('/videos/movie.mp4', info, options()))
      .toBe('/videos/archived/libx265/movie_archived_1920x1080.mkv');
  });

  it('uses the increment policy for quality testing', async () => {
    const generator = getOutputPreset('Quality Testing', { now });
    expect(generator.overwritePolicy).toBe('increment');
    expect(await generator.generateOutputPath('/videos/movie.mp4', null, options({ useCrf: true, crfValue: 20 })))
      .toBe('/videos/quality_test/movie_crf20_20240305.mkv');
  });

  it('rejects unknown names', () => {
    expect(() => getOutputPreset('Nowhere')).toThrow(InvalidArgumentError);
  });
});
