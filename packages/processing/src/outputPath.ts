/**
 * Output Path Generator
 *
 * Turns an input file, its probed metadata and the encoding options into
 * the output path: base directory, optional templated subdirectories, a
 * templated filename and a collision policy. Nothing is ever created
 * here. A zero-byte file left by an interrupted run does not count as an
 * existing output; the encode removes it before writing.
 */

import { basename, dirname, extname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import {
  createLogger,
  formatCompactDate,
  formatDateStamp,
  formatTimeStamp,
  getBasename,
  getErrorMessage,
  normalizeExtension,
  safeStat,
  sanitizeFilename,
} from '@vidtool/utils';
import {
  DEFAULT_FILENAME_PATTERN,
  InvalidArgumentError,
  isOverwritePolicy,
  OVERWRITE_POLICIES,
  TooManyCollisionsError,
  type EncodingOptions,
  type OutputSettings,
  type OverwritePolicy,
} from '@vidtool/core';
import type { MediaInfo, MediaProber } from '@vidtool/media';

const log = createLogger({ module: 'output-path' });

async function isOccupied(filePath: string): Promise<boolean> {
  const stats = await safeStat(filePath);
  return stats !== null && !(stats.isFile() && stats.size === 0);
}

export const MAX_INCREMENT = 999;

const PLACEHOLDER = /\{(\w+)\}/g;

// Placeholders that only resolve with probed media info
const MEDIA_PLACEHOLDERS = ['{resolution}', '{width}', '{height}', '{duration}', '{size_mb}'];

export interface NamingOptions {
  suffix?: string;
  extension?: string;
  includeResolution?: boolean;
  includeCodec?: boolean;
  includeQuality?: boolean;
  includeDate?: boolean;
}

export interface GeneratorConfig {
  outputDirectory: string | null;
  subdirectoryPattern: string;
  filenamePattern: string;
  suffix: string;
  extension: string;
  includeResolution: boolean;
  includeCodec: boolean;
  includeQuality: boolean;
  includeDate: boolean;
  preserveDirectoryStructure: boolean;
  sourceRoot: string | null;
  overwritePolicy: OverwritePolicy;
}

export interface PreviewEntry {
  input: string;
  output: string | null;
  exists: boolean;
  error?: string;
}

export interface GeneratorOptions {
  /** Clock for the date and time placeholders */
  now?: () => Date;
}

interface PatternContext {
  stem: string;
  mediaInfo: MediaInfo | null;
  settings: EncodingOptions | null;
  now: Date;
}

export class OutputPathGenerator {
  private config: GeneratorConfig = {
    outputDirectory: null,
    subdirectoryPattern: '',
    filenamePattern: DEFAULT_FILENAME_PATTERN,
    suffix: '_encoded',
    extension: '.mkv',
    includeResolution: false,
    includeCodec: false,
    includeQuality: false,
    includeDate: false,
    preserveDirectoryStructure: true,
    sourceRoot: null,
    overwritePolicy: 'skip',
  };

  private readonly now: () => Date;

  constructor(options: GeneratorOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Build a generator from the persisted output settings and the
   * naming parts of the encoding options
   */
  static fromSettings(
    output: OutputSettings,
    encoding: EncodingOptions,
    options: GeneratorOptions = {}
  ): OutputPathGenerator {
    const generator = new OutputPathGenerator(options);
    generator.setOutputDirectory(output.outputDirectory);
    generator.setSubdirectoryPattern(output.subdirectoryPattern);
    generator.setFilenamePattern(output.filenamePattern);
    generator.setNamingOptions({
      suffix: encoding.outputSuffix,
      extension: encoding.outputExtension,
      includeResolution: encoding.appendRes,
      includeCodec: output.includeCodec,
      includeQuality: output.includeQuality,
      includeDate: output.includeDate,
    });
    generator.setOverwritePolicy(output.overwritePolicy);
    generator.setPreserveDirectoryStructure(output.preserveDirectoryStructure);
    generator.setSourceRoot(output.sourceRoot);
    return generator;
  }

  get settings(): Readonly<GeneratorConfig> {
    return { ...this.config };
  }

  get overwritePolicy(): OverwritePolicy {
    return this.config.overwritePolicy;
  }

  /**
   * Null means "same directory as the input"
   */
  setOutputDirectory(directory: string | null): this {
    this.config.outputDirectory = directory === '' ? null : directory;
    return this;
  }

  /**
   * Subdirectory template, e.g. `encoded`, `{codec}` or `archived/{date}`
   */
  setSubdirectoryPattern(pattern: string): this {
    this.config.subdirectoryPattern = pattern;
    return this;
  }

  setFilenamePattern(pattern: string): this {
    if (pattern.trim() === '') {
      throw new InvalidArgumentError('filename pattern', 'must not be empty');
    }
    this.config.filenamePattern = pattern;
    return this;
  }

  setNamingOptions(options: NamingOptions): this {
    this.config.suffix = options.suffix ?? '_encoded';
    this.config.extension = normalizeExtension(options.extension ?? '.mkv');
    this.config.includeResolution = options.includeResolution ?? false;
    this.config.includeCodec = options.includeCodec ?? false;
    this.config.includeQuality = options.includeQuality ?? false;
    this.config.includeDate = options.includeDate ?? false;
    return this;
  }

  setOverwritePolicy(policy: string): this {
    if (!isOverwritePolicy(policy)) {
      throw new InvalidArgumentError(
        'overwrite policy',
        `must be one of ${OVERWRITE_POLICIES.join(', ')}, got '${policy}'`
      );
    }
    this.config.overwritePolicy = policy;
    return this;
  }

  setPreserveDirectoryStructure(preserve: boolean): this {
    this.config.preserveDirectoryStructure = preserve;
    return this;
  }

  /**
   * Directory whose layout is mirrored under the output directory
   */
  setSourceRoot(directory: string | null): this {
    this.config.sourceRoot = directory === '' ? null : directory;
    return this;
  }

  async generateOutputPath(
    inputPath: string,
    mediaInfo: MediaInfo | null = null,
    settings: EncodingOptions | null = null
  ): Promise<string> {
    const context: PatternContext = {
      stem: getBasename(inputPath),
      mediaInfo,
      settings,
      now: this.now(),
    };

    let directory = this.baseDirectory(inputPath);

    if (this.config.subdirectoryPattern) {
      const segments = this.config.subdirectoryPattern
        .split(/[\\/]/)
        .map(segment => this.resolvePattern(segment, context))
        .filter(segment => segment !== '' && segment !== '.' && segment !== '..');
      directory = join(directory, ...segments);
    }

    const filename = this.resolvePattern(
      this.config.filenamePattern,
      context,
      this.dynamicSuffix(context)
    );

    return this.applyOverwritePolicy(join(directory, filename));
  }

  /**
   * True when the skip policy applies and a non-empty output already exists
   */
  async shouldSkip(outputPath: string): Promise<boolean> {
    return this.config.overwritePolicy === 'skip' && (await isOccupied(outputPath));
  }

  /**
   * Whether generation can use probed metadata for the current configuration
   */
  needsMediaInfo(): boolean {
    if (this.config.includeResolution) return true;
    const patterns = this.config.filenamePattern + this.config.subdirectoryPattern;
    return MEDIA_PLACEHOLDERS.some(placeholder => patterns.includes(placeholder));
  }

  /**
   * Planned output for each input. Probes only when the configuration
   * needs media info and carries on without it when probing fails.
   */
  async previewOutputPaths(
    inputs: readonly string[],
    settings: EncodingOptions | null = null,
    prober?: MediaProber
  ): Promise<PreviewEntry[]> {
    const needsInfo = this.needsMediaInfo();
    const results: PreviewEntry[] = [];

    for (const input of inputs) {
      try {
        let mediaInfo: MediaInfo | null = null;
        if (needsInfo && prober) {
          try {
            mediaInfo = await prober.getMediaInfo(input);
          } catch (error) {
            log.debug({ file: input, error: getErrorMessage(error) }, 'Preview continues without media info');
          }
        }

        const output = await this.generateOutputPath(input, mediaInfo, settings);
        results.push({ input, output, exists: await isOccupied(output) });
      } catch (error) {
        results.push({ input, output: null, exists: false, error: getErrorMessage(error) });
      }
    }

    return results;
  }

  private baseDirectory(inputPath: string): string {
    const { outputDirectory, preserveDirectoryStructure, sourceRoot } = this.config;
    if (outputDirectory === null) {
      return dirname(inputPath);
    }

    if (preserveDirectoryStructure && sourceRoot !== null) {
      const relativeDir = relative(resolve(sourceRoot), dirname(resolve(inputPath)));
      const outside = relativeDir === '..' || relativeDir.startsWith(`..${sep}`) || isAbsolute(relativeDir);
      if (relativeDir !== '' && !outside) {
        return join(outputDirectory, relativeDir);
      }
    }

    return outputDirectory;
  }

  private dynamicSuffix({ mediaInfo, settings, now }: PatternContext): string {
    const parts: string[] = this.config.suffix ? [this.config.suffix] : [];

    if (this.config.includeResolution && mediaInfo) {
      parts.push(mediaInfo.resolution);
    }

    if (this.config.includeCodec && settings) {
      const codec = settings.videoCodec;
      if (codec && codec !== 'copy') {
        parts.push(codec.replaceAll('lib', '').replaceAll('_', ''));
      }
    }

    if (this.config.includeQuality && settings?.useCrf) {
      parts.push(`crf${settings.crfValue}`);
    }

    if (this.config.includeDate) {
      parts.push(formatCompactDate(now));
    }

    const combined = parts.join('_');
    return combined && !combined.startsWith('_') ? `_${combined}` : combined;
  }

  private resolvePattern(pattern: string, context: PatternContext, resolvedSuffix = ''): string {
    const { stem, mediaInfo, settings, now } = context;
    const values = new Map<string, string>([
      ['stem', stem],
      ['suffix', resolvedSuffix || this.config.suffix],
      ['extension', this.config.extension],
      ['date', formatDateStamp(now)],
      ['time', formatTimeStamp(now)],
    ]);

    if (mediaInfo) {
      values.set('resolution', mediaInfo.resolution);
      values.set('width', String(mediaInfo.maxWidth));
      values.set('height', String(mediaInfo.maxHeight));
      values.set('duration', String(Math.trunc(mediaInfo.duration)));
      values.set('size_mb', String(Math.trunc(mediaInfo.sizeMb)));
    }

    if (settings) {
      values.set('codec', settings.videoCodec || 'unknown');
      values.set('quality', String(settings.crfValue));
    }

    // Single pass, so substituted values are never re-expanded
    const resolved = pattern.replace(PLACEHOLDER, (match, name: string) => values.get(name) ?? match);
    return sanitizeFilename(resolved);
  }

  private async applyOverwritePolicy(candidate: string): Promise<string> {
    if (this.config.overwritePolicy !== 'increment' || !(await isOccupied(candidate))) {
      return candidate;
    }

    const directory = dirname(candidate);
    const extension = extname(candidate);
    const stem = basename(candidate, extension);

    for (let counter = 1; counter <= MAX_INCREMENT; counter++) {
      const next = join(directory, `${stem}_${String(counter).padStart(3, '0')}${extension}`);
      if (!(await isOccupied(next))) {
        return next;
      }
    }

    throw new TooManyCollisionsError(candidate, MAX_INCREMENT);
  }
}
