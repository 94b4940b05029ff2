/**
 * Batch Filter
 *
 * Narrows a file list by name and by probed media properties. Name checks
 * (extension, include and exclude globs) run first; the prober is only
 * asked when a size, duration, resolution or codec criterion is set.
 * A file that cannot be probed does not match.
 */

import { basename, extname } from 'node:path';
import { minimatch } from 'minimatch';
import { createLogger, getErrorMessage, normalizeExtension } from '@vidtool/utils';
import { InvalidArgumentError } from '@vidtool/core';
import type { MediaInfo, MediaProber, StreamInfo } from '@vidtool/media';

const log = createLogger({ module: 'batch-filter' });

export interface NumericRange {
  min?: number;
  max?: number;
}

export interface BatchFilterCriteria {
  /** With or without the leading dot, any case */
  extensions?: readonly string[];
  /** Filename globs, e.g. `*s01e*`; a file must match one */
  include?: readonly string[];
  /** Filename globs; a file matching any is dropped */
  exclude?: readonly string[];
  sizeMb?: NumericRange;
  durationSec?: NumericRange;
  /** Largest video stream width */
  width?: NumericRange;
  /** Largest video stream height */
  height?: NumericRange;
  videoCodecs?: readonly string[];
  audioCodecs?: readonly string[];
}

const GLOB_OPTIONS = { nocase: true, dot: true, nonegate: true, nocomment: true };

function inRange(value: number, range: NumericRange | undefined): boolean {
  if (!range) return true;
  if (range.min !== undefined && value < range.min) return false;
  if (range.max !== undefined && value > range.max) return false;
  return true;
}

function hasRange(range: NumericRange | undefined): boolean {
  return range !== undefined && (range.min !== undefined || range.max !== undefined);
}

function checkRange(field: string, range: NumericRange | undefined): void {
  if (!range) return;
  for (const value of [range.min, range.max]) {
    if (value !== undefined && (!Number.isFinite(value) || value < 0)) {
      throw new InvalidArgumentError(field, `${value} is not a non-negative number`);
    }
  }
  if (range.min !== undefined && range.max !== undefined && range.min > range.max) {
    throw new InvalidArgumentError(field, `minimum ${range.min} is above maximum ${range.max}`);
  }
}

function lowerAll(values: readonly string[] | undefined): string[] {
  return (values ?? []).map(value => value.trim().toLowerCase()).filter(value => value !== '');
}

function hasCodec(streams: readonly StreamInfo[], wanted: readonly string[]): boolean {
  const names = streams.map(stream => stream.codecName.toLowerCase());
  return wanted.some(codec => names.includes(codec));
}

export class BatchFilter {
  private readonly extensions: Set<string>;
  private readonly include: string[];
  private readonly exclude: string[];
  private readonly videoCodecs: string[];
  private readonly audioCodecs: string[];

  constructor(private readonly criteria: BatchFilterCriteria = {}) {
    checkRange('size range', criteria.sizeMb);
    checkRange('duration range', criteria.durationSec);
    checkRange('width range', criteria.width);
    checkRange('height range', criteria.height);

    this.extensions = new Set(
      (criteria.extensions ?? [])
        .map(ext => normalizeExtension(ext).toLowerCase())
        .filter(ext => ext !== '')
    );
    this.include = [...(criteria.include ?? [])];
    this.exclude = [...(criteria.exclude ?? [])];
    this.videoCodecs = lowerAll(criteria.videoCodecs);
    this.audioCodecs = lowerAll(criteria.audioCodecs);
  }

  /**
   * True when some criterion needs probed metadata
   */
  get needsMediaInfo(): boolean {
    const { sizeMb, durationSec, width, height } = this.criteria;
    return hasRange(sizeMb) || hasRange(durationSec) || hasRange(width) || hasRange(height)
      || this.videoCodecs.length > 0 || this.audioCodecs.length > 0;
  }

  matchesName(file: string): boolean {
    if (this.extensions.size > 0 && !this.extensions.has(extname(file).toLowerCase())) {
      return false;
    }

    const name = basename(file);
    if (this.include.length > 0 && !this.include.some(pattern => minimatch(name, pattern, GLOB_OPTIONS))) {
      return false;
    }
    if (this.exclude.some(pattern => minimatch(name, pattern, GLOB_OPTIONS))) {
      return false;
    }
    return true;
  }

  matchesMedia(info: MediaInfo): boolean {
    const { sizeMb, durationSec, width, height } = this.criteria;

    if (!inRange(info.sizeMb, sizeMb)) return false;
    if (!inRange(info.duration, durationSec)) return false;
    if (!inRange(info.maxWidth, width)) return false;
    if (!inRange(info.maxHeight, height)) return false;

    if (this.videoCodecs.length > 0 && !hasCodec(info.videoStreams, this.videoCodecs)) return false;
    if (this.audioCodecs.length > 0 && !hasCodec(info.audioStreams, this.audioCodecs)) return false;
    return true;
  }

  async matches(file: string, prober: MediaProber): Promise<boolean> {
    if (!this.matchesName(file)) return false;
    if (!this.needsMediaInfo) return true;

    let info: MediaInfo;
    try {
      info = await prober.getMediaInfo(file);
    } catch (error) {
      log.warn({ file, error: getErrorMessage(error) }, 'Could not probe, leaving out of selection');
      return false;
    }
    return this.matchesMedia(info);
  }
}

/**
 * Keep the files the filter accepts, in their original order
 */
export async function selectFiles(
  files: readonly string[],
  filter: BatchFilter,
  prober: MediaProber
): Promise<string[]> {
  const selected: string[] = [];
  for (const file of files) {
    if (await filter.matches(file, prober)) {
      selected.push(file);
    }
  }

  log.info({ candidates: files.length, selected: selected.length }, 'Selection done');
  return selected;
}
