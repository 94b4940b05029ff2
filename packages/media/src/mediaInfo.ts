/**
 * MediaInfo
 * 
 * Immutable view over one ffprobe result: streams grouped by kind plus
 * the aggregates the encoder and the output namer need.
 */

import { formatRuntime } from '@vidtool/utils';
import type { FFProbeResult, FFProbeStream } from './probes/ffprobe.js';
import type { StreamInfo, StreamKind } from './types.js';

function toNumber(value: number | string | undefined): number | null {
  if (value === undefined) return null;
  const n = typeof value === 'number' ? value : Number.parseFloat(value);
  return Number.isFinite(n) ? n : null;
}

function toStreamKind(codecType: string): StreamKind {
  switch (codecType) {
    case 'video':
    case 'audio':
    case 'subtitle':
      return codecType;
    default:
      return 'data';
  }
}

function toStreamInfo(stream: FFProbeStream): StreamInfo {
  return {
    index: stream.index,
    kind: toStreamKind(stream.codec_type),
    codecName: stream.codec_name ?? 'unknown',
    codecLongName: stream.codec_long_name ?? stream.codec_name ?? 'unknown',
    bitRate: toNumber(stream.bit_rate),
    width: stream.width,
    height: stream.height,
    codedWidth: stream.coded_width,
    codedHeight: stream.coded_height,
    displayAspectRatio: stream.display_aspect_ratio,
    channels: stream.channels,
  };
}

export interface MediaInfoInit {
  file: string;
  filename: string;
  formatName: string;
  formatLongName: string;
  duration: number;
  size: number;
  bitrate: number;
  streams: StreamInfo[];
}

export class MediaInfo {
  readonly file: string;
  readonly filename: string;
  readonly formatName: string;
  readonly formatLongName: string;
  /** Seconds */
  readonly duration: number;
  /** Bytes */
  readonly size: number;
  /** Bits per second */
  readonly bitrate: number;
  readonly streams: readonly StreamInfo[];
  readonly maxWidth: number;
  readonly maxHeight: number;

  constructor(init: MediaInfoInit) {
    this.file = init.file;
    this.filename = init.filename;
    this.formatName = init.formatName;
    this.formatLongName = init.formatLongName;
    this.duration = init.duration;
    this.size = init.size;
    this.bitrate = init.bitrate;
    this.streams = Object.freeze([...init.streams]);

    // The largest video stream wins, per axis
    let maxWidth = 0;
    let maxHeight = 0;
    for (const stream of this.videoStreams) {
      maxWidth = Math.max(maxWidth, stream.width ?? stream.codedWidth ?? 0);
      maxHeight = Math.max(maxHeight, stream.height ?? stream.codedHeight ?? 0);
    }
    this.maxWidth = maxWidth;
    this.maxHeight = maxHeight;
    Object.freeze(this);
  }

  static fromProbe(file: string, result: FFProbeResult): MediaInfo {
    return new MediaInfo({
      file,
      filename: result.format.filename,
      formatName: result.format.format_name,
      formatLongName: result.format.format_long_name,
      duration: toNumber(result.format.duration) ?? 0,
      size: Math.trunc(toNumber(result.format.size) ?? 0),
      bitrate: Math.trunc(toNumber(result.format.bit_rate) ?? 0),
      streams: result.streams.map(toStreamInfo),
    });
  }

  get videoStreams(): StreamInfo[] {
    return this.streamsOf('video');
  }

  get audioStreams(): StreamInfo[] {
    return this.streamsOf('audio');
  }

  get subtitleStreams(): StreamInfo[] {
    return this.streamsOf('subtitle');
  }

  get dataStreams(): StreamInfo[] {
    return this.streamsOf('data');
  }

  get durationMs(): number {
    return this.duration * 1000;
  }

  get sizeKb(): number {
    return this.size / 1024;
  }

  get sizeMb(): number {
    return this.size / (1024 * 1024);
  }

  get sizeGb(): number {
    return this.size / (1024 * 1024 * 1024);
  }

  get runtime(): string {
    return formatRuntime(this.duration);
  }

  get resolution(): string {
    return `${this.maxWidth}x${this.maxHeight}`;
  }

  get hasOddResolution(): boolean {
    return this.maxWidth % 2 === 1 || this.maxHeight % 2 === 1;
  }

  /**
   * Multi-line human summary of the container and its streams
   */
  getInfoBlock(): string {
    const lines: string[] = [
      `${this.filename} - ${this.formatName} - ${this.formatLongName}, Runtime = ${this.runtime}`,
    ];
    if (this.hasOddResolution) {
      lines.push(`Warning: Resolution (${this.resolution}) is not divisible by 2.`);
    }

    const video = this.videoStreams;
    if (video.length > 0) {
      lines.push(`${countLabel(video.length, 'Video')}: ${this.resolution}`);
      for (const stream of video) {
        let text = streamHeader(stream);
        if ((stream.height ?? 0) > 0) text += ` - ${stream.width ?? 'N/A'} x ${stream.height}`;
        if ((stream.codedHeight ?? 0) > 0) text += ` - ${stream.codedWidth ?? 'N/A'} x ${stream.codedHeight}`;
        if (stream.displayAspectRatio && stream.displayAspectRatio !== 'N/A') {
          text += ` - DAR: ${stream.displayAspectRatio}`;
        }
        lines.push(`${text} - bitrate: ${stream.bitRate ?? 'N/A'}`);
      }
    }

    const audio = this.audioStreams;
    if (audio.length > 0) {
      lines.push(`${countLabel(audio.length, 'Audio')}:`);
      for (const stream of audio) {
        let text = streamHeader(stream);
        if ((stream.channels ?? 0) > 0) text += ` - channels: ${stream.channels}`;
        lines.push(`${text} - bitrate: ${stream.bitRate ?? 'N/A'}`);
      }
    }

    for (const [streams, label] of [[this.subtitleStreams, 'Subtitle'], [this.dataStreams, 'Data']] as const) {
      if (streams.length > 0) {
        lines.push(`${countLabel(streams.length, label)}:`);
        lines.push(...streams.map(streamHeader));
      }
    }

    return lines.join('\n');
  }

  private streamsOf(kind: StreamKind): StreamInfo[] {
    return this.streams.filter(stream => stream.kind === kind);
  }
}

function countLabel(count: number, label: string): string {
  return `${count} ${label} stream${count > 1 ? 's' : ''}`;
}

function streamHeader(stream: StreamInfo): string {
  return `#${stream.index} ${stream.kind}: ${stream.codecLongName}`;
}
