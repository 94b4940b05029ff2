import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { MediaInfo } from './mediaInfo.js';
import { ffprobeResultSchema } from './probes/ffprobe.js';

const fixture = ffprobeResultSchema.parse(
  JSON.parse(readFileSync(fileURLToPath(new URL('./__fixtures__/probe-1080p.json', import.meta.url)), 'utf-8'))
);

describe('MediaInfo', () => {
  const info = MediaInfo.fromProbe('/videos/sample.mkv', fixture);

  it('groups streams by kind', () => {
    expect(info.videoStreams).toHaveLength(1);
    expect(info.audioStreams).toHaveLength(1);
    expect(info.subtitleStreams).toHaveLength(1);
    expect(info.dataStreams.map(s => s.codecName)).toEqual(['ttf']);
  });

  it('computes aggregates from the format section', () => {
    expect(info.duration).toBeCloseTo(83.45);
    expect(info.durationMs).toBeCloseTo(83450);
    expect(info.size).toBe(52428800);
    expect(info.sizeMb).toBe(50);
    expect(info.sizeKb).toBe(51200);
    expect(info.bitrate).toBe(5026000);
    expect(info.runtime).toBe('0:01:23');
  });

  it('prefers display dimensions over coded ones', () => {
    expect(info.maxWidth).toBe(1920);
    expect(info.maxHeight).toBe(1080);
    expect(info.resolution).toBe('1920x1080');
    expect(info.hasOddResolution).toBe(false);
  });

  it('takes the largest dimension on each axis across video streams', () => {
    const multi = new MediaInfo({
      file: '/v/multi.mkv',
      filename: 'multi.mkv',
      formatName: 'matroska',
      formatLongName: 'Matroska',
      duration: 10,
      size: 1,
      bitrate: 1,
      streams: [
        { index: 0, kind: 'video', codecName: 'h264', codecLongName: 'H.264', bitRate: null, width: 1280, height: 721 },
        { index: 1, kind: 'video', codecName: 'mjpeg', codecLongName: 'Motion JPEG', bitRate: null, codedWidth: 640, codedHeight: 960 },
      ],
    });
    expect(multi.resolution).toBe('1280x960');
  });

  it('falls back to coded dimensions and flags odd sizes', () => {
    const odd = new MediaInfo({
      file: '/v/odd.avi',
      filename: 'odd.avi',
      formatName: 'avi',
      formatLongName: 'AVI',
      duration: 1,
      size: 1,
      bitrate: 1,
      streams: [
        { index: 0, kind: 'video', codecName: 'mpeg4', codecLongName: 'MPEG-4 part 2', bitRate: null, codedWidth: 721, codedHeight: 405 },
      ],
    });
    expect(odd.resolution).toBe('721x405');
    expect(odd.hasOddResolution).toBe(true);
    expect(odd.getInfoBlock().split('\n')[1]).toBe('Warning: Resolution (721x405) is not divisible by 2.');
  });

  it('renders an info block', () => {
    expect(info.getInfoBlock().split('\n')).toEqual([
      'sample.mkv - matroska,webm - Matroska / WebM, Runtime = 0:01:23',
      '1 Video stream: 1920x1080',
      '#0 video: H.264 / AVC / MPEG-4 AVC / MPEG-4 part 10 - 1920 x 1080 - 1920 x 1088 - DAR: 16:9 - bitrate: 4800000',
      '1 Audio stream:',
      '#1 audio: AAC (Advanced Audio Coding) - channels: 2 - bitrate: 192000',
      '1 Subtitle stream:',
      '#2 subtitle: SubRip subtitle',
      '1 Data stream:',
      '#3 data: TrueType font',
    ]);
  });
});
