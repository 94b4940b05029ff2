import { describe, it, expect, vi } from 'vitest';
import { MediaInfoCache } from './cache.js';
import { MediaInfo } from './mediaInfo.js';
import type { MediaProber } from './types.js';

function makeInfo(file: string): MediaInfo {
  return new MediaInfo({
    file,
    filename: file,
    formatName: 'matroska',
    formatLongName: 'Matroska',
    duration: 60,
    size: 1024,
    bitrate: 1000,
    streams: [],
  });
}

describe('MediaInfoCache', () => {
  it('probes each absolute path once', async () => {
    const getMediaInfo = vi.fn(async (file: string) => makeInfo(file));
    const cache = new MediaInfoCache({ getMediaInfo });

    const [a, b] = await Promise.all([
      cache.getMediaInfo('/videos/a.mkv'),
      cache.getMediaInfo('/videos/../videos/a.mkv'),
    ]);

    expect(a).toBe(b);
    expect(getMediaInfo).toHaveBeenCalledTimes(1);
    expect(cache.size).toBe(1);
  });

  it('does not keep failed probes', async () => {
    let calls = 0;
    const prober: MediaProber = {
      getMediaInfo: async (file) => {
        calls++;
        if (calls === 1) throw new Error('probe failed');
        return makeInfo(file);
      },
    };
    const cache = new MediaInfoCache(prober);

    await expect(cache.getMediaInfo('/videos/a.mkv')).rejects.toThrow('probe failed');
    await expect(cache.getMediaInfo('/videos/a.mkv')).resolves.toBeInstanceOf(MediaInfo);
    expect(calls).toBe(2);
  });

  it('invalidates single entries', async () => {
    const getMediaInfo = vi.fn(async (file: string) => makeInfo(file));
    const cache = new MediaInfoCache({ getMediaInfo });
    await cache.getMediaInfo('/videos/a.mkv');
    cache.invalidate('/videos/a.mkv');
    await cache.getMediaInfo('/videos/a.mkv');
    expect(getMediaInfo).toHaveBeenCalledTimes(2);
  });
});
