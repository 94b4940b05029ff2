/**
 * MediaInfo Cache
 * 
 * Memoizes probe results by absolute path. Concurrent lookups for the
 * same file share one probe; failed probes are not cached.
 */

import { resolve } from 'node:path';
import type { MediaInfo } from './mediaInfo.js';
import type { MediaProber } from './types.js';

export class MediaInfoCache implements MediaProber {
  private entries = new Map<string, Promise<MediaInfo>>();

  constructor(private readonly prober: MediaProber) {}

  getMediaInfo(filePath: string): Promise<MediaInfo> {
    const key = resolve(filePath);
    const cached = this.entries.get(key);
    if (cached) return cached;

    const pending = this.prober.getMediaInfo(filePath);
    this.entries.set(key, pending);
    pending.catch(() => {
      if (this.entries.get(key) === pending) {
        this.entries.delete(key);
      }
    });
    return pending;
  }

  invalidate(filePath: string): void {
    this.entries.delete(resolve(filePath));
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
