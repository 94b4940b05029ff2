/**
 * Progress Parser
 *
 * Accumulates the `key=value` blocks ffmpeg writes with `-progress`
 * and derives percent complete and an ETA from them.
 */

import { formatEta } from '@vidtool/utils';

export interface ProgressSnapshot {
  readonly frame: number;
  readonly fps: number;
  readonly bitrate: string;
  readonly totalSize: number;  // Bytes
  readonly outTimeMs: number;
  readonly progress: string;  // 'continue' | 'end'
  readonly speed: string;  // e.g. '2.3x'
  readonly percent: number;  // 0-100
  readonly etaSeconds: number;
  readonly isComplete: boolean;
}

export class ProgressInfo {
  frame = 0;
  fps = 0;
  bitrate = '';
  totalSize = 0;
  outTimeMs = 0;
  progress = '';
  speed = '';
  percent = 0;
  etaSeconds = 0;

  /**
   * Feed one output line. Returns true when the line closes a block
   * (`progress=continue` or `progress=end`).
   */
  updateFromLine(line: string): boolean {
    const separator = line.indexOf('=');
    if (separator === -1) return false;

    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trim();

    switch (key) {
      case 'frame':
        this.frame = toInt(value);
        break;
      case 'fps':
        this.fps = toFloat(value);
        break;
      case 'bitrate':
        this.bitrate = value;
        break;
      case 'total_size':
        this.totalSize = toInt(value);
        break;
      // Both keys carry microseconds
      case 'out_time_ms':
      case 'out_time_us': {
        const micros = Number.parseInt(value, 10);
        if (Number.isFinite(micros)) {
          this.outTimeMs = Math.floor(micros / 1000);
        }
        break;
      }
      case 'progress':
        this.progress = value;
        return value === 'continue' || value === 'end';
      case 'speed':
        this.speed = value;
        break;
    }

    return false;
  }

  /**
   * Derive percent and ETA against the expected output duration
   */
  calculateProgress(totalDurationMs: number): void {
    if (totalDurationMs <= 0 || this.outTimeMs <= 0) {
      this.percent = 0;
      this.etaSeconds = 0;
      return;
    }

    this.percent = Math.min(100, (this.outTimeMs / totalDurationMs) * 100);

    if (this.fps > 0 && this.percent > 0) {
      const remainingMs = totalDurationMs - this.outTimeMs;
      // Frames per second of media time, not of wall time
      const observedRate = this.frame / (this.outTimeMs / 1000);
      this.etaSeconds = Math.max(0, ((remainingMs / 1000) * observedRate) / this.fps);
    } else {
      this.etaSeconds = 0;
    }
  }

  get isComplete(): boolean {
    return this.progress === 'end';
  }

  snapshot(): ProgressSnapshot {
    return Object.freeze({
      frame: this.frame,
      fps: this.fps,
      bitrate: this.bitrate,
      totalSize: this.totalSize,
      outTimeMs: this.outTimeMs,
      progress: this.progress,
      speed: this.speed,
      percent: this.percent,
      etaSeconds: this.etaSeconds,
      isComplete: this.isComplete,
    });
  }
}

function toInt(value: string): number {
  const n = Number.parseInt(value, 10);
  return Number.isFinite(n) ? n : 0;
}

function toFloat(value: string): number {
  const n = Number.parseFloat(value);
  return Number.isFinite(n) ? n : 0;
}

/**
 * Format progress for display
 */
export function formatProgress(snapshot: ProgressSnapshot): string {
  const parts: string[] = [];

  if (snapshot.percent > 0) {
    parts.push(`${snapshot.percent.toFixed(1)}%`);
  }
  parts.push(`Frame: ${snapshot.frame}`);
  parts.push(`FPS: ${snapshot.fps.toFixed(1)}`);
  parts.push(`Speed: ${snapshot.speed || 'N/A'}`);

  if (snapshot.etaSeconds > 0) {
    parts.push(`ETA: ${formatEta(snapshot.etaSeconds)}`);
  }

  return parts.join(' | ');
}

/**
 * Format bytes to human readable
 */
export function formatBytes(bytes: number): string {
  if (bytes <= 0) return '0 B';

  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(units.length - 1, Math.floor(Math.log(bytes) / Math.log(1024)));
  const size = bytes / Math.pow(1024, i);

  return `${size.toFixed(2)} ${units[i] ?? 'B'}`;
}
