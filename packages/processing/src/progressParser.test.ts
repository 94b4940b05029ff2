import { describe, it, expect } from 'vitest';
import { ProgressInfo, formatProgress, formatBytes } from './progressParser.js';

function feed(info: ProgressInfo, block: string): boolean[] {
  return block.trim().split('\n').map(line => info.updateFromLine(line));
}

describe('ProgressInfo', () => {
  it('parses a block and signals the boundary', () => {
    const info = new ProgressInfo();
    const boundaries = feed(info, `
frame=120
fps=24.0
bitrate=1500.2kbits/s
total_size=1048576
out_time_us=5000000
speed=2.5x
progress=continue
`);

    expect(boundaries).toEqual([false, false, false, false, false, false, true]);
    expect(info.frame).toBe(120);
    expect(info.fps).toBe(24);
    expect(info.bitrate).toBe('1500.2kbits/s');
    expect(info.totalSize).toBe(1048576);
    expect(info.outTimeMs).toBe(5000);
    expect(info.speed).toBe('2.5x');
    expect(info.isComplete).toBe(false);
  });

  it('treats out_time_ms as microseconds', () => {
    const info = new ProgressInfo();
    info.updateFromLine('out_time_ms=2500000');
    expect(info.outTimeMs).toBe(2500);
  });

  it('ignores unknown keys, lines without a separator and N/A times', () => {
    const info = new ProgressInfo();
    info.updateFromLine('out_time_us=1000000');
    expect(info.updateFromLine('stream_0_0_q=28.0')).toBe(false);
    expect(info.updateFromLine('Press [q] to stop')).toBe(false);
    info.updateFromLine('out_time_us=N/A');
    info.updateFromLine('frame=abc');
    expect(info.outTimeMs).toBe(1000);
    expect(info.frame).toBe(0);
  });

  it('computes percent and ETA', () => {
    const info = new ProgressInfo();
    feed(info, 'frame=120\nfps=24\nout_time_us=5000000\nprogress=continue');
    info.calculateProgress(20000);

    expect(info.percent).toBe(25);
    expect(info.etaSeconds).toBe(15);
  });

  it('clamps percent at 100 and ETA at 0 when output runs past the duration', () => {
    const info = new ProgressInfo();
    feed(info, 'frame=900\nfps=30\nout_time_us=30000000\nprogress=end');
    info.calculateProgress(20000);

    expect(info.percent).toBe(100);
    expect(info.etaSeconds).toBe(0);
    expect(info.isComplete).toBe(true);
  });

  it('resets both values when the duration is unknown', () => {
    const info = new ProgressInfo();
    feed(info, 'frame=10\nfps=24\nout_time_us=1000000');
    info.calculateProgress(4000);
    expect(info.percent).toBe(25);

    info.calculateProgress(0);
    expect(info.percent).toBe(0);
    expect(info.etaSeconds).toBe(0);
  });

  it('reports percent without an ETA while fps is zero', () => {
    const info = new ProgressInfo();
    feed(info, 'frame=0\nfps=0.00\nout_time_us=1000000');
    info.calculateProgress(10000);
    expect(info.percent).toBe(10);
    expect(info.etaSeconds).toBe(0);
  });

  it('never moves percent backwards across blocks', () => {
    const info = new ProgressInfo();
    const seen: number[] = [];
    for (const micros of ['0', '1000000', 'N/A', '3000000', '8000000', '12000000']) {
      feed(info, `out_time_us=${micros}\nfps=25\nframe=50\nprogress=continue`);
      info.calculateProgress(10000);
      seen.push(info.percent);
    }
    expect(seen).toEqual([0, 10, 10, 30, 80, 100]);
  });

  it('produces frozen snapshots', () => {
    const info = new ProgressInfo();
    feed(info, 'frame=5\nprogress=end');
    const snapshot = info.snapshot();
    info.updateFromLine('frame=6');

    expect(snapshot.frame).toBe(5);
    expect(snapshot.isComplete).toBe(true);
    expect(Object.isFrozen(snapshot)).toBe(true);
  });
});

describe('formatProgress', () => {
  it('renders a one-line summary', () => {
    const info = new ProgressInfo();
    feed(info, 'frame=120\nfps=24.0\nout_time_us=5000000\nspeed=2.5x\nprogress=continue');
    info.calculateProgress(20000);

    expect(formatProgress(info.snapshot())).toBe('25.0% | Frame: 120 | FPS: 24.0 | Speed: 2.5x | ETA: 00:15');
  });

  it('omits percent and ETA before they are known', () => {
    const info = new ProgressInfo();
    expect(formatProgress(info.snapshot())).toBe('Frame: 0 | FPS: 0.0 | Speed: N/A');
  });
});

describe('formatBytes', () => {
  it('scales to the largest whole unit', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(1536)).toBe('1.50 KB');
    expect(formatBytes(5 * 1024 * 1024)).toBe('5.00 MB');
  });
});
