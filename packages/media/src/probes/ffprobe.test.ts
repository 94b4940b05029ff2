import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile, chmod } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { CommandNotFoundError, MetadataExtractionFailedError } from '@vidtool/core';
import { FFProbe } from './ffprobe.js';

const fixturePath = fileURLToPath(new URL('../__fixtures__/probe-1080p.json', import.meta.url));

describe('FFProbe', () => {
  let dir: string;

  async function fakeProbe(name: string, body: string): Promise<string> {
    const script = join(dir, name);
    await writeFile(script, `#!/bin/sh\n${body}\n`);
    await chmod(script, 0o755);
    return script;
  }

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'vidtool-ffprobe-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('parses the JSON document into MediaInfo', async () => {
    const probe = new FFProbe(await fakeProbe('ok.sh', `cat "${fixturePath}"`));
    const info = await probe.getMediaInfo('/videos/sample.mkv');
    expect(info.file).toBe('/videos/sample.mkv');
    expect(info.resolution).toBe('1920x1080');
    expect(info.formatName).toBe('matroska,webm');
  });

  it('reports a missing binary as CommandNotFoundError', async () => {
    const probe = new FFProbe(join(dir, 'does-not-exist'));
    await expect(probe.probe('/videos/a.mkv')).rejects.toBeInstanceOf(CommandNotFoundError);
    expect(await probe.isAvailable()).toBe(false);
  });

  it('reports a failing probe as MetadataExtractionFailedError', async () => {
    const probe = new FFProbe(await fakeProbe('fail.sh', 'echo "moov atom not found" >&2; exit 1'));
    await expect(probe.probe('/videos/broken.mp4')).rejects.toThrow(
      'Failed to read metadata for /videos/broken.mp4: moov atom not found'
    );
  });

  it('reports unparseable output as MetadataExtractionFailedError', async () => {
    const probe = new FFProbe(await fakeProbe('garbage.sh', 'echo "not json"'));
    await expect(probe.probe('/videos/a.mkv')).rejects.toBeInstanceOf(MetadataExtractionFailedError);
  });

  it('rejects JSON without a format section', async () => {
    const probe = new FFProbe(await fakeProbe('noformat.sh', `echo '{"streams": []}'`));
    await expect(probe.probe('/videos/a.mkv')).rejects.toThrow(/unexpected ffprobe output at format/);
  });
});
