import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, stat, utimes, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InvalidArgumentError } from '@vidtool/core';
import { pathExists } from '@vidtool/utils';
import { formatOperationSummary, moveToSubfolder, uniqueTarget } from './fileOperations.js';

describe('moveToSubfolder', () => {
  let dir: string;
  let files: string[];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'vidtool-move-'));
    files = ['a.mkv', 'b.mkv'].map(name => join(dir, name));
    for (const file of files) {
      await writeFile(file, file);
    }
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('creates the folder and moves the files into it', async () => {
    const result = await moveToSubfolder(files, { baseDir: dir, folder: 'done' });

    expect(result).toMatchObject({ operation: 'move', succeeded: 2, skipped: 0, errors: [], targetDir: join(dir, 'done') });
    expect(await pathExists(files[0] ?? '')).toBe(false);
    expect(await readFile(join(dir, 'done', 'b.mkv'), 'utf8')).toBe(join(dir, 'b.mkv'));
  });

  it('numbers names that are already taken', async () => {
    await mkdir(join(dir, 'done'));
    await writeFile(join(dir, 'done', 'a.mkv'), 'older');
    await writeFile(join(dir, 'done', 'a_1.mkv'), 'older');

    const result = await moveToSubfolder([files[0] ?? ''], { baseDir: dir, folder: 'done' });

    expect(result.placed).toEqual([{ source: files[0], target: join(dir, 'done', 'a_2.mkv') }]);
    expect(await readFile(join(dir, 'done', 'a.mkv'), 'utf8')).toBe('older');
  });

  it('copies with timestamps when asked', async () => {
    const stamp = new Date('2021-03-04T05:06:07Z');
    await utimes(files[0] ?? '', stamp, stamp);

    const result = await moveToSubfolder([files[0] ?? ''], { baseDir: dir, folder: 'copies', copy: true });

    expect(result).toMatchObject({ operation: 'copy', succeeded: 1 });
    expect(await pathExists(files[0] ?? '')).toBe(true);
    expect((await stat(join(dir, 'copies', 'a.mkv'))).mtime.getTime()).toBe(stamp.getTime());
  });

  it('records missing sources and carries on', async () => {
    const result = await moveToSubfolder([join(dir, 'gone.mkv'), files[1] ?? ''], { baseDir: dir, folder: 'done' });

    expect(result.succeeded).toBe(1);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatch(/^gone\.mkv: /);
  });

  it('needs a folder name', async () => {
    await expect(moveToSubfolder(files, { baseDir: dir, folder: '  ' })).rejects.toThrow(
      'Invalid subfolder: a folder name is required'
    );
  });

  it('refuses a missing folder when creation is off', async () => {
    await expect(
      moveToSubfolder(files, { baseDir: dir, folder: 'nope', createFolder: false })
    ).rejects.toBeInstanceOf(InvalidArgumentError);
    expect(await pathExists(join(dir, 'nope'))).toBe(false);
  });
});

describe('uniqueTarget', () => {
  it('keeps the name when it is free', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'vidtool-unique-'));
    try {
      expect(await uniqueTarget(dir, 'clip.mp4')).toBe(join(dir, 'clip.mp4'));
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe('formatOperationSummary', () => {
  it('reports a clean run in one line', () => {
    expect(formatOperationSummary({ operation: 'copy', succeeded: 1, skipped: 0, errors: [] }))
      .toBe('Successfully copied 1 file.');
  });

  it('lists at most five errors', () => {
    const errors = ['1', '2', '3', '4', '5', '6'].map(n => `${n}.mkv: denied`);
    const text = formatOperationSummary({ operation: 'move', succeeded: 3, skipped: 2, errors });

    expect(text.split('\n')).toEqual([
      'Moved 3 files successfully.',
      '2 files skipped.',
      '6 operations failed:',
      '',
      '1.mkv: denied',
      '2.mkv: denied',
      '3.mkv: denied',
      '4.mkv: denied',
      '5.mkv: denied',
      '... and 1 more error',
    ]);
  });
});
