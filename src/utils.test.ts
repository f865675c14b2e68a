import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import { formatDuration, writeFileAtomic } from './utils';
import { createTempDir, removeTempDir } from './test-helpers/tmp-dir';

describe('formatDuration', () => {
  it('shows seconds with two decimals under a minute', () => {
    expect(formatDuration(1234)).toBe('1.23s');
  });

  it('shows minutes and whole seconds', () => {
    expect(formatDuration(125_000)).toBe('2m 5s');
    expect(formatDuration(120_000)).toBe('2m');
  });

  it('shows hours and minutes', () => {
    expect(formatDuration(3_900_000)).toBe('1h 5m');
    expect(formatDuration(7_200_000)).toBe('2h');
  });
});

describe('writeFileAtomic', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('creates parent directories and leaves no temporary file', async () => {
    const filePath = path.join(dir, 'a', 'b', 'data.json');

    await writeFileAtomic(filePath, '{"v":1}');
    await writeFileAtomic(filePath, '{"v":2}');

    expect(await fs.readFile(filePath, 'utf-8')).toBe('{"v":2}');
    expect(await fs.readdir(path.dirname(filePath))).toEqual(['data.json']);
  });
});
