import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, readFile, rm, stat } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { stageFiles, withTempDir } from './temp.js';

describe('temp helpers', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'temp-test-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should remove the directory after the callback resolves', async () => {
    let seen = '';
    const result = await withTempDir(root, 'run-a', async (dir) => {
      seen = dir;
      expect((await stat(dir)).isDirectory()).toBe(true);
      return 42;
    });

    expect(result).toBe(42);
    expect(seen.startsWith(join(root, 'run-a-'))).toBe(true);
    expect(await readdir(root)).toEqual([]);
  });

  it('should remove the directory when the callback rejects', async () => {
    await expect(
      withTempDir(root, 'run-b', async () => {
        throw new Error('stage failed');
      }),
    ).rejects.toThrow('stage failed');

    expect(await readdir(root)).toEqual([]);
  });

  it('should create a missing root', async () => {
    const nested = join(root, 'nested', 'deeper');

    await withTempDir(nested, 'run-c', async () => undefined);

    expect(await readdir(nested)).toEqual([]);
  });

  it('should stage uploads under their base names', async () => {
    await withTempDir(root, 'run-d', async (dir) => {
      const staged = await stageFiles(dir, [
        { fileName: '../evil.csv', content: Buffer.from('a,b\n') },
        { fileName: 'edges.csv', content: Buffer.from('c,d\n') },
      ]);

      expect(staged).toEqual([
        { fileName: 'evil.csv', path: join(dir, '0-evil.csv') },
        { fileName: 'edges.csv', path: join(dir, '1-edges.csv') },
      ]);
      expect(await readFile(join(dir, '0-evil.csv'), 'utf8')).toBe('a,b\n');
      expect((await readdir(dir)).sort()).toEqual(['0-evil.csv', '1-edges.csv']);
    });
  });
});
