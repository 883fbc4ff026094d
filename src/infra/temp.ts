import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { basename, join } from 'path';
import { logger } from '../logger.js';
import type { StagedFile, TabularInput } from '../pipeline/types.js';

export const createTempDir = async (root: string, prefix: string) => {
  await mkdir(root, { recursive: true });
  const dir = await mkdtemp(join(root, `${prefix}-`));
  return dir;
};

export const cleanupTempDir = async (dir: string) => {
  await rm(dir, { recursive: true, force: true });
};

/**
 * Run `fn` with a fresh temporary directory that is removed afterwards,
 * whether `fn` resolves or rejects.
 */
export const withTempDir = async <T>(
  root: string,
  prefix: string,
  fn: (dir: string) => Promise<T>,
): Promise<T> => {
  const dir = await createTempDir(root, prefix);
  try {
    return await fn(dir);
  } finally {
    try {
      await cleanupTempDir(dir);
    } catch (err) {
      logger.error({ err, dir }, 'Failed to remove temporary directory');
    }
  }
};

/** Write caller uploads into `dir`. Names are reduced to their base name and prefixed with their index. */
export const stageFiles = async (dir: string, inputs: TabularInput[]): Promise<StagedFile[]> =>
  Promise.all(
    inputs.map(async (input, index) => {
      const fileName = basename(input.fileName) || `input-${index}.csv`;
      const path = join(dir, `${index}-${fileName}`);
      await writeFile(path, input.content);
      return { fileName, path };
    }),
  );
