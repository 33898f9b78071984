import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';

export const createTempDir = async (prefix: string) => {
  const dir = await mkdtemp(join(tmpdir(), `${prefix}-`));
  return dir;
};

/** Write `contents` to `relativePath` under `dir`, creating parent directories. Returns the absolute path. */
export const writeTempFile = async (dir: string, relativePath: string, contents: string | Uint8Array) => {
  const filePath = join(dir, relativePath);
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, contents);
  return filePath;
};

export const cleanupTempDir = async (dir: string) => {
  await rm(dir, { recursive: true, force: true });
};
