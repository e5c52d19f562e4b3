/**
 * File helpers shared by the materializer, rewriter and extractor
 */

import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { basename, dirname, join, sep } from 'path';

const TEMP_FILE_PATTERN = /^\..+\.\d+\.tmp$/;

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * File contents, or `null` when the file does not exist.
 */
export async function readIfExists(filePath: string): Promise<Buffer | null> {
  try {
    return await readFile(filePath);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return null;
    throw error;
  }
}

/**
 * Write through a hidden temp file and rename, so readers never see half a file.
 */
export async function atomicWrite(filePath: string, content: Buffer | string): Promise<void> {
  const dir = dirname(filePath);
  await mkdir(dir, { recursive: true });

  const tmpPath = join(dir, tempFileName(basename(filePath)));
  try {
    await writeFile(tmpPath, content);
    await rename(tmpPath, filePath);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  }
}

export function tempFileName(name: string, pid: number = process.pid): string {
  return `.${name}.${pid}.tmp`;
}

/**
 * Whether `name` is an in-flight `atomicWrite` temp file.
 */
export function isTempFileName(name: string): boolean {
  return TEMP_FILE_PATTERN.test(name);
}

export function toPosixPath(value: string): string {
  return value.split(sep).join('/');
}
