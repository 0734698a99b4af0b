/**
 * JSON file helpers
 * - readJsonFile returns undefined when the file does not exist
 * - writeJsonFileAtomic writes <file>.<pid>.tmp then renames it over the target,
 *   so readers only ever see the old or the new content
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      return undefined;
    }
    throw error;
  }
  return JSON.parse(raw);
}

export async function writeJsonFileAtomic(
  filePath: string,
  data: unknown
): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });

  const tmp = `${filePath}.${process.pid}.tmp`;
  try {
    await writeFile(tmp, JSON.stringify(data, null, 2), 'utf-8');
    await rename(tmp, filePath);
  } catch (error) {
    await rm(tmp, { force: true });
    throw error;
  }
}
