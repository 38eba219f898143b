import { randomUUID } from 'node:crypto';
import { readFile, readdir, rename, rm, writeFile } from 'node:fs/promises';
import { Value } from '@sinclair/typebox/value';
import type { Static, TSchema } from '@sinclair/typebox';
import { StoreIOError } from '@utils/errors';
import { createLogger } from '@utils/logger';

const logger = createLogger('knowledge');

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/** Write to a temporary sibling, then rename over the target. */
export async function writeJsonAtomic(path: string, value: unknown): Promise<void> {
  const tmp = `${path}.${randomUUID()}.tmp`;
  try {
    await writeFile(tmp, `${JSON.stringify(value, null, 2)}\n`, 'utf8');
    await rename(tmp, path);
  } catch (error) {
    await rm(tmp, { force: true }).catch((cleanupError: unknown) => {
      logger.warn({ err: cleanupError, tmp }, 'Failed to remove temporary file');
    });
    throw new StoreIOError(`Failed to write ${path}`, { path }, { cause: error });
  }
}

/** Read and validate a JSON file. A missing file reads as null. */
export async function readJson<T extends TSchema>(path: string, schema: T): Promise<Static<T> | null> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return null;
    throw new StoreIOError(`Failed to read ${path}`, { path }, { cause: error });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new StoreIOError(`Corrupt JSON in ${path}`, { path }, { cause: error });
  }

  if (!Value.Check(schema, data)) {
    const first = Value.Errors(schema, data).First();
    throw new StoreIOError(`${path} does not match its schema`, {
      path,
      field: first?.path,
      reason: first?.message,
    });
  }
  return data;
}

/** File names ending in .json, sorted. Temporary files are skipped. */
export async function listJsonFiles(dir: string): Promise<string[]> {
  try {
    const names = await readdir(dir);
    return names.filter((name) => name.endsWith('.json')).sort();
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return [];
    throw new StoreIOError(`Failed to list ${dir}`, { dir }, { cause: error });
  }
}
