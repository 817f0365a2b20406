/**
 * JSON document files: tolerant load with corruption backup, atomic save.
 */

import { randomUUID } from 'node:crypto';
import { access, mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname, extname } from 'node:path';
import { z } from 'zod';
import { createLogger } from '../logging/logger.js';

const log = createLogger('json-file');

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

export interface LoadResult {
  data: JsonObject;
  /** Set when the file was unreadable and moved aside */
  backupPath?: string;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * First free `<path-without-extension>.bak_<n>` for n = 1, 2, ...
 */
export async function nextBackupPath(filePath: string): Promise<string> {
  const ext = extname(filePath);
  const base = ext ? filePath.slice(0, -ext.length) : filePath;
  for (let n = 1; ; n++) {
    const candidate = `${base}.bak_${n}`;
    if (!(await exists(candidate))) {
      return candidate;
    }
  }
}

/**
 * Load a JSON object document.
 *
 * A missing file yields `{}`. A file that does not parse to a JSON object is
 * renamed to the next free backup name and `{}` is returned; the caller
 * never sees the parse error.
 */
export async function loadJsonObject(filePath: string): Promise<LoadResult> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      return { data: {} };
    }
    throw err;
  }

  let parsed: unknown;
  let parseError: string | undefined;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    parseError = err instanceof Error ? err.message : String(err);
  }

  if (parseError === undefined && isJsonObject(parsed)) {
    return { data: parsed };
  }

  const backupPath = await nextBackupPath(filePath);
  await rename(filePath, backupPath);
  log.warn(
    { filePath, backupPath, reason: parseError ?? 'top-level value is not an object' },
    'Corrupt JSON file moved aside, starting from an empty document'
  );
  return { data: {}, backupPath };
}

/**
 * Write a JSON document so readers never observe a partial file.
 */
export async function saveJsonAtomic(filePath: string, data: JsonValue): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.${randomUUID()}.tmp`;
  await writeFile(tmpPath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
  await rename(tmpPath, filePath);
}
