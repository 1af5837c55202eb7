import { constants, promises as fs } from 'node:fs';
import path from 'node:path';

import { FileLockConfig } from '../config';

import type { DateRange } from '../types';

const DAY_MS = 86_400_000;

/**
 * Error code of a failed fs call ('ENOENT', 'EEXIST', ...), if it has one.
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Ensure a directory exists, creating it recursively if needed.
 */
export async function ensureDirectory(directoryPath: string): Promise<void> {
  await fs.mkdir(directoryPath, { recursive: true });
}

/**
 * Acquire an exclusive lock on a file.
 * Uses a .lock file with O_EXCL for atomic creation; locks older than
 * FileLockConfig.staleTimeoutMs are taken over.
 */
export async function acquireLock(filePath: string): Promise<void> {
  const lockPath = `${filePath}.lock`;
  await ensureDirectory(path.dirname(filePath));

  for (let attempt = 0; attempt < FileLockConfig.maxRetries; attempt++) {
    try {
      // Fails if the lock file already exists
      const handle = await fs.open(lockPath, constants.O_CREAT | constants.O_EXCL | constants.O_WRONLY);
      await handle.write(JSON.stringify({ pid: process.pid, timestamp: Date.now() }));
      await handle.close();
      return;
    } catch (error) {
      if (errorCode(error) !== 'EEXIST') throw error;

      if (await isStaleLock(lockPath)) {
        await fs.unlink(lockPath).catch((unlinkError: unknown) => {
          // Another process took it over first
          if (errorCode(unlinkError) !== 'ENOENT') throw unlinkError;
        });
        continue;
      }
      await sleep(FileLockConfig.retryDelayMs);
    }
  }

  throw new Error(
    `Failed to acquire lock for ${filePath} after ${String(FileLockConfig.maxRetries)} attempts`,
  );
}

/**
 * Write data atomically using temp file + rename pattern.
 * Objects are written as indented JSON, byte arrays as is.
 */
export async function atomicWrite(filePath: string, data: object | Uint8Array): Promise<void> {
  const tempPath = `${filePath}.tmp.${String(Date.now())}.${Math.random().toString(36).slice(2)}`;
  const contents = data instanceof Uint8Array ? data : JSON.stringify(data, undefined, 2);

  await ensureDirectory(path.dirname(filePath));
  await fs.writeFile(tempPath, contents);
  await fs.rename(tempPath, filePath);
}

/**
 * UTC day keys (YYYY-MM-DD) touched by a range, in order.
 */
export function dateKeysInRange(range: DateRange): string[] {
  const keys: string[] = [];
  const first = Date.UTC(
    range.start.getUTCFullYear(),
    range.start.getUTCMonth(),
    range.start.getUTCDate(),
  );
  for (let day = first; day <= range.end.getTime(); day += DAY_MS) {
    keys.push(getDateKey(new Date(day)));
  }
  return keys;
}

/**
 * Format a date as YYYY-MM-DD string (UTC).
 * UTC keeps file naming independent of the server's time zone.
 */
export function getDateKey(date: Date | string): string {
  const d = new Date(date);
  const year = String(d.getUTCFullYear());
  const month = String(d.getUTCMonth() + 1).padStart(2, '0');
  const day = String(d.getUTCDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Build file path in YYYY/MM/YYYY-MM-DD.json format from a day key.
 */
export function getFilePath(baseDirectory: string, dateKey: string): string {
  const [year, month] = dateKey.split('-');
  return path.join(baseDirectory, year, month, `${dateKey}.json`);
}

/**
 * Own property lookup on a JSON record; inherited keys such as "constructor" miss.
 */
export function ownEntry<T>(record: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

/**
 * Read JSON file with fallback to default value if file doesn't exist.
 */
export async function readJsonFile<T>(filePath: string, defaultValue: T): Promise<T> {
  const content = await readJsonFileOptional<T>(filePath);
  return content ?? defaultValue;
}

/**
 * Read JSON file, returning undefined if it doesn't exist.
 * Other failures (permissions, corrupt JSON, abort) are thrown.
 */
export async function readJsonFileOptional<T>(
  filePath: string,
  signal?: AbortSignal,
): Promise<T | undefined> {
  try {
    const content = await fs.readFile(filePath, { encoding: 'utf8', signal });
    return JSON.parse(content);
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

/**
 * Release a lock on a file.
 */
export async function releaseLock(filePath: string): Promise<void> {
  try {
    await fs.unlink(`${filePath}.lock`);
  } catch (error) {
    if (errorCode(error) !== 'ENOENT') {
      throw error;
    }
  }
}

/**
 * Execute a function while holding a lock on a file.
 */
export async function withLock<T>(filePath: string, fn: () => Promise<T>): Promise<T> {
  await acquireLock(filePath);
  try {
    return await fn();
  } finally {
    await releaseLock(filePath);
  }
}

async function isStaleLock(lockPath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(lockPath);
    return Date.now() - stat.mtimeMs > FileLockConfig.staleTimeoutMs;
  } catch (error) {
    // Lock disappeared between open and stat: treat as free
    if (errorCode(error) === 'ENOENT') return true;
    throw error;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
