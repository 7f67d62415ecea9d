/**
 * @fileoverview Atomic JSON state files
 *
 * Writes go to `<file>.tmp.<pid>` and are renamed over the target, so a
 * reader sees either the old record or the new one, never a truncated file.
 * Read-modify-write cycles across processes hold {@link withStateLock}.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import lockfile from 'proper-lockfile';
import { Errors } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';
import { logWarning } from '../telemetry/logger.js';

export type JsonReadResult =
  | { status: 'absent' }
  | { status: 'corrupt'; reason: string }
  | { status: 'ok'; value: unknown };

let tempCounter = 0;

export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.tmp.${process.pid}.${tempCounter++}`;
  await fs.mkdir(path.dirname(filePath), { recursive: true });

  try {
    await fs.writeFile(tempPath, content, 'utf8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true }).catch(() => undefined);
    throw Errors.storage('write', getErrorMessage(error), filePath, true);
  }
}

export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  await writeFileAtomic(filePath, JSON.stringify(value, null, 2) + '\n');
}

/**
 * Read and decode a JSON file. Missing files are `absent`; unreadable or
 * undecodable ones are `corrupt`. Never throws for either case.
 */
export async function readJsonFile(filePath: string): Promise<JsonReadResult> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return { status: 'absent' };
    }
    return { status: 'corrupt', reason: getErrorMessage(error) };
  }
  try {
    return { status: 'ok', value: JSON.parse(raw) };
  } catch (error) {
    return { status: 'corrupt', reason: getErrorMessage(error) };
  }
}

// ============================================================================
// CROSS-PROCESS LOCK
// ============================================================================

export const STATE_LOCK_FILE_NAME = 'state.lock';
const LOCK_STALE_TIMEOUT_MS = 120_000;
const LOCK_UPDATE_INTERVAL_MS = 10_000;

export interface StateLockOptions {
  /** Retries while another process holds the lock (default 20) */
  retries?: number;
}

/**
 * Run `fn` holding the file lock on a state directory.
 *
 * @throws StorageError when another process keeps the lock past the retries
 */
export async function withStateLock<T>(directory: string, fn: () => Promise<T>, options: StateLockOptions = {}): Promise<T> {
  await fs.mkdir(directory, { recursive: true });
  const lockPath = path.join(directory, STATE_LOCK_FILE_NAME);
  let compromised: Error | null = null;
  let release: () => Promise<void>;
  try {
    release = await lockfile.lock(directory, {
      lockfilePath: lockPath,
      stale: LOCK_STALE_TIMEOUT_MS,
      update: LOCK_UPDATE_INTERVAL_MS,
      onCompromised: (err) => {
        compromised = err;
        logWarning('Project state lock compromised', { path: lockPath, error: err.message });
      },
      retries: {
        retries: options.retries ?? 20,
        factor: 1.5,
        minTimeout: 100,
        maxTimeout: 5_000,
      },
    });
  } catch (error) {
    throw Errors.storage('lock', `project state is locked by another run: ${getErrorMessage(error)}`, lockPath, true);
  }
  try {
    return await fn();
  } finally {
    if (compromised === null) {
      await release().catch((error: unknown) => {
        logWarning('Failed to release project state lock', { path: lockPath, error: getErrorMessage(error) });
      });
    }
  }
}
