/**
 * @fileoverview Tests for atomic state files and the state lock
 */

import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { StorageError } from '../../core/errors.js';
import { STATE_LOCK_FILE_NAME, readJsonFile, withStateLock, writeJsonAtomic } from '../json_file.js';
import { cleanupWorkspace, createTempWorkspace } from '../../__tests__/helpers/index.js';

describe('json state files', () => {
  let workspace: string;

  afterEach(async () => {
    await cleanupWorkspace(workspace);
  });

  it('writes through a temp file and leaves only the target', async () => {
    workspace = await createTempWorkspace();
    const target = path.join(workspace, 'state', 'record.json');
    await writeJsonAtomic(target, { iteration: 2 });

    expect(await fs.readdir(path.dirname(target))).toEqual(['record.json']);
    expect(await readJsonFile(target)).toEqual({ status: 'ok', value: { iteration: 2 } });
  });

  it('reads a missing file as absent and broken JSON as corrupt', async () => {
    workspace = await createTempWorkspace();
    const target = path.join(workspace, 'record.json');
    expect(await readJsonFile(target)).toEqual({ status: 'absent' });
    await fs.writeFile(target, '{ broken', 'utf8');
    expect((await readJsonFile(target)).status).toBe('corrupt');
  });

  it('refuses a second holder of the state lock', async () => {
    workspace = await createTempWorkspace();
    const directory = path.join(workspace, 'state');

    const second = await withStateLock(directory, () =>
      withStateLock(directory, async () => 'inner', { retries: 0 }).catch((error: unknown) => error),
    );

    expect(second).toBeInstanceOf(StorageError);
    expect(second instanceof StorageError && second.operation).toBe('lock');
  });

  it('releases the lock when the holder throws', async () => {
    workspace = await createTempWorkspace();
    const directory = path.join(workspace, 'state');

    await expect(withStateLock(directory, async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');

    await expect(fs.access(path.join(directory, STATE_LOCK_FILE_NAME))).rejects.toThrow();
    await expect(withStateLock(directory, async () => 'again', { retries: 0 })).resolves.toBe('again');
  });
});
