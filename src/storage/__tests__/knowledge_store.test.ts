/**
 * @fileoverview Tests for knowledge documents on disk
 */

import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { StorageError } from '../../core/errors.js';
import { KnowledgeStore } from '../knowledge_store.js';
import { cleanupWorkspace, createTempWorkspace } from '../../__tests__/helpers/index.js';

describe('KnowledgeStore', () => {
  let workspace = '';

  afterEach(async () => {
    if (workspace) await cleanupWorkspace(workspace);
    workspace = '';
  });

  it('writes documents with a trailing newline and reads them back sorted', async () => {
    workspace = await createTempWorkspace();
    const store = new KnowledgeStore(workspace);
    await store.write('quick', { 'structure.md': '# Structure', 'context.md': '# Context\n' });
    expect(await store.read('quick')).toEqual({ 'context.md': '# Context\n', 'structure.md': '# Structure\n' });
    expect(store.tierDir('quick')).toBe(path.join(workspace, '.tierscan', 'knowledge', 'quick'));
  });

  it('reads null for a tier that never wrote', async () => {
    workspace = await createTempWorkspace();
    expect(await new KnowledgeStore(workspace).read('deep')).toBeNull();
  });

  it('removes leftovers only when cleaning', async () => {
    workspace = await createTempWorkspace();
    const store = new KnowledgeStore(workspace);
    await store.write('detailed', { 'old.md': 'old' });
    await store.write('detailed', { 'overview.md': 'new' });
    expect(Object.keys((await store.read('detailed')) ?? {})).toEqual(['old.md', 'overview.md']);

    await store.write('detailed', { 'overview.md': 'newer' }, true);
    expect(await fs.readdir(store.tierDir('detailed'))).toEqual(['overview.md']);
    expect(await store.read('detailed')).toEqual({ 'overview.md': 'newer\n' });
  });

  it('swaps a cleaned tier into place without leaving staging directories', async () => {
    workspace = await createTempWorkspace();
    const store = new KnowledgeStore(workspace);
    await store.write('quick', { 'overview.md': 'first' });
    await store.write('detailed', { 'overview.md': 'kept' });

    const written = await store.write('quick', { 'structure.md': 'second', 'overview.md': 'second' }, true);

    expect(written).toEqual([path.join(store.tierDir('quick'), 'structure.md'), path.join(store.tierDir('quick'), 'overview.md')]);
    expect((await fs.readdir(store.root)).sort()).toEqual(['detailed', 'quick']);
    expect(await store.read('quick')).toEqual({ 'overview.md': 'second\n', 'structure.md': 'second\n' });
  });

  it('cleans a tier that never wrote before', async () => {
    workspace = await createTempWorkspace();
    const store = new KnowledgeStore(workspace);
    await store.write('full', { 'overview.md': 'fresh' }, true);
    expect(await fs.readdir(store.root)).toEqual(['full']);
  });

  it('leaves existing documents alone when a cleaning write is refused', async () => {
    workspace = await createTempWorkspace();
    const store = new KnowledgeStore(workspace);
    await store.write('deep', { 'overview.md': 'old' });

    await expect(store.write('deep', { 'overview.md': 'new', '../evil.md': 'x' }, true)).rejects.toBeInstanceOf(StorageError);
    expect(await store.read('deep')).toEqual({ 'overview.md': 'old\n' });
  });

  it('refuses names that could escape the tier directory', async () => {
    workspace = await createTempWorkspace();
    await expect(new KnowledgeStore(workspace).write('quick', { '../evil.md': 'x' })).rejects.toBeInstanceOf(StorageError);
  });
});
