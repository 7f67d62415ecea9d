/**
 * @fileoverview Tests for tier records, freshness and incremental plans
 */

import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import {
  TierCache,
  buildTierRecord,
  checkFreshness,
  failureState,
  planIncremental,
  successState,
  type TierRecord,
} from '../tier_cache.js';
import { ProjectSession } from '../../session/session_registry.js';
import { cleanupWorkspace, createTempWorkspace } from '../../__tests__/helpers/index.js';

const now = new Date('2026-01-01T00:00:00.000Z');

function record(overrides: Partial<TierRecord> = {}): TierRecord {
  return {
    ...buildTierRecord({
      tier: 'quick',
      snapshot: { hash: 'h1' },
      modelId: 'default|default',
      items: { 'a.ts': successState('ia', undefined, now), 'b.ts': successState('ib', undefined, now) },
      now,
    }),
    ...overrides,
  };
}

describe('checkFreshness', () => {
  it('is fresh when hash and model match and nothing failed', () => {
    expect(checkFreshness(record(), { hash: 'h1' }, 'default|default')).toMatchObject({ fresh: true, reasons: [] });
  });

  it('reports every reason the record is stale', () => {
    const stale = record({ items: { 'a.ts': failureState('ia', 'timeout', now) } });
    const check = checkFreshness(stale, { hash: 'h2' }, 'other|model');
    expect(check.fresh).toBe(false);
    expect(check.reasons).toEqual([
      'content changed',
      'model changed (default|default -> other|model)',
      '1 item(s) failed previously',
    ]);
  });

  it('is never fresh without a record or when forced', () => {
    expect(checkFreshness(null, { hash: 'h1' }, 'm').reasons).toEqual(['no previous record']);
    expect(checkFreshness(record(), { hash: 'h1' }, 'default|default', true)).toMatchObject({ fresh: false, reasons: ['forced'] });
  });
});

describe('planIncremental', () => {
  const previous = {
    'a.ts': successState('ia', { purpose: 'kept' }, now),
    'b.ts': successState('ib-old', undefined, now),
    'c.ts': failureState('ic', 'parse error', now),
    'gone.ts': successState('ig', undefined, now),
  };

  it('carries unchanged successes and reprocesses changed, failed and new items', () => {
    const plan = planIncremental({ 'a.ts': 'ia', 'b.ts': 'ib', 'c.ts': 'ic', 'd.ts': 'id' }, previous);
    expect(plan.toProcess).toEqual(['b.ts', 'c.ts', 'd.ts']);
    expect(Object.keys(plan.carried)).toEqual(['a.ts']);
    expect(plan.carried['a.ts'].output).toEqual({ purpose: 'kept' });
    expect(plan.removed).toEqual(['gone.ts']);
  });

  it('reprocesses everything when forced', () => {
    const plan = planIncremental({ 'a.ts': 'ia' }, previous, true);
    expect(plan.toProcess).toEqual(['a.ts']);
    expect(plan.carried).toEqual({});
    expect(plan.forced).toBe(true);
  });
});

describe('TierCache', () => {
  let workspace = '';

  afterEach(async () => {
    if (workspace) await cleanupWorkspace(workspace);
    workspace = '';
  });

  it('round-trips a record', async () => {
    workspace = await createTempWorkspace();
    const cache = new TierCache(workspace);
    const saved = record({ result: { tier: 'quick' } });
    await cache.save(saved);
    expect(await cache.load('quick')).toEqual(saved);
    expect(await cache.load('deep')).toBeNull();
  });

  it('reads a corrupt record as absent', async () => {
    workspace = await createTempWorkspace();
    const cache = new TierCache(workspace);
    await fs.mkdir(cache.directory, { recursive: true });
    await fs.writeFile(cache.recordPath('quick'), '{ not json', 'utf8');
    expect(await cache.load('quick')).toBeNull();
    expect((await cache.check('quick', { hash: 'h1' }, 'm')).reasons).toEqual(['no previous record']);
  });

  it('ignores a record stored under the wrong tier file', async () => {
    workspace = await createTempWorkspace();
    const cache = new TierCache(workspace);
    await fs.mkdir(cache.directory, { recursive: true });
    await fs.writeFile(cache.recordPath('deep'), JSON.stringify(record()), 'utf8');
    expect(await cache.load('deep')).toBeNull();
  });

  it('clears a record', async () => {
    workspace = await createTempWorkspace();
    const cache = new TierCache(workspace);
    await cache.save(record());
    await cache.clear('quick');
    expect(await cache.load('quick')).toBeNull();
  });

  it('serializes holders of the project lock', async () => {
    workspace = await createTempWorkspace();
    const cache = new TierCache(workspace, { session: new ProjectSession(workspace) });
    const order: string[] = [];
    const hold = (name: string, ms: number) =>
      cache.withLock(async () => {
        order.push(`${name}:start`);
        await new Promise((resolve) => setTimeout(resolve, ms));
        order.push(`${name}:end`);
      });
    await Promise.all([hold('first', 30), hold('second', 0)]);
    expect(order).toEqual(['first:start', 'first:end', 'second:start', 'second:end']);
  });
});
