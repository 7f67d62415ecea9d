/**
 * @fileoverview Per-tier cache records and staleness decisions
 *
 * Each analysis tier owns one JSON record under `.tierscan/state/`. The
 * record stores the content fingerprint the tier was computed against, the
 * model it ran with and one state entry per processed item.
 *
 * Freshness:
 * - fresh iff fingerprint and model match and no item failed
 * - `force` bypasses the check and discards previous item states
 *
 * Incremental passes reprocess only items that are new, changed or
 * previously failed; every other successful item is carried forward as-is.
 *
 * INVARIANT: records are written with temp-file + rename
 * INVARIANT: a corrupt record reads as absent, never as an error
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { Errors } from '../core/errors.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { readJsonFile, withStateLock, writeJsonAtomic } from './json_file.js';
import { stateDir } from '../config/loader.js';
import { ANALYSIS_TIERS, type AnalysisTier } from '../config/engine_config.js';
import type { ContentSnapshot } from './content_hasher.js';
import type { ProjectSession } from '../session/session_registry.js';

// ============================================================================
// RECORD SCHEMA
// ============================================================================

export const TIER_RECORD_VERSION = 1;

export const PerItemStateSchema = z.object({
  hash: z.string(),
  time: z.string(),
  success: z.boolean(),
  error: z.string().optional(),
  /** Per-item product (e.g. a file summary) reused when the item is carried forward */
  output: z.unknown().optional(),
});

export const TierRecordSchema = z.object({
  version: z.literal(TIER_RECORD_VERSION),
  tier: z.enum(ANALYSIS_TIERS),
  contentHash: z.string().min(1),
  analyzedAt: z.string(),
  itemCount: z.number().int().min(0),
  modelId: z.string(),
  items: z.record(PerItemStateSchema),
  /** Serialized analysis result served on cache hits */
  result: z.unknown().optional(),
});

export type PerItemState = z.infer<typeof PerItemStateSchema>;
export type TierRecord = z.infer<typeof TierRecordSchema>;

// ============================================================================
// DECISIONS
// ============================================================================

export interface FreshnessCheck {
  fresh: boolean;
  /** Why the tier is stale; empty when fresh */
  reasons: string[];
  record: TierRecord | null;
}

export interface IncrementalPlan {
  /** Items to (re)process, sorted */
  toProcess: string[];
  /** Successful unchanged items copied from the previous record */
  carried: Record<string, PerItemState>;
  /** Items present before but no longer part of the set */
  removed: string[];
  forced: boolean;
}

/**
 * Pure freshness predicate.
 */
export function checkFreshness(
  record: TierRecord | null,
  snapshot: Pick<ContentSnapshot, 'hash'>,
  modelId: string,
  force = false,
): FreshnessCheck {
  const reasons: string[] = [];
  if (force) reasons.push('forced');
  if (!record) {
    reasons.push('no previous record');
    return { fresh: false, reasons, record };
  }
  if (record.contentHash !== snapshot.hash) reasons.push('content changed');
  if (record.modelId !== modelId) reasons.push(`model changed (${record.modelId} -> ${modelId})`);
  const failed = Object.values(record.items).filter((item) => !item.success).length;
  if (failed > 0) reasons.push(`${failed} item(s) failed previously`);
  return { fresh: reasons.length === 0, reasons, record };
}

/**
 * Decide which items to reprocess.
 *
 * @param items - current item hashes keyed by item id
 * @param previous - item states of the previous record, if any
 */
export function planIncremental(
  items: Readonly<Record<string, string>>,
  previous: Readonly<Record<string, PerItemState>> | undefined,
  force = false,
): IncrementalPlan {
  const toProcess: string[] = [];
  const carried: Record<string, PerItemState> = {};
  const prior: Readonly<Record<string, PerItemState>> = force ? {} : previous ?? {};
  for (const id of Object.keys(items).sort()) {
    const state = prior[id];
    if (state && state.success && state.hash === items[id]) {
      carried[id] = state;
    } else {
      toProcess.push(id);
    }
  }
  const removed = Object.keys(previous ?? {}).filter((id) => !(id in items)).sort();
  return { toProcess, carried, removed, forced: force };
}

export function successState(hash: string, output?: unknown, now = new Date()): PerItemState {
  return output === undefined
    ? { hash, time: now.toISOString(), success: true }
    : { hash, time: now.toISOString(), success: true, output };
}

export function failureState(hash: string, error: string, now = new Date()): PerItemState {
  return { hash, time: now.toISOString(), success: false, error };
}

export interface BuildRecordInput {
  tier: AnalysisTier;
  snapshot: Pick<ContentSnapshot, 'hash'>;
  modelId: string;
  items: Record<string, PerItemState>;
  result?: unknown;
  now?: Date;
}

export function buildTierRecord(input: BuildRecordInput): TierRecord {
  const record: TierRecord = {
    version: TIER_RECORD_VERSION,
    tier: input.tier,
    contentHash: input.snapshot.hash,
    analyzedAt: (input.now ?? new Date()).toISOString(),
    itemCount: Object.keys(input.items).length,
    modelId: input.modelId,
    items: input.items,
  };
  if (input.result !== undefined) record.result = input.result;
  return record;
}

// ============================================================================
// TIER CACHE
// ============================================================================

export interface TierCacheOptions {
  /** Serializes runs of this project within the process */
  session?: ProjectSession;
  /** Retries while another process holds the lock (default 20) */
  lockRetries?: number;
}

export class TierCache {
  readonly directory: string;

  constructor(
    readonly projectPath: string,
    private readonly options: TierCacheOptions = {},
  ) {
    this.directory = path.join(stateDir(projectPath), 'state');
  }

  recordPath(tier: AnalysisTier): string {
    return path.join(this.directory, `tier_${tier}.json`);
  }

  async load(tier: AnalysisTier): Promise<TierRecord | null> {
    const filePath = this.recordPath(tier);
    const read = await readJsonFile(filePath);
    if (read.status === 'absent') return null;
    if (read.status === 'corrupt') {
      logWarning('Ignoring unreadable tier record', Errors.corruption(filePath, read.reason).toJSON().details);
      return null;
    }
    const parsed = TierRecordSchema.safeParse(read.value);
    if (!parsed.success || parsed.data.tier !== tier) {
      const reason = parsed.success ? `record belongs to tier ${parsed.data.tier}` : parsed.error.issues[0]?.message ?? 'invalid record';
      logWarning('Ignoring invalid tier record', { ...Errors.corruption(filePath, reason).toJSON().details, reason });
      return null;
    }
    return parsed.data;
  }

  async check(tier: AnalysisTier, snapshot: Pick<ContentSnapshot, 'hash'>, modelId: string, force = false): Promise<FreshnessCheck> {
    const record = await this.load(tier);
    const result = checkFreshness(record, snapshot, modelId, force);
    logDebug('Tier freshness', { tier, fresh: result.fresh, reasons: result.reasons });
    return result;
  }

  async save(record: TierRecord): Promise<void> {
    await writeJsonAtomic(this.recordPath(record.tier), record);
  }

  async clear(tier: AnalysisTier): Promise<void> {
    await fs.rm(this.recordPath(tier), { force: true });
  }

  /**
   * Run `fn` holding both the in-process project lock and the cross-process
   * file lock on the state directory.
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const run = (): Promise<T> => withStateLock(this.directory, fn, { retries: this.options.lockRetries });
    return this.options.session ? this.options.session.lock(run) : run();
  }
}
