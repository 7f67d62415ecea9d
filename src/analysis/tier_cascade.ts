/**
 * @fileoverview Tier cascade: quick → detailed → deep → full
 *
 * Runs the requested tier (and, when asked, the tiers above it) against one
 * content snapshot. Each tier is served from its record when the record is
 * fresh, otherwise rerun with the previous tier's knowledge as seed.
 *
 * INVARIANT: knowledge files and the tier record are written only after the
 *            tier produced a result; a failed tier leaves both untouched
 * INVARIANT: all runs of one project are serialized (session lock + file lock)
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import {
  ANALYSIS_TIERS,
  resolveTierTunables,
  tierModelKey,
  type AnalysisTier,
  type EngineConfig,
} from '../config/engine_config.js';
import { Errors, TierFailure, isEngineError } from '../core/errors.js';
import {
  createTierCompletedEvent,
  createTierFailedEvent,
  createTierProgressEvent,
  createTierStartedEvent,
  type EngineEventBus,
} from '../events.js';
import type { FileLister } from '../files/file_lister.js';
import type { PermissionGate } from '../permission/permission_gate.js';
import type { CompletionClient } from '../providers/completion_client.js';
import { BackendWarmup } from '../providers/warmup.js';
import type { ProjectSession } from '../session/session_registry.js';
import { ContentHasher, type ContentSnapshot } from '../storage/content_hasher.js';
import { KnowledgeStore } from '../storage/knowledge_store.js';
import { ScanStore, scanRecordAnswer } from '../storage/scan_store.js';
import { TierCache, buildTierRecord, checkFreshness, type PerItemState } from '../storage/tier_cache.js';
import { logDebug, logInfo } from '../telemetry/logger.js';
import { AbortError } from '../utils/async.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { decodeStoredResult } from './result_schema.js';
import { DeepTier } from './tiers/deep_tier.js';
import { DetailedTier } from './tiers/detailed_tier.js';
import { FullTier } from './tiers/full_tier.js';
import { QuickTier } from './tiers/quick_tier.js';
import type { TierContext, TierRunner, TierSeed } from './tiers/tier_context.js';
import type { AnalysisResult } from './types.js';

export const ANALYZE_TOOL = 'analyze';

// ============================================================================
// TYPES
// ============================================================================

export type TierRunners = { [T in AnalysisTier]: TierRunner<T> };

export function createTierRunners(): TierRunners {
  return { quick: new QuickTier(), detailed: new DetailedTier(), deep: new DeepTier(), full: new FullTier() };
}

export interface TierCascadeDeps {
  client: CompletionClient;
  config: EngineConfig;
  lister: FileLister;
  bus?: EngineEventBus;
  gate?: PermissionGate;
  session?: ProjectSession;
  /** Shared across runs so the warm-up pause happens once per process */
  warmup?: BackendWarmup;
  runners?: Partial<TierRunners>;
}

export interface AnalyzeParams {
  tier: AnalysisTier;
  /** Ignore stored records and reprocess every item */
  force?: boolean;
  /** Cascade through every tier above the target */
  continue?: boolean;
  /** Cascade up to and including this tier */
  continueTo?: AnalysisTier;
  initiator?: 'user' | 'system';
  sessionId?: string;
  signal?: AbortSignal;
}

export interface TierRunReport {
  tier: AnalysisTier;
  result: AnalysisResult;
  cached: boolean;
  /** Why the stored record was not used; empty for cache hits */
  staleReasons: string[];
  durationMs: number;
}

export interface CascadeResult {
  projectPath: string;
  reports: TierRunReport[];
  /** Result of the last tier that ran */
  final: AnalysisResult;
}

export interface TierStatus {
  tier: AnalysisTier;
  analyzed: boolean;
  analyzedAt: string | null;
  fresh: boolean;
  reasons: string[];
  partial: boolean | null;
  confidence: number | null;
}

// ============================================================================
// PLANNING
// ============================================================================

function tierIndex(tier: AnalysisTier): number {
  return ANALYSIS_TIERS.indexOf(tier);
}

export function nextTier(tier: AnalysisTier): AnalysisTier | null {
  return ANALYSIS_TIERS[tierIndex(tier) + 1] ?? null;
}

export function previousTier(tier: AnalysisTier): AnalysisTier | null {
  const index = tierIndex(tier);
  return index > 0 ? ANALYSIS_TIERS[index - 1] : null;
}

/**
 * Tiers one invocation runs, in order. Without `continue`/`continueTo` the
 * cascade still proceeds into tiers whose `autorun` flag is set.
 *
 * @throws ConfigurationError when `continueTo` is below the target
 */
export function planTiers(params: Pick<AnalyzeParams, 'tier' | 'continue' | 'continueTo'>, config: EngineConfig): AnalysisTier[] {
  const start = tierIndex(params.tier);
  if (params.continueTo !== undefined) {
    const end = tierIndex(params.continueTo);
    if (end < start) {
      throw Errors.config('continueTo', `cannot continue to ${params.continueTo}: it is below the requested tier ${params.tier}`);
    }
    return ANALYSIS_TIERS.slice(start, end + 1);
  }
  if (params.continue) return ANALYSIS_TIERS.slice(start);

  const tiers: AnalysisTier[] = [params.tier];
  let next = nextTier(params.tier);
  while (next !== null && config.analysis[next].autorun) {
    tiers.push(next);
    next = nextTier(next);
  }
  return tiers;
}

// ============================================================================
// CASCADE
// ============================================================================

export class TierCascade {
  private readonly runners: TierRunners;
  private readonly warmup: BackendWarmup;

  constructor(private readonly deps: TierCascadeDeps) {
    this.runners = { ...createTierRunners(), ...deps.runners };
    this.warmup = deps.warmup ?? new BackendWarmup(deps.config.analysis.warmupDelayMs);
  }

  async analyze(projectPath: string, params: AnalyzeParams): Promise<CascadeResult> {
    const root = path.resolve(projectPath);
    const tiers = planTiers(params, this.deps.config);

    if (params.initiator !== 'system' && this.deps.gate) {
      const granted = await this.deps.gate.request(
        {
          sessionId: params.sessionId ?? 'default',
          toolName: ANALYZE_TOOL,
          action: 'analyze',
          path: root,
          description: `Run ${tiers.join(' → ')} analysis. File names and contents are sent to the local model.`,
          params: { tiers, force: params.force === true },
        },
        params.signal,
      );
      if (!granted) throw Errors.permissionDenied(ANALYZE_TOOL, 'analyze', root);
    }

    const cache = new TierCache(root, { session: this.deps.session });
    return cache.withLock(() => this.runLocked(root, tiers, params, cache));
  }

  async status(projectPath: string): Promise<TierStatus[]> {
    const root = path.resolve(projectPath);
    const cache = new TierCache(root);
    const snapshot = await new ContentHasher(this.deps.lister).snapshot(root);
    const statuses: TierStatus[] = [];
    for (const tier of ANALYSIS_TIERS) {
      const record = await cache.load(tier);
      const check = checkFreshness(record, snapshot, tierModelKey(this.deps.config, tier), false);
      const result = record ? decodeStoredResult(record.result, tier) : null;
      statuses.push({
        tier,
        analyzed: record !== null,
        analyzedAt: record?.analyzedAt ?? null,
        fresh: check.fresh && result !== null,
        reasons: check.reasons,
        partial: result?.partial ?? null,
        confidence: result?.confidence ?? null,
      });
    }
    return statuses;
  }

  private async runLocked(
    root: string,
    tiers: readonly AnalysisTier[],
    params: AnalyzeParams,
    cache: TierCache,
  ): Promise<CascadeResult> {
    let snapshot: ContentSnapshot;
    try {
      snapshot = await new ContentHasher(this.deps.lister).snapshot(root);
    } catch (error) {
      throw Errors.tier(tiers[0], 'listing', getErrorMessage(error), 0, 0, toError(error));
    }
    const knowledge = new KnowledgeStore(root);
    const scanRecord = await new ScanStore(root).load();
    const scan = scanRecord ? scanRecordAnswer(scanRecord) : null;
    logDebug('Tier cascade planned', { tiers, files: snapshot.fileCount, hash: snapshot.hash.slice(0, 12) });

    const reports: TierRunReport[] = [];
    let carried: AnalysisResult | null = null;
    for (const tier of tiers) {
      const seed = await this.buildSeed(tier, carried, cache, knowledge, scan);
      const report = await this.runTier(root, tier, snapshot, seed, params, cache, knowledge);
      reports.push(report);
      carried = report.result;
    }

    const last = reports[reports.length - 1];
    return { projectPath: root, reports, final: last.result };
  }

  private async buildSeed(
    tier: AnalysisTier,
    carried: AnalysisResult | null,
    cache: TierCache,
    knowledge: KnowledgeStore,
    scan: TierSeed['scan'],
  ): Promise<TierSeed> {
    const previous = previousTier(tier);
    if (previous === null) {
      return { previousTier: null, knowledge: null, previousResult: null, scan };
    }
    if (carried?.tier === previous) {
      return { previousTier: previous, knowledge: carried.knowledgeFiles, previousResult: carried, scan };
    }
    const record = await cache.load(previous);
    return {
      previousTier: previous,
      knowledge: await knowledge.read(previous),
      previousResult: record ? decodeStoredResult(record.result, previous) : null,
      scan,
    };
  }

  private async runTier(
    root: string,
    tier: AnalysisTier,
    snapshot: ContentSnapshot,
    seed: TierSeed,
    params: AnalyzeParams,
    cache: TierCache,
    knowledge: KnowledgeStore,
  ): Promise<TierRunReport> {
    const { bus, config } = this.deps;
    const started = Date.now();
    const modelId = tierModelKey(config, tier);
    const force = params.force === true;
    await bus?.emit(createTierStartedEvent(root, tier));

    const check = await cache.check(tier, snapshot, modelId, force);
    if (check.fresh && check.record) {
      const stored = decodeStoredResult(check.record.result, tier);
      if (stored) {
        const durationMs = Date.now() - started;
        logInfo('Tier is fresh; serving stored result', { tier, analyzedAt: check.record.analyzedAt });
        this.deps.session?.recordResult(stored);
        await bus?.emit(createTierCompletedEvent(root, tier, true, durationMs));
        return { tier, result: stored, cached: true, staleReasons: [], durationMs };
      }
      check.reasons.push('stored result unreadable');
    }

    const context: TierContext = {
      tier,
      projectPath: root,
      config,
      tunables: resolveTierTunables(config, tier),
      client: this.deps.client,
      snapshot,
      seed,
      // force starts from empty item states
      previousRecord: force ? null : check.record,
      force,
      signal: params.signal,
      warmup: this.warmup,
      progress: (stage, completed, total) => {
        if (bus) void bus.emit(createTierProgressEvent(root, tier, stage, completed, total));
      },
    };

    try {
      logInfo('Running tier', { tier, reasons: check.reasons });
      const output = await this.runners[tier].run(context);
      await this.persist(tier, output.result, snapshot, modelId, output.items, cache, knowledge);
      const durationMs = Date.now() - started;
      this.deps.session?.recordResult(output.result);
      await bus?.emit(createTierCompletedEvent(root, tier, false, durationMs));
      return { tier, result: output.result, cached: false, staleReasons: check.reasons, durationMs };
    } catch (error) {
      const failure =
        error instanceof TierFailure || error instanceof AbortError
          ? error
          : Errors.tier(tier, 'workers', getErrorMessage(error), 0, 0, isEngineError(error) ? error : toError(error));
      await bus?.emit(createTierFailedEvent(root, tier, failure.message));
      throw failure;
    }
  }

  private async persist(
    tier: AnalysisTier,
    result: AnalysisResult,
    snapshot: ContentSnapshot,
    modelId: string,
    items: Record<string, PerItemState>,
    cache: TierCache,
    knowledge: KnowledgeStore,
  ): Promise<void> {
    try {
      await knowledge.write(tier, result.knowledgeFiles, this.deps.config.analysis[tier].clean);
      await cache.save(buildTierRecord({ tier, snapshot, modelId, items, result }));
    } catch (error) {
      throw Errors.tier(tier, 'persist', getErrorMessage(error), 0, 0, toError(error));
    }
  }
}
