/**
 * @fileoverview Shared plumbing for analysis tiers
 *
 * A tier receives a {@link TierContext} (project, snapshot, tunables, seed
 * knowledge from the tier below) and returns its result plus the item
 * states the cache should persist.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { AnalysisTier, EngineConfig, TierTunables } from '../../config/engine_config.js';
import { Errors, isEngineError, QuorumFailure, TierFailure, type TierStage } from '../../core/errors.js';
import type { ChatMessage, CompletionClient } from '../../providers/completion_client.js';
import type { BackendWarmup } from '../../providers/warmup.js';
import type { ContentSnapshot } from '../../storage/content_hasher.js';
import {
  failureState,
  planIncremental,
  successState,
  type PerItemState,
  type TierRecord,
} from '../../storage/tier_cache.js';
import { AbortError, retry } from '../../utils/async.js';
import { getErrorMessage, toError } from '../../utils/errors.js';
import { logDebug, logWarning } from '../../telemetry/logger.js';
import { runCrowd } from '../crowd_sampler.js';
import type { AdjudicatedAnswer, AnalysisResult, AnalysisResultOf, KnowledgeFiles } from '../types.js';

// ============================================================================
// CONTEXT
// ============================================================================

export interface TierSeed {
  previousTier: AnalysisTier | null;
  /** Knowledge documents of the previous tier, if it ever ran */
  knowledge: KnowledgeFiles | null;
  previousResult: AnalysisResult | null;
  /** Last startup-scan answer */
  scan: AdjudicatedAnswer | null;
}

export type ProgressReporter = (stage: string, completed: number, total: number) => void;

export interface TierContext {
  tier: AnalysisTier;
  projectPath: string;
  config: EngineConfig;
  tunables: TierTunables;
  client: CompletionClient;
  snapshot: ContentSnapshot;
  seed: TierSeed;
  previousRecord: TierRecord | null;
  force: boolean;
  signal?: AbortSignal;
  warmup?: BackendWarmup;
  progress?: ProgressReporter;
}

export interface TierOutput<R extends AnalysisResult> {
  result: R;
  items: Record<string, PerItemState>;
}

export interface TierRunner<T extends AnalysisTier> {
  readonly tier: T;
  run(context: TierContext): Promise<TierOutput<AnalysisResultOf<T>>>;
}

/** Item id recording whether the tier-level synthesis completed without degrading. */
export const SYNTHESIS_ITEM = '@synthesis';

export function synthesisState(snapshot: ContentSnapshot, partial: boolean, reason = 'tier degraded'): PerItemState {
  return partial ? failureState(snapshot.hash, reason) : successState(snapshot.hash);
}

// ============================================================================
// MODEL CALLS
// ============================================================================

export type CallRole = 'worker' | 'adjudicator';

function callOnce(context: TierContext, messages: ChatMessage[], role: CallRole): Promise<string> {
  const { tunables, config } = context;
  const worker = role === 'worker';
  return context.client.complete(messages, {
    modelId: worker ? tunables.workerModelId : tunables.adjudicatorModelId,
    maxTokens: worker ? tunables.maxTokensWorker : tunables.maxTokensAdjudicator,
    contextSize: tunables.contextSize,
    timeoutMs: tunables.requestTimeoutMs,
    temperature: worker ? config.llm.temperature : config.llm.adjudicatorTemperature,
    signal: context.signal,
  });
}

/**
 * Call and decode; output that does not decode counts as a failed attempt
 * and is retried within the same budget.
 */
export async function completeAndParse<T>(
  context: TierContext,
  messages: ChatMessage[],
  role: CallRole,
  label: string,
  parse: (raw: string) => T | Error,
): Promise<T> {
  await context.warmup?.ensure(context.signal);
  return retry(
    async () => {
      const parsed = parse(await callOnce(context, messages, role));
      if (parsed instanceof Error) throw parsed;
      return parsed;
    },
    {
      retries: role === 'worker' ? context.tunables.workerRetry : context.tunables.adjudicatorRetry,
      signal: context.signal,
      onRetry: (error, attempt) =>
        logDebug(`${context.tier} ${label} attempt failed, retrying`, { attempt, error: getErrorMessage(error) }),
    },
  );
}

/**
 * Convert a stage failure into a TierFailure naming the stage.
 */
export function tierFailure(context: TierContext, stage: TierStage, error: unknown): TierFailure | AbortError {
  if (error instanceof AbortError || error instanceof TierFailure) return error;
  if (error instanceof QuorumFailure) {
    return Errors.tier(context.tier, stage, error.message, error.failures, error.total, error);
  }
  return Errors.tier(context.tier, stage, getErrorMessage(error), 0, 0, isEngineError(error) ? error : toError(error));
}

// ============================================================================
// INCREMENTAL ITEM PROCESSING
// ============================================================================

export interface ItemProcessingResult<T> {
  /** Outputs for every item that has one, processed or carried */
  outputs: Map<string, T>;
  items: Record<string, PerItemState>;
  processed: string[];
  carried: string[];
  failed: string[];
}

export interface ItemProcessingOptions<T> {
  stage: TierStage;
  /** Item ids this pass covers (all must be in the snapshot) */
  itemIds: readonly string[];
  process: (itemId: string) => Promise<T>;
  /** Validate a carried-forward output; null means reprocess */
  decode: (output: unknown) => T | null;
}

/**
 * Run `process` for the items the cache plan marks as new, changed or
 * previously failed, with the tier's worker concurrency. Failed items are
 * recorded with `success=false`; with `strictFail` any failure aborts.
 */
export async function processItemsIncrementally<T>(
  context: TierContext,
  options: ItemProcessingOptions<T>,
): Promise<ItemProcessingResult<T>> {
  const hashes: Record<string, string> = {};
  for (const id of options.itemIds) {
    const hash = context.snapshot.items[id];
    if (hash) hashes[id] = hash;
  }
  const plan = planIncremental(hashes, context.previousRecord?.items, context.force);
  const outputs = new Map<string, T>();
  const items: Record<string, PerItemState> = {};
  const carried: string[] = [];
  const toProcess = [...plan.toProcess];

  for (const [id, state] of Object.entries(plan.carried)) {
    const decoded = options.decode(state.output);
    if (decoded === null) {
      toProcess.push(id);
      continue;
    }
    outputs.set(id, decoded);
    items[id] = state;
    carried.push(id);
  }
  toProcess.sort();
  logDebug(`${context.tier} incremental plan`, { process: toProcess.length, carried: carried.length, removed: plan.removed.length });

  const failed: string[] = [];
  if (toProcess.length > 0) {
    let completed = 0;
    try {
      const run = await runCrowd<T | null>(
        async ({ index }) => options.process(toProcess[index]),
        {
          n: toProcess.length,
          concurrency: context.tunables.workerConcurrency,
          // strictFail tolerates nothing; otherwise every item may fail individually
          quorumFloor: context.tunables.strictFail ? 0 : toProcess.length,
          signal: context.signal,
          label: `${context.tier} ${options.stage}`,
          empty: () => null,
          onSettled: () => {
            completed++;
            context.progress?.(options.stage, completed, toProcess.length);
          },
        },
      );
      run.values.forEach((value, index) => {
        const id = toProcess[index];
        const error = run.errors[index];
        if (error || value === null) {
          failed.push(id);
          items[id] = failureState(hashes[id], error ? error.message : 'no output');
          logWarning(`${context.tier} ${options.stage} failed for item`, { item: id, error: error?.message });
          return;
        }
        outputs.set(id, value);
        items[id] = successState(hashes[id], value);
      });
    } catch (error) {
      throw tierFailure(context, options.stage, error);
    }
  }

  return { outputs, items, processed: toProcess.filter((id) => !failed.includes(id)), carried, failed };
}

// ============================================================================
// FILE ACCESS
// ============================================================================

/**
 * First `maxLines` lines of a project file.
 */
export async function readFileHead(projectPath: string, relPath: string, maxLines: number): Promise<string> {
  const content = await fs.readFile(path.join(projectPath, relPath), 'utf8');
  const lines = content.split('\n');
  if (lines.length <= maxLines) return content;
  return `${lines.slice(0, maxLines).join('\n')}\n... (${lines.length - maxLines} more lines)`;
}

/**
 * Concatenate knowledge documents into one prompt section.
 */
export function renderKnowledge(knowledge: KnowledgeFiles | null, maxChars = 12_000): string {
  if (!knowledge) return '(none)';
  const parts = Object.entries(knowledge).map(([name, content]) => `### ${name}\n${content.trim()}`);
  const joined = parts.join('\n\n');
  return joined.length > maxChars ? `${joined.slice(0, maxChars)}\n... (truncated)` : joined;
}
