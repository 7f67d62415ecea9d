/**
 * @fileoverview Quick tier: consensus file ranking from paths alone
 *
 * N focused workers each rank the files that look most important from their
 * path list; their votes are merged and either adjudicated by a larger model
 * or tallied locally. No file contents are read.
 *
 * With natural-language workers the adjudicator works from the worker
 * summaries alone and writes a markdown project summary; its important-files
 * list becomes the ranking.
 *
 * Degradation (strictFail off):
 * - failed workers are tolerated up to the quorum floor
 * - a failed adjudication falls back to the local tally
 * Either marks the result partial and lowers its confidence.
 *
 * @packageDocumentation
 */

import { Errors, QuorumFailure } from '../../core/errors.js';
import { systemMessage, userMessage, type ChatMessage } from '../../providers/completion_client.js';
import { logInfo, logWarning } from '../../telemetry/logger.js';
import { getErrorMessage } from '../../utils/errors.js';
import { AbortError } from '../../utils/async.js';
import { majorityFloor, runCrowd, type CrowdRunResult } from '../crowd_sampler.js';
import { clampConfidence, deepFreeze, type QuickAnalysis, type RankedFile } from '../types.js';
import { successState, type PerItemState } from '../../storage/tier_cache.js';
import { renderQuickKnowledge } from './knowledge_docs.js';
import {
  compactCrowdLines,
  finalizeRankings,
  keepTracked,
  limitWords,
  localTally,
  mergeRankings,
  parseAdjudicatedRanking,
  parseSummaryConsensus,
  parseWorkerOutput,
  partitionPaths,
  prefilterForRanking,
  renderStructureHints,
  summarizeStructure,
  type WorkerOutput,
} from './ranking.js';
import {
  SYNTHESIS_ITEM,
  completeAndParse,
  synthesisState,
  tierFailure,
  type TierContext,
  type TierOutput,
  type TierRunner,
} from './tier_context.js';

// ============================================================================
// PROMPTS
// ============================================================================

export interface WorkerPromptInput {
  focus: string;
  structureHints: string;
  paths: readonly string[];
  topN: number;
  /** Word limit of the prose summary; omitted for ranking-only workers */
  summaryWordLimit?: number;
}

export function buildWorkerMessages(input: WorkerPromptInput): ChatMessage[] {
  const output =
    input.summaryWordLimit === undefined
      ? [
          `- Return the TOP ${input.topN} items as a JSON array of objects exactly like:`,
          '  [{"path":"...","importance":9,"reason":"<=120 chars, path-based","category":"entry|config|core|util|test|doc|other"}]',
        ]
      : [
          `- Return a JSON object: {"rankings":[<up to ${input.topN} items as below>],"summary":"<plain text, under ${input.summaryWordLimit} words>"}`,
          '  item: {"path":"...","importance":9,"reason":"<=120 chars, path-based","category":"entry|config|core|util|test|doc|other"}',
          '- The summary names the paths or directories that look most important and why.',
        ];
  const prompt = [
    'Given this list of file paths, quickly predict which files look most important and rank them.',
    `Focus: ${input.focus}`,
    '',
    'Use ONLY path/name signals (no content). Consider:',
    '- Top-level directories and their roles (src/, lib/, cmd/, app/, server/, docs/, tests/)',
    '- Common entrypoints (main, index, cli, server startup)',
    '- Orchestrators and hubs (app setup, service registries, router setup)',
    '- Configuration, build and CI files',
    '- Tests and docs are usually lower importance',
    '',
    'Scoring (1-10):',
    '- 10: primary entrypoint/bootstrap',
    '- 8-9: core components central to runtime',
    '- 6-7: important configuration/integration',
    '- 4-5: shared utilities/helpers',
    '- 2-3: tests/docs/examples',
    '',
    'Rules:',
    ...output,
    '- Reasons must be path-based and concrete. Keep them terse (<=120 chars).',
    '',
    'Structure hints:',
    input.structureHints,
    '',
    'FILES:',
    input.paths.join('\n'),
  ].join('\n');
  return [systemMessage('You are a file importance analyzer. Return valid JSON only.'), userMessage(prompt)];
}

export function buildRankingAdjudicationMessages(
  lines: readonly string[],
  structureHints: string,
  finalTopK: number,
  summaries: readonly string[],
): ChatMessage[] {
  const parts = [
    `Given the crowd lists below, choose the final consensus ranking (TOP ${finalTopK}).`,
    'Prefer agreement; when split, choose the most plausible given structure.',
    'Return JSON with fields: {"rankings":[{path, importance, reason, category}], "confidence": 0.0..1.0}',
    'CROWD (condensed):',
    lines.join('\n'),
  ];
  if (summaries.length > 0) {
    parts.push('', 'WORKER SUMMARIES:', summaries.join('\n\n---\n\n'));
  }
  parts.push('', 'STRUCTURE:', structureHints);
  return [
    systemMessage('Adjudicate crowd answers into a single JSON. Output only valid JSON.'),
    userMessage(parts.join('\n')),
  ];
}

const SUMMARY_TEMPLATE = `# Project Summary

**Purpose**: <short string>

**Structure overview**:

<short paragraph grounded in path/name signals>

**Important files**:

- path (role): reason
- path (role): reason
- path (role): reason

**Notes**:
- <short caveats or unknowns>

**Confidence**: <0.0..1.0>`;

export function buildSummaryAdjudicationMessages(summaries: readonly string[], structureHints: string): ChatMessage[] {
  const prompt = [
    SUMMARY_TEMPLATE,
    '',
    'Constraints:',
    '- Output only the template above. No extra sections, no code fences.',
    '- Synthesize an overview; do not restate, quote or enumerate the worker summaries.',
    '- Use only paths present in the worker summaries or the structure hints. Choose at most 10 important files.',
    '- role is one of entry, config, core, util, test, doc, other; reason is at most 120 chars and path-anchored.',
    '',
    'WORKER SUMMARIES:',
    summaries.join('\n\n---\n\n'),
    '',
    'STRUCTURE HINTS:',
    structureHints,
  ].join('\n');
  return [
    systemMessage('Adjudicate worker summaries into exactly the provided markdown template. Be strict. Output only the template.'),
    userMessage(prompt),
  ];
}

// ============================================================================
// TIER
// ============================================================================

interface RankingConsensus {
  rankings: RankedFile[];
  confidence: number;
  /** Markdown summary from summary adjudication, '' otherwise */
  summary: string;
}

interface Consensus extends RankingConsensus {
  adjudicatorUsed: boolean;
  degraded: boolean;
}

export class QuickTier implements TierRunner<'quick'> {
  readonly tier = 'quick' as const;

  async run(context: TierContext): Promise<TierOutput<QuickAnalysis>> {
    const started = Date.now();
    const settings = context.config.analysis.quick;
    const { tunables, snapshot } = context;
    const tracked = new Set(snapshot.files);
    const files = prefilterForRanking(snapshot.files);
    if (files.length === 0) {
      throw Errors.tier('quick', 'listing', 'no files to rank');
    }

    const structure = summarizeStructure(files);
    const hints = renderStructureHints(structure);
    const chunks = partitionPaths(files, tunables.workers, settings.maxPathsPerCall);
    const naturalLanguage = settings.naturalLanguageWorkers;

    let completed = 0;
    let crowd: CrowdRunResult<WorkerOutput | null>;
    try {
      crowd = await runCrowd<WorkerOutput | null>(
        ({ index }) => {
          const focus = settings.focuses[index % settings.focuses.length];
          const messages = buildWorkerMessages({
            focus,
            structureHints: hints,
            paths: chunks[index],
            topN: settings.topFileRankingCount,
            summaryWordLimit: naturalLanguage ? settings.workerSummaryWordLimit : undefined,
          });
          return completeAndParse<WorkerOutput>(context, messages, 'worker', `worker ${index}`, (raw) =>
            this.decodeWorker(raw, tracked, settings.topFileRankingCount, naturalLanguage, focus, index, settings.workerSummaryWordLimit),
          );
        },
        {
          n: tunables.workers,
          concurrency: tunables.workerConcurrency,
          quorumFloor: tunables.strictFail ? 0 : settings.quorumFloor ?? majorityFloor(tunables.workers),
          signal: context.signal,
          label: 'quick ranking worker',
          empty: () => null,
          onSettled: () => {
            completed++;
            context.progress?.('workers', completed, tunables.workers);
          },
        },
      );
    } catch (error) {
      if (error instanceof QuorumFailure && tunables.strictFail) {
        throw Errors.tier(
          'quick',
          'workers',
          `quick ranking failed: ${error.failures}/${error.total} workers failed`,
          error.failures,
          error.total,
          error,
        );
      }
      throw tierFailure(context, 'workers', error);
    }

    const outputs = crowd.values.filter((value): value is WorkerOutput => value !== null);
    const merged = mergeRankings(
      outputs.map((output) => output.rankings),
      settings.topFileRankingCount,
    );
    const summaries = outputs.map((output) => output.summary).filter((summary) => summary !== '');
    const adjudicatesSummaries = naturalLanguage && settings.useModelAdjudicator && summaries.length > 0;
    if (merged.length === 0 && !adjudicatesSummaries) {
      throw Errors.tier('quick', 'workers', 'workers produced no rankings for tracked files', crowd.failures, crowd.total);
    }

    const consensus = adjudicatesSummaries
      ? await this.summaryConsensus(context, merged, tracked, hints, summaries)
      : await this.reachConsensus(context, merged, tracked, hints, summaries);
    const successRatio = (crowd.total - crowd.failures) / crowd.total;
    const partial = crowd.failures > 0 || consensus.degraded;
    const confidence = clampConfidence(consensus.confidence * successRatio);

    const knowledgeFiles = renderQuickKnowledge({
      fileCount: snapshot.fileCount,
      rankings: consensus.rankings,
      structure,
      workerSummaries: summaries,
      consensusSummary: consensus.summary,
      focuses: settings.focuses,
      consensusConfidence: consensus.confidence,
      adjudicatorUsed: consensus.adjudicatorUsed,
      scan: context.seed.scan,
    });

    const result = deepFreeze<QuickAnalysis>({
      tier: 'quick',
      projectPath: context.projectPath,
      generatedAt: new Date().toISOString(),
      durationMs: Date.now() - started,
      fileCount: snapshot.fileCount,
      knowledgeFiles,
      confidence,
      partial,
      workersUsed: crowd.total,
      workersFailed: crowd.failures,
      topPerWorker: settings.topFileRankingCount,
      finalTopK: settings.finalTopK,
      consensusCount: consensus.rankings.length,
      consensusConfidence: consensus.confidence,
      adjudicatorUsed: consensus.adjudicatorUsed,
      rankings: consensus.rankings,
      structure,
      workerSummaries: summaries,
      consensusSummary: consensus.summary,
    });

    const items: Record<string, PerItemState> = {};
    for (const file of snapshot.files) {
      items[file] = successState(snapshot.items[file]);
    }
    items[SYNTHESIS_ITEM] = synthesisState(snapshot, partial, `${crowd.failures}/${crowd.total} workers failed`);

    logInfo('Quick ranking complete', {
      workers: crowd.total,
      failed: crowd.failures,
      ranked: consensus.rankings.length,
      adjudicated: consensus.adjudicatorUsed,
    });
    return { result, items };
  }

  private decodeWorker(
    raw: string,
    tracked: ReadonlySet<string>,
    topN: number,
    naturalLanguage: boolean,
    focus: string,
    index: number,
    wordLimit: number,
  ): WorkerOutput | Error {
    const parsed = parseWorkerOutput(raw, topN);
    if (!parsed.ok) return parsed.error;
    const rankings = keepTracked(parsed.value.rankings, tracked);
    if (naturalLanguage) {
      if (parsed.value.summary === '') return new Error(`worker ${index} returned no summary`);
      return { rankings, summary: `Worker ${index} (focus: ${focus})\n${limitWords(parsed.value.summary, wordLimit)}` };
    }
    if (rankings.length === 0) return new Error(`worker ${index} ranked no tracked files`);
    return { rankings, summary: '' };
  }

  private async reachConsensus(
    context: TierContext,
    merged: RankedFile[],
    tracked: ReadonlySet<string>,
    hints: string,
    summaries: readonly string[],
  ): Promise<Consensus> {
    const settings = context.config.analysis.quick;
    if (!settings.useModelAdjudicator) {
      return { ...localTally(merged, settings.finalTopK), summary: '', adjudicatorUsed: false, degraded: false };
    }

    const messages = buildRankingAdjudicationMessages(compactCrowdLines(merged), hints, settings.finalTopK, summaries);
    try {
      context.progress?.('adjudication', 0, 1);
      const adjudicated = await completeAndParse<RankingConsensus>(context, messages, 'adjudicator', 'adjudicator', (raw) => {
        const parsed = parseAdjudicatedRanking(raw);
        if (!parsed.ok) return parsed.error;
        const rankings = finalizeRankings(parsed.value.rankings, merged, tracked, settings.finalTopK);
        if (rankings.length === 0) return new Error('adjudicator ranked no tracked files');
        return { rankings, confidence: parsed.value.confidence, summary: '' };
      });
      context.progress?.('adjudication', 1, 1);
      return { ...adjudicated, adjudicatorUsed: true, degraded: false };
    } catch (error) {
      if (error instanceof AbortError) throw error;
      if (context.tunables.strictFail) {
        throw Errors.tier('quick', 'adjudication', `adjudicator failed after retry: ${getErrorMessage(error)}`);
      }
      logWarning('Ranking adjudication failed; using local tally', { error: getErrorMessage(error) });
      return { ...localTally(merged, settings.finalTopK), summary: '', adjudicatorUsed: false, degraded: true };
    }
  }

  private async summaryConsensus(
    context: TierContext,
    merged: RankedFile[],
    tracked: ReadonlySet<string>,
    hints: string,
    summaries: readonly string[],
  ): Promise<Consensus> {
    const settings = context.config.analysis.quick;
    const messages = buildSummaryAdjudicationMessages(summaries, hints);
    try {
      context.progress?.('adjudication', 0, 1);
      const adjudicated = await completeAndParse<RankingConsensus>(context, messages, 'adjudicator', 'summary adjudicator', (raw) => {
        const parsed = parseSummaryConsensus(raw);
        if (!parsed.ok) return parsed.error;
        const listed = finalizeRankings(parsed.value.rankings, merged, tracked, settings.finalTopK);
        const rankings = listed.length > 0 ? listed : localTally(merged, settings.finalTopK).rankings;
        return { rankings, confidence: parsed.value.confidence, summary: parsed.value.markdown };
      });
      context.progress?.('adjudication', 1, 1);
      return { ...adjudicated, adjudicatorUsed: true, degraded: false };
    } catch (error) {
      if (error instanceof AbortError) throw error;
      if (context.tunables.strictFail || merged.length === 0) {
        throw Errors.tier('quick', 'adjudication', `adjudicator failed after retry: ${getErrorMessage(error)}`);
      }
      logWarning('Summary adjudication failed; using local tally', { error: getErrorMessage(error) });
      return { ...localTally(merged, settings.finalTopK), summary: '', adjudicatorUsed: false, degraded: true };
    }
  }
}
