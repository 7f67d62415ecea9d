/**
 * @fileoverview Detailed tier: key files read and summarized
 *
 * Reads the head of up to `maxKeyFiles` key files, summarizes each one
 * (incrementally, through the tier record), then refines the previous tier's
 * knowledge into an architecture / purpose / tech stack synthesis.
 *
 * @packageDocumentation
 */

import { Errors, ParseError } from '../../core/errors.js';
import { systemMessage, userMessage, type ChatMessage } from '../../providers/completion_client.js';
import { logInfo, logWarning } from '../../telemetry/logger.js';
import { AbortError } from '../../utils/async.js';
import { getErrorMessage } from '../../utils/errors.js';
import { isRecord, parseBalancedObject, readNumber, readString, readStringArray } from '../../utils/json_extract.js';
import { clampConfidence, deepFreeze, type DetailedAnalysis, type FileSummary } from '../types.js';
import { isEntryPointName, orderedSummaries, selectKeyFiles, summarizeFiles } from './file_summaries.js';
import { renderFileLevelKnowledge } from './knowledge_docs.js';
import {
  SYNTHESIS_ITEM,
  completeAndParse,
  renderKnowledge,
  synthesisState,
  type TierContext,
  type TierOutput,
  type TierRunner,
} from './tier_context.js';

export interface DetailedSynthesis {
  architecture: string;
  purpose: string;
  techStack: string[];
  entryPoints: string[];
  confidence: number;
}

export function buildDetailedSynthesisMessages(summaries: readonly FileSummary[], previousKnowledge: string): ChatMessage[] {
  const prompt = [
    'You are refining a project analysis. Be skeptical of the previous analysis.',
    '',
    'Previous knowledge:',
    previousKnowledge,
    '',
    'New detailed file analysis:',
    JSON.stringify(summaries, null, 2),
    '',
    'Identify the TRUE architecture (not assumed), the real purpose, the tech stack actually used and the entry points.',
    'Correct anything the previous analysis got wrong.',
    '',
    'Respond with JSON:',
    '{"architecture":"...","purpose":"...","techStack":["..."],"entryPoints":["path"],"confidence":0.0}',
  ].join('\n');
  return [
    systemMessage('You are a skeptical architect refining analysis. Question assumptions and correct errors. Output only valid JSON.'),
    userMessage(prompt),
  ];
}

export function parseDetailedSynthesis(raw: string): DetailedSynthesis | ParseError {
  const decoded = parseBalancedObject(raw, 'detailed synthesis');
  if (!decoded.ok) return decoded.error;
  if (!isRecord(decoded.value)) return new ParseError('detailed synthesis', 'payload is not an object');
  const record = decoded.value;
  const synthesis: DetailedSynthesis = {
    architecture: readString(record, 'architecture'),
    purpose: readString(record, 'purpose'),
    techStack: readStringArray(record, 'techStack'),
    entryPoints: readStringArray(record, 'entryPoints'),
    confidence: clampConfidence(readNumber(record, 'confidence') ?? 0),
  };
  if (synthesis.architecture === '' && synthesis.purpose === '') {
    return new ParseError('detailed synthesis', 'neither architecture nor purpose given');
  }
  return synthesis;
}

/**
 * Synthesis assembled from the summaries alone when the model call failed.
 */
export function fallbackDetailedSynthesis(summaries: readonly FileSummary[], scanPurpose: string): DetailedSynthesis {
  const readme = summaries.find((summary) => /readme/i.test(summary.path));
  return {
    architecture: '',
    purpose: readme?.purpose || scanPurpose,
    techStack: [...new Set(summaries.flatMap((summary) => summary.dependencies))].sort().slice(0, 15),
    entryPoints: summaries.filter((summary) => isEntryPointName(summary.path)).map((summary) => summary.path),
    confidence: 0,
  };
}

function rankedPaths(context: TierContext): string[] {
  const previous = context.seed.previousResult;
  return previous?.tier === 'quick' ? previous.rankings.map((entry) => entry.path) : [];
}

export class DetailedTier implements TierRunner<'detailed'> {
  readonly tier = 'detailed' as const;

  async run(context: TierContext): Promise<TierOutput<DetailedAnalysis>> {
    const started = Date.now();
    const settings = context.config.analysis.detailed;
    const keyFiles = selectKeyFiles(context.snapshot.files, rankedPaths(context), settings.maxKeyFiles);
    if (keyFiles.length === 0) {
      throw Errors.tier('detailed', 'listing', 'no key files to read');
    }

    const processed = await summarizeFiles(context, { files: keyFiles, maxLines: settings.maxLinesPerFile });
    const summaries = orderedSummaries(keyFiles, processed.outputs);
    if (summaries.length === 0) {
      throw Errors.tier('detailed', 'summaries', 'every file summary failed', processed.failed.length, keyFiles.length);
    }

    let synthesis: DetailedSynthesis;
    let degraded = false;
    try {
      context.progress?.('synthesis', 0, 1);
      synthesis = await completeAndParse<DetailedSynthesis>(
        context,
        buildDetailedSynthesisMessages(summaries, renderKnowledge(context.seed.knowledge)),
        'adjudicator',
        'synthesis',
        parseDetailedSynthesis,
      );
      context.progress?.('synthesis', 1, 1);
    } catch (error) {
      if (error instanceof AbortError) throw error;
      if (context.tunables.strictFail) {
        throw Errors.tier('detailed', 'synthesis', getErrorMessage(error));
      }
      logWarning('Detailed synthesis failed; assembling from file summaries', { error: getErrorMessage(error) });
      synthesis = fallbackDetailedSynthesis(summaries, context.seed.scan?.purpose ?? '');
      degraded = true;
    }

    const partial = degraded || processed.failed.length > 0;
    const successRatio = summaries.length / keyFiles.length;
    const knowledgeFiles = renderFileLevelKnowledge({
      title: 'Detailed Analysis',
      architecture: synthesis.architecture,
      purpose: synthesis.purpose,
      techStack: synthesis.techStack,
      entryPoints: synthesis.entryPoints,
      summaries,
      nextSteps: ['Run `deep` analysis for architectural insights', 'Run `full` analysis for recommendations'],
    });

    const result = deepFreeze<DetailedAnalysis>({
      tier: 'detailed',
      projectPath: context.projectPath,
      generatedAt: new Date().toISOString(),
      durationMs: Date.now() - started,
      fileCount: context.snapshot.fileCount,
      knowledgeFiles,
      confidence: clampConfidence(synthesis.confidence * successRatio),
      partial,
      architecture: synthesis.architecture,
      purpose: synthesis.purpose,
      techStack: synthesis.techStack,
      keyFiles,
      entryPoints: synthesis.entryPoints,
      fileSummaries: summaries,
    });

    logInfo('Detailed analysis complete', {
      keyFiles: keyFiles.length,
      summarized: processed.processed.length,
      reused: processed.carried.length,
      failed: processed.failed.length,
    });
    return {
      result,
      items: { ...processed.items, [SYNTHESIS_ITEM]: synthesisState(context.snapshot, degraded, 'synthesis degraded') },
    };
  }
}
