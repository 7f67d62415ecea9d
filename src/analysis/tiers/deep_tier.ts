/**
 * @fileoverview Deep tier: wider and longer reads, verified against the detailed tier
 *
 * Summarizes up to `maxFiles` files with more of each file visible, shows the
 * model the detailed tier's summary of the same file for verification, and
 * asks a larger model where the previous tier was wrong or incomplete.
 *
 * @packageDocumentation
 */

import { Errors, ParseError } from '../../core/errors.js';
import { systemMessage, userMessage, type ChatMessage } from '../../providers/completion_client.js';
import { logInfo, logWarning } from '../../telemetry/logger.js';
import { AbortError } from '../../utils/async.js';
import { getErrorMessage } from '../../utils/errors.js';
import { isRecord, parseBalancedObject, readNumber, readString, readStringArray } from '../../utils/json_extract.js';
import { clampConfidence, deepFreeze, type DeepAnalysis, type FileSummary } from '../types.js';
import { orderedSummaries, selectKeyFiles, summarizeFiles } from './file_summaries.js';
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

export interface DeepSynthesis {
  architecture: string;
  purpose: string;
  refinementNotes: string[];
  architecturalInsights: string[];
  confidence: number;
}

export function buildDeepSynthesisMessages(summaries: readonly FileSummary[], previousKnowledge: string): ChatMessage[] {
  const prompt = [
    'You are performing a deep architectural review. The previous analysis below was produced from fewer and shorter reads.',
    '',
    'Previous knowledge:',
    previousKnowledge,
    '',
    'Deep file analysis:',
    JSON.stringify(summaries, null, 2),
    '',
    'List concretely where the previous analysis was wrong or incomplete (refinementNotes),',
    'and the architectural insights only visible from this deeper read (architecturalInsights).',
    '',
    'Respond with JSON:',
    '{"architecture":"...","purpose":"...","refinementNotes":["..."],"architecturalInsights":["..."],"confidence":0.0}',
  ].join('\n');
  return [
    systemMessage('You are a principal engineer reviewing an architecture analysis. Base every claim on evidence. Output only valid JSON.'),
    userMessage(prompt),
  ];
}

export function parseDeepSynthesis(raw: string): DeepSynthesis | ParseError {
  const decoded = parseBalancedObject(raw, 'deep synthesis');
  if (!decoded.ok) return decoded.error;
  if (!isRecord(decoded.value)) return new ParseError('deep synthesis', 'payload is not an object');
  const record = decoded.value;
  const synthesis: DeepSynthesis = {
    architecture: readString(record, 'architecture'),
    purpose: readString(record, 'purpose'),
    refinementNotes: readStringArray(record, 'refinementNotes'),
    architecturalInsights: readStringArray(record, 'architecturalInsights'),
    confidence: clampConfidence(readNumber(record, 'confidence') ?? 0),
  };
  if (synthesis.architecture === '' && synthesis.architecturalInsights.length === 0) {
    return new ParseError('deep synthesis', 'neither architecture nor insights given');
  }
  return synthesis;
}

interface DetailedSeed {
  keyFiles: string[];
  summaries: Map<string, FileSummary>;
  architecture: string;
  purpose: string;
}

function detailedSeed(context: TierContext): DetailedSeed {
  const previous = context.seed.previousResult;
  if (previous?.tier !== 'detailed') {
    return { keyFiles: [], summaries: new Map(), architecture: '', purpose: context.seed.scan?.purpose ?? '' };
  }
  return {
    keyFiles: previous.keyFiles,
    summaries: new Map(previous.fileSummaries.map((summary) => [summary.path, summary])),
    architecture: previous.architecture,
    purpose: previous.purpose,
  };
}

export class DeepTier implements TierRunner<'deep'> {
  readonly tier = 'deep' as const;

  async run(context: TierContext): Promise<TierOutput<DeepAnalysis>> {
    const started = Date.now();
    const settings = context.config.analysis.deep;
    const seed = detailedSeed(context);
    const files = selectKeyFiles(context.snapshot.files, seed.keyFiles, settings.maxFiles);
    if (files.length === 0) {
      throw Errors.tier('deep', 'listing', 'no files to read');
    }

    const processed = await summarizeFiles(context, {
      files,
      maxLines: settings.maxLinesPerFile,
      previous: seed.summaries,
    });
    const summaries = orderedSummaries(files, processed.outputs);
    if (summaries.length === 0) {
      throw Errors.tier('deep', 'summaries', 'every file summary failed', processed.failed.length, files.length);
    }

    let synthesis: DeepSynthesis;
    let degraded = false;
    try {
      context.progress?.('synthesis', 0, 1);
      synthesis = await completeAndParse<DeepSynthesis>(
        context,
        buildDeepSynthesisMessages(summaries, renderKnowledge(context.seed.knowledge)),
        'adjudicator',
        'synthesis',
        parseDeepSynthesis,
      );
      context.progress?.('synthesis', 1, 1);
    } catch (error) {
      if (error instanceof AbortError) throw error;
      if (context.tunables.strictFail) {
        throw Errors.tier('deep', 'synthesis', getErrorMessage(error));
      }
      logWarning('Deep synthesis failed; keeping the detailed conclusions', { error: getErrorMessage(error) });
      synthesis = {
        architecture: seed.architecture,
        purpose: seed.purpose,
        refinementNotes: [],
        architecturalInsights: [],
        confidence: 0,
      };
      degraded = true;
    }

    const partial = degraded || processed.failed.length > 0;
    const knowledgeFiles = renderFileLevelKnowledge({
      title: 'Deep Analysis',
      architecture: synthesis.architecture,
      purpose: synthesis.purpose,
      techStack: [...new Set(summaries.flatMap((summary) => summary.dependencies))].sort().slice(0, 20),
      entryPoints: seed.keyFiles.filter((file) => files.includes(file)).slice(0, 10),
      summaries,
      refinementNotes: synthesis.refinementNotes,
      insights: synthesis.architecturalInsights,
      nextSteps: ['Run `full` analysis for business value, technical debt and recommendations'],
    });

    const result = deepFreeze<DeepAnalysis>({
      tier: 'deep',
      projectPath: context.projectPath,
      generatedAt: new Date().toISOString(),
      durationMs: Date.now() - started,
      fileCount: context.snapshot.fileCount,
      knowledgeFiles,
      confidence: clampConfidence(synthesis.confidence * (summaries.length / files.length)),
      partial,
      architecture: synthesis.architecture,
      purpose: synthesis.purpose,
      refinementNotes: synthesis.refinementNotes,
      architecturalInsights: synthesis.architecturalInsights,
      fileSummaries: summaries,
    });

    logInfo('Deep analysis complete', {
      files: files.length,
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
