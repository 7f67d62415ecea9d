/**
 * @fileoverview Full tier: business-level synthesis with the largest model
 *
 * Works from the deep tier's knowledge only; no further file reads. Without
 * `strictFail`, a synthesis that fails every retry degrades to a partial
 * result that restates the deep tier's purpose.
 */

import { Errors, ParseError } from '../../core/errors.js';
import { systemMessage, userMessage, type ChatMessage } from '../../providers/completion_client.js';
import { successState, type PerItemState } from '../../storage/tier_cache.js';
import { logInfo, logWarning } from '../../telemetry/logger.js';
import { AbortError } from '../../utils/async.js';
import { getErrorMessage } from '../../utils/errors.js';
import { isRecord, parseBalancedObject, readNumber, readString, readStringArray } from '../../utils/json_extract.js';
import { clampConfidence, deepFreeze, type FullAnalysis } from '../types.js';
import { renderFullKnowledge } from './knowledge_docs.js';
import {
  SYNTHESIS_ITEM,
  completeAndParse,
  renderKnowledge,
  synthesisState,
  type TierContext,
  type TierOutput,
  type TierRunner,
} from './tier_context.js';

export interface FullSynthesis {
  businessValue: string;
  technicalDebt: string[];
  recommendations: string[];
  documentationGaps: string[];
  confidence: number;
}

export function buildFullSynthesisMessages(previousKnowledge: string): ChatMessage[] {
  const prompt = [
    'Using the deep analysis below, produce the final assessment of this project.',
    '',
    'Deep analysis:',
    previousKnowledge,
    '',
    'Cover:',
    '- businessValue: what problem the project solves and for whom',
    '- technicalDebt: concrete debt items, each naming where it lives',
    '- recommendations: prioritized, actionable improvements',
    '- documentationGaps: what a new contributor would be missing',
    '',
    'Respond with JSON:',
    '{"businessValue":"...","technicalDebt":["..."],"recommendations":["..."],"documentationGaps":["..."],"confidence":0.0}',
  ].join('\n');
  return [
    systemMessage('You are a CTO-level reviewer producing a final project assessment. Output only valid JSON.'),
    userMessage(prompt),
  ];
}

export function parseFullSynthesis(raw: string): FullSynthesis | ParseError {
  const decoded = parseBalancedObject(raw, 'full synthesis');
  if (!decoded.ok) return decoded.error;
  if (!isRecord(decoded.value)) return new ParseError('full synthesis', 'payload is not an object');
  const record = decoded.value;
  const synthesis: FullSynthesis = {
    businessValue: readString(record, 'businessValue'),
    technicalDebt: readStringArray(record, 'technicalDebt'),
    recommendations: readStringArray(record, 'recommendations'),
    documentationGaps: readStringArray(record, 'documentationGaps'),
    confidence: clampConfidence(readNumber(record, 'confidence') ?? 0),
  };
  if (synthesis.businessValue === '' && synthesis.recommendations.length === 0) {
    return new ParseError('full synthesis', 'neither business value nor recommendations given');
  }
  return synthesis;
}

function degradedSynthesis(context: TierContext): FullSynthesis {
  const previous = context.seed.previousResult;
  const purpose = previous?.tier === 'deep' ? previous.purpose : (context.seed.scan?.purpose ?? '');
  return { businessValue: purpose, technicalDebt: [], recommendations: [], documentationGaps: [], confidence: 0 };
}

export class FullTier implements TierRunner<'full'> {
  readonly tier = 'full' as const;

  async run(context: TierContext): Promise<TierOutput<FullAnalysis>> {
    const started = Date.now();
    let synthesis: FullSynthesis;
    let degraded = false;
    try {
      context.progress?.('synthesis', 0, 1);
      synthesis = await completeAndParse<FullSynthesis>(
        context,
        buildFullSynthesisMessages(renderKnowledge(context.seed.knowledge, 24_000)),
        'adjudicator',
        'synthesis',
        parseFullSynthesis,
      );
      context.progress?.('synthesis', 1, 1);
    } catch (error) {
      if (error instanceof AbortError) throw error;
      if (context.tunables.strictFail) {
        throw Errors.tier('full', 'synthesis', getErrorMessage(error));
      }
      logWarning('Full synthesis failed; keeping the deep conclusions', { error: getErrorMessage(error) });
      synthesis = degradedSynthesis(context);
      degraded = true;
    }

    const knowledgeFiles = renderFullKnowledge({ ...synthesis, previous: context.seed.knowledge });
    const result = deepFreeze<FullAnalysis>({
      tier: 'full',
      projectPath: context.projectPath,
      generatedAt: new Date().toISOString(),
      durationMs: Date.now() - started,
      fileCount: context.snapshot.fileCount,
      knowledgeFiles,
      confidence: synthesis.confidence,
      partial: degraded || context.seed.knowledge === null,
      businessValue: synthesis.businessValue,
      technicalDebt: synthesis.technicalDebt,
      recommendations: synthesis.recommendations,
      documentationGaps: synthesis.documentationGaps,
    });

    const items: Record<string, PerItemState> = {};
    for (const file of context.snapshot.files) {
      items[file] = successState(context.snapshot.items[file]);
    }
    items[SYNTHESIS_ITEM] = synthesisState(
      context.snapshot,
      result.partial,
      degraded ? 'synthesis degraded' : 'no deep knowledge to build on',
    );
    logInfo('Full analysis complete', { recommendations: synthesis.recommendations.length });
    return { result, items };
  }
}
