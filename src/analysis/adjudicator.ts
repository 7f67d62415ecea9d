/**
 * @fileoverview LLM adjudicator
 *
 * One model call turns the crowd's votes into a single answer. With a prior
 * answer the call is framed as progressive enhancement: keep the prior
 * unless the crowd strongly disagrees, and raise confidence when the crowd
 * agrees with it.
 *
 * @packageDocumentation
 */

import type { Result } from '../core/result.js';
import { Ok, Err, safeAsync } from '../core/result.js';
import { ParseError, isEngineError, Errors, type EngineError } from '../core/errors.js';
import { AbortError, retry, throwIfAborted } from '../utils/async.js';
import { getErrorMessage } from '../utils/errors.js';
import { isRecord, parseObjectSpan, readNumber, readString } from '../utils/json_extract.js';
import { logWarning } from '../telemetry/logger.js';
import { systemMessage, userMessage, type ChatMessage, type CompletionClient } from '../providers/completion_client.js';
import type { ConsensusStrategy } from './consensus.js';
import { clampConfidence, type AdjudicatedAnswer, type CrowdVote } from './types.js';

// ============================================================================
// PROMPTS
// ============================================================================

const ADJUDICATOR_SYSTEM = 'Adjudicate crowd answers into a single JSON object. Be decisive. Output only valid JSON.';

const ANSWER_SHAPE = `{
  "type": "project type",
  "language": "primary language",
  "framework": "framework or none",
  "purpose": "brief purpose",
  "confidence": 0.0
}`;

export function buildAdjudicationPrompt(votes: readonly CrowdVote[], prior?: AdjudicatedAnswer | null): string {
  const crowdJson = JSON.stringify(votes);
  if (prior) {
    const priorJson = JSON.stringify({
      type: prior.type,
      language: prior.language,
      framework: prior.framework,
      purpose: prior.purpose,
      confidence: prior.confidence,
    });
    return [
      'You are the adjudicator refining an established answer.',
      '',
      'PREVIOUS CONSENSUS (working baseline):',
      priorJson,
      '',
      'NEW CROWD ANSWERS (JSON array, empty entries are failed workers):',
      crowdJson,
      '',
      'Rules:',
      '1. Start from the previous consensus.',
      '2. Change a field only when the crowd strongly supports a better answer.',
      '3. If the crowd agrees with the previous consensus, raise confidence (never above 1.0).',
      '4. If the crowd disagrees, decide which is better supported and set confidence accordingly.',
      '',
      'Respond ONLY with JSON:',
      ANSWER_SHAPE,
    ].join('\n');
  }
  return [
    'You are the adjudicator. You are given several JSON answers about a project\'s type, language, framework and purpose.',
    'Pick the single best-supported answer. Prefer agreement across answers. Return confidence between 0 and 1.',
    'Empty entries are failed workers and carry no information.',
    '',
    'Respond ONLY with JSON:',
    ANSWER_SHAPE,
    '',
    'Crowd answers (JSON array):',
    crowdJson,
  ].join('\n');
}

export function buildAdjudicationMessages(votes: readonly CrowdVote[], prior?: AdjudicatedAnswer | null): ChatMessage[] {
  return [systemMessage(ADJUDICATOR_SYSTEM), userMessage(buildAdjudicationPrompt(votes, prior))];
}

export function parseAdjudicatedAnswer(raw: string): Result<AdjudicatedAnswer, ParseError> {
  const decoded = parseObjectSpan(raw, 'adjudicated answer');
  if (!decoded.ok) return decoded;
  if (!isRecord(decoded.value)) {
    return Err(new ParseError('adjudicated answer', 'payload is not an object'));
  }
  const record = decoded.value;
  const answer: AdjudicatedAnswer = {
    type: readString(record, 'type'),
    language: readString(record, 'language'),
    framework: readString(record, 'framework'),
    purpose: readString(record, 'purpose'),
    confidence: clampConfidence(readNumber(record, 'confidence') ?? 0),
  };
  if (!answer.type && !answer.language && !answer.framework && !answer.purpose) {
    return Err(new ParseError('adjudicated answer', 'answer has no fields', raw.slice(0, 160)));
  }
  return Ok(answer);
}

// ============================================================================
// STRATEGY
// ============================================================================

export interface LlmAdjudicatorSettings {
  modelId?: string;
  maxTokens?: number;
  contextSize?: number;
  timeoutMs?: number;
  /** Defaults to 0 for a deterministic verdict */
  temperature?: number;
  /** Extra attempts after a transport or parse failure */
  retries?: number;
}

export class LlmAdjudicator implements ConsensusStrategy {
  readonly name = 'adjudicator';

  constructor(
    private readonly client: CompletionClient,
    private readonly settings: LlmAdjudicatorSettings = {},
  ) {}

  async reduce(
    votes: readonly CrowdVote[],
    prior?: AdjudicatedAnswer | null,
    signal?: AbortSignal,
  ): Promise<Result<AdjudicatedAnswer, EngineError>> {
    const messages = buildAdjudicationMessages(votes, prior);
    const outcome = await safeAsync(() =>
      retry(
        async () => {
          const raw = await this.client.complete(messages, {
            modelId: this.settings.modelId,
            maxTokens: this.settings.maxTokens,
            contextSize: this.settings.contextSize,
            timeoutMs: this.settings.timeoutMs,
            temperature: this.settings.temperature ?? 0,
            signal,
          });
          const parsed = parseAdjudicatedAnswer(raw);
          if (!parsed.ok) throw parsed.error;
          return parsed.value;
        },
        {
          retries: this.settings.retries ?? 0,
          signal,
          onRetry: (error, attempt) =>
            logWarning('Adjudicator attempt failed, retrying', { attempt, error: getErrorMessage(error) }),
        },
      ),
    );
    if (outcome.ok) return Ok(outcome.value);
    // cancellation propagates; it is not an adjudication failure
    if (outcome.error instanceof AbortError) throw outcome.error;
    throwIfAborted(signal);
    const error = outcome.error;
    return Err(isEngineError(error) ? error : Errors.transport('unreachable', getErrorMessage(error)));
  }
}
