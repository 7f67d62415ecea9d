/**
 * @fileoverview Consensus strategies and the shared fallback
 *
 * A strategy reduces crowd votes (plus an optional prior answer) into one
 * adjudicated answer, or reports that it could not. `resolveConsensus`
 * applies the fallback in that case, so every caller receives the same
 * answer type whichever path produced it.
 *
 * @packageDocumentation
 */

import type { Result } from '../core/result.js';
import { Errors, type EngineError } from '../core/errors.js';
import { logWarning } from '../telemetry/logger.js';
import { throwIfAborted } from '../utils/async.js';
import { isEmptyVote, type AdjudicatedAnswer, type CrowdVote } from './types.js';

export interface ConsensusStrategy {
  readonly name: string;
  reduce(
    votes: readonly CrowdVote[],
    prior?: AdjudicatedAnswer | null,
    signal?: AbortSignal,
  ): Promise<Result<AdjudicatedAnswer, EngineError>>;
}

export type ConsensusSource = 'strategy' | 'fallback';

export interface ConsensusOutcome {
  answer: AdjudicatedAnswer;
  source: ConsensusSource;
  strategy: string;
}

/**
 * First vote (by index) with any non-empty field, at confidence 0.
 *
 * @throws AdjudicationFailure when every vote is empty
 */
export function fallbackAnswer(votes: readonly CrowdVote[]): AdjudicatedAnswer {
  const first = votes.find((vote) => !isEmptyVote(vote));
  if (!first) {
    throw Errors.adjudication('failed to adjudicate consensus: every crowd answer was empty', votes.length);
  }
  return {
    type: first.type,
    language: first.language,
    framework: first.framework,
    purpose: first.purpose,
    confidence: 0,
  };
}

export async function resolveConsensus(
  strategy: ConsensusStrategy,
  votes: readonly CrowdVote[],
  prior?: AdjudicatedAnswer | null,
  signal?: AbortSignal,
): Promise<ConsensusOutcome> {
  const reduced = await strategy.reduce(votes, prior, signal);
  if (reduced.ok) {
    return { answer: reduced.value, source: 'strategy', strategy: strategy.name };
  }
  throwIfAborted(signal);
  logWarning('Consensus strategy failed, using first non-empty vote', {
    strategy: strategy.name,
    error: reduced.error.message,
  });
  return { answer: fallbackAnswer(votes), source: 'fallback', strategy: strategy.name };
}
