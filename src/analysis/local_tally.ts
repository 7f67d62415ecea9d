/**
 * @fileoverview Local majority tally
 *
 * Deterministic, model-free consensus: each field takes the value most
 * non-empty votes agree on (compared case-insensitively, first occurrence
 * wins ties unless the prior answer breaks the tie). Confidence is the share
 * of all n votes that agree with the chosen `type` and `language`.
 */

import type { Result } from '../core/result.js';
import { Ok, Err } from '../core/result.js';
import { Errors, type EngineError } from '../core/errors.js';
import type { ConsensusStrategy } from './consensus.js';
import {
  VOTE_FIELDS,
  clampConfidence,
  isEmptyVote,
  type AdjudicatedAnswer,
  type CrowdVote,
  type VoteField,
} from './types.js';

function normalize(value: string): string {
  return value.trim().toLowerCase();
}

interface Tally {
  value: string;
  count: number;
  firstIndex: number;
}

export function tallyField(votes: readonly CrowdVote[], field: VoteField, prior?: string): Tally | null {
  const counts = new Map<string, Tally>();
  votes.forEach((vote, index) => {
    const value = vote[field].trim();
    if (!value) return;
    const key = normalize(value);
    const entry = counts.get(key);
    if (entry) entry.count++;
    else counts.set(key, { value, count: 1, firstIndex: index });
  });
  let best: Tally | null = null;
  const priorKey = prior ? normalize(prior) : null;
  for (const [key, entry] of counts) {
    if (!best || entry.count > best.count) {
      best = entry;
      continue;
    }
    if (entry.count === best.count) {
      const entryIsPrior = key === priorKey;
      const bestIsPrior = normalize(best.value) === priorKey;
      if (entryIsPrior && !bestIsPrior) best = entry;
      else if (entryIsPrior === bestIsPrior && entry.firstIndex < best.firstIndex) best = entry;
    }
  }
  return best;
}

export class LocalTally implements ConsensusStrategy {
  readonly name = 'local_tally';

  async reduce(
    votes: readonly CrowdVote[],
    prior?: AdjudicatedAnswer | null,
  ): Promise<Result<AdjudicatedAnswer, EngineError>> {
    if (votes.length === 0 || votes.every(isEmptyVote)) {
      return Err(Errors.adjudication('no non-empty votes to tally', votes.length));
    }
    const answer: AdjudicatedAnswer = { type: '', language: '', framework: '', purpose: '', confidence: 0 };
    for (const field of VOTE_FIELDS) {
      answer[field] = tallyField(votes, field, prior?.[field])?.value ?? '';
    }
    const agreeing = votes.filter(
      (vote) =>
        !isEmptyVote(vote) &&
        normalize(vote.type) === normalize(answer.type) &&
        normalize(vote.language) === normalize(answer.language),
    ).length;
    answer.confidence = clampConfidence(agreeing / votes.length);
    return Ok(answer);
  }
}
