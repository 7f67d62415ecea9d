/**
 * @fileoverview Tests for consensus strategies and the fallback
 */

import { describe, it, expect } from 'vitest';
import { AdjudicationFailure } from '../../core/errors.js';
import { Err } from '../../core/result.js';
import { LlmAdjudicator, buildAdjudicationPrompt, parseAdjudicatedAnswer } from '../adjudicator.js';
import { fallbackAnswer, resolveConsensus, type ConsensusStrategy } from '../consensus.js';
import { LocalTally, tallyField } from '../local_tally.js';
import { createConsensusStrategy } from '../strategy_factory.js';
import { emptyVote, type CrowdVote } from '../types.js';
import { FakeCompletionClient, unreachable, userText } from '../../__tests__/helpers/index.js';

function vote(type: string, language: string, framework = '', purpose = ''): CrowdVote {
  return { type, language, framework, purpose };
}

describe('fallbackAnswer', () => {
  it('takes the first non-empty vote at confidence 0', () => {
    const answer = fallbackAnswer([emptyVote(), vote('CLI', 'Go'), vote('web app', 'Python')]);
    expect(answer).toEqual({ type: 'CLI', language: 'Go', framework: '', purpose: '', confidence: 0 });
  });

  it('fails when every vote is empty', () => {
    expect(() => fallbackAnswer([emptyVote(), emptyVote()])).toThrow(AdjudicationFailure);
  });
});

describe('parseAdjudicatedAnswer', () => {
  it('clamps confidence into [0, 1]', () => {
    const parsed = parseAdjudicatedAnswer('{"type":"CLI","language":"Go","confidence":1.7}');
    expect(parsed.ok && parsed.value.confidence).toBe(1);
  });

  it('rejects an answer with no fields', () => {
    expect(parseAdjudicatedAnswer('{"confidence":0.9}').ok).toBe(false);
  });
});

describe('buildAdjudicationPrompt', () => {
  it('frames a prior answer as the baseline to refine', () => {
    const prompt = buildAdjudicationPrompt([vote('CLI', 'Go')], { ...vote('CLI', 'Go'), confidence: 0.6 });
    expect(prompt).toContain('PREVIOUS CONSENSUS (working baseline):');
    expect(prompt).toContain('"confidence":0.6');
  });

  it('omits the baseline on the first scan', () => {
    expect(buildAdjudicationPrompt([vote('CLI', 'Go')])).not.toContain('PREVIOUS CONSENSUS');
  });
});

describe('LlmAdjudicator', () => {
  it('returns the model verdict', async () => {
    const client = new FakeCompletionClient(() => '{"type":"CLI","language":"Go","framework":"none","purpose":"chat","confidence":0.8}');
    const result = await new LlmAdjudicator(client, { modelId: 'mid' }).reduce([vote('CLI', 'Go')]);
    expect(result).toEqual({ ok: true, value: { type: 'CLI', language: 'Go', framework: 'none', purpose: 'chat', confidence: 0.8 } });
    expect(client.calls[0].options).toMatchObject({ modelId: 'mid', temperature: 0 });
    expect(userText(client.calls[0].messages)).toContain('"type":"CLI"');
  });

  it('retries once and then reports the failure as a value', async () => {
    const client = new FakeCompletionClient(() => unreachable());
    const result = await new LlmAdjudicator(client, { retries: 1 }).reduce([vote('CLI', 'Go')]);
    expect(result.ok).toBe(false);
    expect(client.callCount).toBe(2);
  });
});

describe('LocalTally', () => {
  it('takes the majority per field, case-insensitively', async () => {
    const votes = [vote('CLI', 'Go'), vote('cli', 'go'), vote('web app', 'Python'), emptyVote()];
    const result = await new LocalTally().reduce(votes);
    expect(result).toEqual({ ok: true, value: { type: 'CLI', language: 'Go', framework: '', purpose: '', confidence: 0.5 } });
  });

  it('lets the prior break a tie', () => {
    const votes = [vote('CLI', ''), vote('library', '')];
    expect(tallyField(votes, 'type')?.value).toBe('CLI');
    expect(tallyField(votes, 'type', 'Library')?.value).toBe('library');
  });

  it('fails without any non-empty vote', async () => {
    const result = await new LocalTally().reduce([emptyVote()]);
    expect(result.ok).toBe(false);
  });
});

describe('resolveConsensus', () => {
  it('falls back to the first non-empty vote when the strategy fails', async () => {
    const failing: ConsensusStrategy = {
      name: 'broken',
      reduce: async () => Err(new AdjudicationFailure('nope', 2)),
    };
    const outcome = await resolveConsensus(failing, [emptyVote(), vote('CLI', 'Go')]);
    expect(outcome).toEqual({
      answer: { type: 'CLI', language: 'Go', framework: '', purpose: '', confidence: 0 },
      source: 'fallback',
      strategy: 'broken',
    });
  });

  it('selects strategies by name', () => {
    const client = new FakeCompletionClient(() => '{}');
    expect(createConsensusStrategy('local_tally', client).name).toBe('local_tally');
    expect(createConsensusStrategy('adjudicator', client).name).toBe('adjudicator');
  });
});
