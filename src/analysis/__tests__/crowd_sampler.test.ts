/**
 * @fileoverview Tests for crowd fan-out and vote sampling
 */

import { describe, it, expect } from 'vitest';
import { QuorumFailure } from '../../core/errors.js';
import { AbortError, sleep } from '../../utils/async.js';
import { CrowdSampler, majorityFloor, parseCrowdVote, runCrowd } from '../crowd_sampler.js';
import { FakeCompletionClient } from '../../__tests__/helpers/index.js';

const VOTE = '{"type":"CLI","language":"Go","framework":"none","purpose":"terminal chat"}';

describe('runCrowd', () => {
  it('keeps at most min(concurrency, n) tasks in flight', async () => {
    let running = 0;
    let peak = 0;
    const result = await runCrowd(
      async ({ index }) => {
        running++;
        peak = Math.max(peak, running);
        await sleep(5);
        running--;
        return index * 10;
      },
      { n: 8, concurrency: 3, empty: () => -1 },
    );
    expect(peak).toBe(3);
    expect(result.values).toEqual([0, 10, 20, 30, 40, 50, 60, 70]);
    expect(result.failures).toBe(0);
  });

  it('leaves failed slots at their empty value', async () => {
    const result = await runCrowd(
      async ({ index }) => {
        if (index === 1) throw new Error('worker down');
        return `v${index}`;
      },
      { n: 3, concurrency: 3, empty: () => '' },
    );
    expect(result.values).toEqual(['v0', '', 'v2']);
    expect(result.errors[1]?.message).toBe('worker down');
    expect(result.failures).toBe(1);
  });

  it('fails the batch once failures exceed the floor', async () => {
    const task = async ({ index }: { index: number }): Promise<number> => {
      if (index < 3) throw new Error('down');
      return index;
    };
    await expect(runCrowd(task, { n: 5, concurrency: 5, empty: () => 0, label: 'analysis' })).rejects.toBeInstanceOf(QuorumFailure);
    await expect(runCrowd(task, { n: 5, concurrency: 5, empty: () => 0, quorumFloor: 3 })).resolves.toMatchObject({ failures: 3 });
  });

  it('rejects with AbortError when cancelled', async () => {
    const controller = new AbortController();
    const pending = runCrowd(
      async ({ signal }) => {
        await sleep(1000, signal);
        return 1;
      },
      { n: 4, concurrency: 2, empty: () => 0, signal: controller.signal },
    );
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(AbortError);
  });

  it('rejects a crowd size below one', async () => {
    await expect(runCrowd(async () => 1, { n: 0, concurrency: 1, empty: () => 0 })).rejects.toThrow(RangeError);
  });

  it('uses floor(n/2) as the default floor', () => {
    expect(majorityFloor(10)).toBe(5);
    expect(majorityFloor(5)).toBe(2);
  });
});

describe('parseCrowdVote', () => {
  it('reads the object span and accepts projectType as an alias', () => {
    const vote = parseCrowdVote('Answer: {"projectType":"library","language":"TypeScript"}');
    expect(vote).toEqual({ ok: true, value: { type: 'library', language: 'TypeScript', framework: '', purpose: '' } });
  });

  it('fails on text without an object', () => {
    expect(parseCrowdVote('no idea').ok).toBe(false);
  });
});

describe('CrowdSampler', () => {
  it('collects one vote per worker and counts failures', async () => {
    const client = new FakeCompletionClient((_messages, _options, call) => (call === 0 ? 'garbage' : VOTE));
    const sampler = new CrowdSampler(client, { modelId: 'small', maxTokens: 300 });
    const result = await sampler.sample([], { n: 4, concurrency: 2 });

    expect(client.callCount).toBe(4);
    expect(result.failures).toBe(1);
    expect(result.votes.filter((vote) => vote.type === 'CLI')).toHaveLength(3);
    expect(client.calls[0].options).toMatchObject({ modelId: 'small', maxTokens: 300 });
  });

  it('bounds concurrent calls to the backend', async () => {
    const client = new FakeCompletionClient(() => VOTE, 5);
    await new CrowdSampler(client).sample([], { n: 10, concurrency: 4 });
    expect(client.maxInFlight).toBe(4);
  });
});
