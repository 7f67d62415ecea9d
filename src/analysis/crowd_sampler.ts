/**
 * @fileoverview Crowd sampling: bounded fan-out of speculative model calls
 *
 * `runCrowd` is the generic fan-out: n independent tasks behind a semaphore
 * of size min(concurrency, n), each writing to its own result slot. A failed
 * task leaves the slot's empty value and counts one failure; the batch only
 * fails once failures exceed the quorum floor.
 *
 * `CrowdSampler` specializes it to project classification votes.
 *
 * INVARIANT: at most min(concurrency, n) tasks are in flight
 * INVARIANT: slot i always holds task i's value (or its empty value)
 *
 * @packageDocumentation
 */

import type { Result } from '../core/result.js';
import { Ok, Err } from '../core/result.js';
import { Errors, ParseError } from '../core/errors.js';
import { AbortError, Semaphore, throwIfAborted } from '../utils/async.js';
import { toError } from '../utils/errors.js';
import { isRecord, parseObjectSpan, readString } from '../utils/json_extract.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import type { ChatMessage, CompletionClient } from '../providers/completion_client.js';
import type { BackendWarmup } from '../providers/warmup.js';
import { emptyVote, type CrowdVote } from './types.js';

// ============================================================================
// GENERIC FAN-OUT
// ============================================================================

export interface CrowdTaskContext {
  index: number;
  signal?: AbortSignal;
}

export interface CrowdRunOptions<T> {
  n: number;
  concurrency: number;
  /** Max tolerated failures; defaults to floor(n/2) */
  quorumFloor?: number;
  signal?: AbortSignal;
  /** Name used in the QuorumFailure message */
  label?: string;
  empty: (index: number) => T;
  onSettled?: (index: number, error: Error | null) => void;
}

export interface CrowdRunResult<T> {
  values: T[];
  errors: Array<Error | null>;
  failures: number;
  total: number;
}

export function majorityFloor(n: number): number {
  return Math.floor(n / 2);
}

export function effectiveConcurrency(concurrency: number, n: number): number {
  return Math.max(1, Math.min(Math.floor(concurrency), n));
}

/**
 * Run `n` tasks with bounded concurrency and absorb individual failures.
 *
 * @throws QuorumFailure when failures exceed the floor
 * @throws AbortError when the signal fires; in-flight tasks see the same signal
 */
export async function runCrowd<T>(
  task: (context: CrowdTaskContext) => Promise<T>,
  options: CrowdRunOptions<T>,
): Promise<CrowdRunResult<T>> {
  const { n, signal } = options;
  if (!Number.isInteger(n) || n < 1) {
    throw new RangeError(`crowd size must be a positive integer, got ${n}`);
  }
  const floor = options.quorumFloor ?? majorityFloor(n);
  const gate = new Semaphore(effectiveConcurrency(options.concurrency, n));
  const values: T[] = Array.from({ length: n }, (_, index) => options.empty(index));
  const errors: Array<Error | null> = new Array<Error | null>(n).fill(null);

  await Promise.all(
    values.map((_, index) =>
      gate.run(async () => {
        try {
          throwIfAborted(signal);
          values[index] = await task({ index, signal });
          options.onSettled?.(index, null);
        } catch (error) {
          errors[index] = toError(error);
          options.onSettled?.(index, errors[index]);
        }
      }),
    ),
  );

  if (signal?.aborted) {
    throw new AbortError(`${options.label ?? 'crowd'} cancelled`);
  }

  const failures = errors.filter((error) => error !== null).length;
  if (failures > floor) {
    throw Errors.quorum(failures, n, floor, options.label);
  }
  if (failures > 0) {
    logDebug('Crowd finished with tolerated failures', { label: options.label, failures, total: n, floor });
  }
  return { values, errors, failures, total: n };
}

// ============================================================================
// VOTE PARSING
// ============================================================================

/**
 * Decode a vote from raw model text; the payload is the first-`{`-to-last-`}` span.
 */
export function parseCrowdVote(raw: string): Result<CrowdVote, ParseError> {
  const decoded = parseObjectSpan(raw, 'crowd vote');
  if (!decoded.ok) return decoded;
  if (!isRecord(decoded.value)) {
    return Err(new ParseError('crowd vote', 'payload is not an object'));
  }
  const record = decoded.value;
  return Ok({
    type: readString(record, 'type') || readString(record, 'projectType'),
    language: readString(record, 'language'),
    framework: readString(record, 'framework'),
    purpose: readString(record, 'purpose'),
  });
}

// ============================================================================
// CROWD SAMPLER
// ============================================================================

export interface CrowdSamplerSettings {
  modelId?: string;
  maxTokens?: number;
  contextSize?: number;
  timeoutMs?: number;
  temperature?: number;
}

export interface SampleOptions {
  n: number;
  concurrency: number;
  quorumFloor?: number;
  signal?: AbortSignal;
}

export interface SampleResult {
  /** Slot i holds worker i's vote; failed workers leave an empty vote */
  votes: CrowdVote[];
  failures: number;
}

export class CrowdSampler {
  constructor(
    private readonly client: CompletionClient,
    private readonly settings: CrowdSamplerSettings = {},
    private readonly warmup?: BackendWarmup,
  ) {}

  async sample(messages: ChatMessage[], options: SampleOptions): Promise<SampleResult> {
    await this.warmup?.ensure(options.signal);
    const result = await runCrowd<CrowdVote>(
      async ({ index, signal }) => {
        const raw = await this.client.complete(messages, {
          modelId: this.settings.modelId,
          maxTokens: this.settings.maxTokens,
          contextSize: this.settings.contextSize,
          timeoutMs: this.settings.timeoutMs,
          temperature: this.settings.temperature,
          signal,
        });
        const vote = parseCrowdVote(raw);
        if (!vote.ok) {
          logWarning('Crowd worker returned unparseable output', { worker: index, error: vote.error.message });
          throw vote.error;
        }
        return vote.value;
      },
      {
        n: options.n,
        concurrency: options.concurrency,
        quorumFloor: options.quorumFloor,
        signal: options.signal,
        label: 'analysis',
        empty: () => emptyVote(),
      },
    );
    return { votes: result.values, failures: result.failures };
  }
}
