/**
 * @fileoverview Progress indicators for CLI operations
 *
 * Spinner and progress bar utilities for scans and tier runs. Both draw on
 * stderr so `--json` output on stdout stays parseable.
 */

import cliProgress from 'cli-progress';
import { formatDuration } from '../analysis/format.js';
import type { EngineEventBus } from '../events.js';

// Spinner frames for text-based spinner
const SPINNER_FRAMES = ['|', '/', '-', '\\'];
const SPINNER_INTERVAL_MS = 100;

export interface SpinnerHandle {
  update(message: string): void;
  succeed(message?: string): void;
  fail(message?: string): void;
  stop(): void;
}

export function createSpinner(initialMessage: string): SpinnerHandle {
  let frameIndex = 0;
  let message = initialMessage;
  let running = true;
  let intervalId: NodeJS.Timeout | null = null;

  const render = (): void => {
    if (!running) return;
    const frame = SPINNER_FRAMES[frameIndex % SPINNER_FRAMES.length];
    process.stderr.write(`\r${frame} ${message}`);
    frameIndex++;
  };

  // Clear current line
  const clearLine = (): void => {
    process.stderr.write('\r' + ' '.repeat(message.length + 4) + '\r');
  };

  intervalId = setInterval(render, SPINNER_INTERVAL_MS);
  render();

  return {
    update(newMessage: string): void {
      clearLine();
      message = newMessage;
      render();
    },

    succeed(finalMessage?: string): void {
      running = false;
      if (intervalId) clearInterval(intervalId);
      clearLine();
      console.error(`[OK] ${finalMessage || message}`);
    },

    fail(finalMessage?: string): void {
      running = false;
      if (intervalId) clearInterval(intervalId);
      clearLine();
      console.error(`[FAIL] ${finalMessage || message}`);
    },

    stop(): void {
      running = false;
      if (intervalId) clearInterval(intervalId);
      clearLine();
    },
  };
}

export interface ProgressBarHandle {
  update(current: number, payload?: Record<string, unknown>): void;
  setTotal(total: number): void;
  increment(delta?: number, payload?: Record<string, unknown>): void;
  stop(): void;
}

export interface ProgressBarOptions {
  total: number;
  format?: string;
  etaBuffer?: number;
}

export function createProgressBar(options: ProgressBarOptions): ProgressBarHandle {
  const { total, etaBuffer = 10 } = options;

  const format = options.format || '{bar} {percentage}% | {value}/{total} | {task} | ETA: {eta_formatted}';

  const bar = new cliProgress.SingleBar(
    {
      format,
      barCompleteChar: '=',
      barIncompleteChar: '-',
      hideCursor: true,
      clearOnComplete: false,
      stopOnComplete: true,
      etaBuffer,
      forceRedraw: true,
      stream: process.stderr,
    },
    cliProgress.Presets.shades_classic,
  );

  bar.start(total, 0, { task: 'Initializing...' });

  return {
    update(current: number, payload?: Record<string, unknown>): void {
      bar.update(current, payload);
    },

    setTotal(newTotal: number): void {
      bar.setTotal(newTotal);
    },

    increment(delta = 1, payload?: Record<string, unknown>): void {
      bar.increment(delta, payload);
    },

    stop(): void {
      bar.stop();
    },
  };
}

/**
 * Format a timestamp for display
 */
export function formatTimestamp(date: Date | string | null): string {
  if (!date) return 'Never';
  const d = typeof date === 'string' ? new Date(date) : date;
  return d.toLocaleString();
}

/**
 * Print a key-value list
 */
export function printKeyValue(items: Array<{ key: string; value: string | number | boolean | null }>): void {
  const maxKeyLength = Math.max(...items.map((item) => item.key.length));

  for (const item of items) {
    const value = item.value === null ? 'N/A' : String(item.value);
    console.log(`  ${item.key.padEnd(maxKeyLength)}: ${value}`);
  }
}

// ============================================================================
// ENGINE EVENTS
// ============================================================================

/**
 * Render tier progress events as a progress bar, one bar per stage.
 * Returns the unsubscribe function.
 */
export function attachTierProgress(bus: EngineEventBus): () => void {
  let bar: ProgressBarHandle | null = null;
  let current = '';

  const close = (): void => {
    bar?.stop();
    bar = null;
    current = '';
  };

  const offProgress = bus.on('tier_progress', (event) => {
    const { tier, stage, completed, total } = event.data;
    const key = `${tier}:${stage}`;
    if (key !== current) {
      close();
      current = key;
      bar = createProgressBar({ total, format: '{bar} {percentage}% | {value}/{total} | {task}' });
    }
    bar?.update(completed, { task: `${tier} ${stage}` });
  });
  const offStarted = bus.on('tier_started', (event) => {
    close();
    process.stderr.write(`Running ${event.data.tier} analysis...\n`);
  });
  const offCompleted = bus.on('tier_completed', (event) => {
    close();
    const { tier, cached, durationMs } = event.data;
    process.stderr.write(`[OK] ${tier} ${cached ? '(cached)' : `in ${formatDuration(durationMs)}`}\n`);
  });
  const offFailed = bus.on('tier_failed', (event) => {
    close();
    process.stderr.write(`[FAIL] ${event.data.tier}: ${event.data.error}\n`);
  });

  return () => {
    close();
    offProgress();
    offStarted();
    offCompleted();
    offFailed();
  };
}
