/**
 * @fileoverview One-time warm-up pause before the first batch of calls
 *
 * Local servers load a model lazily on the first request; a burst of
 * parallel calls during that window tends to time out. The pause is a
 * latency heuristic only and is 0 in tests.
 */

import { sleep } from '../utils/async.js';
import { logDebug } from '../telemetry/logger.js';

export class BackendWarmup {
  private done = false;
  private pending: Promise<void> | null = null;

  constructor(readonly delayMs: number) {}

  get warmedUp(): boolean {
    return this.done;
  }

  /** Resolves immediately after the first call has waited out the delay. */
  async ensure(signal?: AbortSignal): Promise<void> {
    if (this.done || this.delayMs <= 0) {
      this.done = true;
      return;
    }
    if (!this.pending) {
      logDebug('Waiting for inference backend warm-up', { delayMs: this.delayMs });
      this.pending = sleep(this.delayMs, signal).then(() => {
        this.done = true;
      });
      // A cancelled warm-up must not block later callers forever.
      this.pending.catch(() => {
        this.pending = null;
      });
    }
    await this.pending;
  }
}
