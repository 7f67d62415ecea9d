/**
 * @fileoverview Per-project session registry
 *
 * Holds the mutable per-project state one engine instance needs: the
 * in-process lock that serializes analysis runs of the same project, and the
 * most recent results. The registry is an ordinary object handed to the
 * components that need it; there is no module-level instance.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import type { ScanResult, AnalysisResult } from '../analysis/types.js';
import type { AnalysisTier } from '../config/engine_config.js';

// ============================================================================
// PROJECT SESSION
// ============================================================================

export class ProjectSession {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;
  readonly startedAt = new Date();
  lastScan: ScanResult | null = null;
  readonly lastResults = new Map<AnalysisTier, AnalysisResult>();

  constructor(readonly projectPath: string) {}

  /** Number of callers holding or waiting for the lock. */
  get queued(): number {
    return this.pending;
  }

  /**
   * Run `fn` after every previously queued holder has finished.
   * A rejected holder does not poison the queue.
   */
  async lock<T>(fn: () => Promise<T>): Promise<T> {
    this.pending++;
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    try {
      await previous;
      return await fn();
    } finally {
      this.pending--;
      release();
    }
  }

  recordResult(result: AnalysisResult): void {
    this.lastResults.set(result.tier, result);
  }
}

// ============================================================================
// REGISTRY
// ============================================================================

export function normalizeProjectPath(projectPath: string): string {
  return path.resolve(projectPath);
}

export class SessionRegistry {
  private readonly sessions = new Map<string, ProjectSession>();

  get(projectPath: string): ProjectSession {
    const key = normalizeProjectPath(projectPath);
    let session = this.sessions.get(key);
    if (!session) {
      session = new ProjectSession(key);
      this.sessions.set(key, session);
    }
    return session;
  }

  has(projectPath: string): boolean {
    return this.sessions.has(normalizeProjectPath(projectPath));
  }

  get size(): number {
    return this.sessions.size;
  }

  dispose(): void {
    this.sessions.clear();
  }
}
