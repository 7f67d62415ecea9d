/**
 * @fileoverview Content fingerprint of the tracked file set
 *
 * The project fingerprint is a SHA-256 over the sorted
 * (relative path, size, mtime) tuples of every tracked file with an
 * indexable extension. Each file also gets its own short item hash so the
 * tier cache can tell which items changed.
 *
 * INVARIANT: the fingerprint is a pure function of the tuple list
 * INVARIANT: changing any file's size or mtime changes the fingerprint
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { computeChecksum16, sha256Hex } from '../utils/checksums.js';
import { Semaphore } from '../utils/async.js';
import { logDebug } from '../telemetry/logger.js';
import type { FileLister, FileListSource } from '../files/file_lister.js';

// ============================================================================
// TYPES
// ============================================================================

export interface FileFingerprint {
  path: string;
  size: number;
  mtimeMs: number;
}

export interface ContentSnapshot {
  /** Fingerprint of the whole set */
  hash: string;
  /** Per-file item hash keyed by relative path */
  items: Record<string, string>;
  /** Relative paths, sorted */
  files: string[];
  fileCount: number;
  source: FileListSource | 'explicit';
}

const STAT_CONCURRENCY = 32;

// ============================================================================
// HASHING
// ============================================================================

export function itemHash(entry: FileFingerprint): string {
  return computeChecksum16(`${entry.path}\u0000${entry.size}\u0000${entry.mtimeMs}`);
}

/**
 * Order-independent input, order-stable output: entries are sorted by path first.
 */
export function fingerprintHash(entries: readonly FileFingerprint[]): string {
  const lines = [...entries]
    .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0))
    .map((entry) => `${entry.path}\t${entry.size}\t${entry.mtimeMs}\n`);
  return sha256Hex(lines.join(''));
}

/**
 * Stat each relative path under `projectPath`; files that vanished between
 * listing and stat are left out.
 */
export async function collectFingerprints(projectPath: string, files: readonly string[]): Promise<FileFingerprint[]> {
  const gate = new Semaphore(STAT_CONCURRENCY);
  const results = await Promise.all(
    files.map((rel) =>
      gate.run(async (): Promise<FileFingerprint | null> => {
        try {
          const stat = await fs.stat(path.join(projectPath, rel));
          if (!stat.isFile()) return null;
          return { path: rel, size: stat.size, mtimeMs: Math.trunc(stat.mtimeMs) };
        } catch {
          logDebug('Skipping file that disappeared before hashing', { path: rel });
          return null;
        }
      }),
    ),
  );
  return results.filter((entry): entry is FileFingerprint => entry !== null);
}

export function buildSnapshot(entries: readonly FileFingerprint[], source: ContentSnapshot['source']): ContentSnapshot {
  const sorted = [...entries].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  const items: Record<string, string> = {};
  for (const entry of sorted) {
    items[entry.path] = itemHash(entry);
  }
  return {
    hash: fingerprintHash(sorted),
    items,
    files: sorted.map((entry) => entry.path),
    fileCount: sorted.length,
    source,
  };
}

// ============================================================================
// HASHER
// ============================================================================

export class ContentHasher {
  constructor(private readonly lister: FileLister) {}

  async snapshot(projectPath: string): Promise<ContentSnapshot> {
    const listing = await this.lister.list(projectPath);
    const entries = await collectFingerprints(projectPath, listing.files);
    return buildSnapshot(entries, listing.source);
  }

  async snapshotOf(projectPath: string, files: readonly string[]): Promise<ContentSnapshot> {
    return buildSnapshot(await collectFingerprints(projectPath, files), 'explicit');
  }
}
