/**
 * @fileoverview File ranking helpers for the quick tier
 *
 * Pure functions: worker output decoding, vote merging, the condensed
 * adjudicator input and the structure hints computed from the path list.
 *
 * INVARIANT: merged rankings are ordered by votes desc, importance desc, path asc
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { ParseError } from '../../core/errors.js';
import { Err, Ok, type Result } from '../../core/result.js';
import {
  isRecord,
  parseArraySpan,
  parseBalancedObject,
  readNumber,
  readString,
} from '../../utils/json_extract.js';
import {
  FILE_CATEGORIES,
  type CountEntry,
  type FileCategory,
  type RankedFile,
  type StructureSummary,
} from '../types.js';

export const MAX_REASON_LENGTH = 120;
export const MAX_ADJUDICATOR_LINES = 150;
const MAX_LINE_LENGTH = 200;
const STRUCTURE_TOP_N = 10;

/** Path fragments never worth ranking. */
const RANKING_EXCLUDES = ['node_modules/', 'vendor/', '.git/', 'dist/', 'build/', 'target/'];

// ============================================================================
// NORMALIZATION
// ============================================================================

export function truncate(value: string, max: number): string {
  const trimmed = value.trim();
  if (trimmed.length <= max) return trimmed;
  if (max <= 3) return trimmed.slice(0, max);
  return `${trimmed.slice(0, max - 3)}...`;
}

export function normalizeCategory(value: string): FileCategory {
  const lowered = value.trim().toLowerCase();
  return FILE_CATEGORIES.find((category) => category === lowered) ?? 'other';
}

export function clampImportance(value: number): number {
  if (!Number.isFinite(value)) return 1;
  return Math.min(10, Math.max(1, value));
}

export function prefilterForRanking(files: readonly string[]): string[] {
  return files.filter((file) => {
    const lowered = file.toLowerCase();
    return !RANKING_EXCLUDES.some((fragment) => lowered.startsWith(fragment) || lowered.includes(`/${fragment}`));
  });
}

/**
 * Path lists handed to each worker. Lists longer than `maxPathsPerCall` are
 * partitioned into contiguous chunks (each capped); shorter lists go whole to
 * every worker.
 */
export function partitionPaths(files: readonly string[], workers: number, maxPathsPerCall: number): string[][] {
  if (files.length <= maxPathsPerCall) {
    return Array.from({ length: workers }, () => [...files]);
  }
  const chunkSize = Math.ceil(files.length / workers);
  return Array.from({ length: workers }, (_, index) =>
    files.slice(index * chunkSize, Math.min((index + 1) * chunkSize, files.length)).slice(0, maxPathsPerCall),
  );
}

// ============================================================================
// WORKER OUTPUT
// ============================================================================

/** A ranking entry before merging: one worker's opinion of one path. */
export interface WorkerRanking {
  path: string;
  importance: number;
  reason: string;
  category: FileCategory;
}

export interface WorkerOutput {
  rankings: WorkerRanking[];
  summary: string;
}

function decodeRankingEntries(entries: readonly unknown[], limit: number): WorkerRanking[] {
  const seen = new Set<string>();
  const rankings: WorkerRanking[] = [];
  for (const entry of entries) {
    if (!isRecord(entry)) continue;
    const filePath = readString(entry, 'path').trim();
    if (filePath === '' || seen.has(filePath)) continue;
    seen.add(filePath);
    rankings.push({
      path: filePath,
      importance: clampImportance(readNumber(entry, 'importance') ?? 1),
      reason: truncate(readString(entry, 'reason'), MAX_REASON_LENGTH),
      category: normalizeCategory(readString(entry, 'category')),
    });
    if (rankings.length >= limit) break;
  }
  return rankings;
}

/**
 * Decode one worker reply: a JSON array of rankings, or the object form
 * `{rankings, summary}` used by natural-language workers.
 */
export function parseWorkerOutput(raw: string, limit: number): Result<WorkerOutput, ParseError> {
  const object = parseBalancedObject(raw, 'worker ranking');
  if (object.ok && isRecord(object.value) && Array.isArray(object.value.rankings)) {
    const rankings = decodeRankingEntries(object.value.rankings, limit);
    const summary = readString(object.value, 'summary').trim();
    if (rankings.length === 0 && summary === '') {
      return Err(new ParseError('worker ranking', 'object carries neither rankings nor summary'));
    }
    return Ok({ rankings, summary });
  }
  const array = parseArraySpan(raw, 'worker ranking');
  if (!array.ok) return array;
  if (!Array.isArray(array.value)) {
    return Err(new ParseError('worker ranking', 'payload is not an array'));
  }
  const rankings = decodeRankingEntries(array.value, limit);
  if (rankings.length === 0) {
    return Err(new ParseError('worker ranking', 'no usable ranking entries'));
  }
  return Ok({ rankings, summary: '' });
}

export function keepTracked<T extends { path: string }>(entries: readonly T[], tracked: ReadonlySet<string>): T[] {
  return entries.filter((entry) => tracked.has(entry.path));
}

export function limitWords(text: string, limit: number): string {
  const words = text.trim().split(/\s+/).filter(Boolean);
  return words.length <= limit ? words.join(' ') : `${words.slice(0, limit).join(' ')} ...`;
}

// ============================================================================
// MERGE
// ============================================================================

export function compareRanked(a: RankedFile, b: RankedFile): number {
  if (a.votes !== b.votes) return b.votes - a.votes;
  if (a.importance !== b.importance) return b.importance - a.importance;
  return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
}

/**
 * Merge per-worker lists: one vote per worker per path, importance averaged
 * over the voters, first non-empty reason kept, `other` upgraded by a later
 * concrete category.
 */
export function mergeRankings(perWorker: ReadonlyArray<readonly WorkerRanking[]>, topPerWorker: number): RankedFile[] {
  const merged = new Map<string, RankedFile>();
  for (const list of perWorker) {
    const ordered = [...list].sort((a, b) => b.importance - a.importance).slice(0, topPerWorker);
    for (const entry of ordered) {
      const existing = merged.get(entry.path);
      if (!existing) {
        merged.set(entry.path, { ...entry, votes: 1 });
        continue;
      }
      const votes = existing.votes + 1;
      existing.importance = (existing.importance * existing.votes + entry.importance) / votes;
      existing.votes = votes;
      if (existing.reason === '' && entry.reason !== '') existing.reason = entry.reason;
      if (existing.category === 'other' && entry.category !== 'other') existing.category = entry.category;
    }
  }
  return [...merged.values()].sort(compareRanked);
}

export function formatImportance(value: number): string {
  return value.toFixed(2);
}

/** Condensed adjudicator input, one line per merged path. */
export function compactCrowdLines(merged: readonly RankedFile[]): string[] {
  return merged.slice(0, MAX_ADJUDICATOR_LINES).map((entry) =>
    truncate(
      `${entry.path} • votes:${entry.votes} • imp:${formatImportance(entry.importance)} • reason:${truncate(entry.reason, 160)}`,
      MAX_LINE_LENGTH,
    ),
  );
}

/** Top-K of the merged list; the local tally expresses no confidence. */
export function localTally(merged: readonly RankedFile[], finalTopK: number): { rankings: RankedFile[]; confidence: number } {
  return { rankings: merged.slice(0, finalTopK).map((entry) => ({ ...entry })), confidence: 0 };
}

// ============================================================================
// ADJUDICATED OUTPUT
// ============================================================================

export interface AdjudicatedRanking {
  rankings: WorkerRanking[];
  confidence: number;
}

/**
 * Decode `{rankings, confidence}`; a bare array is accepted with confidence 0.
 */
export function parseAdjudicatedRanking(raw: string): Result<AdjudicatedRanking, ParseError> {
  const object = parseBalancedObject(raw, 'adjudicated ranking');
  if (object.ok && isRecord(object.value) && Array.isArray(object.value.rankings)) {
    const confidence = readNumber(object.value, 'confidence') ?? 0;
    return Ok({
      rankings: decodeRankingEntries(object.value.rankings, Number.POSITIVE_INFINITY),
      confidence: Math.min(1, Math.max(0, confidence)),
    });
  }
  const array = parseArraySpan(raw, 'adjudicated ranking');
  if (array.ok && Array.isArray(array.value)) {
    return Ok({ rankings: decodeRankingEntries(array.value, Number.POSITIVE_INFINITY), confidence: 0 });
  }
  return Err(new ParseError('adjudicated ranking', 'unable to extract JSON'));
}

export interface SummaryConsensus extends AdjudicatedRanking {
  /** The adjudicator's project summary, as returned */
  markdown: string;
}

const IMPORTANT_FILE_LINE = /^[-*]\s+`?([^`\s]+)`?\s+\(([a-z]+)\):\s*(.*)$/i;
const CONFIDENCE_LINE = /\*\*Confidence\*\*:\s*([0-9]*\.?[0-9]+)/;

/**
 * Decode the markdown consensus written from worker summaries. Important
 * files are ranked in listed order; confidence is 0 unless stated.
 */
export function parseSummaryConsensus(raw: string): Result<SummaryConsensus, ParseError> {
  const markdown = raw.replace(/```(?:markdown|md)?/g, '').trim();
  if (!markdown.includes('# Project Summary')) {
    return Err(new ParseError('summary consensus', 'missing "# Project Summary" heading', raw.slice(0, 160)));
  }
  const rankings: WorkerRanking[] = [];
  const seen = new Set<string>();
  for (const line of markdown.split('\n')) {
    const match = IMPORTANT_FILE_LINE.exec(line.trim());
    if (!match || seen.has(match[1])) continue;
    seen.add(match[1]);
    rankings.push({
      path: match[1],
      importance: clampImportance(10 - rankings.length),
      reason: truncate(match[3].trim(), MAX_REASON_LENGTH),
      category: normalizeCategory(match[2]),
    });
  }
  const stated = CONFIDENCE_LINE.exec(markdown);
  const confidence = stated ? Math.min(1, Math.max(0, Number.parseFloat(stated[1]))) : 0;
  return Ok({ markdown, rankings, confidence });
}

/**
 * Attach crowd vote counts to adjudicated entries and apply the tracked
 * filter and the top-K cap.
 */
export function finalizeRankings(
  adjudicated: readonly WorkerRanking[],
  merged: readonly RankedFile[],
  tracked: ReadonlySet<string>,
  finalTopK: number,
): RankedFile[] {
  const votesByPath = new Map(merged.map((entry) => [entry.path, entry.votes]));
  return keepTracked(adjudicated, tracked)
    .slice(0, finalTopK)
    .map((entry) => ({ ...entry, votes: votesByPath.get(entry.path) ?? 0 }));
}

// ============================================================================
// STRUCTURE HINTS
// ============================================================================

function topCounts(counts: Map<string, number>, limit: number): CountEntry[] {
  return [...counts.entries()]
    .map(([name, count]) => ({ name, count }))
    .sort((a, b) => b.count - a.count || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .slice(0, limit);
}

export function summarizeStructure(files: readonly string[]): StructureSummary {
  const directories = new Map<string, number>();
  const types = new Map<string, number>();
  for (const file of files) {
    const segments = file.split('/');
    const directory = segments.length > 1 ? segments[0] : '.';
    directories.set(directory, (directories.get(directory) ?? 0) + 1);
    const extension = path.posix.extname(file).toLowerCase() || '(none)';
    types.set(extension, (types.get(extension) ?? 0) + 1);
  }
  return {
    topDirectories: topCounts(directories, STRUCTURE_TOP_N),
    topFileTypes: topCounts(types, STRUCTURE_TOP_N),
  };
}

export function renderStructureHints(structure: StructureSummary): string {
  const lines = ['Top directories:'];
  for (const entry of structure.topDirectories) lines.push(`- ${entry.name}: ${entry.count}`);
  lines.push('Top file types:');
  for (const entry of structure.topFileTypes) lines.push(`- ${entry.name}: ${entry.count}`);
  return lines.join('\n');
}
