/**
 * @fileoverview Analysis value objects
 *
 * Scan and tier results are built once and frozen before they are handed
 * to callers.
 *
 * @packageDocumentation
 */

import type { AnalysisTier } from '../config/engine_config.js';

// ============================================================================
// CROWD / CONSENSUS
// ============================================================================

/** One speculative classification. Any field may be empty. */
export interface CrowdVote {
  type: string;
  language: string;
  framework: string;
  purpose: string;
}

export interface AdjudicatedAnswer extends CrowdVote {
  /** 0..1; exactly 0 when produced by the fallback */
  confidence: number;
}

export const VOTE_FIELDS = ['type', 'language', 'framework', 'purpose'] as const;
export type VoteField = (typeof VOTE_FIELDS)[number];

export function emptyVote(): CrowdVote {
  return { type: '', language: '', framework: '', purpose: '' };
}

/** A vote with no non-empty field carries no information. */
export function isEmptyVote(vote: CrowdVote): boolean {
  return VOTE_FIELDS.every((field) => vote[field].trim() === '');
}

export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

// ============================================================================
// STARTUP SCAN
// ============================================================================

export interface ScanResult {
  projectPath: string;
  projectType: string;
  language: string;
  framework: string;
  purpose: string;
  fileCount: number;
  confidence: number;
  /** 1 on the first scan, previous + 1 afterwards */
  iteration: number;
  durationMs: number;
  generatedAt: string;
}

// ============================================================================
// TIER RESULTS
// ============================================================================

/** Markdown knowledge documents keyed by file name. */
export type KnowledgeFiles = Record<string, string>;

export const FILE_CATEGORIES = ['entry', 'config', 'core', 'util', 'test', 'doc', 'other'] as const;
export type FileCategory = (typeof FILE_CATEGORIES)[number];

export interface RankedFile {
  path: string;
  /** 1..10, averaged across the workers that named the file */
  importance: number;
  reason: string;
  category: FileCategory;
  votes: number;
}

export interface CountEntry {
  name: string;
  count: number;
}

export interface StructureSummary {
  topDirectories: CountEntry[];
  topFileTypes: CountEntry[];
}

export interface FileSummary {
  path: string;
  purpose: string;
  keyElements: string[];
  dependencies: string[];
  notes: string;
}

interface AnalysisBase {
  tier: AnalysisTier;
  projectPath: string;
  generatedAt: string;
  durationMs: number;
  fileCount: number;
  knowledgeFiles: KnowledgeFiles;
  confidence: number;
  /** True when the tier degraded instead of failing */
  partial: boolean;
}

export interface QuickAnalysis extends AnalysisBase {
  tier: 'quick';
  workersUsed: number;
  workersFailed: number;
  topPerWorker: number;
  finalTopK: number;
  consensusCount: number;
  consensusConfidence: number;
  adjudicatorUsed: boolean;
  rankings: RankedFile[];
  structure: StructureSummary;
  workerSummaries: string[];
  /** Markdown consensus written from worker summaries; '' when rankings were adjudicated */
  consensusSummary: string;
}

export interface DetailedAnalysis extends AnalysisBase {
  tier: 'detailed';
  architecture: string;
  purpose: string;
  techStack: string[];
  keyFiles: string[];
  entryPoints: string[];
  fileSummaries: FileSummary[];
}

export interface DeepAnalysis extends AnalysisBase {
  tier: 'deep';
  architecture: string;
  purpose: string;
  refinementNotes: string[];
  architecturalInsights: string[];
  fileSummaries: FileSummary[];
}

export interface FullAnalysis extends AnalysisBase {
  tier: 'full';
  businessValue: string;
  technicalDebt: string[];
  recommendations: string[];
  documentationGaps: string[];
}

export type AnalysisResult = QuickAnalysis | DetailedAnalysis | DeepAnalysis | FullAnalysis;

export type AnalysisResultOf<T extends AnalysisTier> = Extract<AnalysisResult, { tier: T }>;

/**
 * Recursively freeze a freshly built value object.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
