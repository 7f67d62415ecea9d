/**
 * @fileoverview Schemas for persisted analysis values
 *
 * Tier records store the last result and per-file summaries as plain JSON;
 * these schemas turn them back into typed values on a cache hit. A value
 * that no longer matches is treated like a missing one.
 */

import { z } from 'zod';
import { FILE_CATEGORIES, type AnalysisResult, type FileSummary } from './types.js';
import type { AnalysisTier } from '../config/engine_config.js';

export const FileSummarySchema = z.object({
  path: z.string(),
  purpose: z.string(),
  keyElements: z.array(z.string()),
  dependencies: z.array(z.string()),
  notes: z.string(),
}) satisfies z.ZodType<FileSummary>;

const CountEntrySchema = z.object({ name: z.string(), count: z.number().int().min(0) });

const RankedFileSchema = z.object({
  path: z.string(),
  importance: z.number(),
  reason: z.string(),
  category: z.enum(FILE_CATEGORIES),
  votes: z.number().int().min(0),
});

const baseShape = {
  projectPath: z.string(),
  generatedAt: z.string(),
  durationMs: z.number().min(0),
  fileCount: z.number().int().min(0),
  knowledgeFiles: z.record(z.string()),
  confidence: z.number().min(0).max(1),
  partial: z.boolean(),
};

export const QuickAnalysisSchema = z.object({
  ...baseShape,
  tier: z.literal('quick'),
  workersUsed: z.number().int().min(0),
  workersFailed: z.number().int().min(0),
  topPerWorker: z.number().int().min(0),
  finalTopK: z.number().int().min(0),
  consensusCount: z.number().int().min(0),
  consensusConfidence: z.number().min(0).max(1),
  adjudicatorUsed: z.boolean(),
  rankings: z.array(RankedFileSchema),
  structure: z.object({ topDirectories: z.array(CountEntrySchema), topFileTypes: z.array(CountEntrySchema) }),
  workerSummaries: z.array(z.string()),
  consensusSummary: z.string(),
});

export const DetailedAnalysisSchema = z.object({
  ...baseShape,
  tier: z.literal('detailed'),
  architecture: z.string(),
  purpose: z.string(),
  techStack: z.array(z.string()),
  keyFiles: z.array(z.string()),
  entryPoints: z.array(z.string()),
  fileSummaries: z.array(FileSummarySchema),
});

export const DeepAnalysisSchema = z.object({
  ...baseShape,
  tier: z.literal('deep'),
  architecture: z.string(),
  purpose: z.string(),
  refinementNotes: z.array(z.string()),
  architecturalInsights: z.array(z.string()),
  fileSummaries: z.array(FileSummarySchema),
});

export const FullAnalysisSchema = z.object({
  ...baseShape,
  tier: z.literal('full'),
  businessValue: z.string(),
  technicalDebt: z.array(z.string()),
  recommendations: z.array(z.string()),
  documentationGaps: z.array(z.string()),
});

export const AnalysisResultSchema = z.discriminatedUnion('tier', [
  QuickAnalysisSchema,
  DetailedAnalysisSchema,
  DeepAnalysisSchema,
  FullAnalysisSchema,
]) satisfies z.ZodType<AnalysisResult>;

/**
 * Decode a stored result; null when it is missing, invalid or of another tier.
 */
export function decodeStoredResult(value: unknown, tier: AnalysisTier): AnalysisResult | null {
  if (value === undefined) return null;
  const parsed = AnalysisResultSchema.safeParse(value);
  if (!parsed.success || parsed.data.tier !== tier) return null;
  return parsed.data;
}

export function decodeFileSummary(value: unknown): FileSummary | null {
  const parsed = FileSummarySchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}
