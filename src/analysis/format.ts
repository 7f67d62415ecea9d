/**
 * @fileoverview Markdown rendering of scan and tier results for the CLI
 */

import type { AnalysisTier } from '../config/engine_config.js';
import type { AnalysisResult, ScanResult } from './types.js';

export interface FormatOptions {
  cached?: boolean;
}

const TIER_EMOJI: Record<AnalysisTier, string> = {
  quick: '⚡',
  detailed: '📊',
  deep: '💎',
  full: '🚀',
};

const PREVIEW_LINES = 5;

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${Math.round(seconds % 60)}s`;
}

function percent(confidence: number): string {
  return `${Math.round(confidence * 100)}%`;
}

function bulletList(items: readonly string[], empty = '- (none)'): string[] {
  return items.length === 0 ? [empty] : items.map((item) => `- ${item}`);
}

// ============================================================================
// STARTUP SCAN
// ============================================================================

export function formatScanResult(result: ScanResult, options: FormatOptions = {}): string {
  const lines = ['⚡ **Startup Scan Complete**', ''];
  lines.push(options.cached ? '_Using cached scan results_' : `Scan took ${formatDuration(result.durationMs)}`, '');
  lines.push('## Project Detection', '');
  lines.push(`**Type:** ${result.projectType || 'unknown'}`);
  lines.push(`**Language:** ${result.language || 'unknown'}`);
  const framework = result.framework.trim();
  if (framework !== '' && framework.toLowerCase() !== 'none') {
    lines.push(`**Framework:** ${framework}`);
  }
  lines.push(`**Purpose:** ${result.purpose || 'unknown'}`);
  lines.push(`**Files:** ${result.fileCount}`);
  if (result.confidence > 0) {
    lines.push(`**Confidence:** ${percent(result.confidence)}`);
  }
  if (result.iteration > 1) {
    lines.push(`**Iteration:** ${result.iteration} (progressively enhanced)`);
  }
  lines.push(
    '',
    '## Next Steps',
    '',
    '- `tierscan analyze quick` to rank the most important files',
    '- `tierscan analyze detailed` to read and summarize key files',
  );
  return lines.join('\n');
}

// ============================================================================
// TIER RESULTS
// ============================================================================

/**
 * Compact plain summary of a tier result, suitable for a chat prompt.
 */
export function formatForPrompt(result: AnalysisResult): string {
  switch (result.tier) {
    case 'quick': {
      const lines = [
        `Top ${result.rankings.length} of ${result.fileCount} files (workers ${result.workersUsed - result.workersFailed}/${result.workersUsed}, confidence ${percent(result.confidence)}):`,
      ];
      for (const entry of result.rankings.slice(0, 10)) {
        lines.push(`- ${entry.path} [${entry.category}] ${entry.reason}`);
      }
      return lines.join('\n');
    }
    case 'detailed':
      return [
        `**Purpose:** ${result.purpose || 'unknown'}`,
        `**Architecture:** ${result.architecture || 'unknown'}`,
        `**Tech stack:** ${result.techStack.length > 0 ? result.techStack.join(', ') : 'unknown'}`,
        `**Entry points:** ${result.entryPoints.length > 0 ? result.entryPoints.join(', ') : 'none found'}`,
        `**Files summarized:** ${result.fileSummaries.length}/${result.keyFiles.length}`,
      ].join('\n');
    case 'deep':
      return [
        `**Purpose:** ${result.purpose || 'unknown'}`,
        `**Architecture:** ${result.architecture || 'unknown'}`,
        '',
        '**Insights:**',
        ...bulletList(result.architecturalInsights),
        '',
        '**Refinements:**',
        ...bulletList(result.refinementNotes),
      ].join('\n');
    case 'full':
      return [
        `**Business value:** ${result.businessValue || 'unknown'}`,
        '',
        '**Recommendations:**',
        ...bulletList(result.recommendations),
        '',
        '**Technical debt:**',
        ...bulletList(result.technicalDebt),
      ].join('\n');
  }
}

function nextSteps(tier: AnalysisTier): string[] {
  switch (tier) {
    case 'quick':
      return [
        '- `tierscan analyze detailed` to read and summarize the key files',
        '- `tierscan analyze deep` for architectural insights',
      ];
    case 'detailed':
      return [
        '- `tierscan analyze deep` to verify and extend this analysis',
        '- Point your assistant at the knowledge files above',
      ];
    case 'deep':
      return [
        '- `tierscan analyze full` for business value and recommendations',
        '- Review the architectural insights',
      ];
    case 'full':
      return [
        '- Share the knowledge files with your team',
        '- Work through the recommendations',
        '',
        'Analysis complete: every tier has run.',
      ];
  }
}

export function formatAnalysisResult(result: AnalysisResult, options: FormatOptions = {}): string {
  const lines = [`${TIER_EMOJI[result.tier]} **${capitalize(result.tier)} Analysis Complete**`, ''];
  lines.push(options.cached ? '_Used cached results (no changes detected)_' : `Analysis took ${formatDuration(result.durationMs)}`);
  lines.push(`Project: ${result.projectPath}`);
  if (result.partial) {
    lines.push('', '> Partial result: some work failed and will be retried on the next run.');
  }
  lines.push('', '## Summary', '', formatForPrompt(result), '');

  const names = Object.keys(result.knowledgeFiles).sort();
  if (names.length > 0) {
    lines.push('## Knowledge Files', '');
    for (const name of names) {
      const content = result.knowledgeFiles[name] ?? '';
      const preview = content.split('\n').slice(0, PREVIEW_LINES);
      lines.push(`### ${name}`, '', ...preview, '');
    }
  }

  lines.push('## Next Steps', '', ...nextSteps(result.tier));
  return lines.join('\n');
}
