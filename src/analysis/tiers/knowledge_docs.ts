/**
 * @fileoverview Markdown renderers for tier knowledge documents
 *
 * Every tier emits the same four documents (structure, patterns, context,
 * overview) so higher tiers and prompt injection can rely on the names.
 */

import {
  FILE_CATEGORIES,
  type AdjudicatedAnswer,
  type FileCategory,
  type FileSummary,
  type KnowledgeFiles,
  type RankedFile,
  type StructureSummary,
} from '../types.js';
import { formatImportance } from './ranking.js';

const CATEGORY_TITLES: Record<FileCategory, string> = {
  entry: 'Entry points',
  config: 'Configuration & build',
  core: 'Core components',
  util: 'Shared utilities',
  test: 'Tests',
  doc: 'Documentation',
  other: 'Other',
};

function bulletList(items: readonly string[], empty = '_none recorded_'): string {
  return items.length > 0 ? items.map((item) => `- ${item}`).join('\n') : empty;
}

function section(title: string, body: string): string {
  return `## ${title}\n\n${body}\n`;
}

function scanFacts(scan: AdjudicatedAnswer | null): string[] {
  if (!scan) return [];
  const facts = [`**Project Type**: ${scan.type || 'unknown'}`, `**Main Language**: ${scan.language || 'unknown'}`];
  if (scan.framework && scan.framework.toLowerCase() !== 'none') facts.push(`**Framework**: ${scan.framework}`);
  return facts;
}

function rankedLine(entry: RankedFile): string {
  const reason = entry.reason ? `: ${entry.reason}` : '';
  return `\`${entry.path}\` (${entry.category}, importance ${formatImportance(entry.importance)}, votes ${entry.votes})${reason}`;
}

// ============================================================================
// QUICK
// ============================================================================

export interface QuickKnowledgeInput {
  fileCount: number;
  rankings: readonly RankedFile[];
  structure: StructureSummary;
  workerSummaries: readonly string[];
  consensusSummary: string;
  focuses: readonly string[];
  consensusConfidence: number;
  adjudicatorUsed: boolean;
  scan: AdjudicatedAnswer | null;
}

export function renderQuickKnowledge(input: QuickKnowledgeInput): KnowledgeFiles {
  const facts = scanFacts(input.scan);
  const structure = [
    '# Project Structure (Quick Analysis)\n',
    ...(facts.length > 0 ? [`${facts.join('\n')}\n`] : []),
    `**Total Files**: ${input.fileCount}\n`,
    section('Top Directories', bulletList(input.structure.topDirectories.map((entry) => `\`${entry.name}/\`: ${entry.count}`))),
    section('File Types', bulletList(input.structure.topFileTypes.map((entry) => `${entry.name}: ${entry.count}`))),
    section('Ranked Files', bulletList(input.rankings.slice(0, 20).map(rankedLine))),
    '*Based on file paths only. Run detailed analysis for content-level information.*',
  ].join('\n');

  const byCategory = new Map<FileCategory, RankedFile[]>();
  for (const entry of input.rankings) {
    const list = byCategory.get(entry.category) ?? [];
    list.push(entry);
    byCategory.set(entry.category, list);
  }
  const patternSections = FILE_CATEGORIES
    .filter((category) => byCategory.has(category))
    .map((category) =>
      section(CATEGORY_TITLES[category], bulletList((byCategory.get(category) ?? []).slice(0, 10).map((entry) => `\`${entry.path}\``))),
    );
  const patterns = ['# Development Patterns (Quick Analysis)\n', ...patternSections].join('\n');

  const context = [
    '# Project Context (Quick Analysis)\n',
    input.scan?.purpose ? `**Purpose**: ${input.scan.purpose}\n` : '',
    section('Focus Areas', bulletList(input.focuses.map((focus) => `\`${focus}\``))),
    ...(input.workerSummaries.length > 0 ? [section('Worker Observations', input.workerSummaries.join('\n\n'))] : []),
  ]
    .filter(Boolean)
    .join('\n');

  const overview = [
    '# Project Overview (Quick Analysis)\n',
    section(
      'Quick Facts',
      bulletList([
        ...facts,
        `**Files**: ${input.fileCount}`,
        `**Consensus**: ${input.adjudicatorUsed ? 'model adjudicated' : 'local tally'} (confidence ${Math.round(input.consensusConfidence * 100)}%)`,
      ]),
    ),
    section('Key Files', bulletList(input.rankings.slice(0, 10).map((entry) => `\`${entry.path}\``))),
    ...(input.consensusSummary ? [section('Consensus Summary', input.consensusSummary.replace(/^# Project Summary\s*/, ''))] : []),
    section('Next Steps', bulletList(['Run `detailed` analysis for file-level understanding', 'Run `deep` analysis for architectural insights'])),
  ].join('\n');

  return { 'structure.md': structure, 'patterns.md': patterns, 'context.md': context, 'overview.md': overview };
}

// ============================================================================
// DETAILED / DEEP
// ============================================================================

export interface FileLevelKnowledgeInput {
  title: string;
  architecture: string;
  purpose: string;
  techStack: readonly string[];
  entryPoints: readonly string[];
  summaries: readonly FileSummary[];
  refinementNotes?: readonly string[];
  insights?: readonly string[];
  nextSteps: readonly string[];
}

export function renderFileLevelKnowledge(input: FileLevelKnowledgeInput): KnowledgeFiles {
  const structure = [
    `# Project Structure (${input.title})\n`,
    section('Architecture', input.architecture || '_not determined_'),
    section('Entry Points', bulletList(input.entryPoints.map((entry) => `\`${entry}\``))),
    section('Key Files', bulletList(input.summaries.map((summary) => `\`${summary.path}\`: ${summary.purpose || 'purpose unclear'}`))),
  ].join('\n');

  const patterns = [
    `# Development Patterns (${input.title})\n`,
    section('Tech Stack', bulletList([...input.techStack])),
    section(
      'Key Elements',
      bulletList(
        input.summaries
          .filter((summary) => summary.keyElements.length > 0)
          .map((summary) => `\`${summary.path}\`: ${summary.keyElements.join(', ')}`),
      ),
    ),
    ...(input.insights ? [section('Architectural Insights', bulletList([...input.insights]))] : []),
  ].join('\n');

  const dependencies = [...new Set(input.summaries.flatMap((summary) => summary.dependencies))].sort();
  const notes = input.summaries.filter((summary) => summary.notes).map((summary) => `\`${summary.path}\`: ${summary.notes}`);
  const context = [
    `# Project Context (${input.title})\n`,
    section('Purpose', input.purpose || '_not determined_'),
    section('Dependencies', bulletList(dependencies.map((dependency) => `\`${dependency}\``))),
    section('Notes', bulletList(notes)),
    ...(input.refinementNotes ? [section('Corrections to Previous Analysis', bulletList([...input.refinementNotes]))] : []),
  ].join('\n');

  const overview = [
    `# Project Overview (${input.title})\n`,
    input.purpose ? `**${input.purpose}**\n` : '',
    section('Architecture', input.architecture || '_not determined_'),
    section('Tech Stack', bulletList([...input.techStack])),
    section('Next Steps', bulletList([...input.nextSteps])),
  ]
    .filter(Boolean)
    .join('\n');

  return { 'structure.md': structure, 'patterns.md': patterns, 'context.md': context, 'overview.md': overview };
}

// ============================================================================
// FULL
// ============================================================================

export interface FullKnowledgeInput {
  businessValue: string;
  technicalDebt: readonly string[];
  recommendations: readonly string[];
  documentationGaps: readonly string[];
  /** Deep-tier documents carried forward */
  previous: KnowledgeFiles | null;
}

export function renderFullKnowledge(input: FullKnowledgeInput): KnowledgeFiles {
  const carried = (name: string, fallback: string): string => input.previous?.[name]?.trim() || fallback;
  return {
    'structure.md': carried('structure.md', '# Project Structure (Full Analysis)\n\n_No structure document from the previous tier._'),
    'patterns.md': [
      carried('patterns.md', '# Development Patterns (Full Analysis)'),
      '',
      section('Technical Debt', bulletList([...input.technicalDebt])),
    ].join('\n'),
    'context.md': [
      carried('context.md', '# Project Context (Full Analysis)'),
      '',
      section('Business Value', input.businessValue || '_not determined_'),
    ].join('\n'),
    'overview.md': [
      '# Project Overview (Full Analysis)\n',
      section('Business Value', input.businessValue || '_not determined_'),
      section('Recommendations', bulletList([...input.recommendations])),
      section('Documentation Gaps', bulletList([...input.documentationGaps])),
      section('Technical Debt', bulletList([...input.technicalDebt])),
    ].join('\n'),
  };
}
