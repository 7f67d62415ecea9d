/**
 * @fileoverview Per-file summaries shared by the detailed and deep tiers
 *
 * Key file selection, the summary prompt and its decoding. Summaries are
 * stored in the tier record per file so unchanged files are never
 * summarized twice.
 */

import * as path from 'node:path';
import { ParseError } from '../../core/errors.js';
import { systemMessage, userMessage, type ChatMessage } from '../../providers/completion_client.js';
import { isRecord, parseBalancedObject, readString, readStringArray } from '../../utils/json_extract.js';
import { decodeFileSummary } from '../result_schema.js';
import type { FileSummary } from '../types.js';
import {
  completeAndParse,
  processItemsIncrementally,
  readFileHead,
  type ItemProcessingResult,
  type TierContext,
} from './tier_context.js';

/** Base names read first: entry points, manifests and top-level docs. */
export const PRIORITY_FILE_NAMES: readonly string[] = [
  'README.md', 'readme.md', 'README.txt',
  'main.go', 'main.py', 'main.js', 'main.ts', 'index.js', 'index.ts',
  'app.py', 'app.js', 'app.ts', 'server.js', 'server.ts', 'server.py', 'cli.ts', 'cli.js',
  'package.json', 'go.mod', 'requirements.txt', 'pyproject.toml', 'Cargo.toml',
  'Makefile', 'Dockerfile', 'docker-compose.yml',
  '.env.example', 'config.yaml', 'config.json',
];

const ENTRY_NAMES = new Set([
  'main.go', 'main.py', 'main.js', 'main.ts', 'index.js', 'index.ts',
  'app.py', 'app.js', 'app.ts', 'server.js', 'server.ts', 'server.py', 'cli.ts', 'cli.js',
]);

export function isEntryPointName(filePath: string): boolean {
  return ENTRY_NAMES.has(path.posix.basename(filePath));
}

function depth(filePath: string): number {
  return filePath.split('/').length;
}

/**
 * Ordered, de-duplicated selection: priority names (in listing order), then
 * `ranked` paths, then the remaining files shallowest first.
 */
export function selectKeyFiles(files: readonly string[], ranked: readonly string[], max: number): string[] {
  const tracked = new Set(files);
  const selected: string[] = [];
  const seen = new Set<string>();
  const take = (file: string): void => {
    if (selected.length >= max || seen.has(file) || !tracked.has(file)) return;
    seen.add(file);
    selected.push(file);
  };
  for (const file of files) {
    if (PRIORITY_FILE_NAMES.includes(path.posix.basename(file))) take(file);
  }
  for (const file of ranked) take(file);
  const rest = [...files].sort((a, b) => depth(a) - depth(b) || (a < b ? -1 : a > b ? 1 : 0));
  for (const file of rest) take(file);
  return selected;
}

// ============================================================================
// PROMPT / DECODING
// ============================================================================

export interface SummaryPromptInput {
  filePath: string;
  content: string;
  /** Summary from the tier below, to be verified */
  previous?: FileSummary;
}

export function buildFileSummaryMessages(input: SummaryPromptInput): ChatMessage[] {
  const parts = [`Analyze this file in detail:`, `File: ${input.filePath}`, '', 'Content:', input.content, ''];
  if (input.previous) {
    parts.push(
      'A previous, shallower analysis said:',
      JSON.stringify({
        purpose: input.previous.purpose,
        keyElements: input.previous.keyElements,
        dependencies: input.previous.dependencies,
      }),
      'Be skeptical of it: keep what the content confirms and correct what it contradicts.',
      '',
    );
  }
  parts.push(
    'Provide a JSON response:',
    '{',
    '  "purpose": "what this file is for",',
    '  "keyElements": ["main types, functions or sections"],',
    '  "dependencies": ["imports or referenced modules"],',
    '  "notes": "anything surprising or worth knowing"',
    '}',
  );
  return [
    systemMessage('You are analyzing code files in detail. Respond only with valid JSON.'),
    userMessage(parts.join('\n')),
  ];
}

export function parseFileSummary(raw: string, filePath: string): FileSummary | ParseError {
  const decoded = parseBalancedObject(raw, 'file summary');
  if (!decoded.ok) return decoded.error;
  if (!isRecord(decoded.value)) return new ParseError('file summary', 'payload is not an object');
  const summary: FileSummary = {
    path: filePath,
    purpose: readString(decoded.value, 'purpose'),
    keyElements: readStringArray(decoded.value, 'keyElements'),
    dependencies: readStringArray(decoded.value, 'dependencies'),
    notes: readString(decoded.value, 'notes'),
  };
  if (summary.purpose === '' && summary.keyElements.length === 0) {
    return new ParseError('file summary', 'summary has neither purpose nor key elements');
  }
  return summary;
}

// ============================================================================
// RUNNER
// ============================================================================

export interface SummarizeOptions {
  files: readonly string[];
  maxLines: number;
  /** Earlier summaries keyed by path, shown to the model for verification */
  previous?: ReadonlyMap<string, FileSummary>;
}

/**
 * Summarize `files`, reusing stored summaries of unchanged files.
 */
export function summarizeFiles(context: TierContext, options: SummarizeOptions): Promise<ItemProcessingResult<FileSummary>> {
  return processItemsIncrementally<FileSummary>(context, {
    stage: 'summaries',
    itemIds: options.files,
    decode: decodeFileSummary,
    process: async (filePath) => {
      const content = await readFileHead(context.projectPath, filePath, options.maxLines);
      const messages = buildFileSummaryMessages({ filePath, content, previous: options.previous?.get(filePath) });
      return completeAndParse<FileSummary>(context, messages, 'worker', `summary of ${filePath}`, (raw) =>
        parseFileSummary(raw, filePath),
      );
    },
  });
}

/** Summaries in selection order. */
export function orderedSummaries(files: readonly string[], outputs: ReadonlyMap<string, FileSummary>): FileSummary[] {
  return files.flatMap((file) => {
    const summary = outputs.get(file);
    return summary ? [summary] : [];
  });
}
