/**
 * @fileoverview Analyze Command
 *
 * Runs one analysis tier, optionally cascading into the tiers above it.
 *
 * Usage:
 *   tierscan analyze <quick|detailed|deep|full> [--force] [--continue] [--continue-to <tier>] [--json] [--yes]
 *
 * @packageDocumentation
 */

import { parseArgs } from 'node:util';
import { formatAnalysisResult } from '../../analysis/format.js';
import type { CascadeResult } from '../../analysis/tier_cascade.js';
import { ANALYSIS_TIERS, isAnalysisTier, type AnalysisTier } from '../../config/engine_config.js';
import { createError } from '../errors.js';
import { openCliEngine } from '../engine_context.js';

export interface AnalyzeCommandOptions {
  workspace: string;
  args: string[];
  rawArgs: string[];
}

function parseTier(value: unknown, flag: string): AnalysisTier {
  if (isAnalysisTier(value)) return value;
  throw createError('INVALID_ARGUMENT', `${flag} must be one of ${ANALYSIS_TIERS.join(', ')}; got ${String(value)}`);
}

export function renderCascade(result: CascadeResult): string {
  return result.reports
    .map((report) => formatAnalysisResult(report.result, { cached: report.cached }))
    .join('\n\n---\n\n');
}

export async function analyzeCommand(options: AnalyzeCommandOptions): Promise<void> {
  const { values } = parseArgs({
    args: options.rawArgs,
    options: {
      force: { type: 'boolean', default: false },
      continue: { type: 'boolean', default: false },
      'continue-to': { type: 'string' },
      json: { type: 'boolean', default: false },
      yes: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: false,
  });

  if (options.args.length === 0) {
    throw createError('INVALID_ARGUMENT', 'analyze needs a tier: quick, detailed, deep or full');
  }
  const tier = parseTier(options.args[0], 'tier');
  const continueTo = values['continue-to'] === undefined ? undefined : parseTier(values['continue-to'], '--continue-to');
  const json = values.json === true;

  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once('SIGINT', onSigint);

  const cli = await openCliEngine({ workspace: options.workspace, yes: values.yes === true, quiet: json });
  try {
    const result = await cli.engine.analyze(cli.projectPath, {
      tier,
      force: values.force === true,
      continue: values.continue === true,
      continueTo,
      initiator: 'user',
      signal: controller.signal,
    });
    console.log(json ? JSON.stringify(result, null, 2) : renderCascade(result));
  } finally {
    process.off('SIGINT', onSigint);
    cli.close();
  }
}
