/**
 * @fileoverview Scan Command
 *
 * Usage:
 *   tierscan scan [--force] [--debug] [--json] [--yes]
 *
 * @packageDocumentation
 */

import { parseArgs } from 'node:util';
import { formatScanResult } from '../../analysis/format.js';
import { openCliEngine } from '../engine_context.js';
import { createSpinner } from '../progress.js';

export interface ScanCommandOptions {
  workspace: string;
  rawArgs: string[];
}

export async function scanCommand(options: ScanCommandOptions): Promise<void> {
  const { values } = parseArgs({
    args: options.rawArgs,
    options: {
      force: { type: 'boolean', default: false },
      debug: { type: 'boolean', default: false },
      json: { type: 'boolean', default: false },
      yes: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: false,
  });
  const json = values.json === true;

  const cli = await openCliEngine({ workspace: options.workspace, yes: values.yes === true, quiet: json });
  const spinner = json ? null : createSpinner('Scanning project...');
  try {
    const result = await cli.engine.scan(cli.projectPath, {
      force: values.force === true,
      debug: values.debug === true,
    });
    spinner?.succeed(`Scan complete (iteration ${result.iteration})`);
    console.log(json ? JSON.stringify(result, null, 2) : formatScanResult(result));
  } catch (error) {
    spinner?.fail('Scan failed');
    throw error;
  } finally {
    cli.close();
  }
}
