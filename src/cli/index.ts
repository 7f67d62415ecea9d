#!/usr/bin/env node
/**
 * @fileoverview tierscan CLI
 *
 * Commands:
 *   tierscan scan                  - Classify the project with a model crowd
 *   tierscan analyze <tier>        - Run an analysis tier (quick|detailed|deep|full)
 *   tierscan status                - Show which tiers are analyzed and fresh
 *   tierscan help [command]        - Show help
 *
 * @packageDocumentation
 */

import { parseArgs } from 'node:util';
import { showHelp } from './help.js';
import { scanCommand } from './commands/scan.js';
import { analyzeCommand } from './commands/analyze.js';
import { statusCommand } from './commands/status.js';
import { createError, formatError, formatErrorJson, getExitCode, toCliError, type CliError } from './errors.js';

type Command = 'scan' | 'analyze' | 'status' | 'help';

export const COMMANDS: Record<Command, { description: string; usage: string }> = {
  scan: {
    description: 'Classify the project with a crowd of quick model calls',
    usage: 'tierscan scan [--force] [--debug] [--json] [--yes]',
  },
  analyze: {
    description: 'Run an analysis tier and write its knowledge files',
    usage: 'tierscan analyze <quick|detailed|deep|full> [--force] [--continue] [--continue-to <tier>] [--json] [--yes]',
  },
  status: {
    description: 'Show which tiers are analyzed and whether they are fresh',
    usage: 'tierscan status [--json]',
  },
  help: {
    description: 'Show help information',
    usage: 'tierscan help [command]',
  },
};

function isCommand(value: string | undefined): value is Command {
  return value !== undefined && Object.prototype.hasOwnProperty.call(COMMANDS, value);
}

/**
 * Errors go to stderr, or as a JSON document to stdout under `--json`.
 */
function outputError(error: CliError, useJson: boolean): void {
  if (useJson) {
    console.log(formatErrorJson(error));
  } else {
    console.error(formatError(error));
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  const { values, positionals } = parseArgs({
    args,
    options: {
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
      workspace: { type: 'string', short: 'w', default: process.cwd() },
      json: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: false,
  });

  if (values.version) {
    const { TIERSCAN_VERSION } = await import('../index.js');
    console.log(`tierscan ${TIERSCAN_VERSION.string}`);
    return;
  }

  const command = positionals[0];
  const commandArgs = positionals.slice(1);
  const workspace = typeof values.workspace === 'string' ? values.workspace : process.cwd();
  const jsonMode = values.json === true;

  if (values.help || command === undefined || command === 'help') {
    showHelp(command === 'help' ? commandArgs[0] : undefined);
    return;
  }

  if (!isCommand(command)) {
    const error = createError('INVALID_ARGUMENT', `Unknown command: ${command}`, {
      available: Object.keys(COMMANDS),
    });
    outputError(error, jsonMode);
    process.exitCode = getExitCode(error);
    return;
  }

  try {
    switch (command) {
      case 'scan':
        await scanCommand({ workspace, rawArgs: args });
        break;
      case 'analyze':
        await analyzeCommand({ workspace, args: commandArgs, rawArgs: args });
        break;
      case 'status':
        await statusCommand({ workspace, rawArgs: args });
        break;
    }
  } catch (error) {
    const cliError = toCliError(error);
    outputError(cliError, jsonMode);
    process.exitCode = getExitCode(cliError);
  }
}

main().catch((error: unknown) => {
  const cliError = toCliError(error);
  outputError(cliError, process.argv.includes('--json'));
  process.exitCode = getExitCode(cliError);
});
