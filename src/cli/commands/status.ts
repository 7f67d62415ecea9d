import { parseArgs } from 'node:util';
import { openCliEngine } from '../engine_context.js';
import { TIERSCAN_VERSION } from '../../index.js';
import { ScanStore } from '../../storage/scan_store.js';
import { printKeyValue, formatTimestamp } from '../progress.js';

export interface StatusCommandOptions {
  workspace: string;
  rawArgs: string[];
}

export async function statusCommand(options: StatusCommandOptions): Promise<void> {
  const { values } = parseArgs({
    args: options.rawArgs,
    options: { json: { type: 'boolean', default: false } },
    allowPositionals: true,
    strict: false,
  });
  const cli = await openCliEngine({ workspace: options.workspace, quiet: true });
  try {
    const [tiers, scan] = await Promise.all([cli.engine.status(cli.projectPath), new ScanStore(cli.projectPath).load()]);

    if (values.json === true) {
      console.log(JSON.stringify({ projectPath: cli.projectPath, scan, tiers }, null, 2));
      return;
    }

    console.log('tierscan Status');
    console.log('===============\n');
    printKeyValue([{ key: 'Version', value: TIERSCAN_VERSION.string }, { key: 'Project', value: cli.projectPath }]);
    console.log();

    console.log('Startup Scan:');
    if (scan) {
      printKeyValue([
        { key: 'Type', value: scan.answer.type || 'unknown' },
        { key: 'Language', value: scan.answer.language || 'unknown' },
        { key: 'Iteration', value: scan.iteration },
        { key: 'Last Run', value: formatTimestamp(scan.generatedAt) },
      ]);
    } else {
      printKeyValue([{ key: 'Last Run', value: 'Never' }]);
    }

    for (const status of tiers) {
      console.log(`\nTier ${status.tier}:`);
      if (!status.analyzed) {
        printKeyValue([{ key: 'Analyzed', value: 'Never' }]);
        continue;
      }
      printKeyValue([
        { key: 'Analyzed At', value: formatTimestamp(status.analyzedAt) },
        { key: 'Fresh', value: status.fresh },
        { key: 'Partial', value: status.partial },
        { key: 'Confidence', value: status.confidence === null ? null : `${Math.round(status.confidence * 100)}%` },
      ]);
      if (!status.fresh && status.reasons.length > 0) {
        printKeyValue([{ key: 'Stale Because', value: status.reasons.join('; ') }]);
      }
    }
  } finally {
    cli.close();
  }
}
