/**
 * @fileoverview End-to-end engine tests with a scripted model
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createEngine } from '../engine.js';
import { PermissionDenied } from '../core/errors.js';
import {
  FakeCompletionClient,
  cleanupWorkspace,
  createWorkspaceWithFiles,
  promptRole,
  scriptedModel,
  walkLister,
} from './helpers/index.js';

const VOTE = '{"type":"CLI","language":"Go","framework":"none","purpose":"terminal chat"}';

describe('createEngine', () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await createWorkspaceWithFiles({
      'main.go': 'package main\n',
      'cmd/run.go': 'package cmd\n',
      '.tierscan/config.json': JSON.stringify({
        analysis: { warmupDelayMs: 0, consensusStrategy: 'local_tally', startup: { crowdSize: 3 } },
        permissions: { allowedTools: ['startup_scan'] },
      }),
    });
  });

  afterEach(async () => {
    await cleanupWorkspace(workspace);
  });

  it('loads the project configuration', async () => {
    const engine = await createEngine(workspace, { client: scriptedModel(), lister: walkLister(), env: {} });
    expect(engine.config.analysis.startup.crowdSize).toBe(3);
    expect(engine.config.analysis.consensusStrategy).toBe('local_tally');
    engine.dispose();
  });

  it('runs allow-listed scans without asking', async () => {
    const client = new FakeCompletionClient(() => VOTE);
    const engine = await createEngine(workspace, { client, lister: walkLister(), env: {} });

    const scan = await engine.scan(workspace, { initiator: 'user' });

    expect(scan).toMatchObject({ projectType: 'CLI', confidence: 1, iteration: 1, fileCount: 2 });
    expect(engine.session(workspace).lastScan).toBe(scan);
    engine.dispose();
  });

  it('denies user analysis nobody approves, then runs it once granted', async () => {
    const client = scriptedModel();
    const engine = await createEngine(workspace, { client, lister: walkLister(), env: {} });

    await expect(engine.analyze(workspace, { tier: 'quick', initiator: 'user' })).rejects.toBeInstanceOf(PermissionDenied);
    expect(client.callCount).toBe(0);

    const { final } = await engine.analyze(workspace, { tier: 'quick', initiator: 'system' });
    expect(final.tier).toBe('quick');
    expect(engine.session(workspace).lastResults.get('quick')).toBe(final);
    expect(client.calls.every((call) => promptRole(call.messages) !== null)).toBe(true);

    const statuses = await engine.status(workspace);
    expect(statuses.map((status) => status.analyzed)).toEqual([true, false, false, false]);
    engine.dispose();
  });
});
