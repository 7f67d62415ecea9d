/**
 * @fileoverview Tests for the startup scan
 */

import { existsSync } from 'node:fs';
import * as path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { PermissionDenied, QuorumFailure, TransportError } from '../../core/errors.js';
import { EngineEventBus, type EngineEventType } from '../../events.js';
import { EventPermissionGate } from '../../permission/permission_gate.js';
import { ProjectSession } from '../../session/session_registry.js';
import { ScanStore } from '../../storage/scan_store.js';
import { STATE_LOCK_FILE_NAME } from '../../storage/json_file.js';
import { AbortError } from '../../utils/async.js';
import { buildScanPrompt, runStartupScan, type StartupScanDeps } from '../startup_scan.js';
import {
  FakeCompletionClient,
  cleanupWorkspace,
  createWorkspaceWithFiles,
  systemText,
  testConfig,
  unreachable,
  userText,
  walkLister,
  type Responder,
} from '../../__tests__/helpers/index.js';

const VOTE = '{"type":"CLI","language":"Go","framework":"none","purpose":"terminal chat"}';
const VERDICT = '{"type":"CLI","language":"Go","framework":"none","purpose":"terminal chat client","confidence":0.9}';

const isAdjudication: (messages: Parameters<Responder>[0]) => boolean = (messages) =>
  systemText(messages).startsWith('Adjudicate');

describe('runStartupScan', () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await createWorkspaceWithFiles({
      'main.go': 'package main\n',
      'README.md': '# chat\n',
      'notes.txt': 'not indexed\n',
    });
  });

  afterEach(async () => {
    await cleanupWorkspace(workspace);
  });

  function deps(client: FakeCompletionClient, extra: Partial<StartupScanDeps> = {}): StartupScanDeps {
    return {
      client,
      config: testConfig({ analysis: { startup: { crowdSize: 3, concurrency: 3 } } }),
      lister: walkLister(),
      ...extra,
    };
  }

  it('classifies the project through the adjudicator', async () => {
    const client = new FakeCompletionClient((messages) => (isAdjudication(messages) ? VERDICT : VOTE));
    const result = await runStartupScan(workspace, deps(client), { initiator: 'system' });

    expect(result).toMatchObject({
      projectType: 'CLI',
      language: 'Go',
      framework: 'none',
      purpose: 'terminal chat client',
      fileCount: 2,
      confidence: 0.9,
      iteration: 1,
    });
    expect(client.callCount).toBe(4);
    const crowdCall = client.calls.find((call) => !isAdjudication(call.messages));
    expect(userText(crowdCall?.messages ?? [])).toContain('README.md\nmain.go');
    const adjudication = client.calls.find((call) => isAdjudication(call.messages));
    expect(adjudication?.options.temperature).toBe(0);
    expect(Object.isFrozen(result)).toBe(true);
  });

  it('refines the stored answer and increments the iteration', async () => {
    const client = new FakeCompletionClient((messages) => (isAdjudication(messages) ? VERDICT : VOTE));
    await runStartupScan(workspace, deps(client), { initiator: 'system' });
    const second = await runStartupScan(workspace, deps(client), { initiator: 'system' });

    expect(second.iteration).toBe(2);
    const lastCrowd = client.calls.filter((call) => !isAdjudication(call.messages)).pop();
    expect(userText(lastCrowd?.messages ?? [])).toContain('Previous analysis:\n- Type: CLI');
    const lastVerdict = client.calls.filter((call) => isAdjudication(call.messages)).pop();
    expect(userText(lastVerdict?.messages ?? [])).toContain('PREVIOUS CONSENSUS');

    const record = await new ScanStore(workspace).load();
    expect(record?.iteration).toBe(2);
    expect(record?.answer.purpose).toBe('terminal chat client');
  });

  it('drops the baseline with force but keeps counting', async () => {
    const client = new FakeCompletionClient((messages) => (isAdjudication(messages) ? VERDICT : VOTE));
    await runStartupScan(workspace, deps(client), { initiator: 'system' });
    const forced = await runStartupScan(workspace, deps(client), { initiator: 'system', force: true });

    expect(forced.iteration).toBe(2);
    const lastCrowd = client.calls.filter((call) => !isAdjudication(call.messages)).pop();
    expect(userText(lastCrowd?.messages ?? [])).not.toContain('Previous analysis:');
  });

  it('falls back to the first vote when adjudication fails', async () => {
    const client = new FakeCompletionClient((messages) => (isAdjudication(messages) ? 'I cannot decide' : VOTE));
    const result = await runStartupScan(workspace, deps(client), { initiator: 'system' });
    expect(result).toMatchObject({ projectType: 'CLI', purpose: 'terminal chat', confidence: 0 });
  });

  it('tallies locally when configured', async () => {
    const client = new FakeCompletionClient(() => VOTE);
    const config = testConfig({ analysis: { consensusStrategy: 'local_tally', startup: { crowdSize: 3, concurrency: 3 } } });
    const result = await runStartupScan(workspace, deps(client, { config }), { initiator: 'system' });
    expect(result.confidence).toBe(1);
    expect(client.callCount).toBe(3);
  });

  it('fails when most workers fail', async () => {
    const client = new FakeCompletionClient((_messages, _options, call) => (call === 0 ? VOTE : unreachable()));
    await expect(runStartupScan(workspace, deps(client), { initiator: 'system' })).rejects.toBeInstanceOf(QuorumFailure);
    expect(client.callCount).toBe(3);
    expect(await new ScanStore(workspace).load()).toBeNull();
  });

  it('never adjudicates once 6 of 10 crowd calls fail', async () => {
    const client = new FakeCompletionClient((messages, _options, call) =>
      isAdjudication(messages) ? VERDICT : call < 6 ? unreachable() : VOTE,
    );
    const config = testConfig({ analysis: { startup: { crowdSize: 10, concurrency: 10 } } });

    const run = runStartupScan(workspace, deps(client, { config }), { initiator: 'system' });

    await expect(run).rejects.toBeInstanceOf(QuorumFailure);
    await expect(run).rejects.toThrow('too many analysis failures (6/10)');
    expect(client.callCount).toBe(10);
    expect(client.calls.filter((call) => isAdjudication(call.messages))).toHaveLength(0);
  });

  it('falls back to the only answering worker when the adjudicator is unreachable', async () => {
    const answer = '{"type":"cli","language":"go","framework":"none","purpose":"x"}';
    const client = new FakeCompletionClient((messages, _options, call) =>
      isAdjudication(messages) || call > 0 ? unreachable() : answer,
    );
    const config = testConfig({ analysis: { startup: { crowdSize: 3, concurrency: 1, quorumFloor: 2 } } });

    const result = await runStartupScan(workspace, deps(client, { config }), { initiator: 'system' });

    expect(result).toMatchObject({ projectType: 'cli', language: 'go', framework: 'none', purpose: 'x', confidence: 0 });
    expect(client.callCount).toBe(4);
  });

  it('stores nothing when cancelled during adjudication', async () => {
    const controller = new AbortController();
    const client = new FakeCompletionClient((messages) => {
      if (!isAdjudication(messages)) return VOTE;
      controller.abort();
      return new TransportError('aborted', false, 'request cancelled');
    });

    const run = runStartupScan(workspace, deps(client), { initiator: 'system', signal: controller.signal });

    await expect(run).rejects.toBeInstanceOf(AbortError);
    expect(await new ScanStore(workspace).load()).toBeNull();
  });

  it('holds the state file lock while scanning', async () => {
    const lockPath = path.join(new ScanStore(workspace).directory, STATE_LOCK_FILE_NAME);
    const locked: boolean[] = [];
    const client = new FakeCompletionClient((messages) => {
      locked.push(existsSync(lockPath));
      return isAdjudication(messages) ? VERDICT : VOTE;
    });

    await runStartupScan(workspace, deps(client), { initiator: 'system' });

    expect(locked).toEqual([true, true, true, true]);
    expect(existsSync(lockPath)).toBe(false);
  });

  it('refuses a user scan without a grant', async () => {
    const client = new FakeCompletionClient(() => VOTE);
    const gate = new EventPermissionGate(new EngineEventBus());
    await expect(runStartupScan(workspace, deps(client, { gate }), { initiator: 'user' })).rejects.toBeInstanceOf(PermissionDenied);
    expect(client.callCount).toBe(0);
  });

  it('runs a user scan once the gate grants it', async () => {
    const bus = new EngineEventBus();
    const gate = new EventPermissionGate(bus);
    const seen: EngineEventType[] = [];
    bus.onAny((event) => {
      seen.push(event.type);
    });
    bus.on('permission_requested', async (event) => {
      await gate.grant(event.data.request.id);
    });
    const session = new ProjectSession(workspace);
    const client = new FakeCompletionClient((messages) => (isAdjudication(messages) ? VERDICT : VOTE));

    const result = await runStartupScan(workspace, deps(client, { gate, bus, session }), { initiator: 'user' });

    expect(session.lastScan).toBe(result);
    expect(seen).toContain('permission_resolved');
    expect(seen.slice(-2)).toEqual(['scan_started', 'scan_completed']);
  });
});

describe('buildScanPrompt', () => {
  it('lists every file after the questions', () => {
    const prompt = buildScanPrompt(['a.ts', 'b.ts'], null);
    expect(prompt).toContain('Project files (all tracked):\na.ts\nb.ts\n');
    expect(prompt).not.toContain('Previous analysis:');
  });
});
