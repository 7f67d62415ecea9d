/**
 * @fileoverview Startup scan: crowd classification of a project
 *
 * Asks a crowd of cheap model calls what kind of project this is, reduces
 * the answers through the configured consensus strategy and persists the
 * result. Every scan is fresh; the previous answer is fed to the crowd and
 * the adjudicator as a baseline to refine, and the iteration number grows by
 * one per scan.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import type { EngineConfig } from '../config/engine_config.js';
import { stateDir } from '../config/loader.js';
import { Errors } from '../core/errors.js';
import { systemMessage, userMessage, type ChatMessage, type CompletionClient } from '../providers/completion_client.js';
import type { BackendWarmup } from '../providers/warmup.js';
import type { FileLister } from '../files/file_lister.js';
import { ScanStore } from '../storage/scan_store.js';
import { withStateLock, writeJsonAtomic } from '../storage/json_file.js';
import { createScanCompletedEvent, createScanStartedEvent, type EngineEventBus } from '../events.js';
import type { PermissionGate } from '../permission/permission_gate.js';
import type { ProjectSession } from '../session/session_registry.js';
import { logInfo, logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { CrowdSampler } from './crowd_sampler.js';
import { resolveConsensus, type ConsensusStrategy } from './consensus.js';
import { createConsensusStrategy } from './strategy_factory.js';
import { deepFreeze, type AdjudicatedAnswer, type CrowdVote, type ScanResult } from './types.js';

export const STARTUP_SCAN_TOOL = 'startup_scan';

// ============================================================================
// PROMPTS
// ============================================================================

const SCAN_SYSTEM = 'You are a project analyzer. Respond only with a single JSON object.';

export function buildScanPrompt(files: readonly string[], previous: AdjudicatedAnswer | null): string {
  const lines = [
    'Analyze this project\'s file list and determine:',
    '1. Project type (CLI, web app, library, API, ...)',
    '2. Primary language',
    '3. Primary framework (or "none")',
    '4. Key purpose in 10 words or less',
  ];
  if (previous) {
    lines.push(
      '',
      'Previous analysis:',
      `- Type: ${previous.type}`,
      `- Language: ${previous.language}`,
      `- Framework: ${previous.framework}`,
      `- Purpose: ${previous.purpose}`,
    );
  }
  lines.push(
    '',
    'Project files (all tracked):',
    files.join('\n'),
    '',
    'Respond in JSON format:',
    '{',
    '  "type": "project type",',
    '  "language": "primary language",',
    '  "framework": "framework or none",',
    '  "purpose": "brief purpose"',
    '}',
  );
  return lines.join('\n');
}

export function buildScanMessages(files: readonly string[], previous: AdjudicatedAnswer | null): ChatMessage[] {
  return [systemMessage(SCAN_SYSTEM), userMessage(buildScanPrompt(files, previous))];
}

// ============================================================================
// RUNNER
// ============================================================================

export interface StartupScanDeps {
  client: CompletionClient;
  config: EngineConfig;
  lister: FileLister;
  /** Defaults to the strategy named in the configuration */
  strategy?: ConsensusStrategy;
  warmup?: BackendWarmup;
  bus?: EngineEventBus;
  gate?: PermissionGate;
  session?: ProjectSession;
  now?: () => Date;
}

export interface StartupScanOptions {
  /** Ignore the previous answer as a baseline (iteration still increases) */
  force?: boolean;
  /** System-initiated scans skip the permission gate */
  initiator?: 'user' | 'system';
  sessionId?: string;
  signal?: AbortSignal;
  /** Write crowd and adjudication artifacts regardless of configuration */
  debug?: boolean;
}

interface DebugArtifacts {
  votes: CrowdVote[];
  failures: number;
  answer: AdjudicatedAnswer;
  source: string;
}

function debugTimestamp(date: Date): string {
  return date.toISOString().replace(/[:.]/g, '-');
}

async function writeDebugArtifacts(projectPath: string, at: Date, artifacts: DebugArtifacts): Promise<string> {
  const dir = path.join(stateDir(projectPath), 'debug', 'startup_scan', debugTimestamp(at));
  await writeJsonAtomic(path.join(dir, 'crowd_answers.json'), { failures: artifacts.failures, votes: artifacts.votes });
  await writeJsonAtomic(path.join(dir, 'adjudicated.json'), { source: artifacts.source, answer: artifacts.answer });
  return dir;
}

export async function runStartupScan(
  projectPath: string,
  deps: StartupScanDeps,
  options: StartupScanOptions = {},
): Promise<ScanResult> {
  const root = path.resolve(projectPath);
  const store = new ScanStore(root);
  const run = (): Promise<ScanResult> => withStateLock(store.directory, () => performScan(root, store, deps, options));
  return deps.session ? deps.session.lock(run) : run();
}

async function performScan(
  projectPath: string,
  store: ScanStore,
  deps: StartupScanDeps,
  options: StartupScanOptions,
): Promise<ScanResult> {
  const now = deps.now ?? (() => new Date());
  const startedAt = now();
  const started = Date.now();
  const settings = deps.config.analysis.startup;

  if (options.initiator !== 'system' && deps.gate) {
    const granted = await deps.gate.request(
      {
        sessionId: options.sessionId ?? 'default',
        toolName: STARTUP_SCAN_TOOL,
        action: 'scan',
        path: projectPath,
        description: 'Scan the project file list to classify the codebase. Only file names are sent to the model.',
      },
      options.signal,
    );
    if (!granted) throw Errors.permissionDenied(STARTUP_SCAN_TOOL, 'scan', projectPath);
  }

  const previousRecord = await store.load();
  const prior = options.force ? null : previousRecord?.answer ?? null;
  const { files } = await deps.lister.list(projectPath);

  await deps.bus?.emit(createScanStartedEvent(projectPath, settings.crowdSize));

  const crowdPolicy = deps.config.llm[settings.crowdModel];
  const adjudicatorPolicy = deps.config.llm[settings.adjudicatorModel];
  const sampler = new CrowdSampler(
    deps.client,
    {
      modelId: crowdPolicy.modelId,
      maxTokens: crowdPolicy.maxTokensWorker,
      contextSize: crowdPolicy.contextSize,
      timeoutMs: crowdPolicy.requestTimeoutMs,
      temperature: deps.config.llm.temperature,
    },
    deps.warmup,
  );
  const { votes, failures } = await sampler.sample(buildScanMessages(files, prior), {
    n: settings.crowdSize,
    concurrency: settings.concurrency,
    quorumFloor: settings.quorumFloor,
    signal: options.signal,
  });

  const strategy =
    deps.strategy ??
    createConsensusStrategy(deps.config.analysis.consensusStrategy, deps.client, {
      modelId: adjudicatorPolicy.modelId,
      maxTokens: adjudicatorPolicy.maxTokensAdjudicator,
      contextSize: adjudicatorPolicy.contextSize,
      timeoutMs: adjudicatorPolicy.requestTimeoutMs,
      temperature: deps.config.llm.adjudicatorTemperature,
    });
  const outcome = await resolveConsensus(strategy, votes, prior, options.signal);

  if (options.debug || settings.debug || process.env.TIERSCAN_DEBUG === 'true') {
    try {
      const dir = await writeDebugArtifacts(projectPath, startedAt, {
        votes,
        failures,
        answer: outcome.answer,
        source: outcome.source,
      });
      logInfo('Startup scan debug artifacts written', { dir });
    } catch (error) {
      logWarning('Could not write startup scan debug artifacts', { error: getErrorMessage(error) });
    }
  }

  const iteration = previousRecord ? previousRecord.iteration + 1 : 1;
  const durationMs = Date.now() - started;
  const generatedAt = now().toISOString();
  await store.save({
    version: 1,
    projectPath,
    answer: outcome.answer,
    iteration,
    fileCount: files.length,
    generatedAt,
  });

  const result = deepFreeze<ScanResult>({
    projectPath,
    projectType: outcome.answer.type,
    language: outcome.answer.language,
    framework: outcome.answer.framework,
    purpose: outcome.answer.purpose,
    fileCount: files.length,
    confidence: outcome.answer.confidence,
    iteration,
    durationMs,
    generatedAt,
  });
  if (deps.session) deps.session.lastScan = result;
  await deps.bus?.emit(createScanCompletedEvent(projectPath, iteration, result.confidence, durationMs));
  return result;
}
