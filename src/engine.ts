/**
 * @fileoverview Engine assembly
 *
 * Wires configuration, the completion client, the file lister, the event bus,
 * the permission gate and the per-project session into one object that runs
 * startup scans and tier cascades. Every collaborator can be replaced, which
 * is how tests swap in a fake completion client.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { TierCascade, type AnalyzeParams, type CascadeResult, type TierRunners, type TierStatus } from './analysis/tier_cascade.js';
import { runStartupScan, type StartupScanOptions } from './analysis/startup_scan.js';
import type { ScanResult } from './analysis/types.js';
import type { EngineConfig } from './config/engine_config.js';
import { loadConfig } from './config/loader.js';
import { EngineEventBus } from './events.js';
import { createFileLister, type FileLister } from './files/file_lister.js';
import { EventPermissionGate, PermissionStore, type PermissionGate } from './permission/permission_gate.js';
import type { CompletionClient } from './providers/completion_client.js';
import { LmStudioClient } from './providers/lmstudio_client.js';
import { BackendWarmup } from './providers/warmup.js';
import { SessionRegistry, type ProjectSession } from './session/session_registry.js';

export interface EngineOptions {
  config: EngineConfig;
  client?: CompletionClient;
  lister?: FileLister;
  bus?: EngineEventBus;
  gate?: PermissionGate;
  sessions?: SessionRegistry;
  runners?: Partial<TierRunners>;
}

export class AnalysisEngine {
  readonly config: EngineConfig;
  readonly client: CompletionClient;
  readonly lister: FileLister;
  readonly bus: EngineEventBus;
  readonly sessions: SessionRegistry;
  private readonly gate: PermissionGate | undefined;
  private readonly warmup: BackendWarmup;
  private readonly runners: Partial<TierRunners> | undefined;

  constructor(options: EngineOptions) {
    this.config = options.config;
    this.client = options.client ?? new LmStudioClient({ baseUrl: options.config.lmStudioUrl });
    this.lister = options.lister ?? createFileLister();
    this.bus = options.bus ?? new EngineEventBus();
    this.sessions = options.sessions ?? new SessionRegistry();
    this.gate = options.gate;
    this.warmup = new BackendWarmup(options.config.analysis.warmupDelayMs);
    this.runners = options.runners;
  }

  session(projectPath: string): ProjectSession {
    return this.sessions.get(projectPath);
  }

  scan(projectPath: string, options: StartupScanOptions = {}): Promise<ScanResult> {
    return runStartupScan(
      projectPath,
      {
        client: this.client,
        config: this.config,
        lister: this.lister,
        warmup: this.warmup,
        bus: this.bus,
        gate: this.gate,
        session: this.session(projectPath),
      },
      options,
    );
  }

  analyze(projectPath: string, params: AnalyzeParams): Promise<CascadeResult> {
    return this.cascade(projectPath).analyze(projectPath, params);
  }

  status(projectPath: string): Promise<TierStatus[]> {
    return this.cascade(projectPath).status(projectPath);
  }

  dispose(): void {
    this.sessions.dispose();
    this.bus.clear();
  }

  private cascade(projectPath: string): TierCascade {
    return new TierCascade({
      client: this.client,
      config: this.config,
      lister: this.lister,
      bus: this.bus,
      gate: this.gate,
      session: this.session(projectPath),
      warmup: this.warmup,
      runners: this.runners,
    });
  }
}

export interface CreateEngineOptions {
  env?: NodeJS.ProcessEnv;
  client?: CompletionClient;
  lister?: FileLister;
  /** Permission gate; defaults to an event gate with decisions stored in the project */
  gate?: PermissionGate;
}

/**
 * Load the project's configuration and build an engine around it.
 */
export async function createEngine(projectPath: string, options: CreateEngineOptions = {}): Promise<AnalysisEngine> {
  const root = path.resolve(projectPath);
  const { config } = await loadConfig(root, { env: options.env });
  const bus = new EngineEventBus();
  const gate =
    options.gate ??
    new EventPermissionGate(bus, {
      allowedTools: config.permissions.allowedTools,
      store: PermissionStore.forProject(root),
    });
  return new AnalysisEngine({ config, client: options.client, lister: options.lister, bus, gate });
}
