/**
 * @fileoverview Engine construction for CLI commands
 */

import * as path from 'node:path';
import { AnalysisEngine } from '../engine.js';
import { loadConfig } from '../config/loader.js';
import { EngineEventBus } from '../events.js';
import { EventPermissionGate, PermissionStore } from '../permission/permission_gate.js';
import type { CompletionClient } from '../providers/completion_client.js';
import { attachPermissionPrompt, type PermissionPromptOptions } from './permission_prompt.js';
import { attachTierProgress } from './progress.js';

export interface CliEngineOptions {
  workspace: string;
  /** Grant permission requests without asking */
  yes?: boolean;
  /** Suppress progress rendering (JSON output) */
  quiet?: boolean;
  ask?: PermissionPromptOptions['ask'];
  client?: CompletionClient;
}

export interface CliEngine {
  engine: AnalysisEngine;
  projectPath: string;
  close(): void;
}

export async function openCliEngine(options: CliEngineOptions): Promise<CliEngine> {
  const projectPath = path.resolve(options.workspace);
  const { config } = await loadConfig(projectPath);
  const bus = new EngineEventBus();
  const gate = new EventPermissionGate(bus, {
    allowedTools: config.permissions.allowedTools,
    store: PermissionStore.forProject(projectPath),
  });
  const engine = new AnalysisEngine({ config, bus, gate, client: options.client });

  const detach = [attachPermissionPrompt(bus, gate, { autoGrant: options.yes, ask: options.ask })];
  if (!options.quiet) detach.push(attachTierProgress(bus));

  return {
    engine,
    projectPath,
    close: () => {
      for (const off of detach) off();
      engine.dispose();
    },
  };
}
