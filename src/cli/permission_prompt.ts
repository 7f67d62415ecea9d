/**
 * @fileoverview Terminal answers to permission requests
 */

import readline from 'node:readline/promises';
import type { EngineEventBus } from '../events.js';
import type { PermissionGate, PermissionRequest } from '../permission/permission_gate.js';

export type PermissionAnswer = 'yes' | 'no' | 'always' | 'never';

export function parsePermissionAnswer(answer: string): PermissionAnswer {
  const normalized = answer.trim().toLowerCase();
  if (normalized === 'a' || normalized === 'always') return 'always';
  if (normalized === 'v' || normalized === 'never') return 'never';
  if (/^y(es)?$/.test(normalized)) return 'yes';
  return 'no';
}

function describe(request: PermissionRequest): string {
  return [`Permission requested: ${request.toolName} (${request.action})`, `  Path: ${request.path}`, `  ${request.description}`].join('\n');
}

const askTerminal = async (prompt: string): Promise<string> => {
  const rl = readline.createInterface({ input: process.stdin, output: process.stderr });
  try {
    return await rl.question(prompt);
  } finally {
    rl.close();
  }
};

export interface PermissionPromptOptions {
  /** Grant every request without asking */
  autoGrant?: boolean;
  ask?: (prompt: string) => Promise<string>;
}

/**
 * Answer the gate's `permission_requested` events. Without a terminal (and
 * without `autoGrant`) requests are denied.
 */
export function attachPermissionPrompt(
  bus: EngineEventBus,
  gate: PermissionGate,
  options: PermissionPromptOptions = {},
): () => void {
  const ask = options.ask ?? (process.stdin.isTTY ? askTerminal : null);
  return bus.on('permission_requested', async (event) => {
    const { request } = event.data;
    if (options.autoGrant) {
      await gate.grant(request.id);
      return;
    }
    if (!ask) {
      await gate.deny(request.id);
      return;
    }
    const answer = parsePermissionAnswer(await ask(`${describe(request)}\nAllow? [y]es / [n]o / [a]lways / ne[v]er: `));
    const persist = answer === 'always' || answer === 'never';
    if (answer === 'yes' || answer === 'always') {
      await gate.grant(request.id, { persist });
    } else {
      await gate.deny(request.id, { persist });
    }
  });
}
