/**
 * @fileoverview Permission gate for user-initiated analysis
 *
 * One gate, one notification strategy: a request that is neither allow-listed
 * nor covered by a persisted decision is published on the event bus as
 * `permission_requested`, and the caller waits until someone calls
 * `grant` or `deny` with its id.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import * as path from 'node:path';
import { z } from 'zod';
import {
  createPermissionRequestedEvent,
  createPermissionResolvedEvent,
  type EngineEventBus,
} from '../events.js';
import { readJsonFile, writeJsonAtomic } from '../storage/json_file.js';
import { stateDir } from '../config/loader.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';

// ============================================================================
// TYPES
// ============================================================================

export interface PermissionRequest {
  id: string;
  sessionId: string;
  toolName: string;
  action: string;
  path: string;
  description: string;
  params?: Record<string, unknown>;
}

export type CreatePermissionRequest = Omit<PermissionRequest, 'id'>;

export interface DecisionOptions {
  /** Remember the decision for the same tool, action and path */
  persist?: boolean;
}

export interface PermissionGate {
  request(request: CreatePermissionRequest, signal?: AbortSignal): Promise<boolean>;
  grant(requestId: string, options?: DecisionOptions): Promise<boolean>;
  deny(requestId: string, options?: DecisionOptions): Promise<boolean>;
}

// ============================================================================
// PERSISTED DECISIONS
// ============================================================================

const DecisionFileSchema = z.object({
  decisions: z.array(
    z.object({
      toolName: z.string(),
      action: z.string(),
      path: z.string(),
      granted: z.boolean(),
      decidedAt: z.string(),
    }),
  ),
});

type StoredDecision = z.infer<typeof DecisionFileSchema>['decisions'][number];

function decisionKey(toolName: string, action: string, targetPath: string): string {
  return `${toolName}\u0000${action}\u0000${targetPath}`;
}

export class PermissionStore {
  private decisions: Map<string, StoredDecision> | null = null;

  constructor(readonly filePath: string) {}

  static forProject(projectPath: string): PermissionStore {
    return new PermissionStore(path.join(stateDir(projectPath), 'permissions.json'));
  }

  async lookup(request: CreatePermissionRequest): Promise<boolean | null> {
    const decisions = await this.load();
    return decisions.get(decisionKey(request.toolName, request.action, request.path))?.granted ?? null;
  }

  async remember(request: CreatePermissionRequest, granted: boolean): Promise<void> {
    const decisions = await this.load();
    decisions.set(decisionKey(request.toolName, request.action, request.path), {
      toolName: request.toolName,
      action: request.action,
      path: request.path,
      granted,
      decidedAt: new Date().toISOString(),
    });
    await writeJsonAtomic(this.filePath, { decisions: [...decisions.values()] });
  }

  private async load(): Promise<Map<string, StoredDecision>> {
    if (this.decisions) return this.decisions;
    const decisions = new Map<string, StoredDecision>();
    const read = await readJsonFile(this.filePath);
    if (read.status === 'ok') {
      const parsed = DecisionFileSchema.safeParse(read.value);
      if (parsed.success) {
        for (const decision of parsed.data.decisions) {
          decisions.set(decisionKey(decision.toolName, decision.action, decision.path), decision);
        }
      } else {
        logWarning('Ignoring invalid permission store', { path: this.filePath });
      }
    } else if (read.status === 'corrupt') {
      logWarning('Ignoring unreadable permission store', { path: this.filePath, reason: read.reason });
    }
    this.decisions = decisions;
    return decisions;
  }
}

// ============================================================================
// GATE
// ============================================================================

export interface PermissionGateOptions {
  /** Tools that never need a decision */
  allowedTools?: readonly string[];
  store?: PermissionStore;
}

interface PendingRequest {
  request: PermissionRequest;
  resolve: (granted: boolean) => void;
}

export class EventPermissionGate implements PermissionGate {
  private readonly pending = new Map<string, PendingRequest>();
  private readonly allowedTools: ReadonlySet<string>;

  constructor(
    private readonly bus: EngineEventBus,
    private readonly options: PermissionGateOptions = {},
  ) {
    this.allowedTools = new Set(options.allowedTools ?? []);
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  async request(input: CreatePermissionRequest, signal?: AbortSignal): Promise<boolean> {
    if (this.allowedTools.has(input.toolName)) return true;

    const remembered = await this.options.store?.lookup(input);
    if (remembered !== undefined && remembered !== null) {
      logDebug('Permission decided by persisted grant', { tool: input.toolName, granted: remembered });
      return remembered;
    }

    if (this.bus.listenerCount('permission_requested') === 0) {
      logWarning('No handler answers permission requests; denying', { tool: input.toolName, path: input.path });
      return false;
    }

    const request: PermissionRequest = { ...input, id: randomUUID() };
    const decision = new Promise<boolean>((resolve) => {
      const onAbort = (): void => {
        if (this.pending.delete(request.id)) resolve(false);
      };
      this.pending.set(request.id, {
        request,
        resolve: (granted) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(granted);
        },
      });
      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });
    });
    await this.bus.emit(createPermissionRequestedEvent(request));
    return decision;
  }

  grant(requestId: string, options: DecisionOptions = {}): Promise<boolean> {
    return this.resolve(requestId, true, options);
  }

  deny(requestId: string, options: DecisionOptions = {}): Promise<boolean> {
    return this.resolve(requestId, false, options);
  }

  /** Resolves false when no request with this id is pending. */
  private async resolve(requestId: string, granted: boolean, options: DecisionOptions): Promise<boolean> {
    const entry = this.pending.get(requestId);
    if (!entry) return false;
    this.pending.delete(requestId);
    entry.resolve(granted);
    let persisted = false;
    if (options.persist && this.options.store) {
      try {
        await this.options.store.remember(entry.request, granted);
        persisted = true;
      } catch (error) {
        logWarning('Failed to persist permission decision', { error: getErrorMessage(error) });
      }
    }
    await this.bus.emit(createPermissionResolvedEvent(requestId, granted, persisted));
    return true;
  }
}
