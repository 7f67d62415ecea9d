/**
 * @fileoverview Engine event bus
 *
 * In-process publish/subscribe used by the permission gate (to announce
 * pending requests) and by the scan/cascade runners (to report progress to
 * the CLI).
 */

import { logError } from './telemetry/logger.js';
import { getErrorMessage } from './utils/errors.js';
import type { AnalysisTier } from './config/engine_config.js';
import type { PermissionRequest } from './permission/permission_gate.js';

export interface EngineEventMap {
  permission_requested: { request: PermissionRequest };
  permission_resolved: { requestId: string; granted: boolean; persisted: boolean };
  scan_started: { projectPath: string; crowdSize: number };
  scan_completed: { projectPath: string; iteration: number; confidence: number; durationMs: number };
  tier_started: { projectPath: string; tier: AnalysisTier };
  tier_progress: { projectPath: string; tier: AnalysisTier; stage: string; completed: number; total: number };
  tier_completed: { projectPath: string; tier: AnalysisTier; cached: boolean; durationMs: number };
  tier_failed: { projectPath: string; tier: AnalysisTier; error: string };
}

export type EngineEventType = keyof EngineEventMap;

export type EngineEvent = {
  [K in EngineEventType]: { type: K; timestamp: Date; data: EngineEventMap[K] };
}[EngineEventType];

export type EngineEventOf<K extends EngineEventType> = Extract<EngineEvent, { type: K }>;

export type EngineEventHandler = (event: EngineEvent) => void | Promise<void>;

function isEventOf<K extends EngineEventType>(event: EngineEvent, type: K): event is EngineEventOf<K> {
  return event.type === type;
}

export class EngineEventBus {
  private handlers = new Map<EngineEventType | '*', Set<EngineEventHandler>>();

  on<K extends EngineEventType>(eventType: K, handler: (event: EngineEventOf<K>) => void | Promise<void>): () => void {
    return this.subscribe(eventType, (event) => (isEventOf(event, eventType) ? handler(event) : undefined));
  }

  onAny(handler: EngineEventHandler): () => void {
    return this.subscribe('*', handler);
  }

  once<K extends EngineEventType>(eventType: K, handler: (event: EngineEventOf<K>) => void | Promise<void>): () => void {
    const unsubscribe: () => void = this.on(eventType, async (event) => {
      unsubscribe();
      await handler(event);
    });
    return unsubscribe;
  }

  async emit(event: EngineEvent): Promise<void> {
    const targets = [this.handlers.get(event.type), this.handlers.get('*')];
    for (const handlers of targets) {
      if (!handlers) continue;
      for (const handler of [...handlers]) {
        try {
          await handler(event);
        } catch (error: unknown) {
          logError(`Event handler error for ${event.type}`, {
            error: getErrorMessage(error),
          });
        }
      }
    }
  }

  off(eventType: EngineEventType | '*'): void { this.handlers.delete(eventType); }
  clear(): void { this.handlers.clear(); }
  listenerCount(eventType: EngineEventType | '*'): number { return this.handlers.get(eventType)?.size ?? 0; }

  private subscribe(eventType: EngineEventType | '*', handler: EngineEventHandler): () => void {
    let set = this.handlers.get(eventType);
    if (!set) {
      set = new Set();
      this.handlers.set(eventType, set);
    }
    set.add(handler);
    return () => {
      this.handlers.get(eventType)?.delete(handler);
    };
  }
}

export function createPermissionRequestedEvent(request: PermissionRequest): EngineEvent {
  return { type: 'permission_requested', timestamp: new Date(), data: { request } };
}

export function createPermissionResolvedEvent(requestId: string, granted: boolean, persisted: boolean): EngineEvent {
  return { type: 'permission_resolved', timestamp: new Date(), data: { requestId, granted, persisted } };
}

export function createScanStartedEvent(projectPath: string, crowdSize: number): EngineEvent {
  return { type: 'scan_started', timestamp: new Date(), data: { projectPath, crowdSize } };
}

export function createScanCompletedEvent(projectPath: string, iteration: number, confidence: number, durationMs: number): EngineEvent {
  return { type: 'scan_completed', timestamp: new Date(), data: { projectPath, iteration, confidence, durationMs } };
}

export function createTierStartedEvent(projectPath: string, tier: AnalysisTier): EngineEvent {
  return { type: 'tier_started', timestamp: new Date(), data: { projectPath, tier } };
}

export function createTierProgressEvent(projectPath: string, tier: AnalysisTier, stage: string, completed: number, total: number): EngineEvent {
  return { type: 'tier_progress', timestamp: new Date(), data: { projectPath, tier, stage, completed, total } };
}

export function createTierCompletedEvent(projectPath: string, tier: AnalysisTier, cached: boolean, durationMs: number): EngineEvent {
  return { type: 'tier_completed', timestamp: new Date(), data: { projectPath, tier, cached, durationMs } };
}

export function createTierFailedEvent(projectPath: string, tier: AnalysisTier, error: string): EngineEvent {
  return { type: 'tier_failed', timestamp: new Date(), data: { projectPath, tier, error } };
}
