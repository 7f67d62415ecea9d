/**
 * @fileoverview tierscan - Tiered analysis and consensus engine
 *
 * Builds layered knowledge about a codebase with a local LLM: a crowd
 * startup scan, then quick, detailed, deep and full tiers, each refining
 * the previous one and each reusable while the project content is unchanged.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createEngine } from 'tierscan';
 *
 * const engine = await createEngine('/path/to/project');
 * const scan = await engine.scan('/path/to/project', { initiator: 'system' });
 * const { final } = await engine.analyze('/path/to/project', {
 *   tier: 'quick',
 *   continueTo: 'detailed',
 *   initiator: 'system',
 * });
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// ENGINE
// ============================================================================

export { AnalysisEngine, createEngine, type EngineOptions, type CreateEngineOptions } from './engine.js';

export {
  TierCascade,
  planTiers,
  nextTier,
  previousTier,
  createTierRunners,
  ANALYZE_TOOL,
  type AnalyzeParams,
  type CascadeResult,
  type TierRunReport,
  type TierStatus,
  type TierRunners,
  type TierCascadeDeps,
} from './analysis/tier_cascade.js';

export { runStartupScan, STARTUP_SCAN_TOOL, type StartupScanDeps, type StartupScanOptions } from './analysis/startup_scan.js';

export { formatScanResult, formatAnalysisResult, formatForPrompt } from './analysis/format.js';

// ============================================================================
// CONSENSUS
// ============================================================================

export { CrowdSampler, runCrowd, majorityFloor, type CrowdRunOptions, type CrowdRunResult } from './analysis/crowd_sampler.js';
export { resolveConsensus, fallbackAnswer, type ConsensusStrategy, type ConsensusOutcome } from './analysis/consensus.js';
export { LlmAdjudicator, type LlmAdjudicatorSettings } from './analysis/adjudicator.js';
export { LocalTally } from './analysis/local_tally.js';
export { createConsensusStrategy } from './analysis/strategy_factory.js';

// ============================================================================
// VALUE OBJECTS
// ============================================================================

export type {
  ScanResult,
  CrowdVote,
  AdjudicatedAnswer,
  AnalysisResult,
  AnalysisResultOf,
  QuickAnalysis,
  DetailedAnalysis,
  DeepAnalysis,
  FullAnalysis,
  RankedFile,
  FileSummary,
  KnowledgeFiles,
} from './analysis/types.js';

// ============================================================================
// STORAGE
// ============================================================================

export { TierCache, checkFreshness, planIncremental, type TierRecord, type PerItemState } from './storage/tier_cache.js';
export { ContentHasher, type ContentSnapshot } from './storage/content_hasher.js';
export { KnowledgeStore } from './storage/knowledge_store.js';
export { ScanStore, type ScanRecord } from './storage/scan_store.js';

// ============================================================================
// COLLABORATORS
// ============================================================================

export { LmStudioClient, DEFAULT_LMSTUDIO_URL, type LmStudioClientOptions } from './providers/lmstudio_client.js';
export type { CompletionClient, CompletionOptions, ChatMessage } from './providers/completion_client.js';
export { ProjectFileLister, createFileLister, type FileLister, type FileListing } from './files/file_lister.js';
export {
  EventPermissionGate,
  PermissionStore,
  type PermissionGate,
  type PermissionRequest,
} from './permission/permission_gate.js';
export { SessionRegistry, ProjectSession } from './session/session_registry.js';
export { EngineEventBus, type EngineEvent, type EngineEventType } from './events.js';

// ============================================================================
// CONFIGURATION / ERRORS
// ============================================================================

export {
  ANALYSIS_TIERS,
  EngineConfigSchema,
  createDefaultConfig,
  type AnalysisTier,
  type EngineConfig,
  type EngineConfigInput,
} from './config/engine_config.js';
export { loadConfig, type LoadedConfig } from './config/loader.js';
export {
  EngineError,
  TransportError,
  ParseError,
  QuorumFailure,
  AdjudicationFailure,
  StorageError,
  CacheCorruption,
  PermissionDenied,
  ConfigurationError,
  TierFailure,
  Errors,
  isEngineError,
} from './core/errors.js';
export { setLogLevel, type LogLevel } from './telemetry/logger.js';

// ============================================================================
// VERSION CONSTANTS
// ============================================================================

/**
 * Increment MAJOR when stored tier records can no longer be read.
 */
export const TIERSCAN_VERSION = {
  major: 0,
  minor: 1,
  patch: 0,
  string: '0.1.0',
} as const;
