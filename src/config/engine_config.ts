/**
 * @fileoverview Engine configuration schema
 *
 * One zod schema describes every recognized option together with its
 * default, so `EngineConfigSchema.parse({})` is the complete default
 * configuration. Per-tier tunables are resolved against the LLM model
 * policies by `resolveTierTunables`.
 *
 * @packageDocumentation
 */

import { z } from 'zod';

// ============================================================================
// TIERS
// ============================================================================

export const ANALYSIS_TIERS = ['quick', 'detailed', 'deep', 'full'] as const;
export type AnalysisTier = (typeof ANALYSIS_TIERS)[number];

export function isAnalysisTier(value: unknown): value is AnalysisTier {
  return typeof value === 'string' && (ANALYSIS_TIERS as readonly string[]).includes(value);
}

export const MODEL_SIZES = ['smallest', 'medium', 'largest'] as const;
export type ModelSize = (typeof MODEL_SIZES)[number];

// ============================================================================
// LLM POLICIES
// ============================================================================

interface PolicyDefaults {
  requestTimeoutMs: number;
}

/** -1 for max tokens means "let the server decide". */
const modelPolicySchema = (defaults: PolicyDefaults) =>
  z
    .object({
      modelId: z.string().default(''),
      requestTimeoutMs: z.number().int().positive().default(defaults.requestTimeoutMs),
      maxTokensWorker: z.number().int().min(-1).default(-1),
      maxTokensAdjudicator: z.number().int().min(-1).default(-1),
      contextSize: z.number().int().positive().default(8192),
    })
    .strict()
    .default({});

export type ModelPolicy = z.infer<ReturnType<typeof modelPolicySchema>>;

const LlmConfigSchema = z
  .object({
    smallest: modelPolicySchema({ requestTimeoutMs: 30_000 }),
    medium: modelPolicySchema({ requestTimeoutMs: 120_000 }),
    largest: modelPolicySchema({ requestTimeoutMs: 600_000 }),
    temperature: z.number().min(0).max(2).default(0.7),
    adjudicatorTemperature: z.number().min(0).max(2).default(0),
  })
  .strict()
  .default({});

// ============================================================================
// TIER SETTINGS
// ============================================================================

const modelSize = z.enum(MODEL_SIZES);
const quorumFloor = z.number().int().min(0).optional().describe('Max tolerated failures; defaults to floor(n/2)');

/** Flags every stage shares. */
const stageFlags = {
  clean: z.boolean().default(false).describe('Remove previous knowledge files before writing'),
  debug: z.boolean().default(false).describe('Dump intermediate artifacts under .tierscan/debug'),
  autorun: z.boolean().default(false).describe('Continue into this tier after the previous one'),
};

/** Optional overrides of the model policy caps. */
const policyOverrides = {
  maxTokensWorker: z.number().int().min(-1).optional(),
  maxTokensAdjudicator: z.number().int().min(-1).optional(),
  contextSize: z.number().int().positive().optional(),
  requestTimeoutMs: z.number().int().positive().optional(),
};

const retryAndFailure = {
  workerRetry: z.number().int().min(0).default(1),
  adjudicatorRetry: z.number().int().min(0).default(1),
  strictFail: z.boolean().default(false),
};

export const DEFAULT_FOCUSES = ['entry/init', 'config/build', 'core/domain', 'api/handlers', 'tests/docs'];

const StartupConfigSchema = z
  .object({
    debug: stageFlags.debug,
    crowdSize: z.number().int().min(1).default(10),
    concurrency: z.number().int().min(1).default(10),
    quorumFloor,
    crowdModel: modelSize.default('smallest'),
    adjudicatorModel: modelSize.default('smallest'),
  })
  .strict()
  .default({});

const QuickConfigSchema = z
  .object({
    ...stageFlags,
    ...retryAndFailure,
    maxTokensWorker: z.number().int().min(-1).default(300),
    maxTokensAdjudicator: z.number().int().min(-1).default(600),
    contextSize: z.number().int().positive().default(2048),
    requestTimeoutMs: z.number().int().positive().default(10_000),
    workers: z.number().int().min(1).default(5),
    workerConcurrency: z.number().int().min(1).default(2),
    focuses: z.array(z.string().min(1)).min(1).default(() => [...DEFAULT_FOCUSES]),
    topFileRankingCount: z.number().int().min(1).default(20),
    finalTopK: z.number().int().min(1).default(100),
    maxPathsPerCall: z.number().int().min(1).default(400),
    useModelAdjudicator: z.boolean().default(true),
    naturalLanguageWorkers: z.boolean().default(false),
    workerSummaryWordLimit: z.number().int().min(10).default(200),
    quorumFloor,
    workerModel: modelSize.default('smallest'),
    adjudicatorModel: modelSize.default('medium'),
  })
  .strict()
  .default({});

const DetailedConfigSchema = z
  .object({
    ...stageFlags,
    ...policyOverrides,
    ...retryAndFailure,
    workerConcurrency: z.number().int().min(1).default(2),
    maxKeyFiles: z.number().int().min(1).default(20),
    maxLinesPerFile: z.number().int().min(1).default(500),
    workerModel: modelSize.default('medium'),
    adjudicatorModel: modelSize.default('medium'),
  })
  .strict()
  .default({});

const DeepConfigSchema = z
  .object({
    ...stageFlags,
    ...policyOverrides,
    ...retryAndFailure,
    workerConcurrency: z.number().int().min(1).default(2),
    maxFiles: z.number().int().min(1).default(50),
    maxLinesPerFile: z.number().int().min(1).default(1000),
    workerModel: modelSize.default('medium'),
    adjudicatorModel: modelSize.default('largest'),
  })
  .strict()
  .default({});

const FullConfigSchema = z
  .object({
    ...stageFlags,
    ...policyOverrides,
    ...retryAndFailure,
    workerConcurrency: z.number().int().min(1).default(1),
    workerModel: modelSize.default('largest'),
    adjudicatorModel: modelSize.default('largest'),
  })
  .strict()
  .default({});

// ============================================================================
// ROOT SCHEMA
// ============================================================================

export const EngineConfigSchema = z
  .object({
    lmStudioUrl: z.string().url().default('http://localhost:1234'),
    llm: LlmConfigSchema,
    analysis: z
      .object({
        warmupDelayMs: z.number().int().min(0).default(3000).describe('Pause before the first batch so the server can load a model'),
        consensusStrategy: z.enum(['adjudicator', 'local_tally']).default('adjudicator'),
        startup: StartupConfigSchema,
        quick: QuickConfigSchema,
        detailed: DetailedConfigSchema,
        deep: DeepConfigSchema,
        full: FullConfigSchema,
      })
      .strict()
      .default({}),
    permissions: z
      .object({
        allowedTools: z.array(z.string()).default(['copy', 'clear', 'help', 'chat']),
      })
      .strict()
      .default({}),
  })
  .strict();

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type StartupConfig = EngineConfig['analysis']['startup'];
export type QuickConfig = EngineConfig['analysis']['quick'];
export type DetailedConfig = EngineConfig['analysis']['detailed'];
export type DeepConfig = EngineConfig['analysis']['deep'];
export type FullConfig = EngineConfig['analysis']['full'];
export type ConsensusStrategyName = EngineConfig['analysis']['consensusStrategy'];

export function createDefaultConfig(overrides: EngineConfigInput = {}): EngineConfig {
  return EngineConfigSchema.parse(overrides);
}

// ============================================================================
// TIER TUNABLES
// ============================================================================

/** Resolved knobs one tier runs with. */
export interface TierTunables {
  workers: number;
  workerConcurrency: number;
  maxTokensWorker: number;
  maxTokensAdjudicator: number;
  contextSize: number;
  requestTimeoutMs: number;
  workerRetry: number;
  adjudicatorRetry: number;
  strictFail: boolean;
  workerModelId: string;
  adjudicatorModelId: string;
}

export function resolveTierTunables(config: EngineConfig, tier: AnalysisTier): TierTunables {
  const settings = config.analysis[tier];
  const workerPolicy = config.llm[settings.workerModel];
  const adjudicatorPolicy = config.llm[settings.adjudicatorModel];
  return {
    workers: tier === 'quick' ? config.analysis.quick.workers : 1,
    workerConcurrency: settings.workerConcurrency,
    maxTokensWorker: settings.maxTokensWorker ?? workerPolicy.maxTokensWorker,
    maxTokensAdjudicator: settings.maxTokensAdjudicator ?? adjudicatorPolicy.maxTokensAdjudicator,
    contextSize: settings.contextSize ?? workerPolicy.contextSize,
    requestTimeoutMs: settings.requestTimeoutMs ?? workerPolicy.requestTimeoutMs,
    workerRetry: settings.workerRetry,
    adjudicatorRetry: settings.adjudicatorRetry,
    strictFail: settings.strictFail,
    workerModelId: workerPolicy.modelId,
    adjudicatorModelId: adjudicatorPolicy.modelId,
  };
}

/** The model a tier's freshness check is keyed on. */
export function tierModelKey(config: EngineConfig, tier: AnalysisTier): string {
  const tunables = resolveTierTunables(config, tier);
  return `${tunables.workerModelId || 'default'}|${tunables.adjudicatorModelId || 'default'}`;
}
