/**
 * @fileoverview Configuration loading
 *
 * Reads `.tierscan/config.jsonc`, `.tierscan/config.json` or
 * `.tierscan/config.yaml` (first one found wins), expands `$VAR` / `${VAR}`
 * references in string values, applies environment overrides and validates
 * the result against {@link EngineConfigSchema}.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import stripJsonComments from 'strip-json-comments';
import YAML from 'yaml';
import type { ZodError } from 'zod';
import { EngineConfigSchema, type EngineConfig } from './engine_config.js';
import { ConfigurationError } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';
import { isRecord } from '../utils/json_extract.js';
import { logDebug } from '../telemetry/logger.js';

export const STATE_DIR_NAME = '.tierscan';

export const CONFIG_FILE_NAMES = ['config.jsonc', 'config.json', 'config.yaml', 'config.yml'] as const;

export interface LoadedConfig {
  config: EngineConfig;
  /** Absolute path of the file read, or null when defaults were used */
  source: string | null;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
}

// ============================================================================
// ENV EXPANSION
// ============================================================================

const ENV_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g;

/**
 * Replace `$VAR` and `${VAR}` with environment values; unknown names expand to ''.
 */
export function expandEnv(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(ENV_PATTERN, (_match, braced: string | undefined, bare: string | undefined) => {
    const name = braced ?? bare ?? '';
    return env[name] ?? '';
  });
}

export function expandEnvDeep(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === 'string') return expandEnv(value, env);
  if (Array.isArray(value)) return value.map((entry) => expandEnvDeep(entry, env));
  if (isRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      out[key] = expandEnvDeep(entry, env);
    }
    return out;
  }
  return value;
}

// ============================================================================
// PARSING
// ============================================================================

function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export function parseConfigText(content: string, fileName: string): unknown {
  const ext = path.extname(fileName).toLowerCase();
  try {
    if (ext === '.yaml' || ext === '.yml') {
      return YAML.parse(content) ?? {};
    }
    return JSON.parse(stripJsonComments(content, { trailingCommas: true }));
  } catch (error) {
    throw new ConfigurationError(fileName, `cannot parse: ${getErrorMessage(error)}`);
  }
}

function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv): unknown {
  const base: Record<string, unknown> = isRecord(raw) ? { ...raw } : {};
  const url = env.TIERSCAN_LMSTUDIO_URL?.trim();
  if (url) base.lmStudioUrl = url;
  return base;
}

/**
 * Validate an already-parsed configuration object.
 */
export function validateConfig(raw: unknown, source = 'config'): EngineConfig {
  const parsed = EngineConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(source, formatZodIssues(parsed.error));
  }
  return parsed.data;
}

// ============================================================================
// LOADING
// ============================================================================

export function stateDir(projectPath: string): string {
  return path.join(projectPath, STATE_DIR_NAME);
}

async function findConfigFile(projectPath: string): Promise<string | null> {
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = path.join(stateDir(projectPath), name);
    try {
      const stat = await fs.stat(candidate);
      if (stat.isFile()) return candidate;
    } catch {
      // not present; try the next name
    }
  }
  return null;
}

export async function loadConfig(projectPath: string, options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const env = options.env ?? process.env;
  const source = await findConfigFile(projectPath);
  let raw: unknown = {};
  if (source) {
    const content = await fs.readFile(source, 'utf8');
    raw = expandEnvDeep(parseConfigText(content, source), env);
    logDebug('Loaded configuration', { source });
  }
  const config = validateConfig(applyEnvOverrides(raw, env), source ?? 'defaults');
  return { config, source };
}
