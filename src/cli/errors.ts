/**
 * @fileoverview CLI error handling with helpful suggestions
 */

import {
  ConfigurationError,
  PermissionDenied,
  QuorumFailure,
  StorageError,
  CacheCorruption,
  TierFailure,
  TransportError,
  isEngineError,
} from '../core/errors.js';
import { AbortError } from '../utils/async.js';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export type CliErrorCode =
  | 'BACKEND_UNAVAILABLE'
  | 'PERMISSION_DENIED'
  | 'CONFIG_INVALID'
  | 'TIER_FAILED'
  | 'QUORUM_NOT_MET'
  | 'STORAGE_ERROR'
  | 'INVALID_ARGUMENT'
  | 'CANCELLED'
  | 'UNKNOWN';

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  BACKEND_UNAVAILABLE: 'Start LM Studio (or set TIERSCAN_LMSTUDIO_URL) and load a model.',
  PERMISSION_DENIED: 'Rerun and answer the prompt, or pass --yes to grant without asking.',
  CONFIG_INVALID: 'Fix the listed keys in .tierscan/config.jsonc, .tierscan/config.json or .tierscan/config.yaml.',
  TIER_FAILED: 'Rerun the command; unchanged work is reused. Disable strictFail to accept partial results.',
  QUORUM_NOT_MET: 'Too many model calls failed. Check the backend logs or raise quorumFloor.',
  STORAGE_ERROR: 'Check that the .tierscan directory is writable and no other run holds its lock.',
  INVALID_ARGUMENT: 'Run `tierscan help <command>` for usage information.',
  CANCELLED: 'The run was interrupted; nothing was written for the unfinished tier.',
  UNKNOWN: 'Rerun with TIERSCAN_DEBUG=true for more detail.',
};

const EXIT_CODES: Record<CliErrorCode, number> = {
  BACKEND_UNAVAILABLE: 3,
  PERMISSION_DENIED: 4,
  CONFIG_INVALID: 2,
  TIER_FAILED: 5,
  QUORUM_NOT_MET: 5,
  STORAGE_ERROR: 6,
  INVALID_ARGUMENT: 2,
  CANCELLED: 130,
  UNKNOWN: 1,
};

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

/**
 * Map any thrown value onto a CLI error code.
 */
export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) return error;
  if (error instanceof AbortError) return createError('CANCELLED', error.message);
  if (error instanceof TierFailure) {
    const unreachable = error.cause instanceof TransportError && error.cause.reason === 'unreachable';
    const code: CliErrorCode = unreachable ? 'BACKEND_UNAVAILABLE' : 'TIER_FAILED';
    return createError(code, error.message, { tier: error.tier, stage: error.stage, failures: error.failures, total: error.total });
  }
  if (error instanceof TransportError) return createError('BACKEND_UNAVAILABLE', error.message, { reason: error.reason });
  if (error instanceof PermissionDenied) return createError('PERMISSION_DENIED', error.message, { tool: error.toolName });
  if (error instanceof ConfigurationError) return createError('CONFIG_INVALID', error.message, { key: error.key });
  if (error instanceof QuorumFailure) {
    return createError('QUORUM_NOT_MET', error.message, { failures: error.failures, total: error.total });
  }
  if (error instanceof StorageError || error instanceof CacheCorruption) return createError('STORAGE_ERROR', error.message);
  if (isEngineError(error)) return createError('UNKNOWN', error.message, { code: error.code });
  return createError('UNKNOWN', error instanceof Error ? error.message : String(error));
}

export function formatError(error: CliError): string {
  const lines = [`Error [${error.code}]: ${error.message}`];
  if (error.suggestion) lines.push('', `Suggestion: ${error.suggestion}`);
  return lines.join('\n');
}

export function formatErrorJson(error: CliError): string {
  return JSON.stringify({ error: { code: error.code, message: error.message, suggestion: error.suggestion, details: error.details } }, null, 2);
}

export function getExitCode(error: CliError): number {
  return EXIT_CODES[error.code];
}
