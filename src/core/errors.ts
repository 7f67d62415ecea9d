/**
 * @fileoverview Engine error hierarchy
 *
 * Every failure that crosses a component boundary is one of these typed
 * errors. Worker-level failures never appear here: the crowd sampler absorbs
 * them into failure counts and only batch or tier failures surface.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class EngineError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// TRANSPORT ERRORS
// ============================================================================

export type TransportFailureReason = 'unreachable' | 'http_status' | 'timeout' | 'aborted' | 'empty_response';

/** Inference backend unreachable, slow, or answering with a non-2xx status. */
export class TransportError extends EngineError {
  readonly code = 'TRANSPORT_ERROR';

  constructor(
    readonly reason: TransportFailureReason,
    readonly retryable: boolean,
    message: string,
    readonly status?: number,
  ) {
    super(`Transport ${reason}: ${message}`);
    this.name = 'TransportError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { reason: this.reason, status: this.status },
    };
  }
}

// ============================================================================
// PARSE ERRORS
// ============================================================================

export class ParseError extends EngineError {
  readonly code = 'PARSE_ERROR';
  readonly retryable = true;

  constructor(
    readonly format: string,
    message: string,
    readonly excerpt?: string,
  ) {
    super(`Failed to parse ${format}: ${message}`);
    this.name = 'ParseError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { format: this.format, excerpt: this.excerpt },
    };
  }
}

// ============================================================================
// CONSENSUS ERRORS
// ============================================================================

/** Crowd failures exceeded the quorum floor; no votes are usable. */
export class QuorumFailure extends EngineError {
  readonly code = 'QUORUM_FAILURE';
  readonly retryable = true;

  constructor(
    readonly failures: number,
    readonly total: number,
    readonly floor: number,
    label = 'crowd',
  ) {
    super(`too many ${label} failures (${failures}/${total})`);
    this.name = 'QuorumFailure';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { failures: this.failures, total: this.total, floor: this.floor },
    };
  }
}

/** Adjudicator unusable and every vote was empty, so the fallback had nothing to pick. */
export class AdjudicationFailure extends EngineError {
  readonly code = 'ADJUDICATION_FAILURE';
  readonly retryable = true;

  constructor(message: string, readonly voteCount: number) {
    super(message);
    this.name = 'AdjudicationFailure';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { voteCount: this.voteCount },
    };
  }
}

// ============================================================================
// STORAGE ERRORS
// ============================================================================

export type StorageOperation = 'read' | 'write' | 'lock' | 'delete';

export class StorageError extends EngineError {
  readonly code = 'STORAGE_ERROR';

  constructor(
    readonly operation: StorageOperation,
    readonly retryable: boolean,
    message: string,
    readonly filePath?: string,
  ) {
    super(`Storage ${operation} failed: ${message}`);
    this.name = 'StorageError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { operation: this.operation, filePath: this.filePath },
    };
  }
}

/**
 * Unreadable or schema-invalid state file. Never thrown past the cache:
 * the record is treated as absent and this value is only logged.
 */
export class CacheCorruption extends EngineError {
  readonly code = 'CACHE_CORRUPTION';
  readonly retryable = false;

  constructor(readonly filePath: string, reason: string) {
    super(`Corrupt state file ${filePath}: ${reason}`);
    this.name = 'CacheCorruption';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { filePath: this.filePath },
    };
  }
}

// ============================================================================
// PERMISSION / CONFIGURATION
// ============================================================================

export class PermissionDenied extends EngineError {
  readonly code = 'PERMISSION_DENIED';
  readonly retryable = false;

  constructor(
    readonly toolName: string,
    readonly action: string,
    readonly targetPath: string,
  ) {
    super(`Permission denied for ${toolName} (${action}) on ${targetPath}`);
    this.name = 'PermissionDenied';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { toolName: this.toolName, action: this.action, path: this.targetPath },
    };
  }
}

export class ConfigurationError extends EngineError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly key: string,
    message: string,
  ) {
    super(`Invalid configuration ${key}: ${message}`);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { key: this.key },
    };
  }
}

// ============================================================================
// TIER FAILURE
// ============================================================================

export type TierStage = 'permission' | 'listing' | 'workers' | 'adjudication' | 'summaries' | 'synthesis' | 'persist';

/** A tier aborted; names the stage and how many calls failed there. */
export class TierFailure extends EngineError {
  readonly code = 'TIER_FAILURE';

  constructor(
    readonly tier: string,
    readonly stage: TierStage,
    message: string,
    readonly failures = 0,
    readonly total = 0,
    readonly cause?: Error,
  ) {
    super(`${tier} analysis failed during ${stage}${total > 0 ? ` (${failures}/${total} failed)` : ''}: ${message}`);
    this.name = 'TierFailure';
  }

  get retryable(): boolean {
    return isEngineError(this.cause) ? this.cause.retryable : false;
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        tier: this.tier,
        stage: this.stage,
        failures: this.failures,
        total: this.total,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// TYPE GUARDS
// ============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

// ============================================================================
// FACTORY
// ============================================================================

export const Errors = {
  transport: (reason: TransportFailureReason, message: string, status?: number) =>
    new TransportError(reason, reason !== 'aborted', message, status),
  parse: (format: string, message: string, excerpt?: string) => new ParseError(format, message, excerpt),
  quorum: (failures: number, total: number, floor: number, label?: string) =>
    new QuorumFailure(failures, total, floor, label),
  adjudication: (message: string, voteCount: number) => new AdjudicationFailure(message, voteCount),
  storage: (operation: StorageOperation, message: string, filePath?: string, retryable = false) =>
    new StorageError(operation, retryable, message, filePath),
  corruption: (filePath: string, reason: string) => new CacheCorruption(filePath, reason),
  permissionDenied: (toolName: string, action: string, targetPath: string) =>
    new PermissionDenied(toolName, action, targetPath),
  config: (key: string, message: string) => new ConfigurationError(key, message),
  tier: (tier: string, stage: TierStage, message: string, failures?: number, total?: number, cause?: Error) =>
    new TierFailure(tier, stage, message, failures, total, cause),
};
