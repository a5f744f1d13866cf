/**
 * @fileoverview Resolver error hierarchy
 *
 * Every non-recoverable failure surfaces as one of these typed errors so
 * callers can tell "resolution failed" apart from "no entity found".
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

export abstract class ResolverError extends Error {
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
// VALIDATION ERRORS
// ============================================================================

export class ValidationError extends ResolverError {
  readonly code = 'VALIDATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(`Validation failed for ${field}: expected ${expected}, got ${received}`);
    this.name = 'ValidationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        field: this.field,
        expected: this.expected,
        received: this.received,
      },
    };
  }
}

// ============================================================================
// EMBEDDING ERRORS
// ============================================================================

export class EmbeddingError extends ResolverError {
  readonly code = 'EMBEDDING_ERROR';

  constructor(
    readonly model: string,
    readonly retryable: boolean,
    message: string,
    readonly inputCount?: number,
  ) {
    super(`Embedding with ${model} failed: ${message}`);
    this.name = 'EmbeddingError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        model: this.model,
        inputCount: this.inputCount,
      },
    };
  }
}

// ============================================================================
// STORAGE ERRORS
// ============================================================================

export type StorageOperation = 'open' | 'read' | 'write' | 'delete' | 'lock' | 'migrate';

export class StorageError extends ResolverError {
  readonly code = 'STORAGE_ERROR';

  constructor(
    readonly operation: StorageOperation,
    readonly retryable: boolean,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Storage ${operation} failed: ${message}`);
    this.name = 'StorageError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        operation: this.operation,
        cause: this.cause?.message,
      },
    };
  }
}

/**
 * The record store rejected a write. Records listed in `writtenIds` did reach
 * the store before the failure.
 */
export class IndexWriteError extends ResolverError {
  readonly code = 'INDEX_WRITE_ERROR';
  readonly retryable = true;

  constructor(
    message: string,
    readonly writtenIds: readonly string[],
    readonly failedIds: readonly string[],
    readonly cause?: Error,
  ) {
    super(`Index write failed: ${message}`);
    this.name = 'IndexWriteError';
  }

  get partial(): boolean {
    return this.writtenIds.length > 0;
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        writtenIds: [...this.writtenIds],
        failedIds: [...this.failedIds],
        cause: this.cause?.message,
      },
    };
  }
}

/** Non-fatal: raised only when the store itself fails, never for a missing entity. */
export class DeleteError extends ResolverError {
  readonly code = 'DELETE_ERROR';
  readonly retryable = true;

  constructor(
    readonly canonical: string,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Delete of ${canonical} failed: ${message}`);
    this.name = 'DeleteError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        canonical: this.canonical,
        cause: this.cause?.message,
      },
    };
  }
}

export class IndexNotOpenError extends ResolverError {
  readonly code = 'INDEX_NOT_OPEN';
  readonly retryable = false;

  constructor(operation: string) {
    super(`Entity index is not open (${operation}). Call open() first.`);
    this.name = 'IndexNotOpenError';
  }
}

// ============================================================================
// RESOLUTION ERRORS
// ============================================================================

export class ResolutionTimeoutError extends ResolverError {
  readonly code = 'RESOLUTION_TIMEOUT';
  readonly retryable = true;

  constructor(readonly budgetMs: number) {
    super(`Resolution exceeded its ${budgetMs}ms budget`);
    this.name = 'ResolutionTimeoutError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { budgetMs: this.budgetMs },
    };
  }
}

// ============================================================================
// TYPE GUARDS
// ============================================================================

export function isResolverError(error: unknown): error is ResolverError {
  return error instanceof ResolverError;
}

export function isRetryableError(error: unknown): boolean {
  return isResolverError(error) && error.retryable;
}
