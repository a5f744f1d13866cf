/**
 * @fileoverview CLI error handling with helpful suggestions
 */

import { isResolverError } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'VALIDATION_FAILED'
  | 'STORAGE_ERROR'
  | 'EMBEDDING_FAILED'
  | 'SYNC_FAILED'
  | 'DELETE_FAILED'
  | 'QUERY_FAILED'
  | 'TIMEOUT'
  | 'INTERNAL';

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

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  INVALID_ARGUMENT: 'Run `entity-resolver help <command>` for usage information.',
  VALIDATION_FAILED: 'Check the snapshot or configuration values named in the message.',
  STORAGE_ERROR: 'Check that the database path is writable and not opened by another process.',
  EMBEDDING_FAILED: 'Check that the embedding model can be loaded (first use downloads it).',
  SYNC_FAILED: 'Fix the entities listed above and run sync again; sync is idempotent.',
  DELETE_FAILED: 'Retry the delete; entities that are already gone are not an error.',
  QUERY_FAILED: 'Try a simpler query or check `entity-resolver stats` for index health.',
  TIMEOUT: 'Raise `resolution.searchBudgetMs` or set it to 0 to disable the budget.',
  INTERNAL: 'Re-run with ENTITY_RESOLVER_LOG_LEVEL=debug for more detail.',
};

/** Process exit codes, grouped by failure family. */
export const EXIT_CODES: Record<CliErrorCode, number> = {
  INTERNAL: 1,
  INVALID_ARGUMENT: 2,
  VALIDATION_FAILED: 3,
  STORAGE_ERROR: 10,
  QUERY_FAILED: 20,
  TIMEOUT: 21,
  EMBEDDING_FAILED: 30,
  SYNC_FAILED: 40,
  DELETE_FAILED: 41,
};

const RESOLVER_ERROR_CODES: Record<string, CliErrorCode> = {
  VALIDATION_ERROR: 'VALIDATION_FAILED',
  EMBEDDING_ERROR: 'EMBEDDING_FAILED',
  STORAGE_ERROR: 'STORAGE_ERROR',
  INDEX_WRITE_ERROR: 'SYNC_FAILED',
  DELETE_ERROR: 'DELETE_FAILED',
  INDEX_NOT_OPEN: 'STORAGE_ERROR',
  RESOLUTION_TIMEOUT: 'TIMEOUT',
};

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

/**
 * Map anything thrown by a command onto a CliError.
 */
export function classifyError(error: unknown): CliError {
  if (error instanceof CliError) return error;
  if (isResolverError(error)) {
    const code = RESOLVER_ERROR_CODES[error.code] ?? 'INTERNAL';
    return createError(code, error.message, { resolverCode: error.code, retryable: error.retryable });
  }
  return createError('INTERNAL', getErrorMessage(error));
}

export function getExitCode(error: CliError): number {
  return EXIT_CODES[error.code];
}

export function formatError(error: CliError): string {
  const suggestion = error.suggestion ? `\n\nSuggestion: ${error.suggestion}` : '';
  return `Error [${error.code}]: ${error.message}${suggestion}`;
}

export function formatErrorJson(error: CliError): string {
  return JSON.stringify(
    {
      error: {
        code: error.code,
        message: error.message,
        suggestion: error.suggestion,
        details: error.details,
      },
    },
    null,
    2,
  );
}
