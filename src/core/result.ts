/**
 * @fileoverview Result type for explicit error handling
 *
 * Each step of sync and resolution returns a Result so the caller decides
 * whether to continue, instead of relying on broad exception suppression.
 */

// ============================================================================
// CORE RESULT TYPE
// ============================================================================

export type OkResult<T> = { readonly ok: true; readonly value: T };
export type ErrResult<E> = { readonly ok: false; readonly error: E };
export type Result<T, E = Error> = OkResult<T> | ErrResult<E>;

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// ============================================================================
// RESULT HELPERS
// ============================================================================

/**
 * Wrap an async function in a Result
 */
export async function safeAsync<T>(
  fn: () => Promise<T>
): Promise<Result<T, Error>> {
  try {
    return Ok(await fn());
  } catch (e) {
    return Err(e instanceof Error ? e : new Error(String(e)));
  }
}

/**
 * Unwrap a Result, throwing if error
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error;
}

/**
 * Retry an operation with exponential backoff
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: {
    maxRetries?: number;
    delayMs?: number;
    backoffMultiplier?: number;
    maxDelayMs?: number;
    shouldRetry?: (error: Error) => boolean;
    onRetry?: (error: Error, attempt: number) => void;
  } = {}
): Promise<Result<T, Error>> {
  const {
    maxRetries = 3,
    delayMs = 1000,
    backoffMultiplier = 2,
    maxDelayMs = 60_000,
    shouldRetry = () => true,
    onRetry,
  } = options;

  let lastError: Error | undefined;
  let currentDelay = delayMs;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    const result = await safeAsync(fn);

    if (result.ok) {
      return result;
    }

    lastError = result.error;

    if (!shouldRetry(result.error)) {
      return Err(result.error);
    }

    // Wait before next attempt (except on last attempt)
    if (attempt < maxRetries) {
      onRetry?.(result.error, attempt + 1);
      if (currentDelay > 0) {
        await new Promise((resolve) => setTimeout(resolve, currentDelay));
      }
      currentDelay = Math.min(currentDelay * backoffMultiplier, maxDelayMs);
    }
  }

  return Err(lastError ?? new Error('Max retries exceeded'));
}
