/**
 * @fileoverview Result type for explicit error handling
 *
 * Entry points that callers want to branch on without try/catch return
 * Result<T, E> instead of throwing.
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
 * Unwrap a Result, throwing if error
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error;
}

/**
 * Map a Result's success value
 */
export function mapResult<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return result.ok ? Ok(fn(result.value)) : result;
}

/**
 * Run a throwing function, capturing errors that pass `isExpected`.
 * Anything else is rethrown untouched.
 */
export function captureResult<T, E>(
  fn: () => T,
  isExpected: (error: unknown) => error is E,
): Result<T, E> {
  try {
    return Ok(fn());
  } catch (e) {
    if (isExpected(e)) {
      return Err(e);
    }
    throw e;
  }
}
