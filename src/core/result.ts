/**
 * @fileoverview Result type for explicit error handling
 *
 * Used where a failure is data rather than control flow: resolving a git
 * pointer, parsing a document file, evaluating one API out of many.
 */

// ============================================================================
// CORE RESULT TYPE
// ============================================================================

export type Result<T, E = Error> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly error: E };

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
