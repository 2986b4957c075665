/**
 * Result Type for Functional Error Handling
 *
 * Expected failures inside the analysis pipeline (unparsable model output,
 * records that fail a shape check) travel as values; exceptions are kept for
 * conditions the caller has to see.
 *
 * @module
 */

// =============================================================================
// Result Type Definition
// =============================================================================

/**
 * Result type representing either success (Ok) or failure (Err)
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates a successful Result containing a value
 */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/**
 * Creates a failed Result containing an error
 */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

// =============================================================================
// Type Guards
// =============================================================================

export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is { ok: false; error: E } {
  return !result.ok;
}
