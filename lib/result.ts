/**
 * Result type for composable error handling.
 *
 * Represents either success (Ok) or failure (Err).
 * Used wherever failure is an expected outcome rather than a bug, e.g.
 * a deletion whose target section is absent.
 *
 * @example
 * ```typescript
 * const result = deleteSection(text, "ABSTRACT")
 *
 * if (!result.ok) {
 *   logger.warn("Ablation skipped", { reason: result.error.reason })
 *   return
 * }
 *
 * write(result.value.mutatedText)
 * ```
 */

/**
 * Result type - represents either success or failure.
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E }

/**
 * Create a success result.
 */
export const Ok = <T>(value: T): Result<T, never> => ({
  ok: true,
  value,
})

/**
 * Create a failure result.
 */
export const Err = <E>(error: E): Result<never, E> => ({
  ok: false,
  error,
})
