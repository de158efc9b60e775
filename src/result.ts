/**
 * Result type for recoverable failures.
 *
 * Parsers and converters return a Result instead of throwing so that batch
 * callers can keep going after a bad item.
 */

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E }

export function Ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value }
}

export function Err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error }
}
