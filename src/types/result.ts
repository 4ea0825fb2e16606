// ═══════════════════════════════════════════════════════════════════════════════
// RESULT PATTERN — Type-Safe Error Handling
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// CORE RESULT TYPE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Success variant of Result.
 */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
  readonly error?: never;
}

/**
 * Failure variant of Result.
 */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
  readonly value?: never;
}

/**
 * Result type representing either success (Ok) or failure (Err).
 *
 * Use this instead of throwing exceptions for expected failure cases.
 *
 * @example
 * ```typescript
 * const parsed = parseMappingRecords(raw);
 * if (parsed.ok) {
 *   index(parsed.value);
 * } else {
 *   report(parsed.error);
 * }
 * ```
 */
export type Result<T, E = Error> = Ok<T> | Err<E>;

// ─────────────────────────────────────────────────────────────────────────────────
// CONSTRUCTORS
// ─────────────────────────────────────────────────────────────────────────────────

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}
