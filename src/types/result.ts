/**
 * Result Type
 *
 * Success-or-failure value used where a caller is expected to branch on the
 * outcome instead of catching. The pipeline and path validation return these.
 */

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

/**
 * @example
 * ```ts
 * const outcome = await pipeline.run({ code });
 * if (outcome.ok) {
 *   console.log(outcome.value.findings.length);
 * } else {
 *   console.error(outcome.error.code);
 * }
 * ```
 */
export type Result<T, E = Error> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}
