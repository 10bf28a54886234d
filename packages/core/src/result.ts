/**
 * Outcome of an operation whose failure is an expected, typed value rather
 * than an exception.
 *
 * Persistence uses it to tell "nothing stored yet" from "stored but
 * unusable" without a try/catch at the call site.
 * @example
 * ```typescript
 * const loaded = await credential.tryLoad();
 * if (!loaded.ok) {
 *   // the file exists but failed its checks: a DataIntegrityError
 *   throw loaded.error;
 * }
 * if (!loaded.value) {
 *   await auth.login();
 * }
 * ```
 * @public
 */
export type Result<T, E = Error> = Ok<T> | Err<E>;

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}
