/**
 * Generic Result type for expected failures.
 *
 * Loading, analysis and CLI steps return a Result for anything a user can
 * cause (unreadable file, too few values, bad flag). Throw only for
 * programmer errors.
 */

export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
