/**
 * Success-or-failure values.
 *
 * Decoding steps return these instead of throwing, so a malformed ref or
 * object travels up as data until the reader decides whether to throw it
 * or fall back to a default.
 */

export interface Success<T> {
  success: true;
  value: T;
}

export interface Failure<E = Error> {
  success: false;
  error: E;
}

export type Result<T, E = Error> = Success<T> | Failure<E>;

export function ok<T>(value: T): Success<T> {
  return { success: true, value };
}

export function err<E = Error>(error: E): Failure<E> {
  return { success: false, error };
}
