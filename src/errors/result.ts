/**
 * Result type for fallible engine operations.
 *
 * Component boundaries return a Result instead of throwing so a batch can
 * inspect each outcome and keep going.
 */

import { QuoteCastError, errorMessage, persistenceFailure } from './errors.js';

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E = QuoteCastError> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return !result.ok;
}

export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return result.ok ? ok(fn(result.value)) : result;
}

export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
  return result.ok ? result.value : fallback;
}

/**
 * Run a store call and convert a thrown error into a persistence failure.
 * A thrown QuoteCastError keeps its own kind.
 */
export function tryCatch<T>(fn: () => T, context: string): Result<T> {
  try {
    return ok(fn());
  } catch (error) {
    if (error instanceof QuoteCastError) {
      return err(error);
    }
    return err(persistenceFailure(`${context}: ${errorMessage(error)}`, error));
  }
}
