/**
 * @fileoverview Result pattern
 *
 * Expected failures of an assessment (missing demographics, a payload the
 * schema rejects, an unavailable history store) travel on the return path.
 * Only programming errors are thrown.
 *
 * @example
 * ```typescript
 * const result = assessCardiacRisk(input);
 * if (result.success) {
 *   render(result.value.riskCategory);
 * } else {
 *   showFormError(result.error.missingFields);
 * }
 * ```
 *
 * @module domain/shared/types
 */

export interface Success<T> {
  readonly success: true;
  readonly value: T;
  readonly error?: never;
}

export interface Failure<E> {
  readonly success: false;
  readonly error: E;
  readonly value?: never;
}

export type Result<T, E = Error> = Success<T> | Failure<E>;

export function ok<T>(value: T): Success<T> {
  return { success: true, value };
}

export function err<E>(error: E): Failure<E> {
  return { success: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is Success<T> {
  return result.success;
}

export function isErr<T, E>(result: Result<T, E>): result is Failure<E> {
  return !result.success;
}

/**
 * Value of a successful result
 *
 * @throws the carried error when the result is a failure
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.success) {
    return result.value;
  }
  throw result.error;
}

export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
  return result.success ? result.value : fallback;
}
