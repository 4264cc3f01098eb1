import { AppError } from '@/errors';

/**
 * Outcome of a service operation
 *
 * Validation failures are returned, not thrown: the dispatch loop
 * branches on `success` and renders `error.message` uniformly.
 */
export interface Success<T> {
  success: true;
  value: T;
}

export interface Failure<E extends AppError = AppError> {
  success: false;
  error: E;
}

export type Outcome<T, E extends AppError = AppError> = Success<T> | Failure<E>;

export function ok<T>(value: T): Success<T> {
  return { success: true, value };
}

export function fail<E extends AppError>(error: E): Failure<E> {
  return { success: false, error };
}
