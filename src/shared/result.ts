/**
 * Result — success or typed failure as a plain value.
 * Layer: Shared
 *
 * The DAO and service return these instead of throwing, so every failure kind
 * shows up in the signature and the controller has to handle it.
 */
import type { AppError } from './errors/AppError';

export type Ok<T> = { readonly ok: true; readonly value: T };
export type Fail<E> = { readonly ok: false; readonly error: E };
export type Result<T, E = AppError> = Ok<T> | Fail<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function fail<E>(error: E): Fail<E> {
  return { ok: false, error };
}
