import type { AppError } from "../errors/app-error.js";

/**
 * Result type: fallible operations return Result<T, E> instead of throwing.
 * Ports, services and the composer all speak it; only the HTTP edge turns an
 * Err into a response.
 */
export type Result<T, E = AppError> = Ok<T> | Err<E>;

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const err = <E>(error: E): Err<E> => ({ ok: false, error });
