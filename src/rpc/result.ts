// This module defines the tagged result shared by handlers and argument decoders.

export interface Success<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Failure<E extends Error = Error> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E extends Error = Error> = Success<T> | Failure<E>;

// What a handler produces for one call: a success value or an error value on the same channel.
export type RpcResult = Result<unknown>;

export function success<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function failure<E extends Error>(error: E): Failure<E> {
  return { ok: false, error };
}

// This guard narrows results that carry an error value.
export function isFailure<T, E extends Error>(result: Result<T, E>): result is Failure<E> {
  return !result.ok;
}

