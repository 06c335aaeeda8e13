import { ErrorCode, JsonErrc, makeErrorCode } from './errors.js';

/**
 * Either a value or an `ErrorCode`. Every fallible step of the reader returns
 * one of these; steps are chained with `andThen` and the first failure
 * short-circuits the rest of the chain.
 */
export type Result<T> = Ok<T> | Err<T>;

export class Ok<T> {
  readonly ok = true;

  constructor(readonly value: T) {}

  map<U>(fn: (value: T) => U): Result<U> {
    return new Ok(fn(this.value));
  }

  andThen<U>(fn: (value: T) => Result<U>): Result<U> {
    return fn(this.value);
  }

  mapError(_fn: (error: ErrorCode) => ErrorCode): Result<T> {
    return this;
  }

  /** Downgrades the value to `error` when `predicate` rejects it. */
  filter(predicate: (value: T) => boolean, error: ErrorCode): Result<T> {
    return predicate(this.value) ? this : new Err<T>(error);
  }

  /** Forgets the value, keeping only success or failure. */
  drop(): Result<void> {
    return new Ok<void>(undefined);
  }

  valueOr(_fallback: T): T {
    return this.value;
  }

  unwrap(): T {
    return this.value;
  }
}

export class Err<T> {
  readonly ok = false;

  constructor(readonly error: ErrorCode) {}

  map<U>(_fn: (value: T) => U): Result<U> {
    return new Err<U>(this.error);
  }

  andThen<U>(_fn: (value: T) => Result<U>): Result<U> {
    return new Err<U>(this.error);
  }

  mapError(fn: (error: ErrorCode) => ErrorCode): Result<T> {
    return new Err<T>(fn(this.error));
  }

  filter(_predicate: (value: T) => boolean, _error: ErrorCode): Result<T> {
    return this;
  }

  drop(): Result<void> {
    return new Err<void>(this.error);
  }

  valueOr(fallback: T): T {
    return fallback;
  }

  unwrap(): T {
    throw this.error.toException();
  }
}

export function ok(): Result<void>;
export function ok<T>(value: T): Result<T>;
export function ok(value?: unknown): Result<unknown> {
  return new Ok(value);
}

export function err<T = never>(code: JsonErrc | ErrorCode, message = ''): Result<T> {
  return new Err<T>(code instanceof ErrorCode ? code : makeErrorCode(code, message));
}

/** `ok()` when `condition` holds, otherwise an error with `code`. */
export function makeResult(condition: boolean, code: JsonErrc, message = ''): Result<void> {
  return condition ? ok() : err(code, message);
}

export function isResult(value: unknown): value is Result<unknown> {
  return value instanceof Ok || value instanceof Err;
}
