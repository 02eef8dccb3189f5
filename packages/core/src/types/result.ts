/**
 * Result<T, E> type for functional error handling
 * Loaders return a Result so one failed unit never throws through a batch
 */

export type Result<T, E> = Ok<T> | Err<E>;

/**
 * Success variant of Result<T, E>
 */
export class Ok<T> {
  readonly _tag = 'Ok' as const;

  constructor(public readonly value: T) {}

  isOk(): this is Ok<T> {
    return true;
  }

  isErr(): this is never {
    return false;
  }

  /**
   * Transform the success value using the provided function
   */
  map<U>(fn: (value: T) => U): Ok<U> {
    return new Ok(fn(this.value));
  }

  /**
   * Get the value or return the provided default
   */
  unwrapOr(_defaultValue: T): T {
    return this.value;
  }
}

/**
 * Error variant of Result<T, E>
 */
export class Err<E> {
  readonly _tag = 'Err' as const;

  constructor(public readonly error: E) {}

  isOk(): this is never {
    return false;
  }

  isErr(): this is Err<E> {
    return true;
  }

  /**
   * Map over the success value (no-op for Err)
   */
  map(_fn: (_value: never) => unknown): Err<E> {
    return this;
  }

  /**
   * Get the value or return the provided default
   */
  unwrapOr<T>(defaultValue: T): T {
    return defaultValue;
  }
}

/**
 * Helper function to create a success Result
 */
export function ok<T>(value: T): Ok<T> {
  return new Ok(value);
}

/**
 * Helper function to create an error Result
 */
export function err<E>(error: E): Err<E> {
  return new Err(error);
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.isOk();
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result.isErr();
}
