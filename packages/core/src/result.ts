/**
 * Result<T>: the outcome of an operation, either a success carrying a value
 * or a failure carrying an {@link AppError}.
 *
 * The error slot of a success always holds the {@link NONE} sentinel and the
 * error slot of a failure never does; every construction path enforces this.
 *
 * Reading `value` on a failure yields `undefined` instead of throwing. Check
 * `isSuccess` first (it narrows the union), or use `getValueOrThrow()` when a
 * failure at that point is a bug.
 *
 * @example
 * ```typescript
 * function findUser(id: number): Result<User> {
 *   const user = users.get(id);
 *   return user
 *     ? Result.success(user)
 *     : Result.failure(Errors.notFound(`User ${id} not found`));
 * }
 *
 * const greeting = findUser(7)
 *   .map((user) => user.name)
 *   .match(
 *     (name) => `Hello, ${name}`,
 *     (error) => error.description
 *   );
 * ```
 *
 * @module result
 */

import { AppError } from "./app-error.js";
import { ErrorCode } from "./error-code.js";
import { Errors } from "./errors.js";
import { ResultInvariantError } from "./library-errors.js";
import { ResultException } from "./result-exception.js";
import { settle } from "./settle.js";

class NoneErrorCode extends ErrorCode {
  static readonly instance = new NoneErrorCode();
  readonly name = "None";
  private constructor() {
    super();
  }
}

/**
 * The "no error" sentinel held by every successful Result. Never a real
 * error, and never registered with the codec.
 */
export const NONE: AppError = new AppError(NoneErrorCode.instance, "None");

export function isNone(error: AppError): boolean {
  return error.code.equals(NoneErrorCode.instance);
}

/**
 * Combinators shared by both halves of {@link Result}. They live here, once,
 * so that calling them on the `Success | Failure` union type-checks.
 */
abstract class ResultBase<T> {
  abstract readonly isSuccess: boolean;
  abstract readonly error: AppError;
  abstract readonly value: T | undefined;

  get isFailure(): boolean {
    return !this.isSuccess;
  }

  protected abstract self(): Result<T>;

  /** Transform the value of a success; a failure passes through untouched. */
  map<U>(mapper: (value: T) => U): Result<U> {
    const self = this.self();
    return self.isSuccess
      ? new Success(mapper(self.value))
      : new Failure<U>(self.error);
  }

  /** Transform the error of a failure; a success passes through untouched. */
  mapError(mapper: (error: AppError) => AppError): Result<T> {
    const self = this.self();
    return self.isSuccess ? self : new Failure<T>(mapper(self.error));
  }

  /**
   * Chain a step that can itself fail. Never invoked for a failure.
   *
   * @example
   * ```typescript
   * validateOrder(request)
   *   .bind((order) => reserveStock(order))
   *   .bind((order) => chargeCard(order))
   *   .map((charge) => charge.receiptId);
   * ```
   */
  bind<U>(binder: (value: T) => Result<U>): Result<U> {
    const self = this.self();
    return self.isSuccess ? binder(self.value) : new Failure<U>(self.error);
  }

  /** Run exactly one of the two branches and return what it returns. */
  match<R>(
    onSuccess: (value: T) => R,
    onFailure: (error: AppError) => R
  ): R {
    const self = this.self();
    return self.isSuccess ? onSuccess(self.value) : onFailure(self.error);
  }

  /** Side effect on success; returns this same Result. */
  tap(action: (value: T) => void): Result<T> {
    const self = this.self();
    if (self.isSuccess) action(self.value);
    return self;
  }

  mapAsync<U>(mapper: (value: T) => U | PromiseLike<U>): Promise<Result<U>> {
    const self = this.self();
    if (!self.isSuccess) return Promise.resolve(new Failure<U>(self.error));
    return settle(() => mapper(self.value)).then(
      (mapped): Result<U> => new Success(mapped)
    );
  }

  bindAsync<U>(
    binder: (value: T) => Result<U> | PromiseLike<Result<U>>
  ): Promise<Result<U>> {
    const self = this.self();
    if (!self.isSuccess) return Promise.resolve(new Failure<U>(self.error));
    return settle<Result<U>>(() => binder(self.value));
  }

  matchAsync<R>(
    onSuccess: (value: T) => R | PromiseLike<R>,
    onFailure: (error: AppError) => R | PromiseLike<R>
  ): Promise<R> {
    const self = this.self();
    return self.isSuccess
      ? settle(() => onSuccess(self.value))
      : settle(() => onFailure(self.error));
  }

  /** Side effect on success that may suspend; resolves to this same Result. */
  tapAsync(action: (value: T) => unknown): Promise<Result<T>> {
    const self = this.self();
    if (!self.isSuccess) return Promise.resolve(self);
    return settle(() => action(self.value)).then((): Result<T> => self);
  }

  /** Replace the value of a success, keeping a failure as it is. */
  toResult<U>(value: U): Result<U> {
    const self = this.self();
    return self.isSuccess ? new Success(value) : new Failure<U>(self.error);
  }

  /** @throws ResultException carrying the error when this is a failure */
  getValueOrThrow(): T {
    const self = this.self();
    if (self.isSuccess) return self.value;
    throw new ResultException(`Result failed: ${self.error.description}`, {
      error: self.error,
    });
  }

  getValueOr<F>(fallback: F): T | F {
    const self = this.self();
    return self.isSuccess ? self.value : fallback;
  }
}

export class Success<T> extends ResultBase<T> {
  readonly isSuccess = true as const;
  readonly error: AppError = NONE;

  constructor(readonly value: T) {
    super();
  }

  protected self(): Result<T> {
    return this;
  }
}

export class Failure<T> extends ResultBase<T> {
  readonly isSuccess = false as const;
  readonly value: undefined = undefined;
  readonly error: AppError;

  /**
   * @throws ResultInvariantError when `error` is absent or the None sentinel
   */
  constructor(error: AppError) {
    super();
    if (!(error instanceof AppError) || isNone(error)) {
      throw new ResultInvariantError("Failure result must have an error");
    }
    this.error = error;
  }

  protected self(): Result<T> {
    return this;
  }
}

export type Result<T = void> = Success<T> | Failure<T>;

/**
 * Map something thrown to the AppError a failed Result should carry. A
 * ResultException keeps the error it carries.
 */
export function errorFromThrown(thrown: unknown): AppError {
  if (thrown instanceof ResultException && thrown.error !== undefined) {
    return thrown.error;
  }
  return Errors.exception(thrown);
}

export const Result = {
  success<T>(value: T): Result<T> {
    return new Success(value);
  },

  /** Successful Result without a value. */
  ok(): Result<void> {
    return new Success<void>(undefined);
  },

  failure<T = never>(error: AppError): Result<T> {
    return new Failure<T>(error);
  },

  /**
   * General constructor, used where the success flag arrives as data (e.g.
   * from the wire).
   *
   * @throws ResultInvariantError when `isSuccess` disagrees with `error`
   */
  of<T>(isSuccess: boolean, error: AppError, value: T): Result<T> {
    if (!(error instanceof AppError)) {
      throw new ResultInvariantError("Result requires an error slot");
    }
    if (isSuccess) {
      if (!isNone(error)) {
        throw new ResultInvariantError("Success result cannot have an error");
      }
      return new Success(value);
    }
    if (isNone(error)) {
      throw new ResultInvariantError("Failure result must have an error");
    }
    return new Failure<T>(error);
  },

  /**
   * Run `fn`, capturing a throw as an UnhandledExceptionError failure.
   */
  try<T>(fn: () => T): Result<T> {
    try {
      return new Success(fn());
    } catch (e) {
      return new Failure<T>(errorFromThrown(e));
    }
  },

  isResult(value: unknown): value is Result<unknown> {
    return value instanceof Success || value instanceof Failure;
  },
};
