/**
 * Suspension-aware combinators over a Result or a promise of one.
 *
 * Each step starts only after the previous one has settled, and a failure
 * short-circuits every later step exactly like the synchronous methods. A
 * rejected step rejects the returned promise; nothing here converts a
 * rejection (timeouts and aborts included) into a failed Result except
 * {@link tryAsync}, which exists to do precisely that.
 *
 * @example
 * ```typescript
 * const receipt = await bindAsync(
 *   mapAsync(loadCart(cartId), (cart) => priceCart(cart)),
 *   (priced) => chargeCard(priced)
 * );
 * ```
 *
 * @module result-async
 */

import type { AppError } from "./app-error.js";
import { Result, errorFromThrown } from "./result.js";
import { settle } from "./settle.js";

export type ResultLike<T> = Result<T> | PromiseLike<Result<T>>;

export function mapAsync<T, U>(
  input: ResultLike<T>,
  mapper: (value: T) => U | PromiseLike<U>
): Promise<Result<U>> {
  return settle<Result<T>>(() => input).then((result) => result.mapAsync(mapper));
}

export function bindAsync<T, U>(
  input: ResultLike<T>,
  binder: (value: T) => Result<U> | PromiseLike<Result<U>>
): Promise<Result<U>> {
  return settle<Result<T>>(() => input).then((result) => result.bindAsync(binder));
}

export function matchAsync<T, R>(
  input: ResultLike<T>,
  onSuccess: (value: T) => R | PromiseLike<R>,
  onFailure: (error: AppError) => R | PromiseLike<R>
): Promise<R> {
  return settle<Result<T>>(() => input).then((result) =>
    result.matchAsync(onSuccess, onFailure)
  );
}

export function tapAsync<T>(
  input: ResultLike<T>,
  action: (value: T) => unknown
): Promise<Result<T>> {
  return settle<Result<T>>(() => input).then((result) => result.tapAsync(action));
}

/**
 * Run a possibly-suspending computation, capturing a throw or rejection as a
 * failed Result.
 */
export function tryAsync<T>(fn: () => T | PromiseLike<T>): Promise<Result<T>> {
  return settle(fn).then(
    (value) => Result.success(value),
    (thrown: unknown) => Result.failure<T>(errorFromThrown(thrown))
  );
}
