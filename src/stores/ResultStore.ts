/**
 * ResultStore interface for caching serialized Results under string keys.
 *
 * Every method returns a Result of its own, so callers handle store problems
 * (no connection, backend down, unreadable entry) the same way they handle
 * any other failure. A stored Result is the inner value of a successful
 * outer Result: a stored failure is not a store failure.
 *
 * @module stores
 */

import type { Result, ValueSchema } from '@faultline/core';

/**
 * Contract implemented by result stores.
 *
 * @example
 * ```typescript
 * const store: ResultStore = new RedisResultStore();
 * await store.connect('redis://localhost:6379');
 *
 * await store.put('quote:42', Result.success({ total: 99 }), 300);
 *
 * const cached = await store.get('quote:42', QuoteSchema);
 * if (cached.isSuccess) {
 *   // cached.value is the stored Result<Quote>
 * }
 * ```
 */
export interface ResultStore {
  /**
   * Open the backing connection.
   *
   * @param connectionString - backend URL, e.g. `redis://host:port/db`
   * @returns ConfigurationError failure for a malformed URL, ApiError
   * failure when the backend cannot be reached
   */
  connect(connectionString: string): Promise<Result<void>>;

  /**
   * Close the connection. Safe to call when not connected.
   */
  disconnect(): Promise<Result<void>>;

  /**
   * Serialize and store a Result.
   *
   * @param ttlSeconds - expiry; falls back to the store's default TTL
   */
  put<T>(key: string, result: Result<T>, ttlSeconds?: number): Promise<Result<void>>;

  /**
   * Load a stored Result.
   *
   * A missing key is a NotFoundError failure. An entry that no longer
   * decodes (unknown type tag, value rejected by `schema`) is an ApiError
   * failure.
   */
  get(key: string): Promise<Result<Result<unknown>>>;
  get<T>(key: string, schema: ValueSchema<T>): Promise<Result<Result<T>>>;

  /**
   * Remove an entry.
   *
   * @returns whether anything was removed
   */
  delete(key: string): Promise<Result<boolean>>;
}
