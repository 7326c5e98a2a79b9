import type { AppError } from "./app-error.js";

export interface ResultExceptionOptions {
  readonly error?: AppError;
  readonly cause?: unknown;
}

/**
 * Throwable carrier for an {@link AppError}, for code paths that have to
 * leave the Result flow (e.g. `getValueOrThrow`, framework callbacks).
 *
 * @example
 * ```typescript
 * throw new ResultException("Customer lookup failed", {
 *   error: Errors.notFound("Customer 42 not found"),
 * });
 * ```
 */
export class ResultException extends Error {
  readonly error: AppError | undefined;

  constructor(message?: string, options: ResultExceptionOptions = {}) {
    super(message ?? options.error?.description, { cause: options.cause });
    this.name = "ResultException";
    this.error = options.error;
  }
}
