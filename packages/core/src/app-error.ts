import { ErrorCode, isErrorCode } from "./error-code.js";
import { ErrorConstructionError } from "./library-errors.js";

/**
 * Constructor of an AppError variant. Abstract so `isErrorType(AppError)` and
 * checks against intermediate base classes type-check too.
 */
export type AppErrorType<E extends AppError = AppError> = abstract new (
  ...args: never[]
) => E;

/**
 * Open base type for application failures: an {@link ErrorCode} plus a
 * human-readable description.
 *
 * AppError is a plain immutable value carried by a failed Result, not a
 * throwable. Variants subclass it and may add public fields; nothing in this
 * module changes when they do. To make a variant travel over the wire,
 * register it with `registerErrorType`.
 *
 * The codec writes every own enumerable field, and `private` or `protected`
 * fields are enumerable at runtime. A variant holding anything that must not
 * travel lists those fields in its `exclude` option.
 *
 * @example
 * ```typescript
 * class CustomerNotFoundError extends AppError {
 *   constructor(description: string, readonly customerId: string) {
 *     super(CustomerNotFoundErrorCode.instance, description);
 *   }
 * }
 * ```
 */
export class AppError {
  readonly code: ErrorCode;
  readonly description: string;

  /**
   * @throws ErrorConstructionError when `code` is not an ErrorCode or
   * `description` is empty or whitespace.
   */
  constructor(code: ErrorCode, description: string) {
    if (!isErrorCode(code)) {
      throw new ErrorConstructionError("AppError requires an ErrorCode");
    }
    if (typeof description !== "string" || description.trim() === "") {
      throw new ErrorConstructionError(
        "AppError description must not be empty or whitespace"
      );
    }
    this.code = code;
    this.description = description;
  }

  /**
   * True when this error is an instance of `type` or one of its subclasses.
   */
  isErrorType<E extends AppError>(type: AppErrorType<E>): this is E {
    return this instanceof type;
  }

  toString(): string {
    return `${this.code.name}: ${this.description}`;
  }
}
