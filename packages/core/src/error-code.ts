/**
 * Identity token for a category of {@link AppError}.
 *
 * Every concrete code class owns exactly one canonical instance, exposed as a
 * static `instance` and created when the class is evaluated. Constructors are
 * kept private so no second instance can exist.
 *
 * Equality is structural: two codes are equal when they share a concrete class
 * and a name. The codec resolves decoded codes back to the registered
 * `instance`, so reference comparison (`===`) holds across the wire as well.
 *
 * @example
 * ```typescript
 * class PaymentDeclinedErrorCode extends ErrorCode {
 *   static readonly instance = new PaymentDeclinedErrorCode();
 *   readonly name = "PaymentDeclinedError";
 *   private constructor() {
 *     super();
 *   }
 * }
 * ```
 *
 * @module error-code
 */
export abstract class ErrorCode {
  /**
   * Stable, human-readable identifier of the category (e.g. "NotFoundError").
   *
   * This is the only identifier that is meaningful across processes; use it
   * for logs, metrics and protocol discriminators.
   */
  abstract readonly name: string;

  toString(): string {
    return this.name;
  }

  [Symbol.toPrimitive](): string {
    return this.name;
  }

  equals(other: ErrorCode | null | undefined): boolean {
    if (other === null || other === undefined) return false;
    if (other === this) return true;
    return (
      Object.getPrototypeOf(other) === Object.getPrototypeOf(this) &&
      other.name === this.name
    );
  }
}

/**
 * Static side of a concrete ErrorCode class: anything exposing the canonical
 * singleton through `instance`.
 */
export interface ErrorCodeType<C extends ErrorCode = ErrorCode> {
  readonly name: string;
  readonly instance: C;
}

export function isErrorCode(value: unknown): value is ErrorCode {
  return value instanceof ErrorCode;
}
