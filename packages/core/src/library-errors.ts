/**
 * Errors thrown by the library itself, as opposed to the {@link AppError}
 * values it carries for callers.
 *
 * @module library-errors
 */

/**
 * An AppError was constructed with a missing code or a blank description.
 */
export class ErrorConstructionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ErrorConstructionError";
  }
}

/**
 * A Result was built with a success flag that disagrees with its error slot.
 */
export class ResultInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ResultInvariantError";
  }
}

/**
 * A type could not be registered: wrong base class, missing singleton, or a
 * tag already owned by another type.
 */
export class RegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RegistryError";
  }
}

/**
 * A value could not be written to the wire format.
 */
export class EncodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EncodeError";
  }
}

/**
 * A payload could not be turned back into a Result, AppError or ErrorCode.
 *
 * `reasons` lists why each constructor candidate was rejected when decoding
 * an error exhausted all of them.
 */
export class DecodeError extends Error {
  readonly reasons: readonly string[];

  constructor(message: string, reasons: readonly string[] = []) {
    super(reasons.length > 0 ? `${message} (${reasons.join("; ")})` : message);
    this.name = "DecodeError";
    this.reasons = reasons;
  }
}
