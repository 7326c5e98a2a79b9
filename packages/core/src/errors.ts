/**
 * Built-in AppError variants.
 *
 * Each variant takes only a description; its ErrorCode is a private singleton
 * named after the variant and reachable through `.code`. Everything here is
 * registered with the default registry when the module loads.
 *
 * @module errors
 */

import { z } from "zod";
import { AppError } from "./app-error.js";
import { ErrorCode } from "./error-code.js";
import {
  errorConstructor,
  registerErrorCode,
  registerErrorType,
  type ErrorConstructor,
} from "./registry.js";

class ApiErrorCode extends ErrorCode {
  static readonly instance = new ApiErrorCode();
  readonly name = "ApiError";
  private constructor() {
    super();
  }
}

/**
 * Failure of a call to an external API: transport errors, unexpected status
 * codes, undecodable responses. Not for application or domain failures.
 */
export class ApiError extends AppError {
  constructor(description: string) {
    super(ApiErrorCode.instance, description);
  }
}

class BusinessRuleViolationErrorCode extends ErrorCode {
  static readonly instance = new BusinessRuleViolationErrorCode();
  readonly name = "BusinessRuleViolationError";
  private constructor() {
    super();
  }
}

export class BusinessRuleViolationError extends AppError {
  constructor(description: string) {
    super(BusinessRuleViolationErrorCode.instance, description);
  }
}

class ConfigurationErrorCode extends ErrorCode {
  static readonly instance = new ConfigurationErrorCode();
  readonly name = "ConfigurationError";
  private constructor() {
    super();
  }
}

export class ConfigurationError extends AppError {
  constructor(description: string) {
    super(ConfigurationErrorCode.instance, description);
  }
}

class ConflictErrorCode extends ErrorCode {
  static readonly instance = new ConflictErrorCode();
  readonly name = "ConflictError";
  private constructor() {
    super();
  }
}

export class ConflictError extends AppError {
  constructor(description: string) {
    super(ConflictErrorCode.instance, description);
  }
}

class NotFoundErrorCode extends ErrorCode {
  static readonly instance = new NotFoundErrorCode();
  readonly name = "NotFoundError";
  private constructor() {
    super();
  }
}

export class NotFoundError extends AppError {
  constructor(description: string) {
    super(NotFoundErrorCode.instance, description);
  }
}

class UnauthorizedErrorCode extends ErrorCode {
  static readonly instance = new UnauthorizedErrorCode();
  readonly name = "UnauthorizedError";
  private constructor() {
    super();
  }
}

export class UnauthorizedError extends AppError {
  constructor(description: string) {
    super(UnauthorizedErrorCode.instance, description);
  }
}

class UnhandledExceptionErrorCode extends ErrorCode {
  static readonly instance = new UnhandledExceptionErrorCode();
  readonly name = "UnhandledExceptionError";
  private constructor() {
    super();
  }
}

/**
 * An exception nobody caught, flattened to `"<ExceptionName>: <message>"`.
 *
 * Should be rare; letting the exception propagate is usually the better
 * choice. Only the name and message are kept since exceptions themselves do
 * not serialize.
 */
export class UnhandledExceptionError extends AppError {
  constructor(description: string) {
    super(UnhandledExceptionErrorCode.instance, description);
  }
}

class ValidationErrorCode extends ErrorCode {
  static readonly instance = new ValidationErrorCode();
  readonly name = "ValidationError";
  private constructor() {
    super();
  }
}

export class ValidationError extends AppError {
  constructor(description: string) {
    super(ValidationErrorCode.instance, description);
  }
}

/**
 * Factories for the built-in variants.
 *
 * @example
 * ```typescript
 * return Result.failure(Errors.notFound(`User ${id} not found`));
 * ```
 */
export const Errors = {
  api: (description: string): ApiError => new ApiError(description),
  businessRuleViolation: (description: string): BusinessRuleViolationError =>
    new BusinessRuleViolationError(description),
  configuration: (description: string): ConfigurationError =>
    new ConfigurationError(description),
  conflict: (description: string): ConflictError =>
    new ConflictError(description),
  notFound: (description: string): NotFoundError =>
    new NotFoundError(description),
  unauthorized: (description: string): UnauthorizedError =>
    new UnauthorizedError(description),
  validation: (description: string): ValidationError =>
    new ValidationError(description),

  exception(thrown: unknown): UnhandledExceptionError {
    if (thrown instanceof Error) {
      const name = thrown.constructor.name || thrown.name;
      return new UnhandledExceptionError(`${name}: ${thrown.message}`);
    }
    const text = describeThrown(thrown);
    return new UnhandledExceptionError(
      text.trim() === "" ? "Unknown exception" : text
    );
  },
};

// String() throws for objects without a usable toString.
function describeThrown(thrown: unknown): string {
  try {
    return String(thrown);
  } catch {
    return Object.prototype.toString.call(thrown);
  }
}

function describedBy<E extends AppError>(
  create: (description: string) => E
): () => readonly ErrorConstructor<E>[] {
  return () => [
    errorConstructor({ description: z.string() }, (args) =>
      create(args.description)
    ),
  ];
}

registerErrorType(AppError, {
  constructors: (schemas) => [
    errorConstructor(
      { code: schemas.code, description: z.string() },
      (args) => new AppError(args.code, args.description)
    ),
  ],
});

registerErrorCode(ApiErrorCode);
registerErrorCode(BusinessRuleViolationErrorCode);
registerErrorCode(ConfigurationErrorCode);
registerErrorCode(ConflictErrorCode);
registerErrorCode(NotFoundErrorCode);
registerErrorCode(UnauthorizedErrorCode);
registerErrorCode(UnhandledExceptionErrorCode);
registerErrorCode(ValidationErrorCode);

registerErrorType(ApiError, { constructors: describedBy(Errors.api) });
registerErrorType(BusinessRuleViolationError, {
  constructors: describedBy(Errors.businessRuleViolation),
});
registerErrorType(ConfigurationError, {
  constructors: describedBy(Errors.configuration),
});
registerErrorType(ConflictError, { constructors: describedBy(Errors.conflict) });
registerErrorType(NotFoundError, { constructors: describedBy(Errors.notFound) });
registerErrorType(UnauthorizedError, {
  constructors: describedBy(Errors.unauthorized),
});
registerErrorType(UnhandledExceptionError, {
  constructors: describedBy(
    (description) => new UnhandledExceptionError(description)
  ),
});
registerErrorType(ValidationError, {
  constructors: describedBy(Errors.validation),
});
