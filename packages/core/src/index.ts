export { ErrorCode, isErrorCode } from "./error-code.js";
export type { ErrorCodeType } from "./error-code.js";

export { AppError } from "./app-error.js";
export type { AppErrorType } from "./app-error.js";

export {
  ApiError,
  BusinessRuleViolationError,
  ConfigurationError,
  ConflictError,
  Errors,
  NotFoundError,
  UnauthorizedError,
  UnhandledExceptionError,
  ValidationError,
} from "./errors.js";

export {
  DecodeError,
  EncodeError,
  ErrorConstructionError,
  RegistryError,
  ResultInvariantError,
} from "./library-errors.js";

export { ResultException } from "./result-exception.js";
export type { ResultExceptionOptions } from "./result-exception.js";

export { Failure, NONE, Result, Success, errorFromThrown, isNone } from "./result.js";

export {
  bindAsync,
  mapAsync,
  matchAsync,
  tapAsync,
  tryAsync,
} from "./result-async.js";
export type { ResultLike } from "./result-async.js";

export {
  TypeRegistry,
  defaultRegistry,
  errorConstructor,
  registerErrorCode,
  registerErrorType,
} from "./registry.js";
export type {
  ConstructorArgs,
  ErrorCodeEntry,
  ErrorCodeOptions,
  ErrorConstructor,
  ErrorTypeEntry,
  ErrorTypeOptions,
  NestedSchemas,
  PreparedConstruction,
  RegistryEntry,
} from "./registry.js";

export { CodecConfigSchema } from "./config.js";
export type { CodecConfig } from "./config.js";

export {
  Codec,
  defaultCodec,
  deserializeError,
  deserializeErrorAs,
  deserializeErrorCode,
  deserializeResult,
  serializeError,
  serializeErrorCode,
  serializeResult,
} from "./codec/codec.js";
export type { CodecOptions, ValueSchema } from "./codec/codec.js";
export { NAME_KEY, TYPE_KEY } from "./codec/wire.js";
export type {
  EncodedError,
  EncodedErrorCode,
  EncodedResult,
} from "./codec/wire.js";
