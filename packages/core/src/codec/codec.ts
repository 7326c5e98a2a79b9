/**
 * JSON codec for Results, AppErrors and ErrorCodes.
 *
 * Errors are written as tagged maps (`"$type"` plus public fields) and read
 * back as instances of exactly the registered variant; codes come back as
 * the canonical singletons, so identity comparison keeps working after a
 * round trip.
 *
 * @example
 * ```typescript
 * const json = serializeResult(Result.failure(Errors.notFound("No user 7")));
 * // {"isSuccess":false,"error":{"$type":"NotFoundError","code":{...},"description":"No user 7"}}
 *
 * const back = deserializeResult(json, z.number());
 * back.error.code === Errors.notFound("x").code; // true
 * ```
 *
 * @module codec
 */

import type { z } from "zod";
import type { AppError, AppErrorType } from "../app-error.js";
import { CodecConfigSchema, type CodecConfig } from "../config.js";
import type { ErrorCode } from "../error-code.js";
import { DecodeError } from "../library-errors.js";
import { defaultRegistry, type TypeRegistry } from "../registry.js";
import type { Result } from "../result.js";
import { messageOf, type CodecContext } from "./context.js";
import { decodeErrorCode, encodeErrorCode } from "./error-code-codec.js";
import { decodeError, decodeErrorAs, encodeError } from "./error-codec.js";
import { decodeResult, encodeResult } from "./result-codec.js";
import {
  describeIssues,
  type EncodedError,
  type EncodedErrorCode,
  type EncodedResult,
} from "./wire.js";

export type ValueSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface CodecOptions {
  registry?: TypeRegistry;
  config?: z.input<typeof CodecConfigSchema>;
}

export class Codec implements CodecContext {
  readonly registry: TypeRegistry;
  readonly config: CodecConfig;

  constructor(options: CodecOptions = {}) {
    this.registry = options.registry ?? defaultRegistry;
    this.config = CodecConfigSchema.parse(options.config ?? {});
  }

  encodeErrorCode(code: ErrorCode): EncodedErrorCode {
    return encodeErrorCode(code, this);
  }

  decodeErrorCode(raw: unknown): ErrorCode {
    return decodeErrorCode(raw, this);
  }

  encodeError(error: AppError): EncodedError {
    return encodeError(error, this);
  }

  decodeError(raw: unknown): AppError {
    return decodeError(raw, this);
  }

  decodeErrorAs<E extends AppError>(raw: unknown, type: AppErrorType<E>): E {
    return decodeErrorAs(raw, type, this);
  }

  encodeResult<T>(result: Result<T>): EncodedResult {
    return encodeResult(result, this);
  }

  /**
   * Without a schema the success value is returned as parsed JSON. With one,
   * a value the schema rejects is a DecodeError.
   */
  decodeResult(raw: unknown): Result<unknown>;
  decodeResult<T>(raw: unknown, schema: ValueSchema<T>): Result<T>;
  decodeResult<T>(raw: unknown, schema?: ValueSchema<T>): Result<unknown> {
    if (schema === undefined) {
      return decodeResult(raw, this, (value) => value);
    }
    return decodeResult(raw, this, (value) => {
      const parsed = schema.safeParse(value);
      if (!parsed.success) {
        throw new DecodeError(
          `Invalid Result value: ${describeIssues(parsed.error)}`
        );
      }
      return parsed.data;
    });
  }

  serializeErrorCode(code: ErrorCode): string {
    return this.stringify(this.encodeErrorCode(code));
  }

  deserializeErrorCode(text: string): ErrorCode {
    return this.decodeErrorCode(this.parse(text));
  }

  serializeError(error: AppError): string {
    return this.stringify(this.encodeError(error));
  }

  deserializeError(text: string): AppError {
    return this.decodeError(this.parse(text));
  }

  deserializeErrorAs<E extends AppError>(
    text: string,
    type: AppErrorType<E>
  ): E {
    return this.decodeErrorAs(this.parse(text), type);
  }

  serializeResult<T>(result: Result<T>): string {
    return this.stringify(this.encodeResult(result));
  }

  deserializeResult(text: string): Result<unknown>;
  deserializeResult<T>(text: string, schema: ValueSchema<T>): Result<T>;
  deserializeResult<T>(text: string, schema?: ValueSchema<T>): Result<unknown> {
    const raw = this.parse(text);
    return schema === undefined
      ? this.decodeResult(raw)
      : this.decodeResult(raw, schema);
  }

  private stringify(encoded: unknown): string {
    return JSON.stringify(encoded, null, this.config.space || undefined);
  }

  private parse(text: string): unknown {
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (e) {
      throw new DecodeError(`Malformed JSON: ${messageOf(e)}`);
    }
  }
}

/** Codec over the default registry with default settings. */
export const defaultCodec = new Codec();

export function serializeErrorCode(code: ErrorCode): string {
  return defaultCodec.serializeErrorCode(code);
}

export function deserializeErrorCode(text: string): ErrorCode {
  return defaultCodec.deserializeErrorCode(text);
}

export function serializeError(error: AppError): string {
  return defaultCodec.serializeError(error);
}

export function deserializeError(text: string): AppError {
  return defaultCodec.deserializeError(text);
}

export function deserializeErrorAs<E extends AppError>(
  text: string,
  type: AppErrorType<E>
): E {
  return defaultCodec.deserializeErrorAs(text, type);
}

export function serializeResult<T>(result: Result<T>): string {
  return defaultCodec.serializeResult(result);
}

export function deserializeResult(text: string): Result<unknown>;
export function deserializeResult<T>(
  text: string,
  schema: ValueSchema<T>
): Result<T>;
export function deserializeResult<T>(
  text: string,
  schema?: ValueSchema<T>
): Result<unknown> {
  return schema === undefined
    ? defaultCodec.deserializeResult(text)
    : defaultCodec.deserializeResult(text, schema);
}
