import { DecodeError, ResultInvariantError } from "../library-errors.js";
import { NONE, Result } from "../result.js";
import type { CodecContext } from "./context.js";
import { decodeError, encodeError, encodeValue } from "./error-codec.js";
import { EncodedResultSchema, describeIssues, type EncodedResult } from "./wire.js";

/**
 * `{ "isSuccess": true, "value": ... }` or `{ "isSuccess": false, "error":
 * ... }`. The None sentinel is never written; a void success has no `value`.
 */
export function encodeResult<T>(
  result: Result<T>,
  ctx: CodecContext
): EncodedResult {
  if (!result.isSuccess) {
    return { isSuccess: false, error: encodeError(result.error, ctx) };
  }
  const value = encodeValue(result.value, ctx, 0);
  return value === undefined ? { isSuccess: true } : { isSuccess: true, value };
}

/**
 * Rebuild a Result. A missing or null `error` means None; the success flag
 * and the error must agree. `decodeValue` turns the raw success value into
 * a `T` and may throw to reject it.
 *
 * @throws DecodeError on a malformed payload or a flag/error mismatch
 */
export function decodeResult<T>(
  raw: unknown,
  ctx: CodecContext,
  decodeValue: (value: unknown) => T
): Result<T> {
  const parsed = EncodedResultSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DecodeError(`Invalid Result payload (${describeIssues(parsed.error)})`);
  }

  const { isSuccess, error, value } = parsed.data;
  const decodedError =
    error === undefined || error === null ? NONE : decodeError(error, ctx);

  try {
    return isSuccess
      ? Result.of(true, decodedError, decodeValue(value))
      : Result.failure<T>(decodedError);
  } catch (e) {
    if (e instanceof ResultInvariantError) {
      throw new DecodeError(`Invalid Result payload: ${e.message}`);
    }
    throw e;
  }
}
