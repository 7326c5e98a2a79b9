import type { ErrorCode } from "../error-code.js";
import { DecodeError, EncodeError } from "../library-errors.js";
import type { CodecContext } from "./context.js";
import {
  EncodedErrorCodeSchema,
  NAME_KEY,
  TYPE_KEY,
  describeIssues,
  type EncodedErrorCode,
} from "./wire.js";

/**
 * Write a code as `{ "$type": tag, "$name": name }`.
 *
 * @throws EncodeError when the code's class was never registered
 */
export function encodeErrorCode(
  code: ErrorCode,
  ctx: CodecContext
): EncodedErrorCode {
  const tag = ctx.registry.tagOfCode(code);
  if (tag === undefined) {
    throw new EncodeError(`ErrorCode '${code.name}' is not registered`);
  }
  return { [TYPE_KEY]: tag, [NAME_KEY]: code.name };
}

/**
 * Resolve a `{ "$type", "$name" }` payload to the registered singleton. The
 * instance returned is the canonical one, never a copy.
 *
 * @throws DecodeError on a malformed payload, an unknown tag, or a tag that
 * names an AppError type rather than a code
 */
export function decodeErrorCode(raw: unknown, ctx: CodecContext): ErrorCode {
  const parsed = EncodedErrorCodeSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DecodeError(
      `ErrorCode payload requires a ${TYPE_KEY} property (${describeIssues(parsed.error)})`
    );
  }

  const tag = parsed.data[TYPE_KEY];
  const entry = ctx.registry.resolve(tag);
  if (entry === undefined) {
    throw new DecodeError(`Unknown ErrorCode type: '${tag}'`);
  }
  if (entry.kind !== "code") {
    throw new DecodeError(`'${tag}' is not an ErrorCode type`);
  }

  const name = parsed.data[NAME_KEY];
  if (ctx.config.strictCodeNames && name !== entry.instance.name) {
    throw new DecodeError(
      `ErrorCode '${tag}' is named '${entry.instance.name}', payload says '${name ?? ""}'`
    );
  }
  return entry.instance;
}
