import { z } from "zod";
import { AppError, type AppErrorType } from "../app-error.js";
import { isErrorCode } from "../error-code.js";
import { DecodeError, EncodeError } from "../library-errors.js";
import type {
  ErrorConstructor,
  NestedSchemas,
  PreparedConstruction,
} from "../registry.js";
import { messageOf, type CodecContext } from "./context.js";
import { decodeErrorCode, encodeErrorCode } from "./error-code-codec.js";
import {
  TYPE_KEY,
  TaggedMapSchema,
  describeIssues,
  type EncodedError,
} from "./wire.js";

type MutableEncodedError = { $type: string; [field: string]: unknown };

/**
 * Write an error as its registered tag followed by its own enumerable fields,
 * in declaration order. Codes and nested errors are written through their own
 * codecs, so the wire form round-trips.
 *
 * `private` and `protected` fields are enumerable at runtime and are written
 * too unless the variant lists them in `exclude`; getter values never are.
 *
 * @throws EncodeError when the error's exact class is not registered
 */
export function encodeError(
  error: AppError,
  ctx: CodecContext,
  depth = 0
): EncodedError {
  if (depth > ctx.config.maxDepth) {
    throw new EncodeError(`Error nesting exceeds ${ctx.config.maxDepth}`);
  }

  const tag = ctx.registry.tagOfError(error);
  if (tag === undefined) {
    throw new EncodeError(
      `Error type '${error.constructor.name}' is not registered`
    );
  }

  const exclude = ctx.registry.exclusionsOf(error);
  const encoded: MutableEncodedError = { [TYPE_KEY]: tag };
  const fields: [string, unknown][] = Object.entries(error);
  for (const [field, value] of fields) {
    if (field === TYPE_KEY || exclude.has(field)) continue;
    encoded[field] = encodeValue(value, ctx, depth);
  }
  return encoded;
}

/**
 * Encode an arbitrary field or Result value. Codes and errors get their
 * tagged forms, dates become ISO strings, containers are walked.
 */
export function encodeValue(
  value: unknown,
  ctx: CodecContext,
  depth: number
): unknown {
  if (isErrorCode(value)) return encodeErrorCode(value, ctx);
  if (value instanceof AppError) return encodeError(value, ctx, depth + 1);
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) {
    return value.map((item: unknown) => encodeValue(item, ctx, depth));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = encodeValue(item, ctx, depth);
    }
    return out;
  }
  return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Zod schemas that decode nested codes and errors through this same
 * context. A nested failure becomes an issue on the field, which
 * disqualifies the candidate using it.
 */
function nestedSchemas(ctx: CodecContext, depth: number): NestedSchemas {
  return {
    code: z.unknown().transform((raw, issues) => {
      try {
        return decodeErrorCode(raw, ctx);
      } catch (e) {
        issues.addIssue({ code: z.ZodIssueCode.custom, message: messageOf(e) });
        return z.NEVER;
      }
    }),
    error: z.unknown().transform((raw, issues) => {
      try {
        return decodeError(raw, ctx, depth);
      } catch (e) {
        issues.addIssue({ code: z.ZodIssueCode.custom, message: messageOf(e) });
        return z.NEVER;
      }
    }),
  };
}

/**
 * Pick each parameter's field by case-insensitive name, preferring an exact
 * match. Parameters without a field are left out so that declared defaults
 * apply.
 */
function bindArguments(
  parameters: readonly string[],
  fields: Readonly<Record<string, unknown>>
): Record<string, unknown> {
  const keys = Object.keys(fields);
  const args: Record<string, unknown> = {};
  for (const parameter of parameters) {
    const lower = parameter.toLowerCase();
    const key = keys.includes(parameter)
      ? parameter
      : keys.find((k) => k.toLowerCase() === lower);
    if (key !== undefined) args[parameter] = fields[key];
  }
  return args;
}

function byArity(a: ErrorConstructor, b: ErrorConstructor): number {
  return b.parameters.length - a.parameters.length;
}

/**
 * Rebuild an error from its tagged map.
 *
 * The tag selects the registered variant; its constructor candidates are
 * tried from most to fewest parameters, and the first whose arguments
 * validate and whose `create` does not throw wins. The result is an instance
 * of exactly the registered class.
 *
 * @throws DecodeError when the payload is malformed, the tag is unknown or
 * names a code, nesting exceeds `maxDepth`, or no candidate fits
 */
export function decodeError(
  raw: unknown,
  ctx: CodecContext,
  depth = 0
): AppError {
  if (depth > ctx.config.maxDepth) {
    throw new DecodeError(`Error nesting exceeds ${ctx.config.maxDepth}`);
  }

  const parsed = TaggedMapSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DecodeError(
      `Error payload requires a ${TYPE_KEY} property (${describeIssues(parsed.error)})`
    );
  }

  const fields: Readonly<Record<string, unknown>> = parsed.data;
  const tag = parsed.data[TYPE_KEY];
  const entry = ctx.registry.resolve(tag);
  if (entry === undefined) {
    throw new DecodeError(`Unknown Error type: '${tag}'`);
  }
  if (entry.kind !== "error") {
    throw new DecodeError(`'${tag}' is not an AppError type`);
  }

  const candidates = [...entry.constructors(nestedSchemas(ctx, depth + 1))];
  candidates.sort(byArity);

  const reasons: string[] = [];
  for (const candidate of candidates) {
    const label = `(${candidate.parameters.join(", ")})`;
    let prepared: PreparedConstruction<AppError>;
    try {
      prepared = candidate.prepare(
        bindArguments(candidate.parameters, fields)
      );
    } catch (e) {
      reasons.push(`${label} threw ${messageOf(e)}`);
      continue;
    }
    if (!prepared.ok) {
      reasons.push(`${label} ${prepared.reason}`);
      continue;
    }

    let decoded: AppError;
    try {
      decoded = prepared.invoke();
    } catch (e) {
      reasons.push(`${label} threw ${messageOf(e)}`);
      continue;
    }
    if (Object.getPrototypeOf(decoded) !== entry.type.prototype) {
      reasons.push(`${label} built ${decoded.constructor.name}`);
      continue;
    }
    return decoded;
  }

  throw new DecodeError(
    `Could not find a compatible constructor for Error type '${tag}'`,
    reasons
  );
}

/**
 * Decode and require a particular variant (or a subclass of it).
 *
 * @throws DecodeError when the payload decodes to some other variant
 */
export function decodeErrorAs<E extends AppError>(
  raw: unknown,
  type: AppErrorType<E>,
  ctx: CodecContext
): E {
  const decoded = decodeError(raw, ctx);
  if (!decoded.isErrorType(type)) {
    throw new DecodeError(
      `Expected ${type.name}, payload decoded to ${decoded.constructor.name}`
    );
  }
  return decoded;
}
