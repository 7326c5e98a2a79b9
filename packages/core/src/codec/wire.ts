import { z } from "zod";

export const TYPE_KEY = "$type";
export const NAME_KEY = "$name";

export const TaggedMapSchema = z
  .object({ [TYPE_KEY]: z.string().min(1) })
  .passthrough();

export const EncodedErrorCodeSchema = z.object({
  [TYPE_KEY]: z.string().min(1),
  [NAME_KEY]: z.string().optional(),
});

export const EncodedResultSchema = z.object({
  isSuccess: z.boolean(),
  error: z.unknown().optional(),
  value: z.unknown().optional(),
});

/** Wire form of an ErrorCode. */
export interface EncodedErrorCode {
  readonly $type: string;
  readonly $name: string;
}

/** Wire form of an AppError: its tag followed by every public field. */
export interface EncodedError {
  readonly $type: string;
  readonly [field: string]: unknown;
}

/** Wire form of a Result; `error` only on failure, `value` only on success. */
export interface EncodedResult {
  readonly isSuccess: boolean;
  readonly error?: EncodedError;
  readonly value?: unknown;
}

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message
    )
    .join(", ");
}
