import type { AppError } from "@faultline/core";

export type StatusMap = Readonly<Record<string, number>>;

const BUILT_IN_STATUS: StatusMap = {
  NotFoundError: 404,
  ValidationError: 400,
  ConflictError: 409,
  UnauthorizedError: 401,
  UnhandledExceptionError: 500,
};

/**
 * HTTP status for an error, looked up by its code name. Subclasses share
 * their parent's code and so its status. Anything unmapped is a 400.
 */
export function statusFor(error: AppError, overrides: StatusMap = {}): number {
  const name = error.code.name;
  return overrides[name] ?? BUILT_IN_STATUS[name] ?? 400;
}
