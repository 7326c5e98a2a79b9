import type { Request, Response, NextFunction } from "express";
import {
  Errors,
  ResultException,
  UnhandledExceptionError,
} from "@faultline/core";
import { defaultHttpConfig, type HttpConfig } from "../config.js";
import { sendProblem } from "../problem.js";

const HIDDEN_DETAIL = "An unexpected error occurred";

export type ErrorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction,
) => void;

/**
 * Express error middleware. Register it last.
 *
 * A ResultException that carries an error is answered with that error's
 * problem details. Anything else is logged and answered as a 500
 * UnhandledExceptionError.
 */
export function createErrorHandler(
  config: HttpConfig = defaultHttpConfig,
): ErrorHandler {
  return (err, _req, res, _next) => {
    if (err instanceof ResultException && err.error !== undefined) {
      sendProblem(res, err.error, config);
      return;
    }

    console.error("[faultline] Unhandled error:", err);

    const error = config.exposeUnhandledDetails
      ? Errors.exception(err)
      : new UnhandledExceptionError(HIDDEN_DETAIL);
    sendProblem(res, error, config);
  };
}

export const errorHandler: ErrorHandler = createErrorHandler();
