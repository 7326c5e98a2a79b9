import type { Response } from "express";
import type { AppError } from "@faultline/core";
import { defaultHttpConfig, type HttpConfig } from "./config.js";
import { statusFor } from "./status.js";

/** RFC 7807 body. */
export interface ProblemDetails {
  type: string;
  title: string;
  status: number;
  detail: string;
}

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

export function toProblemDetails(
  error: AppError,
  status: number,
  config: HttpConfig = defaultHttpConfig
): ProblemDetails {
  return {
    type: `${config.problemTypeBase}${status}`,
    title: error.code.name,
    status,
    detail: error.description,
  };
}

export function sendProblem(
  res: Response,
  error: AppError,
  config: HttpConfig = defaultHttpConfig
): void {
  const status = statusFor(error, config.statusMap);
  res
    .status(status)
    .type(PROBLEM_CONTENT_TYPE)
    .json(toProblemDetails(error, status, config));
}
