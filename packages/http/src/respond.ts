import type { Response } from "express";
import type { Result } from "@faultline/core";
import { defaultHttpConfig, type HttpConfig } from "./config.js";
import { sendProblem } from "./problem.js";

export interface SendResultOptions {
  /** Location of a newly created resource; answers 201 instead of 200. */
  created?: string;
  config?: HttpConfig;
}

/**
 * Write a Result as the response.
 *
 * Success: 200 with the value as JSON, 201 plus `Location` when `created` is
 * set, 204 when there is no value. Failure: problem details with the status
 * from {@link statusFor}.
 *
 * @example
 * ```typescript
 * router.get("/customers/:id", async (req, res, next) => {
 *   try {
 *     sendResult(res, await customers.find(req.params.id));
 *   } catch (e) {
 *     next(e);
 *   }
 * });
 * ```
 */
export function sendResult<T>(
  res: Response,
  result: Result<T>,
  options: SendResultOptions = {}
): void {
  result.match(
    (value) => {
      if (options.created !== undefined) {
        res.location(options.created).status(201);
      } else if (value === undefined) {
        res.status(204).end();
        return;
      } else {
        res.status(200);
      }

      if (value === undefined) {
        res.end();
      } else {
        res.json(value);
      }
    },
    (error) => sendProblem(res, error, options.config ?? defaultHttpConfig)
  );
}
