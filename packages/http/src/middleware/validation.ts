import type { Request, Response, NextFunction } from "express";
import type { ZodSchema, ZodIssue } from "zod";
import { Errors } from "@faultline/core";
import { defaultHttpConfig, type HttpConfig } from "../config.js";
import { sendProblem } from "../problem.js";

type RequestPart = "params" | "query" | "body";

export interface ValidateOptions {
  params?: ZodSchema;
  query?: ZodSchema;
  body?: ZodSchema;
  config?: HttpConfig;
}

function describe(part: RequestPart, issue: ZodIssue): string {
  const path = [part, ...issue.path].join(".");
  return `${path}: ${issue.message}`;
}

/**
 * Validate request parts with zod. Parsed values are stored in
 * `res.locals.params`, `res.locals.query` and `res.locals.body`; the parsed
 * body also replaces `req.body`. Every issue from every part is reported in
 * one 400 ValidationError problem.
 */
export function validate(schemas: ValidateOptions) {
  const config = schemas.config ?? defaultHttpConfig;

  return (req: Request, res: Response, next: NextFunction): void => {
    try {
      const messages: string[] = [];
      const parts: [RequestPart, ZodSchema | undefined, unknown][] = [
        ["params", schemas.params, req.params],
        ["query", schemas.query, req.query],
        ["body", schemas.body, req.body],
      ];

      for (const [part, schema, input] of parts) {
        if (!schema) continue;
        const parsed = schema.safeParse(input);
        if (parsed.success) {
          res.locals[part] = parsed.data;
        } else {
          messages.push(...parsed.error.issues.map((i) => describe(part, i)));
        }
      }

      if (messages.length > 0) {
        sendProblem(res, Errors.validation(messages.join(", ")), config);
        return;
      }
      if (schemas.body) {
        req.body = res.locals.body;
      }
      next();
    } catch (e) {
      next(e);
    }
  };
}
