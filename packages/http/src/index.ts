export { HttpConfigSchema, defaultHttpConfig } from "./config.js";
export type { HttpConfig } from "./config.js";

export { statusFor } from "./status.js";
export type { StatusMap } from "./status.js";

export { PROBLEM_CONTENT_TYPE, sendProblem, toProblemDetails } from "./problem.js";
export type { ProblemDetails } from "./problem.js";

export { sendResult } from "./respond.js";
export type { SendResultOptions } from "./respond.js";

export { createErrorHandler, errorHandler } from "./middleware/error-handler.js";
export type { ErrorHandler } from "./middleware/error-handler.js";

export { validate } from "./middleware/validation.js";
export type { ValidateOptions } from "./middleware/validation.js";
