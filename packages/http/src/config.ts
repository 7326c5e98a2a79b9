import { z } from "zod";

export const HttpConfigSchema = z.object({
  /** Prefix of the problem `type` URI; the status code is appended. */
  problemTypeBase: z.string().default("https://httpstatuses.io/"),
  /** Send the message of an unhandled exception to the client. Off in production. */
  exposeUnhandledDetails: z.boolean().default(false),
  /** Status per ErrorCode name, overriding the built-in mapping. */
  statusMap: z
    .record(z.string(), z.number().int().min(400).max(599))
    .default({}),
});

export type HttpConfig = z.infer<typeof HttpConfigSchema>;

export const defaultHttpConfig: HttpConfig = HttpConfigSchema.parse({});
