import { z } from "zod";

export const CodecConfigSchema = z.object({
  /** Indentation passed to JSON.stringify by the text functions. */
  space: z.number().int().min(0).max(10).default(0),
  /** Deepest nesting of errors inside errors accepted by decode. */
  maxDepth: z.number().int().min(1).max(256).default(32),
  /** Reject ErrorCode payloads whose `$name` disagrees with the registered singleton. */
  strictCodeNames: z.boolean().default(false),
});

export type CodecConfig = z.infer<typeof CodecConfigSchema>;
