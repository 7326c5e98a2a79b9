import { z } from 'zod';

export const ResultStoreConfigSchema = z.object({
  keyPrefix: z.string().min(1).default('faultline:result:'),
  /** Applied by put() when no TTL is passed; entries never expire when unset. */
  defaultTtlSeconds: z.number().int().positive().optional(),
});

export type ResultStoreConfig = z.infer<typeof ResultStoreConfigSchema>;
