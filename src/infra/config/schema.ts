import { z } from 'zod';

export const DEFAULT_LIMIT = 20;
export const MAX_LIMIT = 1000;

export const cliOptionsSchema = z
  .object({
    pair: z.string().trim().min(1),
    limit: z.coerce.number().int().positive().max(MAX_LIMIT).default(DEFAULT_LIMIT),
    database_url: z
      .string()
      .url()
      .refine((value) => /^https?:\/\//i.test(value), { message: 'Must be an http(s) URL' }),
    stats: z.boolean().default(false),
    status: z.boolean().default(false),
    verify: z.boolean().default(false),
    details: z.boolean().default(false),
    summary: z.boolean().default(false),
    export: z.enum(['csv', 'json']).optional(),
    output: z.string().trim().min(1).optional()
  })
  .strict();

export type CliOptions = z.infer<typeof cliOptionsSchema>;
