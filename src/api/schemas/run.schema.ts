import { z } from 'zod';

// ---------------------------------------------------------------------------
// Run control Zod schemas for API boundary validation.
// URL shape, the delay window ordering and profile names are checked by the
// run configuration store, which answers with 422.
// ---------------------------------------------------------------------------

const delaySeconds = z.number().finite().nonnegative().max(600);

export const startRunSchema = z
  .object({
    url: z.string().trim().min(1).max(2048).optional(),
    delayMin: delaySeconds.optional(),
    delayMax: delaySeconds.optional(),
    profile: z.string().trim().min(1).max(64).optional(),
  })
  .strict();

export type StartRunInput = z.infer<typeof startRunSchema>;

export const configureRunSchema = startRunSchema.omit({ url: true });

export type ConfigureRunInput = z.infer<typeof configureRunSchema>;

export const openUrlSchema = z
  .object({
    url: z.string().trim().min(1).max(2048),
  })
  .strict();

export type OpenUrlInput = z.infer<typeof openUrlSchema>;

export const logsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export type LogsQuery = z.infer<typeof logsQuerySchema>;
