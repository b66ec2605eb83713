import { z } from "zod";

export const engineConfigSchema = z.object({
  // Concurrency
  maxConflictRetries: z.number().int().min(0).optional(),

  // Registration guards
  registration: z
    .object({
      passwordMinLength: z.number().int().min(1).optional(),
      requireReferral: z.boolean().optional(),
    })
    .optional(),
});

export type EngineConfigInput = z.input<typeof engineConfigSchema>;
