import { z } from "zod";

const positiveMs = z.number().int().positive();
const nonNegativeMs = z.number().int().min(0);

export const managerConfigSchema = z
  .object({
    // Resource limits
    maxConcurrentSessions: z.number().int().min(1).optional(),

    // Timeouts
    maxSessionLifetimeMs: nonNegativeMs.optional(),
    cancelGracePeriodMs: nonNegativeMs.optional(),

    // Retention of terminal sessions
    reaper: z
      .object({
        retentionMs: nonNegativeMs.optional(),
        intervalMs: positiveMs.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ManagerConfigInput = z.input<typeof managerConfigSchema>;
