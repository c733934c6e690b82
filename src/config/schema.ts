import { z } from 'zod';

/**
 * Configuration schema for the toolchain
 */
export const ConfigSchema = z.object({
  harness: z.object({
    /** Per-case timeout before a tool is recorded as hung */
    caseTimeoutMs: z.number().int().positive().max(600_000).default(5000),
  }),

  suite: z.object({
    /** Catalog module validated when no path is given */
    catalogPath: z.string().min(1, 'Catalog path cannot be empty').optional(),
  }),

  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    /** Optional file receiving info-and-above log lines */
    logFile: z.string().optional(),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;
