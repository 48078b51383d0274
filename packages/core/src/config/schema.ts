// packages/core/src/config/schema.ts

import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const scanConfigSchema = z.object({
  extensions: z
    .array(z.string().regex(/^\.[^./\\]+$/, 'extension must look like ".ext"'))
    .min(1)
    .transform((exts) => exts.map((e) => e.toLowerCase())),
  ignorePathSegments: z.array(z.string().min(1)).default([]),
  useIgnoreFile: z.boolean().default(true),
  concurrency: z.number().int().nonnegative().default(0),
});

const migrateConfigSchema = z.object({
  targetArchitecture: z.string().min(1).default('arm64'),
  backupExcludes: z.array(z.string().min(1)).default([]),
});

const advancedConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export const projectConfigSchema = z.object({
  configVersion: z.number().int().positive().optional(),
  project: z
    .object({
      name: z.string().default(''),
    })
    .default({}),
  scan: scanConfigSchema,
  migrate: migrateConfigSchema.default({}),
  advanced: advancedConfigSchema.default({}),
});

export type ProjectConfigInput = z.input<typeof projectConfigSchema>;

/**
 * Validate and parse a config object. Throws ConfigError on invalid input.
 */
export function validateConfig(config: unknown): z.output<typeof projectConfigSchema> {
  const result = projectConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    const field = result.error.issues[0]?.path.join('.');
    throw new ConfigError(`Invalid configuration: ${issues}`, field);
  }
  return result.data;
}
