// packages/core/src/types/mcp.ts - MCP tool input schemas

import { z } from 'zod';

export const scanInputSchema = z.object({
  path: z.string().min(1),
});
export type ScanInput = z.infer<typeof scanInputSchema>;

export const planInputSchema = z.object({
  path: z.string().min(1),
  target: z.string().min(1).optional(),
});
export type PlanInput = z.infer<typeof planInputSchema>;

export const migrateInputSchema = z.object({
  path: z.string().min(1),
  /** Stored plan to run; a fresh plan is built when absent */
  planId: z.string().min(1).optional(),
  target: z.string().min(1).optional(),
  mode: z.enum(['simulate', 'apply']).optional().default('simulate'),
});
export type MigrateInput = z.infer<typeof migrateInputSchema>;
