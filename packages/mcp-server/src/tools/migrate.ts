// packages/mcp-server/src/tools/migrate.ts - armport_migrate tool handler

import { DATA_DIRNAME, EditExecutor, MigrationError, isTerminalStatus, migrateInputSchema } from '@armport/core';
import type { MigrationPlan } from '@armport/core';

import { buildPlan, jsonResult, resolveProject, type ToolContext, type ToolResult } from './project.js';

/**
 * Simulate (default) or apply. Runs a stored plan when `planId` is given,
 * otherwise builds and stores a fresh one. Every run is recorded.
 */
export async function handleMigrate(ctx: ToolContext, args: unknown): Promise<ToolResult> {
  const input = migrateInputSchema.parse(args);
  const project = resolveProject(input.path);

  let planId: string;
  let plan: MigrationPlan;
  if (input.planId) {
    const stored = ctx.store.get(input.planId);
    if (!stored) throw new MigrationError(`Plan not found: ${input.planId}`, input.planId);
    if (stored.projectDir !== project.projectDir) {
      throw new MigrationError(
        `Plan ${stored.planId} belongs to ${stored.projectDir}, not ${project.projectDir}`,
        stored.planId,
      );
    }
    if (isTerminalStatus(stored.status)) {
      throw new MigrationError(`Plan ${stored.planId} is already ${stored.status}`, stored.planId);
    }
    planId = stored.planId;
    plan = stored.plan;
  } else {
    plan = await buildPlan(project, input.target, ctx.logger);
    planId = ctx.store.save(plan, project.projectDir);
  }

  const simulatedBefore = ctx.store.hasSimulation(planId);
  const executor = new EditExecutor({
    projectDir: project.projectDir,
    logger: ctx.logger,
    backupExcludes: [...project.config.migrate.backupExcludes, DATA_DIRNAME],
  });
  const result = await executor.execute(plan, input.mode);
  const status = ctx.store.recordRun(planId, result);

  return jsonResult({
    planId,
    status,
    ...(input.mode === 'apply' && !simulatedBefore
      ? { warning: 'Plan was applied without a prior simulation' }
      : {}),
    result,
  });
}
