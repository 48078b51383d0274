// packages/mcp-server/src/tools/plan.ts - armport_plan tool handler

import { planInputSchema } from '@armport/core';

import { buildPlan, jsonResult, resolveProject, type ToolContext, type ToolResult } from './project.js';

export async function handlePlan(ctx: ToolContext, args: unknown): Promise<ToolResult> {
  const input = planInputSchema.parse(args);
  const project = resolveProject(input.path);
  const plan = await buildPlan(project, input.target, ctx.logger);
  const planId = ctx.store.save(plan, project.projectDir);
  return jsonResult({ planId, plan });
}
