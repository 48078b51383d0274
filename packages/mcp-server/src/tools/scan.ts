// packages/mcp-server/src/tools/scan.ts - armport_scan tool handler

import { scanInputSchema } from '@armport/core';

import { jsonResult, resolveProject, scanProject, type ToolContext, type ToolResult } from './project.js';

export async function handleScan(ctx: ToolContext, args: unknown): Promise<ToolResult> {
  const input = scanInputSchema.parse(args);
  const report = await scanProject(resolveProject(input.path), ctx.logger);
  return jsonResult(report);
}
