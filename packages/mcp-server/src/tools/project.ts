// packages/mcp-server/src/tools/project.ts - Shared context for tool handlers

import { resolve } from 'node:path';
import { PlanBuilder, ProjectScanner, createPlanTables, loadConfig } from '@armport/core';
import type { Logger, MigrationPlan, MigrationStore, ProjectConfig, ScanReport } from '@armport/core';

export interface ToolContext {
  store: MigrationStore;
  logger: Logger;
}

// A type alias, not an interface: the SDK's result schema carries an index signature
export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export function jsonResult(value: unknown): ToolResult {
  return { content: [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }] };
}

export interface ResolvedProject {
  projectDir: string;
  config: ProjectConfig;
}

export function resolveProject(path: string): ResolvedProject {
  const projectDir = resolve(path);
  return { projectDir, config: loadConfig({ projectDir }) };
}

export async function scanProject(project: ResolvedProject, logger: Logger): Promise<ScanReport> {
  return new ProjectScanner({ config: project.config.scan, logger }).scan(project.projectDir);
}

export async function buildPlan(
  project: ResolvedProject,
  target: string | undefined,
  logger: Logger,
): Promise<MigrationPlan> {
  const report = await scanProject(project, logger);
  return new PlanBuilder(createPlanTables(), logger).buildPlan(
    report,
    target ?? project.config.migrate.targetArchitecture,
  );
}
