// packages/cli/src/commands/plan.ts - Build a migration plan and store it as a draft

import { MigrationStore, PlanBuilder, createPlanTables } from '@armport/core';
import chalk from 'chalk';
import type { Command } from 'commander';

import { formatPlan } from '../render.js';
import { resolveContext, withDatabase, writeJsonFile } from '../utils.js';
import { runScan } from './scan.js';

export type PlanFormat = 'text' | 'json';

interface PlanOptions {
  target?: string;
  format: PlanFormat;
  output?: string;
}

export async function planCommand(path: string, options: PlanOptions, command?: Command): Promise<void> {
  const ctx = resolveContext(path, command);
  const target = options.target ?? ctx.config.migrate.targetArchitecture;

  const report = await runScan(ctx);
  const plan = new PlanBuilder(createPlanTables(), ctx.logger).buildPlan(report, target);
  const planId = await withDatabase(ctx.projectDir, (db) => new MigrationStore(db).save(plan, ctx.projectDir));

  if (options.output) {
    writeJsonFile(options.output, plan);
    console.error(chalk.gray(`Plan written to ${options.output}`));
  }

  if (options.format === 'json') {
    console.log(JSON.stringify({ planId, plan }, null, 2));
    return;
  }

  console.error(formatPlan(plan, planId));
  console.error(chalk.gray('\nNext steps:'));
  console.error(chalk.gray(`  1. armport migrate --plan ${planId} --dry-run`));
  console.error(chalk.gray(`  2. armport migrate --plan ${planId} --apply`));
}
