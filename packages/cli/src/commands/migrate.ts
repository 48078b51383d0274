// packages/cli/src/commands/migrate.ts - Simulate or apply a stored (or fresh) migration plan

import {
  DATA_DIRNAME,
  EditExecutor,
  EventBus,
  MigrationError,
  MigrationStore,
  PlanBuilder,
  createPlanTables,
  isTerminalStatus,
} from '@armport/core';
import type { ExecutionMode, MigrationPlan } from '@armport/core';
import chalk from 'chalk';
import type { Command } from 'commander';

import { formatExecutionSummary, renderEvent } from '../render.js';
import { resolveContext, withDatabase } from '../utils.js';
import { runScan } from './scan.js';

interface MigrateOptions {
  plan?: string;
  target?: string;
  apply?: boolean;
  dryRun?: boolean;
  json?: boolean;
}

export async function migrateCommand(path: string, options: MigrateOptions, command?: Command): Promise<void> {
  if (options.apply && options.dryRun) {
    throw new MigrationError('Choose one of --apply or --dry-run');
  }
  const mode: ExecutionMode = options.apply ? 'apply' : 'simulate';
  const ctx = resolveContext(path, command);

  await withDatabase(ctx.projectDir, async (db) => {
    const store = new MigrationStore(db);

    let planId: string;
    let plan: MigrationPlan;
    if (options.plan) {
      const stored = store.get(options.plan);
      if (!stored) throw new MigrationError(`Plan not found: ${options.plan}`, options.plan);
      if (stored.projectDir !== ctx.projectDir) {
        throw new MigrationError(`Plan ${stored.planId} belongs to ${stored.projectDir}, not ${ctx.projectDir}`, stored.planId);
      }
      if (isTerminalStatus(stored.status)) {
        throw new MigrationError(`Plan ${stored.planId} is already ${stored.status}; build a new plan to run again`, stored.planId);
      }
      planId = stored.planId;
      plan = stored.plan;
    } else {
      const target = options.target ?? ctx.config.migrate.targetArchitecture;
      const report = await runScan(ctx);
      plan = new PlanBuilder(createPlanTables(), ctx.logger).buildPlan(report, target);
      planId = store.save(plan, ctx.projectDir);
      console.error(chalk.gray(`Built plan ${planId}`));
    }

    if (mode === 'apply' && !store.hasSimulation(planId)) {
      console.error(chalk.yellow('Warning: applying a plan that has not been simulated. Run with --dry-run first to preview.'));
    }

    console.error(chalk.cyan(`Project: ${ctx.projectDir}`));
    console.error(chalk.cyan(`Mode: ${mode === 'apply' ? 'Apply Changes' : 'Dry Run'}\n`));

    const events = new EventBus();
    events.on('event', renderEvent);
    const executor = new EditExecutor({
      projectDir: ctx.projectDir,
      logger: ctx.logger,
      events,
      // The plan database lives in the data dir and is open while we copy
      backupExcludes: [...ctx.config.migrate.backupExcludes, DATA_DIRNAME],
    });

    const result = await executor.execute(plan, mode);
    const status = store.recordRun(planId, result);

    if (options.json) {
      console.log(JSON.stringify({ planId, status, result }, null, 2));
    } else {
      console.error('');
      console.error(formatExecutionSummary(result));
      console.error(chalk.gray(`\nPlan ${planId} is now ${status}`));
      if (mode === 'simulate') {
        console.error(chalk.gray(`Next: armport migrate --plan ${planId} --apply`));
      }
    }

    if (result.failedSteps > 0) process.exitCode = 1;
  });
}
