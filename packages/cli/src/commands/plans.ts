// packages/cli/src/commands/plans.ts - List stored migration plans

import { MigrationStore } from '@armport/core';
import type { Command } from 'commander';

import { formatPlanList } from '../render.js';
import { resolveContext, withDatabase } from '../utils.js';

interface PlansOptions {
  limit: number;
  json?: boolean;
}

export async function plansCommand(path: string, options: PlansOptions, command?: Command): Promise<void> {
  const ctx = resolveContext(path, command);
  const plans = await withDatabase(ctx.projectDir, (db) =>
    new MigrationStore(db).list({ projectDir: ctx.projectDir, limit: options.limit }),
  );

  if (options.json) {
    console.log(JSON.stringify(plans, null, 2));
  } else {
    console.error(formatPlanList(plans));
  }
}
