// packages/cli/src/program.ts - Command registration for the armport CLI

import { Command, Option } from 'commander';

import { DEFAULT_PLAN_LIST_LIMIT, VERSION } from '@armport/core';

import { doctorCommand } from './commands/doctor.js';
import { initCommand } from './commands/init.js';
import { migrateCommand } from './commands/migrate.js';
import { planCommand } from './commands/plan.js';
import { plansCommand } from './commands/plans.js';
import { scanCommand } from './commands/scan.js';
import { parsePositiveInt } from './utils.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('armport')
    .description('Find x86-specific code and migrate it to ARM')
    .version(VERSION)
    .option('--verbose', 'Enable debug logging');

  program
    .command('init')
    .description('Write a default .armport.yml in the project')
    .argument('[path]', 'Project path', '.')
    .option('--force', 'Overwrite existing .armport.yml')
    .action(initCommand);

  program
    .command('doctor')
    .description('Preflight diagnostics: config, database, mapping table, node')
    .argument('[path]', 'Project path', '.')
    .action(doctorCommand);

  program
    .command('scan')
    .description('Scan code for x86-specific instructions and dependencies')
    .argument('[path]', 'Project path to scan', '.')
    .addOption(new Option('--format <format>', 'Output format').choices(['table', 'json', 'summary']).default('table'))
    .option('--output <file>', 'Write the scan report to a JSON file')
    .option('--no-ignore-file', 'Skip .armportignore rules')
    .action(scanCommand);

  program
    .command('plan')
    .description('Scan, build a migration plan and store it as a draft')
    .argument('[path]', 'Project path', '.')
    .option('--target <arch>', 'Target architecture (default from config)')
    .addOption(new Option('--format <format>', 'Output format').choices(['text', 'json']).default('text'))
    .option('--output <file>', 'Write the plan to a JSON file')
    .action(planCommand);

  program
    .command('migrate')
    .description('Simulate (default) or apply a migration plan')
    .argument('[path]', 'Project path', '.')
    .option('--plan <id>', 'Stored plan to run (default: build a fresh one)')
    .option('--target <arch>', 'Target architecture for a fresh plan')
    .option('--apply', 'Apply high-confidence changes after taking a backup')
    .option('--dry-run', 'Simulate without modifying files (default)')
    .option('--json', 'Machine-readable JSON output')
    .action(migrateCommand);

  program
    .command('plans')
    .description('List stored migration plans')
    .argument('[path]', 'Project path', '.')
    .option('--limit <n>', 'Max results', parsePositiveInt, DEFAULT_PLAN_LIST_LIMIT)
    .option('--json', 'Machine-readable JSON output')
    .action(plansCommand);

  return program;
}
