// packages/cli/src/commands/doctor.ts - Preflight diagnostics for armport

import { accessSync, constants, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import chalk from 'chalk';
import {
  CONFIG_FILENAME,
  DATA_DIRNAME,
  VERSION,
  errorMessage,
  getSchemaVersion,
  loadConfig,
  loadIntrinsicMappings,
  openDatabase,
} from '@armport/core';

export interface Check {
  name: string;
  status: 'pass' | 'warn' | 'fail';
  message: string;
  fix?: string;
}

const MIN_NODE_MAJOR = 20;

export function runChecks(projectDir: string, nodeVersion: string = process.version): Check[] {
  const checks: Check[] = [];

  // 1. Config file
  const configPath = join(projectDir, CONFIG_FILENAME);
  if (existsSync(configPath)) {
    try {
      loadConfig({ projectDir });
      checks.push({ name: 'config', status: 'pass', message: `${CONFIG_FILENAME} found and valid` });
    } catch (err) {
      checks.push({ name: 'config', status: 'fail', message: errorMessage(err), fix: `Fix ${CONFIG_FILENAME}` });
    }
  } else {
    checks.push({
      name: 'config',
      status: 'warn',
      message: `${CONFIG_FILENAME} not found, built-in defaults apply`,
      fix: 'armport init',
    });
  }

  // 2. Database writable
  const dbDir = join(projectDir, DATA_DIRNAME, 'db');
  const dbPath = join(dbDir, 'armport.db');
  if (existsSync(dbDir)) {
    try {
      accessSync(dbDir, constants.W_OK);
      checks.push({
        name: 'database',
        status: existsSync(dbPath) ? 'pass' : 'warn',
        message: existsSync(dbPath) ? 'Database exists and writable' : 'Database directory exists, DB will be created on first use',
      });
    } catch {
      checks.push({
        name: 'database',
        status: 'fail',
        message: `${DATA_DIRNAME}/db/ is not writable`,
        fix: `Check file permissions on ${DATA_DIRNAME}/db/`,
      });
    }
  } else {
    checks.push({
      name: 'database',
      status: 'warn',
      message: `${DATA_DIRNAME}/db/ not found, will be created on first plan`,
      fix: 'armport init',
    });
  }

  // 3. Intrinsic mapping table
  try {
    const mappings = loadIntrinsicMappings();
    checks.push({ name: 'mappings', status: 'pass', message: `${mappings.size} intrinsic mappings loaded` });
  } catch (err) {
    checks.push({ name: 'mappings', status: 'fail', message: errorMessage(err), fix: 'Reinstall armport' });
  }

  // 4. Node version
  const major = Number.parseInt(nodeVersion.slice(1).split('.')[0], 10);
  if (major >= MIN_NODE_MAJOR) {
    checks.push({ name: 'node', status: 'pass', message: `Node.js ${nodeVersion}` });
  } else {
    checks.push({
      name: 'node',
      status: 'fail',
      message: `Node.js ${nodeVersion}, requires >= ${MIN_NODE_MAJOR}`,
      fix: `Install Node.js ${MIN_NODE_MAJOR}+`,
    });
  }

  // 5. Schema version
  if (existsSync(dbPath)) {
    try {
      const db = openDatabase(dbPath);
      try {
        checks.push({ name: 'schema', status: 'pass', message: `Schema version ${getSchemaVersion(db) ?? 'unknown'}` });
      } finally {
        db.close();
      }
    } catch (err) {
      checks.push({ name: 'schema', status: 'warn', message: `Could not read schema version: ${errorMessage(err)}` });
    }
  }

  return checks;
}

export async function doctorCommand(path: string): Promise<void> {
  const projectDir = resolve(path);
  console.error(chalk.cyan(`\n  armport doctor v${VERSION}\n`));

  const checks = runChecks(projectDir);

  let hasFailure = false;
  for (const check of checks) {
    const icon = check.status === 'pass'
      ? chalk.green('PASS')
      : check.status === 'warn'
        ? chalk.yellow('WARN')
        : chalk.red('FAIL');
    console.error(`  ${icon} ${check.name}: ${check.message}`);
    if (check.fix) {
      console.error(chalk.dim(`       → ${check.fix}`));
    }
    if (check.status === 'fail') hasFailure = true;
  }
  console.error('');

  console.log(JSON.stringify({ version: VERSION, checks, healthy: !hasFailure }, null, 2));
  if (hasFailure) process.exitCode = 1;
}
