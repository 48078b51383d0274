// tests/commands.test.ts - scan / plan / migrate / plans / init against a temp project

import { cpSync, existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import chalk from 'chalk';
import { afterEach, beforeAll, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { ConfigError, MigrationError, loadConfig } from '@armport/core';
import type { ExecutionResult } from '@armport/core';
import { initCommand } from '../src/commands/init.js';
import { migrateCommand } from '../src/commands/migrate.js';
import { planCommand } from '../src/commands/plan.js';
import { plansCommand } from '../src/commands/plans.js';
import { scanCommand } from '../src/commands/scan.js';
import { runChecks } from '../src/commands/doctor.js';

const SOURCE = [
  '#include <stdio.h>',
  '',
  'typedef float v4;',
  '',
  '#ifdef __x86_64__',
  '#define FAST 1',
  '#endif',
  '',
  'v4 add(v4 a, v4 b) {',
  '  return _mm_add_ps(a, b);',
  '}',
  '',
].join('\n');

let parent: string;
let project: string;
let stdout: MockInstance<typeof console.log>;
let stderr: MockInstance<typeof console.error>;

/** Parse the last JSON document a command printed to stdout. */
function lastJson<T = unknown>(): T {
  const calls = stdout.mock.calls;
  return JSON.parse(String(calls[calls.length - 1][0]));
}

beforeAll(() => {
  chalk.level = 0;
});

beforeEach(() => {
  parent = join(tmpdir(), `armport-cli-${randomUUID()}`);
  project = join(parent, 'proj');
  mkdirSync(join(project, 'src'), { recursive: true });
  writeFileSync(join(project, 'src', 'simd.c'), SOURCE);
  stdout = vi.spyOn(console, 'log').mockImplementation(() => {});
  stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  rmSync(parent, { recursive: true, force: true });
});

describe('scan', () => {
  it('prints the report as JSON', async () => {
    await scanCommand(project, { format: 'json', ignoreFile: true });
    const report = lastJson();
    expect(report).toMatchObject({ totalFiles: 1, scannedFiles: 1 });
    expect(report).toHaveProperty('issues.length', 2);
  });

  it('writes the report to --output', async () => {
    const out = join(parent, 'out', 'report.json');
    await scanCommand(project, { format: 'summary', output: out, ignoreFile: true });
    expect(JSON.parse(readFileSync(out, 'utf-8'))).toMatchObject({ totalFiles: 1 });
    expect(stdout).not.toHaveBeenCalled();
  });

  it('honours .armportignore unless told not to', async () => {
    writeFileSync(join(project, '.armportignore'), 'src/\n');
    await scanCommand(project, { format: 'json', ignoreFile: true });
    expect(lastJson()).toMatchObject({ totalFiles: 0 });

    await scanCommand(project, { format: 'json', ignoreFile: false });
    expect(lastJson()).toMatchObject({ totalFiles: 1 });
  });
});

describe('plan → migrate', () => {
  async function draftPlan(): Promise<string> {
    await planCommand(project, { format: 'json' });
    return lastJson<{ planId: string }>().planId;
  }

  it('stores a draft plan with bottom-up changes', async () => {
    await planCommand(project, { format: 'json' });
    expect(lastJson()).toMatchObject({
      plan: {
        targetArchitecture: 'arm64',
        steps: [{ file: 'src/simd.c', changes: [{ line: 10 }, { line: 5 }] }],
      },
    });

    await plansCommand(project, { limit: 20, json: true });
    expect(lastJson()).toMatchObject([{ status: 'draft', totalIssues: 2, effort: 'medium' }]);
  });

  it('uses --target over the configured architecture', async () => {
    await planCommand(project, { format: 'json', target: 'armv7' });
    expect(lastJson()).toMatchObject({ plan: { targetArchitecture: 'armv7' } });
  });

  it('simulates, then applies with a backup', async () => {
    const planId = await draftPlan();

    await migrateCommand(project, { plan: planId, dryRun: true, json: true });
    expect(lastJson()).toMatchObject({ planId, status: 'simulated' });
    expect(readFileSync(join(project, 'src', 'simd.c'), 'utf-8')).toBe(SOURCE);

    await migrateCommand(project, { plan: planId, apply: true, json: true });
    const out = lastJson<{ planId: string; status: string; result: ExecutionResult }>();
    expect(out).toMatchObject({ planId, status: 'applied', result: { mode: 'apply', completedSteps: 1 } });

    const lines = readFileSync(join(project, 'src', 'simd.c'), 'utf-8').split('\n');
    expect(lines[4]).toBe('#if defined(_M_X64) || defined(__x86_64__) || defined(__aarch64__)');

    const backupPath = out.result.backupPath ?? '';
    expect(backupPath.startsWith(join(parent, 'proj_backup_'))).toBe(true);
    expect(readFileSync(join(backupPath, 'src', 'simd.c'), 'utf-8')).toBe(SOURCE);
    expect(existsSync(join(backupPath, '.armport'))).toBe(false);
  });

  it('warns when applying a plan that was never simulated', async () => {
    const planId = await draftPlan();
    await migrateCommand(project, { plan: planId, apply: true, json: true });
    expect(stderr).toHaveBeenCalledWith(
      'Warning: applying a plan that has not been simulated. Run with --dry-run first to preview.',
    );
  });

  it('refuses to run a plan twice after apply', async () => {
    const planId = await draftPlan();
    await migrateCommand(project, { plan: planId, apply: true, json: true });
    await expect(migrateCommand(project, { plan: planId, dryRun: true })).rejects.toThrow(MigrationError);
  });

  it('refuses a stored plan when the project was copied elsewhere', async () => {
    const planId = await draftPlan();
    const copy = join(parent, 'copy');
    cpSync(project, copy, { recursive: true });

    await expect(migrateCommand(copy, { plan: planId, apply: true })).rejects.toThrow(
      `Plan ${planId} belongs to ${project}, not ${copy}`,
    );
    expect(readFileSync(join(copy, 'src', 'simd.c'), 'utf-8')).toBe(SOURCE);
  });

  it('builds a fresh plan when none is given', async () => {
    await migrateCommand(project, { json: true });
    expect(lastJson()).toMatchObject({ status: 'simulated', result: { mode: 'simulate', totalSteps: 1 } });
    expect(readFileSync(join(project, 'src', 'simd.c'), 'utf-8')).toBe(SOURCE);
  });

  it('rejects unknown plans and conflicting modes', async () => {
    await expect(migrateCommand(project, { plan: 'plan_nope' })).rejects.toThrow('Plan not found: plan_nope');
    await expect(migrateCommand(project, { apply: true, dryRun: true })).rejects.toThrow(
      'Choose one of --apply or --dry-run',
    );
  });
});

describe('init', () => {
  it('writes a config named after the directory', async () => {
    await initCommand(project, {});
    const config = loadConfig({ projectDir: project });
    expect(config.project.name).toBe('proj');
    expect(readFileSync(join(project, '.gitignore'), 'utf-8')).toBe('.armport/\n');
  });

  it('refuses to overwrite without --force', async () => {
    await initCommand(project, {});
    await expect(initCommand(project, {})).rejects.toThrow(ConfigError);
    await expect(initCommand(project, { force: true })).resolves.toBeUndefined();
  });
});

describe('doctor', () => {
  it('warns about a missing config and database', () => {
    const checks = runChecks(project, 'v20.11.0');
    expect(checks.map((c) => [c.name, c.status])).toEqual([
      ['config', 'warn'],
      ['database', 'warn'],
      ['mappings', 'pass'],
      ['node', 'pass'],
    ]);
  });

  it('fails an old Node.js', () => {
    const node = runChecks(project, 'v18.19.0').find((c) => c.name === 'node');
    expect(node).toMatchObject({ status: 'fail', message: 'Node.js v18.19.0, requires >= 20' });
  });

  it('reports a valid config and database after init', async () => {
    await initCommand(project, {});
    await plansCommand(project, { limit: 5, json: true });
    const checks = runChecks(project, 'v20.11.0');
    expect(checks.map((c) => [c.name, c.status])).toEqual([
      ['config', 'pass'],
      ['database', 'pass'],
      ['mappings', 'pass'],
      ['node', 'pass'],
      ['schema', 'pass'],
    ]);
  });
});
