import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { backupPathFor } from '../../../src/engine/backup.js';
import { EditExecutor } from '../../../src/engine/edit-executor.js';
import { EventBus } from '../../../src/engine/event-bus.js';
import { testingStrategyFor } from '../../../src/planner/testing-strategy.js';
import type { Change, MigrationPlan, MigrationStep } from '../../../src/types/plan.js';
import type { MigrationEvent } from '../../../src/types/events.js';
import { BackupError } from '../../../src/utils/errors.js';
import { createLogger } from '../../../src/utils/logger.js';

const FIXED = new Date(2026, 0, 5, 9, 7, 3);

let parent: string;
let project: string;

function executor(events?: EventBus): EditExecutor {
  return new EditExecutor({
    projectDir: project,
    logger: createLogger('error'),
    events,
    now: () => FIXED,
  });
}

function change(line: number, original: string, replacement: string, confidence: Change['confidence'] = 'high'): Change {
  return { line, category: 'architecture_check', original, replacement, confidence };
}

function step(id: number, file: string, changes: Change[]): MigrationStep {
  return { id, type: 'file_migration', file, issuesCount: changes.length, changes };
}

function plan(steps: MigrationStep[], extra: Partial<MigrationPlan> = {}): MigrationPlan {
  return {
    targetArchitecture: 'arm64',
    createdAt: FIXED.toISOString(),
    totalIssues: steps.reduce((n, s) => n + s.issuesCount, 0),
    steps,
    buildSystemChanges: [],
    dependencyUpdates: [],
    testingStrategy: testingStrategyFor('arm64'),
    estimatedEffort: 'minimal',
    ...extra,
  };
}

function read(file: string): string {
  return readFileSync(join(project, file), 'utf-8');
}

beforeEach(() => {
  parent = join(tmpdir(), `armport-exec-${randomUUID()}`);
  project = join(parent, 'proj');
  mkdirSync(project, { recursive: true });
});

afterEach(() => {
  rmSync(parent, { recursive: true, force: true });
});

describe('EditExecutor apply', () => {
  it('applies changes bottom-up so multi-line replacements do not shift earlier lines', async () => {
    writeFileSync(join(project, 'a.c'), 'a\nb\nc');
    const result = await executor().execute(
      plan([step(1, 'a.c', [change(3, 'c', 'C1\nC2'), change(1, 'a', 'A')])]),
      'apply',
    );
    expect(read('a.c')).toBe('A\nb\nC1\nC2');
    expect(result.stepResults[0]).toEqual({
      stepId: 1,
      file: 'a.c',
      success: true,
      changesApplied: 2,
      warnings: [],
    });
  });

  it('replaces every occurrence of the original text on the line', async () => {
    writeFileSync(join(project, 'm.c'), 'x = _mm_add_ps(_mm_add_ps(a, b), c);\n');
    await executor().execute(plan([step(1, 'm.c', [change(1, '_mm_add_ps', 'vaddq_f32')])]), 'apply');
    expect(read('m.c')).toBe('x = vaddq_f32(vaddq_f32(a, b), c);\n');
  });

  it('only writes high-confidence changes', async () => {
    writeFileSync(join(project, 'a.c'), 'one\ntwo\n');
    const result = await executor().execute(
      plan([step(1, 'a.c', [change(2, 'two', 'TWO', 'medium'), change(1, 'one', 'ONE', 'low')])]),
      'apply',
    );
    expect(read('a.c')).toBe('one\ntwo\n');
    expect(result.stepResults[0].changesApplied).toBe(0);
    expect(result.stepResults[0].warnings).toEqual([
      'Low confidence change skipped at line 2',
      'Low confidence change skipped at line 1',
    ]);
  });

  it('warns instead of editing when the line is stale', async () => {
    writeFileSync(join(project, 'a.c'), 'int x;\n');
    const result = await executor().execute(
      plan([step(1, 'a.c', [change(9, 'foo', 'bar'), change(1, '#ifdef _M_X64', 'x')])]),
      'apply',
    );
    expect(read('a.c')).toBe('int x;\n');
    expect(result.stepResults[0].success).toBe(true);
    expect(result.stepResults[0].warnings).toEqual([
      'Line 9 is out of range, change not applied',
      'Expected text not found at line 1, change not applied',
    ]);
  });

  it('takes a backup first and reports its path', async () => {
    writeFileSync(join(project, 'a.c'), 'a\n');
    const result = await executor().execute(plan([step(1, 'a.c', [change(1, 'a', 'b')])]), 'apply');
    const expected = backupPathFor(project, FIXED);
    expect(result.backupPath).toBe(expected);
    expect(readFileSync(join(expected, 'a.c'), 'utf-8')).toBe('a\n');
    expect(read('a.c')).toBe('b\n');
  });

  it('fails a step whose file is missing and carries on', async () => {
    writeFileSync(join(project, 'ok.c'), 'a\n');
    const result = await executor().execute(
      plan([step(1, 'gone.c', [change(1, 'a', 'b')]), step(2, 'ok.c', [change(1, 'a', 'b')])]),
      'apply',
    );
    expect(result.stepResults[0]).toMatchObject({ success: false, error: 'File not found' });
    expect(result.completedSteps).toBe(1);
    expect(result.failedSteps).toBe(1);
    expect(result.successRate).toBe(0.5);
    expect(read('ok.c')).toBe('b\n');
  });

  it('reports build and dependency actions', async () => {
    const result = await executor().execute(
      plan([], {
        buildSystemChanges: [{ file: 'Makefile', system: 'make', changes: ['one', 'two'] }],
        dependencyUpdates: [
          { name: 'numpy', currentVersion: '1.26', type: 'python', action: 'check_arm_wheels', notes: [] },
        ],
      }),
      'apply',
    );
    expect(result.buildChanges).toEqual([
      {
        file: 'Makefile',
        system: 'make',
        success: true,
        changesApplied: 2,
        note: 'Build system changes require manual review',
      },
    ]);
    expect(result.dependencyChanges).toEqual([
      {
        dependency: 'numpy',
        success: true,
        actionTaken: 'check_arm_wheels',
        note: 'Dependency compatibility requires manual review',
      },
    ]);
    expect(result.successRate).toBe(0);
  });
});

describe('EditExecutor simulate', () => {
  it('counts what apply would do without touching the tree', async () => {
    writeFileSync(join(project, 'a.c'), 'a\nb\nc');
    const steps = [step(1, 'a.c', [change(3, 'c', 'C'), change(2, 'b', 'B', 'low'), change(1, 'a', 'A')])];

    const simulated = await executor().execute(plan(steps), 'simulate');
    expect(read('a.c')).toBe('a\nb\nc');
    expect(simulated.backupPath).toBeUndefined();
    expect(existsSync(backupPathFor(project, FIXED))).toBe(false);
    expect(simulated.executedAt).toBe(FIXED.toISOString());

    const applied = await executor().execute(plan(steps), 'apply');
    expect(simulated.stepResults[0].changesApplied).toBe(applied.stepResults[0].changesApplied);
    expect(simulated.stepResults[0].warnings).toEqual(['Low confidence change skipped at line 2']);
    expect(read('a.c')).toBe('A\nb\nC');
  });

  it('flags missing files', async () => {
    const result = await executor().execute(plan([step(1, 'gone.c', [change(1, 'a', 'b')])]), 'simulate');
    expect(result.stepResults[0].error).toBe('File not found');
    expect(result.failedSteps).toBe(1);
  });

  it('takes no dependency or build action', async () => {
    const result = await executor().execute(
      plan([], {
        buildSystemChanges: [{ file: 'CMakeLists.txt', system: 'cmake', changes: ['x'] }],
        dependencyUpdates: [
          { name: 'sharp', currentVersion: '^0.33.0', type: 'npm', action: 'verify_arm_support', notes: [] },
        ],
      }),
      'simulate',
    );
    expect(result.buildChanges[0].changesApplied).toBe(0);
    expect(result.dependencyChanges[0].actionTaken).toBe('none');
  });
});

describe('EditExecutor backup precondition', () => {
  it('aborts apply before touching any file when the backup cannot be taken', async () => {
    writeFileSync(join(project, 'a.c'), '#ifdef _M_X64\n');
    mkdirSync(backupPathFor(project, FIXED));
    const bus = new EventBus();
    const seen: MigrationEvent[] = [];
    bus.on('event', (e) => seen.push(e));

    await expect(
      executor(bus).execute(plan([step(1, 'a.c', [change(1, '#ifdef _M_X64', '#if defined(_M_X64)')])]), 'apply'),
    ).rejects.toThrow(BackupError);

    expect(read('a.c')).toBe('#ifdef _M_X64\n');
    expect(seen).toEqual([]);
  });
});

describe('EditExecutor events', () => {
  it('emits progress in order', async () => {
    writeFileSync(join(project, 'a.c'), 'a\n');
    const bus = new EventBus();
    const seen: MigrationEvent[] = [];
    bus.on('event', (e) => seen.push(e));

    await executor(bus).execute(
      plan([step(1, 'a.c', [change(1, 'a', 'b'), change(1, 'a', 'c', 'medium')]), step(2, 'gone.c', [])]),
      'apply',
    );
    expect(seen.map((e) => e.type)).toEqual([
      'backup.created',
      'step.started',
      'change.skipped',
      'step.completed',
      'step.started',
      'step.failed',
      'run.completed',
    ]);
    expect(seen[0]).toMatchObject({ type: 'backup.created', filesCopied: 1 });
    expect(seen.every((e) => e.timestamp === FIXED.toISOString())).toBe(true);
  });
});
