// packages/core/src/engine/edit-executor.ts - Simulate or apply a migration plan

import { existsSync } from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type {
  BuildChangeResult,
  DependencyChangeResult,
  ExecutionMode,
  ExecutionResult,
  StepResult,
} from '../types/execution.js';
import type { Change, MigrationPlan, MigrationStep } from '../types/plan.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { createBackup, DEFAULT_BACKUP_EXCLUDES } from './backup.js';
import type { EventBus } from './event-bus.js';

export interface EditExecutorOptions {
  projectDir: string;
  logger?: Logger;
  events?: EventBus;
  /** Entry names left out of the backup copy */
  backupExcludes?: readonly string[];
  /** Clock for executedAt and the backup timestamp */
  now?: () => Date;
}

const BUILD_CHANGE_NOTE = 'Build system changes require manual review';
const DEPENDENCY_CHANGE_NOTE = 'Dependency compatibility requires manual review';

/**
 * Runs a plan against the project tree. Only high-confidence changes are
 * ever written; everything else becomes a warning. The plan is never mutated.
 */
export class EditExecutor {
  private readonly projectDir: string;
  private readonly logger: Logger;
  private readonly events: EventBus | undefined;
  private readonly backupExcludes: readonly string[];
  private readonly now: () => Date;

  constructor(options: EditExecutorOptions) {
    this.projectDir = resolve(options.projectDir);
    this.logger = (options.logger ?? createLogger('info')).child('executor');
    this.events = options.events;
    this.backupExcludes = options.backupExcludes ?? DEFAULT_BACKUP_EXCLUDES;
    this.now = options.now ?? (() => new Date());
  }

  /** Throws BackupError in apply mode if the backup cannot be taken; nothing is modified then. */
  async execute(plan: MigrationPlan, mode: ExecutionMode): Promise<ExecutionResult> {
    const startedAt = this.now();
    this.logger.info(`Executing migration plan (mode=${mode})`);

    let backupPath: string | undefined;
    if (mode === 'apply') {
      const backup = await createBackup(this.projectDir, this.backupExcludes, startedAt);
      backupPath = backup.backupPath;
      this.logger.info(`Backup created at: ${backupPath}`);
      this.events?.emitEvent({
        type: 'backup.created',
        backupPath,
        filesCopied: backup.filesCopied,
        timestamp: this.timestamp(),
      });
    }

    const stepResults: StepResult[] = [];
    for (const step of plan.steps) {
      this.events?.emitEvent({
        type: 'step.started',
        stepId: step.id,
        file: step.file,
        mode,
        timestamp: this.timestamp(),
      });
      const result = await this.executeStep(step, mode);
      stepResults.push(result);

      if (result.success) {
        this.events?.emitEvent({
          type: 'step.completed',
          stepId: step.id,
          file: step.file,
          changesApplied: result.changesApplied,
          warnings: result.warnings.length,
          timestamp: this.timestamp(),
        });
      } else {
        this.logger.error(`Step ${step.id} failed: ${result.error ?? 'unknown error'}`);
        this.events?.emitEvent({
          type: 'step.failed',
          stepId: step.id,
          file: step.file,
          error: result.error ?? 'unknown error',
          timestamp: this.timestamp(),
        });
      }
    }

    const buildChanges: BuildChangeResult[] = plan.buildSystemChanges.map((change) => ({
      file: change.file,
      system: change.system,
      success: true,
      changesApplied: mode === 'apply' ? change.changes.length : 0,
      note: BUILD_CHANGE_NOTE,
    }));

    const dependencyChanges: DependencyChangeResult[] = plan.dependencyUpdates.map((update) => ({
      dependency: update.name,
      success: true,
      actionTaken: mode === 'apply' ? update.action : 'none',
      note: DEPENDENCY_CHANGE_NOTE,
    }));

    const completedSteps = stepResults.filter((r) => r.success).length;
    const failedSteps = stepResults.length - completedSteps;
    const totalSteps = plan.steps.length;
    const successRate = totalSteps > 0 ? completedSteps / totalSteps : 0;

    this.logger.info(`Migration execution completed: ${(successRate * 100).toFixed(1)}% success rate`);
    this.events?.emitEvent({
      type: 'run.completed',
      mode,
      completedSteps,
      failedSteps,
      timestamp: this.timestamp(),
    });

    return {
      mode,
      executedAt: startedAt.toISOString(),
      totalSteps,
      completedSteps,
      failedSteps,
      successRate,
      stepResults,
      buildChanges,
      dependencyChanges,
      ...(backupPath !== undefined ? { backupPath } : {}),
    };
  }

  private async executeStep(step: MigrationStep, mode: ExecutionMode): Promise<StepResult> {
    const result: StepResult = {
      stepId: step.id,
      file: step.file,
      success: true,
      changesApplied: 0,
      warnings: [],
    };

    const filePath = join(this.projectDir, step.file);
    if (!existsSync(filePath)) {
      result.success = false;
      result.error = 'File not found';
      return result;
    }

    try {
      if (mode === 'apply') {
        const lines = (await readFile(filePath, 'utf-8')).split('\n');
        for (const change of step.changes) {
          this.applyChange(step, change, lines, result);
        }
        if (result.changesApplied > 0) {
          await writeFile(filePath, lines.join('\n'), 'utf-8');
        }
      } else {
        for (const change of step.changes) {
          if (change.confidence === 'high') result.changesApplied++;
          else this.skip(step, change.line, `Low confidence change skipped at line ${change.line}`, result);
        }
      }
    } catch (err) {
      result.success = false;
      result.error = errorMessage(err);
    }
    return result;
  }

  /**
   * Changes arrive in descending line order, so splicing a multi-line
   * replacement never shifts a line that is still to be edited.
   */
  private applyChange(step: MigrationStep, change: Change, lines: string[], result: StepResult): void {
    if (change.confidence !== 'high') {
      this.skip(step, change.line, `Low confidence change skipped at line ${change.line}`, result);
      return;
    }
    const index = change.line - 1;
    if (index < 0 || index >= lines.length) {
      this.skip(step, change.line, `Line ${change.line} is out of range, change not applied`, result);
      return;
    }
    const current = lines[index];
    if (!change.original || !current.includes(change.original)) {
      this.skip(step, change.line, `Expected text not found at line ${change.line}, change not applied`, result);
      return;
    }
    const updated = current.split(change.original).join(change.replacement);
    lines.splice(index, 1, ...updated.split('\n'));
    result.changesApplied++;
  }

  private skip(step: MigrationStep, line: number, reason: string, result: StepResult): void {
    result.warnings.push(reason);
    this.events?.emitEvent({
      type: 'change.skipped',
      stepId: step.id,
      file: step.file,
      line,
      reason,
      timestamp: this.timestamp(),
    });
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
