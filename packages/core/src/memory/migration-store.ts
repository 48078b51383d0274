// packages/core/src/memory/migration-store.ts - Plans and execution runs

import type Database from 'better-sqlite3';
import { nextPlanStatus } from '../engine/lifecycle.js';
import type { ExecutionResult, PlanStatus } from '../types/execution.js';
import type { EffortEstimate, MigrationPlan } from '../types/plan.js';
import { MigrationError } from '../utils/errors.js';
import { generatePlanId } from '../utils/id.js';

export interface StoredPlan {
  planId: string;
  projectDir: string;
  target: string;
  status: PlanStatus;
  plan: MigrationPlan;
  createdAt: number;
  updatedAt: number;
}

export interface PlanSummary {
  planId: string;
  projectDir: string;
  target: string;
  status: PlanStatus;
  totalIssues: number;
  effort: EffortEstimate;
  createdAt: number;
  updatedAt: number;
}

export interface StoredRun {
  id: number;
  planId: string;
  mode: ExecutionResult['mode'];
  completedSteps: number;
  failedSteps: number;
  backupPath: string | null;
  result: ExecutionResult;
  createdAt: number;
}

interface PlanRow {
  plan_id: string;
  project_dir: string;
  target: string;
  status: PlanStatus;
  total_issues: number;
  effort: EffortEstimate;
  plan_json: string;
  created_at: number;
  updated_at: number;
}

interface RunRow {
  id: number;
  plan_id: string;
  mode: ExecutionResult['mode'];
  completed_steps: number;
  failed_steps: number;
  backup_path: string | null;
  result_json: string;
  created_at: number;
}

export class MigrationStore {
  constructor(private db: Database.Database) {}

  /** Persist a freshly built plan as a draft. Returns its plan id. */
  save(plan: MigrationPlan, projectDir: string): string {
    const planId = generatePlanId();
    const now = Date.now();
    this.db
      .prepare(
        `INSERT INTO migration_plans (plan_id, project_dir, target, status, total_issues, effort, plan_json, created_at, updated_at)
         VALUES (?, ?, ?, 'draft', ?, ?, ?, ?, ?)`,
      )
      .run(
        planId,
        projectDir,
        plan.targetArchitecture,
        plan.totalIssues,
        plan.estimatedEffort,
        JSON.stringify(plan),
        now,
        now,
      );
    return planId;
  }

  get(planId: string): StoredPlan | null {
    const row = this.db
      .prepare<[string], PlanRow>('SELECT * FROM migration_plans WHERE plan_id = ?')
      .get(planId);
    return row ? toStoredPlan(row) : null;
  }

  /** Most recently updated first. */
  list(filter?: { projectDir?: string; limit?: number }): PlanSummary[] {
    let sql = 'SELECT * FROM migration_plans WHERE 1=1';
    const params: Array<string | number> = [];
    if (filter?.projectDir) {
      sql += ' AND project_dir = ?';
      params.push(filter.projectDir);
    }
    sql += ' ORDER BY updated_at DESC, rowid DESC';
    if (filter?.limit) {
      sql += ' LIMIT ?';
      params.push(filter.limit);
    }
    const rows = this.db.prepare<Array<string | number>, PlanRow>(sql).all(...params);
    return rows.map((r) => ({
      planId: r.plan_id,
      projectDir: r.project_dir,
      target: r.target,
      status: r.status,
      totalIssues: r.total_issues,
      effort: r.effort,
      createdAt: r.created_at,
      updatedAt: r.updated_at,
    }));
  }

  /**
   * Record an execution run and move the plan to its next lifecycle status,
   * atomically. Throws MigrationError for an unknown or terminal plan.
   */
  recordRun(planId: string, result: ExecutionResult): PlanStatus {
    return this.db.transaction(() => {
      const current = this.get(planId);
      if (!current) {
        throw new MigrationError(`Plan not found: ${planId}`, planId);
      }
      const next = nextPlanStatus(current.status, result.mode, result, planId);
      const now = Date.now();

      this.db
        .prepare(
          `INSERT INTO migration_runs (plan_id, mode, completed_steps, failed_steps, backup_path, result_json, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          planId,
          result.mode,
          result.completedSteps,
          result.failedSteps,
          result.backupPath ?? null,
          JSON.stringify(result),
          now,
        );
      this.db
        .prepare('UPDATE migration_plans SET status = ?, updated_at = ? WHERE plan_id = ?')
        .run(next, now, planId);
      return next;
    })();
  }

  /** Oldest first. */
  listRuns(planId: string): StoredRun[] {
    const rows = this.db
      .prepare<[string], RunRow>('SELECT * FROM migration_runs WHERE plan_id = ? ORDER BY id ASC')
      .all(planId);
    return rows.map((r) => ({
      id: r.id,
      planId: r.plan_id,
      mode: r.mode,
      completedSteps: r.completed_steps,
      failedSteps: r.failed_steps,
      backupPath: r.backup_path,
      result: parseJson<ExecutionResult>(r.result_json),
      createdAt: r.created_at,
    }));
  }

  hasSimulation(planId: string): boolean {
    const row = this.db
      .prepare<[string], { n: number }>(
        "SELECT COUNT(*) AS n FROM migration_runs WHERE plan_id = ? AND mode = 'simulate'",
      )
      .get(planId);
    return (row?.n ?? 0) > 0;
  }
}

function toStoredPlan(row: PlanRow): StoredPlan {
  return {
    planId: row.plan_id,
    projectDir: row.project_dir,
    target: row.target,
    status: row.status,
    plan: parseJson<MigrationPlan>(row.plan_json),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/** Columns written by this store only ever hold its own JSON.stringify output. */
function parseJson<T>(text: string): T {
  const value: T = JSON.parse(text);
  return value;
}
