// packages/core/src/types/execution.ts - Execution report types

import type { BuildSystem } from './scan.js';
import type { DependencyAction } from './plan.js';

export type ExecutionMode = 'simulate' | 'apply';

/** Lifecycle of a stored plan across the simulate → review → apply workflow. */
export type PlanStatus = 'draft' | 'simulated' | 'applied' | 'partially_applied';

export interface StepResult {
  stepId: number;
  file: string;
  success: boolean;
  changesApplied: number;
  warnings: string[];
  error?: string;
}

export interface BuildChangeResult {
  file: string;
  system: BuildSystem;
  success: true;
  changesApplied: number;
  note: string;
}

export interface DependencyChangeResult {
  dependency: string;
  success: true;
  actionTaken: DependencyAction | 'none';
  note: string;
}

export interface ExecutionResult {
  mode: ExecutionMode;
  /** ISO-8601 */
  executedAt: string;
  totalSteps: number;
  completedSteps: number;
  failedSteps: number;
  /** completedSteps / totalSteps, 0 when the plan has no steps */
  successRate: number;
  stepResults: StepResult[];
  buildChanges: BuildChangeResult[];
  dependencyChanges: DependencyChangeResult[];
  /** Present in apply mode only */
  backupPath?: string;
}
