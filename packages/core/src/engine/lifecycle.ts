// packages/core/src/engine/lifecycle.ts - Plan status transitions

import type { ExecutionMode, ExecutionResult, PlanStatus } from '../types/execution.js';
import { MigrationError } from '../utils/errors.js';

const TERMINAL: ReadonlySet<PlanStatus> = new Set(['applied', 'partially_applied']);

export function isTerminalStatus(status: PlanStatus): boolean {
  return TERMINAL.has(status);
}

/**
 * draft|simulated + simulate → simulated
 * draft|simulated + apply    → applied, or partially_applied if any step failed
 * applied|partially_applied are terminal.
 */
export function nextPlanStatus(
  current: PlanStatus,
  mode: ExecutionMode,
  result: Pick<ExecutionResult, 'failedSteps'>,
  planId?: string,
): PlanStatus {
  if (isTerminalStatus(current)) {
    throw new MigrationError(`Plan is already ${current}; build a new plan to run again`, planId);
  }
  if (mode === 'simulate') return 'simulated';
  return result.failedSteps > 0 ? 'partially_applied' : 'applied';
}
