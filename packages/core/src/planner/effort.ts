// packages/core/src/planner/effort.ts

import type { EffortEstimate } from '../types/plan.js';
import {
  LOW_EFFORT_HIGH_CONFIDENCE_RATIO,
  LOW_EFFORT_MAX_ISSUES,
  MEDIUM_EFFORT_MAX_ISSUES,
} from '../utils/constants.js';

/** Decision table, first matching row wins. */
export function estimateEffort(totalIssues: number, highConfidenceChanges: number): EffortEstimate {
  if (totalIssues === 0) return 'minimal';
  if (
    totalIssues <= LOW_EFFORT_MAX_ISSUES &&
    highConfidenceChanges / totalIssues >= LOW_EFFORT_HIGH_CONFIDENCE_RATIO
  ) {
    return 'low';
  }
  if (totalIssues <= MEDIUM_EFFORT_MAX_ISSUES) return 'medium';
  return 'high';
}
