// packages/core/src/utils/id.ts

import { nanoid } from 'nanoid';

/** Generate a plan ID with "plan_" prefix. */
export function generatePlanId(): string {
  return `plan_${nanoid(16)}`;
}

