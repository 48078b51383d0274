// packages/core/src/planner/index.ts -- barrel re-export

export { PlanBuilder } from './plan-builder.js';
export {
  createPlanTables,
  loadIntrinsicMappings,
  defaultIntrinsicMappingsPath,
  AMD64_FAMILY,
  IA32_FAMILY,
} from './tables.js';
export type { PlanTables, MacroFamily } from './tables.js';
export {
  confidenceFor,
  replacementFor,
  replaceIntrinsic,
  rewriteArchitectureCheck,
} from './replacements.js';
export { estimateEffort } from './effort.js';
export { testingStrategyFor } from './testing-strategy.js';
export { BUILD_SYSTEM_CHECKLISTS } from './checklists.js';
