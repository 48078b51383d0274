// packages/mcp-server/src/tools/index.ts - barrel export

export { handleScan } from './scan.js';
export { handlePlan } from './plan.js';
export { handleMigrate } from './migrate.js';
export type { ToolContext, ToolResult } from './project.js';
