// packages/core/src/memory/index.ts -- barrel re-export

export { openDatabase, runMigrations, getSchemaVersion } from './database.js';
export { MigrationStore } from './migration-store.js';
export type { StoredPlan, PlanSummary, StoredRun } from './migration-store.js';
