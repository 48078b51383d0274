// packages/core/src/utils/index.ts -- barrel re-export

export { generatePlanId } from './id.js';
export {
  ConfigError,
  ScanError,
  BackupError,
  MigrationError,
  DatabaseError,
  errorMessage,
} from './errors.js';
export { createLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export { mapWithConcurrency, resolveConcurrency } from './concurrency.js';
export { assertNever } from './assert.js';
