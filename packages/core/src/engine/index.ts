// packages/core/src/engine/index.ts -- barrel re-export

export { EventBus } from './event-bus.js';
export { EditExecutor } from './edit-executor.js';
export type { EditExecutorOptions } from './edit-executor.js';
export {
  createBackup,
  backupPathFor,
  formatBackupTimestamp,
  DEFAULT_BACKUP_EXCLUDES,
} from './backup.js';
export type { BackupResult } from './backup.js';
export { nextPlanStatus, isTerminalStatus } from './lifecycle.js';
