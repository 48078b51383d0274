// packages/core/src/types/index.ts -- barrel re-export

export type { ScanConfig, MigrateConfig, ProjectConfig } from './config.js';

export { ISSUE_CATEGORIES } from './scan.js';
export type {
  IssueCategory,
  Severity,
  Issue,
  DependencyType,
  DependencyRecord,
  BuildSystem,
  BuildSystemRecord,
  SkippedFile,
  ScanReport,
} from './scan.js';

export type {
  Confidence,
  EffortEstimate,
  Change,
  MigrationStep,
  BuildSystemChange,
  DependencyAction,
  DependencyUpdate,
  TestingStrategy,
  MigrationPlan,
} from './plan.js';

export type {
  ExecutionMode,
  PlanStatus,
  StepResult,
  BuildChangeResult,
  DependencyChangeResult,
  ExecutionResult,
} from './execution.js';

export type {
  BackupCreatedEvent,
  StepStartedEvent,
  StepCompletedEvent,
  StepFailedEvent,
  ChangeSkippedEvent,
  RunCompletedEvent,
  MigrationEvent,
} from './events.js';

export { scanInputSchema, planInputSchema, migrateInputSchema } from './mcp.js';
export type { ScanInput, PlanInput, MigrateInput } from './mcp.js';
