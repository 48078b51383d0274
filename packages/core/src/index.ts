// @armport/core - x86 → ARM source migration engine
// Scan → plan → simulate/apply, with SQLite-backed plan history

export const VERSION = '0.1.0';

// Type definitions
export type {
  // Config
  ProjectConfig,
  ScanConfig,
  MigrateConfig,
  // Scan
  IssueCategory,
  Severity,
  Issue,
  DependencyType,
  DependencyRecord,
  BuildSystem,
  BuildSystemRecord,
  SkippedFile,
  ScanReport,
  // Plan
  Confidence,
  EffortEstimate,
  Change,
  MigrationStep,
  BuildSystemChange,
  DependencyAction,
  DependencyUpdate,
  TestingStrategy,
  MigrationPlan,
  // Execution
  ExecutionMode,
  PlanStatus,
  StepResult,
  BuildChangeResult,
  DependencyChangeResult,
  ExecutionResult,
  // Events
  BackupCreatedEvent,
  StepStartedEvent,
  StepCompletedEvent,
  StepFailedEvent,
  ChangeSkippedEvent,
  RunCompletedEvent,
  MigrationEvent,
  // MCP
  ScanInput,
  PlanInput,
  MigrateInput,
} from './types/index.js';

export { ISSUE_CATEGORIES, scanInputSchema, planInputSchema, migrateInputSchema } from './types/index.js';

// Config
export {
  DEFAULT_CONFIG,
  CURRENT_CONFIG_VERSION,
  projectConfigSchema,
  validateConfig,
  loadConfig,
  writeConfig,
  deepMerge,
  CONFIG_FILENAME,
  DATA_DIRNAME,
  createIgnoreFilter,
  shouldIgnore,
  IGNORE_FILE_NAME,
} from './config/index.js';
export type { ProjectConfigInput, ConfigOverrides } from './config/index.js';

// Catalog
export { PatternCatalog, DEFAULT_PATTERN_TABLE } from './catalog/index.js';
export type { PatternEntry, CategoryRule, PatternTable, PatternMatch } from './catalog/index.js';

// Scanner
export {
  FileScanner,
  ProjectScanner,
  detectBuildSystem,
  extractDependencies,
  parsePackageJson,
  parseRequirementsTxt,
  parseCargoToml,
  parseGoMod,
  buildRecommendations,
} from './scanner/index.js';
export type { FileScanResult, ProjectScannerOptions } from './scanner/index.js';

// Planner
export {
  PlanBuilder,
  createPlanTables,
  loadIntrinsicMappings,
  defaultIntrinsicMappingsPath,
  AMD64_FAMILY,
  IA32_FAMILY,
  confidenceFor,
  replacementFor,
  replaceIntrinsic,
  rewriteArchitectureCheck,
  estimateEffort,
  testingStrategyFor,
  BUILD_SYSTEM_CHECKLISTS,
} from './planner/index.js';
export type { PlanTables, MacroFamily } from './planner/index.js';

// Engine
export {
  EventBus,
  EditExecutor,
  createBackup,
  backupPathFor,
  formatBackupTimestamp,
  DEFAULT_BACKUP_EXCLUDES,
  nextPlanStatus,
  isTerminalStatus,
} from './engine/index.js';
export type { EditExecutorOptions, BackupResult } from './engine/index.js';

// Memory
export { openDatabase, runMigrations, getSchemaVersion, MigrationStore } from './memory/index.js';
export type { StoredPlan, PlanSummary, StoredRun } from './memory/index.js';

// Utils
export {
  generatePlanId,
  ConfigError,
  ScanError,
  BackupError,
  MigrationError,
  DatabaseError,
  errorMessage,
  createLogger,
  mapWithConcurrency,
  resolveConcurrency,
  assertNever,
} from './utils/index.js';
export type { Logger, LogLevel } from './utils/index.js';
export {
  BINARY_SNIFF_BYTES,
  LOW_EFFORT_MAX_ISSUES,
  MEDIUM_EFFORT_MAX_ISSUES,
  LOW_EFFORT_HIGH_CONFIDENCE_RATIO,
  DEFAULT_TARGET_ARCHITECTURE,
  MATCHED_TEXT_DISPLAY_CHARS,
  FILE_PATH_DISPLAY_CHARS,
  DEFAULT_PLAN_LIST_LIMIT,
} from './utils/constants.js';
