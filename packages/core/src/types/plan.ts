// packages/core/src/types/plan.ts - Migration plan types

import type { BuildSystem, DependencyType, IssueCategory } from './scan.js';

export type Confidence = 'high' | 'medium' | 'low';

export type EffortEstimate = 'minimal' | 'low' | 'medium' | 'high';

/** A proposed edit derived from one issue. */
export interface Change {
  readonly line: number;
  readonly category: IssueCategory;
  /** Text to find on the line */
  readonly original: string;
  readonly replacement: string;
  readonly confidence: Confidence;
}

/** All changes for one file, ordered by descending line number. */
export interface MigrationStep {
  readonly id: number;
  readonly type: 'file_migration';
  readonly file: string;
  readonly issuesCount: number;
  readonly changes: readonly Change[];
}

export interface BuildSystemChange {
  readonly file: string;
  readonly system: BuildSystem;
  readonly changes: readonly string[];
}

export type DependencyAction = 'verify_arm_support' | 'check_arm_wheels';

export interface DependencyUpdate {
  readonly name: string;
  readonly currentVersion: string;
  readonly type: DependencyType;
  readonly action: DependencyAction;
  readonly notes: readonly string[];
}

export interface TestingStrategy {
  readonly unitTests: {
    readonly required: boolean;
    readonly platforms: readonly string[];
    readonly focusAreas: readonly string[];
  };
  readonly integrationTests: {
    readonly required: boolean;
    readonly environments: readonly string[];
  };
  readonly performanceTests: {
    readonly required: boolean;
    readonly metrics: readonly string[];
    readonly comparisonBaseline: string;
  };
  readonly compatibilityTests: {
    readonly required: boolean;
    readonly dataFormats: readonly string[];
  };
}

export interface MigrationPlan {
  readonly targetArchitecture: string;
  /** ISO-8601 */
  readonly createdAt: string;
  readonly totalIssues: number;
  readonly steps: readonly MigrationStep[];
  readonly buildSystemChanges: readonly BuildSystemChange[];
  readonly dependencyUpdates: readonly DependencyUpdate[];
  readonly testingStrategy: TestingStrategy;
  readonly estimatedEffort: EffortEstimate;
}
