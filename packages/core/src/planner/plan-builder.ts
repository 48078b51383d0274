// packages/core/src/planner/plan-builder.ts - Scan report → ordered, confidence-tiered plan

import type {
  BuildSystemChange,
  Change,
  DependencyUpdate,
  MigrationPlan,
  MigrationStep,
} from '../types/plan.js';
import type { BuildSystemRecord, DependencyRecord, Issue, ScanReport } from '../types/scan.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { BUILD_SYSTEM_CHECKLISTS } from './checklists.js';
import { estimateEffort } from './effort.js';
import { confidenceFor, replacementFor } from './replacements.js';
import { createPlanTables, type PlanTables } from './tables.js';
import { testingStrategyFor } from './testing-strategy.js';

export class PlanBuilder {
  private readonly tables: PlanTables;
  private readonly logger: Logger;

  constructor(tables?: PlanTables, logger?: Logger) {
    this.tables = tables ?? createPlanTables();
    this.logger = logger ?? createLogger('info');
  }

  buildPlan(report: ScanReport, targetArchitecture: string, now: Date = new Date()): MigrationPlan {
    this.logger.info(`Creating migration plan for ${targetArchitecture}`);

    const steps: MigrationStep[] = [];
    for (const [file, issues] of groupByFile(report.issues)) {
      steps.push({
        id: steps.length + 1,
        type: 'file_migration',
        file,
        issuesCount: issues.length,
        changes: this.changesFor(issues),
      });
    }

    const highConfidence = steps
      .flatMap((s) => s.changes)
      .filter((c) => c.confidence === 'high').length;

    const plan: MigrationPlan = {
      targetArchitecture,
      createdAt: now.toISOString(),
      totalIssues: report.issues.length,
      steps,
      buildSystemChanges: report.buildSystems.map(buildSystemChange),
      dependencyUpdates: report.dependencies.map((d) => this.dependencyUpdate(d)),
      testingStrategy: testingStrategyFor(targetArchitecture),
      estimatedEffort: estimateEffort(report.issues.length, highConfidence),
    };

    this.logger.info(`Migration plan created with ${steps.length} steps`);
    return plan;
  }

  /** Descending line order; ties keep their scan order. */
  private changesFor(issues: readonly Issue[]): Change[] {
    return [...issues]
      .sort((a, b) => b.line - a.line)
      .map((issue) => ({
        line: issue.line,
        category: issue.category,
        original: issue.matchedText,
        replacement: replacementFor(issue, this.tables),
        confidence: confidenceFor(issue.category),
      }));
  }

  private dependencyUpdate(dep: DependencyRecord): DependencyUpdate {
    const sensitive = this.tables.armSensitiveDependencies.has(dep.name.toLowerCase());
    return {
      name: dep.name,
      currentVersion: dep.version,
      type: dep.type,
      action: sensitive ? 'check_arm_wheels' : 'verify_arm_support',
      notes: sensitive ? ['May require ARM-specific build'] : [],
    };
  }
}

/** Insertion-ordered grouping: files appear in first-seen order. */
function groupByFile(issues: readonly Issue[]): Map<string, Issue[]> {
  const groups = new Map<string, Issue[]>();
  for (const issue of issues) {
    const group = groups.get(issue.file);
    if (group) group.push(issue);
    else groups.set(issue.file, [issue]);
  }
  return groups;
}

function buildSystemChange(record: BuildSystemRecord): BuildSystemChange {
  return {
    file: record.file,
    system: record.system,
    changes: BUILD_SYSTEM_CHECKLISTS[record.system],
  };
}
