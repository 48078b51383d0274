// packages/cli/src/render.ts - Terminal rendering for scan reports, plans and migration events

import type {
  ExecutionResult,
  Issue,
  MigrationEvent,
  MigrationPlan,
  PlanStatus,
  PlanSummary,
  ScanReport,
  Severity,
} from '@armport/core';
import {
  FILE_PATH_DISPLAY_CHARS,
  ISSUE_CATEGORIES,
  MATCHED_TEXT_DISPLAY_CHARS,
} from '@armport/core';
import chalk from 'chalk';

const severityColors: Record<Severity, (text: string) => string> = {
  high: chalk.red,
  medium: chalk.yellow,
  low: chalk.green,
};

const statusColors: Record<PlanStatus, (text: string) => string> = {
  draft: chalk.gray,
  simulated: chalk.cyan,
  applied: chalk.green,
  partially_applied: chalk.yellow,
};

function plural(n: number, word: string, many = `${word}s`): string {
  return `${n} ${n === 1 ? word : many}`;
}

/** Keep the tail of a path: `...ng/path/file.c` */
export function truncateStart(text: string, max: number): string {
  return text.length > max ? `...${text.slice(text.length - (max - 3))}` : text;
}

/** Keep the head of a snippet: `_mm256_fmadd_...` */
export function truncateEnd(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

type CellPainter = (row: number, column: number, padded: string) => string;

/**
 * Left-aligned columns separated by two spaces, under a dashed rule.
 * `paint` colours body cells after padding, so widths stay right.
 */
export function formatColumns(header: string[], rows: string[][], paint?: CellPainter): string[] {
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map((r) => r[i].length)));
  const pad = (c: string, i: number): string => (i === header.length - 1 ? c : c.padEnd(widths[i]));
  return [
    header.map(pad).join('  '),
    widths.map((w) => '-'.repeat(w)).join('  '),
    ...rows.map((cells, r) => cells.map((c, i) => (paint ? paint(r, i, pad(c, i)) : pad(c, i))).join('  ')),
  ];
}

function issueRow(issue: Issue): string[] {
  return [
    truncateStart(issue.file, FILE_PATH_DISPLAY_CHARS),
    String(issue.line),
    issue.category,
    issue.severity.toUpperCase(),
    truncateEnd(issue.matchedText, MATCHED_TEXT_DISPLAY_CHARS),
  ];
}

export function formatScanSummary(report: ScanReport): string {
  const lines = [
    chalk.green('Scan Summary'),
    `  Total files: ${report.totalFiles}`,
    `  Scanned files: ${report.scannedFiles}`,
    `  Issues found: ${report.issues.length}`,
    `  Dependencies: ${report.dependencies.length}`,
    `  Build systems: ${report.buildSystems.length}`,
  ];
  if (report.skipped.length > 0) {
    lines.push(`  Skipped files: ${report.skipped.length}`);
  }

  if (report.issues.length > 0) {
    lines.push('', chalk.bold('Issue Categories:'));
    for (const category of ISSUE_CATEGORIES) {
      const count = report.issues.filter((i) => i.category === category).length;
      if (count > 0) lines.push(`  ${category}: ${count}`);
    }
  }

  if (report.recommendations.length > 0) {
    lines.push('', chalk.bold('Recommendations:'));
    for (const rec of report.recommendations) lines.push(`  • ${rec}`);
  }
  return lines.join('\n');
}

export function formatScanTable(report: ScanReport): string {
  const lines = [chalk.green(`Scanned ${report.scannedFiles} of ${plural(report.totalFiles, 'file')}`), ''];

  if (report.issues.length > 0) {
    lines.push(chalk.yellow(`Found ${plural(report.issues.length, 'compatibility issue')}:`));
    lines.push(
      ...formatColumns(
        ['File', 'Line', 'Category', 'Severity', 'Issue'],
        report.issues.map(issueRow),
        (row, column, text) => (column === 3 ? severityColors[report.issues[row].severity](text) : text),
      ),
    );
  } else {
    lines.push(chalk.green('No obvious compatibility issues found'));
  }

  if (report.dependencies.length > 0) {
    lines.push('', chalk.cyan(`Dependencies found: ${report.dependencies.length}`));
    lines.push(
      ...formatColumns(
        ['Name', 'Version', 'Type', 'ARM'],
        report.dependencies.map((d) => [d.name, d.version, d.type, d.armCompatible]),
      ),
    );
  }

  if (report.buildSystems.length > 0) {
    lines.push('', chalk.cyan(`Build systems found: ${report.buildSystems.length}`));
    for (const b of report.buildSystems) lines.push(`  ${b.file} (${b.system})`);
  }

  if (report.skipped.length > 0) {
    lines.push('', chalk.yellow(`Skipped ${plural(report.skipped.length, 'file')}:`));
    for (const s of report.skipped) lines.push(`  ${s.file}: ${s.reason}`);
  }

  if (report.recommendations.length > 0) {
    lines.push('', chalk.bold('Recommendations:'));
    for (const rec of report.recommendations) lines.push(`  • ${rec}`);
  }
  return lines.join('\n');
}

export function formatPlan(plan: MigrationPlan, planId?: string): string {
  const lines = [chalk.green(planId ? `Migration Plan ${planId}` : 'Migration Plan')];
  lines.push(`Target: ${plan.targetArchitecture} | Created: ${plan.createdAt} | Effort: ${plan.estimatedEffort}`);
  lines.push(`Issues: ${plan.totalIssues} | Steps: ${plan.steps.length}`);

  if (plan.steps.length > 0) {
    lines.push('', chalk.bold('Code changes:'));
    for (const step of plan.steps) {
      lines.push(`  Step ${step.id}: ${step.file} (${plural(step.issuesCount, 'issue')})`);
      for (const change of step.changes) {
        const tag = change.confidence === 'high' ? chalk.green('[high]') : chalk.yellow(`[${change.confidence}]`);
        lines.push(`    ${tag} line ${change.line} (${change.category}): ${change.original}`);
        lines.push(chalk.gray(`      → ${change.replacement.split('\n').join('\n        ')}`));
      }
    }
  }

  if (plan.buildSystemChanges.length > 0) {
    lines.push('', chalk.bold('Build system changes:'));
    for (const b of plan.buildSystemChanges) {
      lines.push(`  ${b.file} (${b.system}):`);
      for (const item of b.changes) lines.push(`    • ${item}`);
    }
  }

  if (plan.dependencyUpdates.length > 0) {
    lines.push('', chalk.bold('Dependency updates:'));
    for (const d of plan.dependencyUpdates) {
      lines.push(`  ${d.name} (${d.currentVersion}) - ${d.action}`);
      for (const note of d.notes) lines.push(`    • ${note}`);
    }
  }

  const t = plan.testingStrategy;
  lines.push('', chalk.bold('Testing strategy:'));
  lines.push(`  Unit tests: ${t.unitTests.platforms.join(', ')}`);
  lines.push(`  Integration tests: ${t.integrationTests.environments.join(', ')}`);
  lines.push(`  Performance metrics: ${t.performanceTests.metrics.join(', ')} (baseline: ${t.performanceTests.comparisonBaseline})`);
  return lines.join('\n');
}

export function formatExecutionSummary(result: ExecutionResult): string {
  const applied = result.stepResults.reduce((n, s) => n + s.changesApplied, 0);
  const warnings = result.stepResults.reduce((n, s) => n + s.warnings.length, 0);
  const verb = result.mode === 'apply' ? 'Applied' : 'Would apply';

  const lines = [chalk.bold(result.mode === 'apply' ? 'Migration Summary' : 'Simulation Summary')];
  lines.push(`  ${verb} ${plural(applied, 'code change')} across ${plural(result.completedSteps, 'file')}`);
  if (result.failedSteps > 0) lines.push(chalk.red(`  ${plural(result.failedSteps, 'step')} failed`));
  if (warnings > 0) lines.push(chalk.yellow(`  ${plural(warnings, 'change')} left for manual review`));
  lines.push(`  ${plural(result.buildChanges.length, 'build system')} to review`);
  lines.push(`  ${plural(result.dependencyChanges.length, 'dependency', 'dependencies')} analyzed`);
  lines.push(`  Success rate: ${(result.successRate * 100).toFixed(1)}%`);
  if (result.backupPath) lines.push(chalk.gray(`  Backup: ${result.backupPath}`));
  return lines.join('\n');
}

export function formatPlanList(plans: PlanSummary[]): string {
  if (plans.length === 0) return chalk.gray('No stored plans');
  const rows = plans.map((p) => [
    p.planId,
    p.status,
    p.target,
    String(p.totalIssues),
    p.effort,
    new Date(p.updatedAt).toISOString(),
  ]);
  return formatColumns(
    ['Plan', 'Status', 'Target', 'Issues', 'Effort', 'Updated'],
    rows,
    (row, column, text) => (column === 1 ? statusColors[plans[row].status](text) : text),
  ).join('\n');
}

/** One line per event; null for events not shown. */
export function formatEvent(event: MigrationEvent): string | null {
  switch (event.type) {
    case 'backup.created':
      return chalk.green(`Backup created at: ${event.backupPath} (${plural(event.filesCopied, 'file')})`);
    case 'step.started':
      return null;
    case 'step.completed':
      return chalk.gray(`  ✓ ${event.file} (${plural(event.changesApplied, 'change')}, ${plural(event.warnings, 'warning')})`);
    case 'step.failed':
      return chalk.red(`  ✗ ${event.file}: ${event.error}`);
    case 'change.skipped':
      return chalk.yellow(`    ! ${event.file}:${event.line} ${event.reason}`);
    case 'run.completed':
      return chalk.cyan(`Run complete (${event.mode}): ${event.completedSteps} completed, ${event.failedSteps} failed`);
  }
}

export function renderEvent(event: MigrationEvent): void {
  const line = formatEvent(event);
  if (line !== null) console.error(line);
}
