// packages/cli/src/commands/scan.ts - Scan a project for x86-specific code

import { ProjectScanner } from '@armport/core';
import type { ScanReport } from '@armport/core';
import chalk from 'chalk';
import type { Command } from 'commander';
import ora from 'ora';

import { formatScanSummary, formatScanTable } from '../render.js';
import { resolveContext, writeJsonFile, type CommandContext } from '../utils.js';

export type ScanFormat = 'table' | 'json' | 'summary';

interface ScanOptions {
  format: ScanFormat;
  output?: string;
  ignoreFile: boolean;
}

/** Scan with a spinner on stderr. Shared by `plan` and `migrate`. */
export async function runScan(ctx: CommandContext): Promise<ScanReport> {
  const spinner = ora({ text: `Scanning ${ctx.projectDir}`, stream: process.stderr }).start();
  try {
    const report = await new ProjectScanner({ config: ctx.config.scan, logger: ctx.logger }).scan(ctx.projectDir);
    spinner.succeed(`Scanned ${report.scannedFiles} files, ${report.issues.length} issues`);
    return report;
  } catch (err) {
    spinner.fail('Scan failed');
    throw err;
  }
}

export async function scanCommand(path: string, options: ScanOptions, command?: Command): Promise<void> {
  const ctx = resolveContext(
    path,
    command,
    options.ignoreFile ? undefined : { scan: { useIgnoreFile: false } },
  );
  const report = await runScan(ctx);

  if (options.output) {
    writeJsonFile(options.output, report);
    console.error(chalk.gray(`Report written to ${options.output}`));
  }

  switch (options.format) {
    case 'json':
      console.log(JSON.stringify(report, null, 2));
      break;
    case 'summary':
      console.error(formatScanSummary(report));
      break;
    case 'table':
      console.error(formatScanTable(report));
      break;
  }
}
