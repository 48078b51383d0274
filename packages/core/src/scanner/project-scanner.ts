// packages/core/src/scanner/project-scanner.ts - Tree walk, per-file scan, manifest inspection

import { readdir, readFile, stat } from 'node:fs/promises';
import { extname, join, resolve } from 'node:path';
import type { Ignore } from 'ignore';
import { PatternCatalog } from '../catalog/pattern-catalog.js';
import { DEFAULT_PATTERN_TABLE } from '../catalog/default-table.js';
import { createIgnoreFilter, shouldIgnore } from '../config/ignore.js';
import type { ScanConfig } from '../types/config.js';
import type { BuildSystemRecord, Issue, ScanReport, SkippedFile } from '../types/scan.js';
import { mapWithConcurrency, resolveConcurrency } from '../utils/concurrency.js';
import { ScanError, errorMessage } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { detectBuildSystem } from './build-systems.js';
import { extractDependencies } from './dependencies.js';
import { FileScanner, type FileScanResult } from './file-scanner.js';
import { buildRecommendations } from './recommendations.js';

export interface ProjectScannerOptions {
  config: ScanConfig;
  catalog?: PatternCatalog;
  logger?: Logger;
}

interface WalkResult {
  sourceFiles: string[];
  buildSystems: BuildSystemRecord[];
}

export class ProjectScanner {
  private readonly config: ScanConfig;
  private readonly fileScanner: FileScanner;
  private readonly logger: Logger;
  private readonly extensions: Set<string>;

  constructor(options: ProjectScannerOptions) {
    this.config = options.config;
    this.fileScanner = new FileScanner(options.catalog ?? new PatternCatalog(DEFAULT_PATTERN_TABLE));
    this.logger = (options.logger ?? createLogger('info')).child('scanner');
    this.extensions = new Set(options.config.extensions.map((e) => e.toLowerCase()));
  }

  async scan(root: string): Promise<ScanReport> {
    const projectDir = resolve(root);
    await this.assertDirectory(projectDir);
    this.logger.info(`Scanning project at: ${projectDir}`);

    const filter = this.config.useIgnoreFile ? createIgnoreFilter(projectDir) : undefined;
    const { sourceFiles, buildSystems } = await this.walk(projectDir, filter);

    const results = await mapWithConcurrency(
      sourceFiles,
      resolveConcurrency(this.config.concurrency),
      (file) => this.scanOne(projectDir, file),
    );

    const issues: Issue[] = [];
    const skipped: SkippedFile[] = [];
    let scannedFiles = 0;
    results.forEach((result, i) => {
      const file = sourceFiles[i];
      if (result.status === 'scanned') {
        scannedFiles++;
        issues.push(...result.issues);
      } else {
        skipped.push({ file, reason: result.reason });
        this.logger.warn(`Failed to scan ${file}: ${result.reason}`);
      }
    });
    issues.sort(compareIssues);

    const dependencies = await extractDependencies(projectDir, this.logger);
    const recommendations = buildRecommendations(issues, buildSystems, dependencies);

    this.logger.info(`Scan completed: ${scannedFiles}/${sourceFiles.length} files`);
    return {
      totalFiles: sourceFiles.length,
      scannedFiles,
      issues,
      dependencies,
      buildSystems,
      recommendations,
      skipped,
    };
  }

  private async assertDirectory(projectDir: string): Promise<void> {
    try {
      const info = await stat(projectDir);
      if (info.isDirectory()) return;
    } catch {
      throw new ScanError(`Project directory not found: ${projectDir}`, projectDir);
    }
    throw new ScanError(`Not a directory: ${projectDir}`, projectDir);
  }

  private async scanOne(projectDir: string, file: string): Promise<FileScanResult> {
    try {
      const content = await readFile(join(projectDir, file));
      return this.fileScanner.scan(file, content);
    } catch (err) {
      return { status: 'skipped', reason: errorMessage(err) };
    }
  }

  /** Depth-first, entries in name order, so output is independent of readdir order. */
  private async walk(projectDir: string, filter: Ignore | undefined): Promise<WalkResult> {
    const sourceFiles: string[] = [];
    const buildSystems: BuildSystemRecord[] = [];

    const visit = async (relDir: string): Promise<void> => {
      let entries;
      try {
        entries = await readdir(join(projectDir, relDir), { withFileTypes: true });
      } catch (err) {
        if (!relDir) throw err;
        this.logger.warn(`Cannot read directory ${relDir}: ${errorMessage(err)}`);
        return;
      }
      entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

      for (const entry of entries) {
        const rel = relDir ? `${relDir}/${entry.name}` : entry.name;
        if (shouldIgnore(rel, this.config.ignorePathSegments)) continue;

        if (entry.isDirectory()) {
          if (filter?.ignores(`${rel}/`)) continue;
          await visit(rel);
        } else if (entry.isFile()) {
          if (filter?.ignores(rel)) continue;
          const system = detectBuildSystem(entry.name);
          if (system) buildSystems.push({ file: rel, system, needsReview: true });
          if (this.extensions.has(extname(entry.name).toLowerCase())) sourceFiles.push(rel);
        }
      }
    };

    await visit('');
    return { sourceFiles, buildSystems };
  }
}

function compareIssues(a: Issue, b: Issue): number {
  if (a.file !== b.file) return a.file < b.file ? -1 : 1;
  return a.line - b.line;
}
