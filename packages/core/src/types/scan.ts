// packages/core/src/types/scan.ts - Scan report types

/** Kinds of architecture-specific code the catalog can detect. */
export type IssueCategory =
  | 'inline_assembly'
  | 'instruction_intrinsic'
  | 'architecture_check'
  | 'platform_specific_api';

export const ISSUE_CATEGORIES: readonly IssueCategory[] = [
  'inline_assembly',
  'instruction_intrinsic',
  'architecture_check',
  'platform_specific_api',
];

export type Severity = 'high' | 'medium' | 'low';

/** One located match of a catalog pattern. */
export interface Issue {
  /** Path relative to the project root, forward slashes */
  readonly file: string;
  /** 1-based */
  readonly line: number;
  readonly category: IssueCategory;
  readonly matchedText: string;
  readonly severity: Severity;
  readonly suggestion: string;
}

export type DependencyType = 'npm' | 'python' | 'cargo' | 'go';

export interface DependencyRecord {
  name: string;
  version: string;
  type: DependencyType;
  /** Never resolved locally; a registry lookup would be needed */
  armCompatible: 'unknown';
}

export type BuildSystem =
  | 'cmake'
  | 'make'
  | 'gradle'
  | 'maven'
  | 'npm'
  | 'cargo'
  | 'go_modules'
  | 'qmake';

export interface BuildSystemRecord {
  file: string;
  system: BuildSystem;
  needsReview: boolean;
}

export interface SkippedFile {
  file: string;
  reason: string;
}

export interface ScanReport {
  totalFiles: number;
  scannedFiles: number;
  issues: Issue[];
  dependencies: DependencyRecord[];
  buildSystems: BuildSystemRecord[];
  recommendations: string[];
  /** Files that qualified for scanning but could not be read or decoded */
  skipped: SkippedFile[];
}
