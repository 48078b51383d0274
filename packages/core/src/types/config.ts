// packages/core/src/types/config.ts

import type { LogLevel } from '../utils/logger.js';

export interface ScanConfig {
  /** Lower-case, with leading dot */
  extensions: string[];
  /**
   * Relative paths containing any of these as whole path segments are skipped.
   * `build` skips `out/build/x.c` but not `cmake-build-debug/x.c`; list such
   * directories by their full name.
   */
  ignorePathSegments: string[];
  /** Honour .armportignore at the project root */
  useIgnoreFile: boolean;
  /** Files scanned in parallel; 0 uses every available core */
  concurrency: number;
}

export interface MigrateConfig {
  targetArchitecture: string;
  /** Directory names left out of the pre-apply backup */
  backupExcludes: string[];
}

export interface ProjectConfig {
  configVersion?: number;
  project: {
    name: string;
  };
  scan: ScanConfig;
  migrate: MigrateConfig;
  advanced: {
    logLevel: LogLevel;
  };
}
