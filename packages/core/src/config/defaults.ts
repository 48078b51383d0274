// packages/core/src/config/defaults.ts

import type { ProjectConfig } from '../types/config.js';
import { DEFAULT_BACKUP_EXCLUDES } from '../engine/backup.js';
import { DEFAULT_TARGET_ARCHITECTURE } from '../utils/constants.js';

export const CURRENT_CONFIG_VERSION = 1;

export const DEFAULT_CONFIG: ProjectConfig = {
  configVersion: CURRENT_CONFIG_VERSION,
  project: {
    name: '',
  },
  scan: {
    extensions: [
      '.c', '.cpp', '.cc', '.cxx', '.h', '.hpp', '.hxx',
      '.py', '.go', '.rs', '.java', '.cs',
      '.js', '.ts', '.jsx', '.tsx',
    ],
    ignorePathSegments: [
      '.git', '__pycache__', 'node_modules', '.venv', 'venv',
      'build', 'dist', '.tox', '.pytest_cache',
    ],
    useIgnoreFile: true,
    concurrency: 0,
  },
  migrate: {
    targetArchitecture: DEFAULT_TARGET_ARCHITECTURE,
    backupExcludes: [...DEFAULT_BACKUP_EXCLUDES],
  },
  advanced: {
    logLevel: 'info',
  },
};
