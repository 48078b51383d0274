// packages/core/src/engine/backup.ts - Sibling-directory tree copy taken before apply

import { copyFile, mkdir, readdir, readlink, symlink } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { basename, dirname, join, resolve } from 'node:path';
import { BackupError, errorMessage } from '../utils/errors.js';

export const DEFAULT_BACKUP_EXCLUDES = ['.git', '__pycache__', 'node_modules', '.venv', 'build', 'dist'];

export interface BackupResult {
  backupPath: string;
  filesCopied: number;
}

/** `YYYYMMDD_HHMMSS` in local time */
export function formatBackupTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/** `<parent>/<name>_backup_<YYYYMMDD_HHMMSS>` */
export function backupPathFor(projectDir: string, date: Date): string {
  const root = resolve(projectDir);
  return join(dirname(root), `${basename(root)}_backup_${formatBackupTimestamp(date)}`);
}

/**
 * Copy the project tree, skipping any entry whose name is in `excludes`.
 * Throws BackupError when the destination exists or any copy fails.
 */
export async function createBackup(
  projectDir: string,
  excludes: readonly string[],
  date: Date,
): Promise<BackupResult> {
  const source = resolve(projectDir);
  const backupPath = backupPathFor(source, date);
  if (existsSync(backupPath)) {
    throw new BackupError(`Backup destination already exists: ${backupPath}`, backupPath);
  }

  const skip = new Set(excludes);
  let filesCopied = 0;

  const copyDir = async (from: string, to: string): Promise<void> => {
    await mkdir(to, { recursive: true });
    const entries = await readdir(from, { withFileTypes: true });
    for (const entry of entries) {
      if (skip.has(entry.name)) continue;
      const src = join(from, entry.name);
      const dest = join(to, entry.name);
      if (entry.isDirectory()) {
        await copyDir(src, dest);
      } else if (entry.isSymbolicLink()) {
        await symlink(await readlink(src), dest);
      } else if (entry.isFile()) {
        await copyFile(src, dest);
        filesCopied++;
      }
    }
  };

  try {
    await copyDir(source, backupPath);
  } catch (err) {
    throw new BackupError(`Failed to create backup: ${errorMessage(err)}`, backupPath);
  }
  return { backupPath, filesCopied };
}
