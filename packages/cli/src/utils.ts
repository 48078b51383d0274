import { DATA_DIRNAME, createLogger, loadConfig, openDatabase } from '@armport/core';
import type { ConfigOverrides, Logger, ProjectConfig } from '@armport/core';
import { InvalidArgumentError, type Command } from 'commander';
import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

export function getDbPath(projectDir?: string): string {
  const base = projectDir ?? process.cwd();
  const dbDir = join(base, DATA_DIRNAME, 'db');
  mkdirSync(dbDir, { recursive: true });
  return join(dbDir, 'armport.db');
}

/**
 * Run a command function with a database connection that is guaranteed to close,
 * even when the function throws.
 */
export async function withDatabase<T>(
  projectDir: string,
  fn: (db: ReturnType<typeof openDatabase>) => Promise<T> | T,
): Promise<T> {
  const db = openDatabase(getDbPath(projectDir));
  try {
    return await fn(db);
  } finally {
    db.close();
  }
}

export function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value)) throw new InvalidArgumentError('Must be a positive integer');
  const n = Number.parseInt(value, 10);
  if (n <= 0) throw new InvalidArgumentError('Must be a positive integer');
  return n;
}

/** True when the global --verbose flag was passed. */
export function isVerbose(command?: Command): boolean {
  return command?.optsWithGlobals<{ verbose?: boolean }>().verbose === true;
}

export interface CommandContext {
  projectDir: string;
  config: ProjectConfig;
  logger: Logger;
}

/**
 * Resolve the project directory, load its .armport.yml and build a logger.
 * Logs go to stderr so JSON on stdout stays parseable.
 */
export function resolveContext(path: string, command?: Command, overrides?: ConfigOverrides): CommandContext {
  const projectDir = resolve(path);
  const config = loadConfig({ projectDir, overrides });
  const logger = createLogger(isVerbose(command) ? 'debug' : config.advanced.logLevel, undefined, true);
  return { projectDir, config, logger };
}

export function writeJsonFile(path: string, value: unknown): void {
  const target = resolve(path);
  mkdirSync(dirname(target), { recursive: true });
  writeFileSync(target, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
}
