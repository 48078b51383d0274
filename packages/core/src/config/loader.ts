// packages/core/src/config/loader.ts

import { appendFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { ProjectConfig } from '../types/config.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { validateConfig } from './schema.js';

export const CONFIG_FILENAME = '.armport.yml';
export const DATA_DIRNAME = '.armport';

/** Per-section partial overrides, e.g. `{ migrate: { targetArchitecture: 'armv7' } }`. */
export type ConfigOverrides = {
  [K in keyof ProjectConfig]?: Partial<ProjectConfig[K]>;
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects. Source values overwrite target values.
 * Arrays are replaced, not merged.
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const key of Object.keys(source)) {
    const srcVal = source[key];
    const tgtVal = result[key];
    if (srcVal === undefined) continue;
    if (isPlainObject(srcVal) && isPlainObject(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else {
      result[key] = srcVal;
    }
  }
  return result;
}

/**
 * Load config with precedence: overrides > .armport.yml > defaults.
 * The merged result is validated before it is returned.
 */
export function loadConfig(options?: {
  projectDir?: string;
  overrides?: ConfigOverrides;
  skipFile?: boolean;
}): ProjectConfig {
  const projectDir = options?.projectDir ?? process.cwd();
  const defaults: unknown = structuredClone(DEFAULT_CONFIG);
  let merged: Record<string, unknown> = isPlainObject(defaults) ? defaults : {};

  const configPath = join(projectDir, CONFIG_FILENAME);
  if (!options?.skipFile && existsSync(configPath)) {
    let fileConfig: unknown;
    try {
      fileConfig = parseYaml(readFileSync(configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${CONFIG_FILENAME}: ${errorMessage(err)}`);
    }
    if (isPlainObject(fileConfig)) {
      merged = deepMerge(merged, fileConfig);
    } else if (fileConfig !== null && fileConfig !== undefined) {
      throw new ConfigError(`${CONFIG_FILENAME} must contain a mapping at the top level`);
    }
  }

  const overrides: unknown = options?.overrides;
  if (isPlainObject(overrides)) {
    merged = deepMerge(merged, overrides);
  }

  return validateConfig(merged);
}

/**
 * Write a ProjectConfig to .armport.yml in the given directory.
 * Also creates .armport/db/ and lists .armport/ in .gitignore.
 */
export function writeConfig(config: ProjectConfig, dir: string): void {
  const configPath = join(dir, CONFIG_FILENAME);
  const yamlContent = stringifyYaml(config, { lineWidth: 100 });
  writeFileSync(configPath, yamlContent, 'utf-8');

  // Create project directories
  mkdirSync(join(dir, DATA_DIRNAME, 'db'), { recursive: true });

  // Append to .gitignore if not already there
  const gitignorePath = join(dir, '.gitignore');
  if (existsSync(gitignorePath)) {
    const content = readFileSync(gitignorePath, 'utf-8');
    if (!content.includes(`${DATA_DIRNAME}/`)) {
      appendFileSync(gitignorePath, `\n${DATA_DIRNAME}/\n`);
    }
  } else {
    writeFileSync(gitignorePath, `${DATA_DIRNAME}/\n`, 'utf-8');
  }
}

export { deepMerge };
