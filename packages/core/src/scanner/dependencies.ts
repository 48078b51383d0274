// packages/core/src/scanner/dependencies.ts - Dependency extraction from root manifests

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseToml } from 'smol-toml';
import { z } from 'zod';
import type { DependencyRecord, DependencyType } from '../types/scan.js';
import type { Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const packageJsonSchema = z
  .object({
    dependencies: z.record(z.string()).optional(),
    devDependencies: z.record(z.string()).optional(),
  })
  .passthrough();

const cargoTomlSchema = z
  .object({
    dependencies: z
      .record(z.union([z.string(), z.object({ version: z.string().optional() }).passthrough()]))
      .optional(),
  })
  .passthrough();

function record(name: string, version: string, type: DependencyType): DependencyRecord {
  return { name, version, type, armCompatible: 'unknown' };
}

/** dependencies then devDependencies; a name in both keeps its first position with the dev version. */
export function parsePackageJson(content: string): DependencyRecord[] {
  const data = packageJsonSchema.parse(JSON.parse(content));
  const all = { ...data.dependencies, ...data.devDependencies };
  return Object.entries(all).map(([name, version]) => record(name, version, 'npm'));
}

export function parseRequirementsTxt(content: string): DependencyRecord[] {
  const deps: DependencyRecord[] = [];
  for (const raw of content.split('\n')) {
    const line = raw.trim();
    if (!line || line.startsWith('#')) continue;

    let name = line;
    let version = '*';
    for (const sep of ['==', '>=']) {
      const at = line.indexOf(sep);
      if (at !== -1) {
        name = line.slice(0, at);
        version = line.slice(at + sep.length);
        break;
      }
    }
    deps.push(record(name.trim(), version.trim(), 'python'));
  }
  return deps;
}

export function parseCargoToml(content: string): DependencyRecord[] {
  const data = cargoTomlSchema.parse(parseToml(content));
  return Object.entries(data.dependencies ?? {}).map(([name, spec]) =>
    record(name, typeof spec === 'string' ? spec : (spec.version ?? '*'), 'cargo'),
  );
}

/** `require ( ... )` blocks and single-line `require name version` directives. */
export function parseGoMod(content: string): DependencyRecord[] {
  const deps: DependencyRecord[] = [];
  let inBlock = false;

  const take = (spec: string): void => {
    const parts = spec.trim().split(/\s+/);
    if (parts.length >= 2 && !parts[0].startsWith('//')) {
      deps.push(record(parts[0], parts[1], 'go'));
    }
  };

  for (const raw of content.split('\n')) {
    const line = raw.trim();
    if (inBlock) {
      if (line.startsWith(')')) inBlock = false;
      else take(line);
      continue;
    }
    if (/^require\s*\($/.test(line)) {
      inBlock = true;
    } else if (/^require\s+/.test(line)) {
      take(line.replace(/^require\s+/, ''));
    }
  }
  return deps;
}

const MANIFEST_PARSERS: ReadonlyArray<[string, (content: string) => DependencyRecord[]]> = [
  ['package.json', parsePackageJson],
  ['requirements.txt', parseRequirementsTxt],
  ['Cargo.toml', parseCargoToml],
  ['go.mod', parseGoMod],
];

/**
 * Read each recognised manifest at the project root. A manifest that fails
 * to parse is logged and contributes no records.
 */
export async function extractDependencies(root: string, logger: Logger): Promise<DependencyRecord[]> {
  const deps: DependencyRecord[] = [];
  for (const [fileName, parse] of MANIFEST_PARSERS) {
    const manifestPath = join(root, fileName);
    if (!existsSync(manifestPath)) continue;
    try {
      const content = await readFile(manifestPath, 'utf-8');
      deps.push(...parse(content));
    } catch (err) {
      logger.warn(`Error scanning ${fileName}: ${errorMessage(err)}`);
    }
  }
  return deps;
}
