// packages/core/src/planner/tables.ts - Immutable lookup tables for plan building

import { readFileSync } from 'node:fs';
import { createRequire } from 'node:module';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../utils/errors.js';

const require = createRequire(import.meta.url);

/** Located through the package's own exports map, which holds for sources and the CLI bundle alike. */
export function defaultIntrinsicMappingsPath(): string {
  return require.resolve('@armport/core/data/intrinsic-mappings.json');
}

const intrinsicMappingsSchema = z.object({
  version: z.number().int().positive(),
  intrinsics: z.record(z.string().min(1)),
  headers: z.record(z.string().min(1)),
});

export interface MacroFamily {
  /** Macros recognised as belonging to this family */
  readonly members: readonly string[];
  /** Macros always spelled out in the rewritten conditional */
  readonly emitted: readonly string[];
  /** Target macro appended to the conditional */
  readonly targetMacro: string;
}

export interface PlanTables {
  /** Source intrinsic or header name → ARM equivalent */
  readonly intrinsicMappings: ReadonlyMap<string, string>;
  readonly macroFamilies: readonly MacroFamily[];
  /** Lower-case dependency names that often ship x86-only binaries */
  readonly armSensitiveDependencies: ReadonlySet<string>;
}

export const AMD64_FAMILY: MacroFamily = {
  members: ['_M_X64', '__x86_64__', '__amd64__', '_M_AMD64'],
  emitted: ['_M_X64', '__x86_64__'],
  targetMacro: '__aarch64__',
};

export const IA32_FAMILY: MacroFamily = {
  members: ['_M_IX86', '__i386__'],
  emitted: ['_M_IX86', '__i386__'],
  targetMacro: '__arm__',
};

const ARM_SENSITIVE_DEPENDENCIES = [
  'tensorflow',
  'pytorch',
  'torch',
  'opencv',
  'opencv-python',
  'numpy',
  'scipy',
  'onnxruntime',
  'mxnet',
  'jax',
  'jaxlib',
];

/** Read and validate an intrinsic mapping file. Intrinsics and headers share one lookup. */
export function loadIntrinsicMappings(path?: string): ReadonlyMap<string, string> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path ?? defaultIntrinsicMappingsPath(), 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Failed to load intrinsic mappings: ${errorMessage(err)}`, 'intrinsicMappings');
  }
  const result = intrinsicMappingsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `  ${i.path.join('.')}: ${i.message}`).join('\n');
    throw new ConfigError(`Invalid intrinsic mappings:\n${issues}`, 'intrinsicMappings');
  }
  return new Map([
    ...Object.entries(result.data.intrinsics),
    ...Object.entries(result.data.headers),
  ]);
}

export function createPlanTables(mappingsPath?: string): PlanTables {
  return {
    intrinsicMappings: loadIntrinsicMappings(mappingsPath),
    macroFamilies: [AMD64_FAMILY, IA32_FAMILY],
    armSensitiveDependencies: new Set(ARM_SENSITIVE_DEPENDENCIES),
  };
}
