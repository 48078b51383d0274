// packages/core/src/scanner/build-systems.ts - Manifest filename → build-system tag

import type { BuildSystem } from '../types/scan.js';

interface ManifestRule {
  readonly matches: (fileName: string) => boolean;
  readonly system: BuildSystem;
}

const MANIFEST_RULES: readonly ManifestRule[] = [
  { matches: (n) => n === 'CMakeLists.txt', system: 'cmake' },
  { matches: (n) => n === 'Makefile', system: 'make' },
  { matches: (n) => n.endsWith('.mk'), system: 'make' },
  { matches: (n) => n === 'build.gradle', system: 'gradle' },
  { matches: (n) => n === 'pom.xml', system: 'maven' },
  { matches: (n) => n === 'package.json', system: 'npm' },
  { matches: (n) => n === 'Cargo.toml', system: 'cargo' },
  { matches: (n) => n === 'go.mod', system: 'go_modules' },
  { matches: (n) => n.endsWith('.pro'), system: 'qmake' },
];

/** Build-system tag for a manifest file name, or undefined. Existence only; contents are not read. */
export function detectBuildSystem(fileName: string): BuildSystem | undefined {
  return MANIFEST_RULES.find((rule) => rule.matches(fileName))?.system;
}
