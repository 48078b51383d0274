import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { createIgnoreFilter, shouldIgnore } from '../../../src/config/ignore.js';

describe('shouldIgnore', () => {
  const entries = ['node_modules', '.git', 'build', 'third_party/sse'];

  it('ignores a leading segment', () => {
    expect(shouldIgnore('.git/config', entries)).toBe(true);
  });

  it('ignores a nested segment', () => {
    expect(shouldIgnore('src/node_modules/foo/bar.js', entries)).toBe(true);
  });

  it('ignores an exact match and a trailing segment', () => {
    expect(shouldIgnore('build', entries)).toBe(true);
    expect(shouldIgnore('out/build', entries)).toBe(true);
  });

  it('matches multi-segment entries', () => {
    expect(shouldIgnore('lib/third_party/sse/simd.h', entries)).toBe(true);
  });

  it('does not ignore partial segment matches', () => {
    expect(shouldIgnore('src/builder/main.c', entries)).toBe(false);
    expect(shouldIgnore('docs/.github/x.md', entries)).toBe(false);
  });

  it('leaves directories that only contain a default entry in their name', () => {
    expect(shouldIgnore('cmake-build-debug/gen.c', DEFAULT_CONFIG.scan.ignorePathSegments)).toBe(false);
    expect(shouldIgnore('myvenv/x.py', DEFAULT_CONFIG.scan.ignorePathSegments)).toBe(false);
    expect(shouldIgnore('venv/x.py', DEFAULT_CONFIG.scan.ignorePathSegments)).toBe(true);
  });

  it('normalises backslashes', () => {
    expect(shouldIgnore('src\\node_modules\\a.js', entries)).toBe(true);
  });
});

describe('createIgnoreFilter', () => {
  const dir = join(tmpdir(), `armport-ignore-test-${Date.now()}`);

  beforeEach(() => {
    mkdirSync(dir, { recursive: true });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('is empty without an .armportignore file', () => {
    expect(createIgnoreFilter(dir).ignores('src/main.c')).toBe(false);
  });

  it('applies gitignore syntax from .armportignore', () => {
    writeFileSync(join(dir, '.armportignore'), 'vendor/\n*.gen.c\n!keep.gen.c\n', 'utf-8');
    const filter = createIgnoreFilter(dir);
    expect(filter.ignores('vendor/')).toBe(true);
    expect(filter.ignores('src/table.gen.c')).toBe(true);
    expect(filter.ignores('src/keep.gen.c')).toBe(false);
    expect(filter.ignores('src/main.c')).toBe(false);
  });
});
