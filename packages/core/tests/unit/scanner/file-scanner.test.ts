import { describe, expect, it } from 'vitest';
import { DEFAULT_PATTERN_TABLE } from '../../../src/catalog/default-table.js';
import { PatternCatalog } from '../../../src/catalog/pattern-catalog.js';
import { FileScanner } from '../../../src/scanner/file-scanner.js';

const scanner = new FileScanner(new PatternCatalog(DEFAULT_PATTERN_TABLE));

const SOURCE = [
  '#include <stdio.h>',
  '#ifdef __x86_64__',
  'static void spin(void) { __asm__("pause"); }',
  '#endif',
  '__m128 add(__m128 a, __m128 b) {',
  '  return _mm_add_ps(a, b);',
  '}',
].join('\n');

describe('FileScanner', () => {
  it('reports each match with its 1-based line', () => {
    const result = scanner.scan('src/simd.c', SOURCE);
    expect(result.status).toBe('scanned');
    if (result.status !== 'scanned') return;

    expect(result.issues.map((i) => [i.category, i.line, i.matchedText])).toEqual([
      ['inline_assembly', 3, '__asm__('],
      ['instruction_intrinsic', 6, '_mm_add_ps'],
      ['architecture_check', 2, '#ifdef __x86_64__'],
    ]);
  });

  it('fills file, severity and suggestion from the catalog', () => {
    const result = scanner.scan('src/simd.c', '#ifdef _M_IX86');
    expect(result).toEqual({
      status: 'scanned',
      issues: [
        {
          file: 'src/simd.c',
          line: 1,
          category: 'architecture_check',
          matchedText: '#ifdef _M_IX86',
          severity: 'medium',
          suggestion: 'Add ARM architecture checks or use runtime detection',
        },
      ],
    });
  });

  it('is deterministic for identical content', () => {
    expect(scanner.scan('a.c', SOURCE)).toEqual(scanner.scan('a.c', SOURCE));
  });

  it('counts the line of a match at the very start of a line', () => {
    const result = scanner.scan('a.c', '\n\n\nGetSystemInfo(&si);');
    expect(result.status === 'scanned' && result.issues[0].line).toBe(4);
  });

  it('decodes UTF-8 bytes', () => {
    const bytes = new TextEncoder().encode('// café\nIsWow64Process(h, &wow);');
    const result = scanner.scan('a.c', bytes);
    expect(result.status === 'scanned' && result.issues.map((i) => i.line)).toEqual([2]);
  });

  it('skips binary content', () => {
    const bytes = new Uint8Array([0x7f, 0x45, 0x4c, 0x46, 0x00, 0x01]);
    expect(scanner.scan('a.o', bytes)).toEqual({ status: 'skipped', reason: 'binary file' });
  });

  it('skips content that is not valid UTF-8', () => {
    const bytes = new Uint8Array([0x61, 0xff, 0xfe, 0x62]);
    expect(scanner.scan('a.c', bytes)).toEqual({ status: 'skipped', reason: 'not valid UTF-8' });
  });

  it('returns no issues for portable code', () => {
    expect(scanner.scan('a.c', 'int main(void) { return 0; }')).toEqual({
      status: 'scanned',
      issues: [],
    });
  });
});
