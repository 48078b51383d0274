// packages/core/src/catalog/default-table.ts - Built-in x86 detection patterns

import type { PatternTable } from './pattern-catalog.js';

export const DEFAULT_PATTERN_TABLE: PatternTable = {
  inline_assembly: {
    severity: 'high',
    suggestion: 'Replace with portable C/C++ code or use ARM NEON intrinsics',
    patterns: [
      { source: '__asm__\\s*\\(', caseInsensitive: true },
      { source: 'asm\\s*\\(', caseInsensitive: true },
      { source: '_asm\\s*\\{', caseInsensitive: true },
    ],
  },
  instruction_intrinsic: {
    severity: 'high',
    suggestion: 'Replace with ARM NEON equivalents or portable alternatives',
    patterns: [
      { source: '#include\\s*<.*mmintrin\\.h.*>', caseInsensitive: true },
      { source: '#include\\s*<.*xmmintrin\\.h.*>', caseInsensitive: true },
      { source: '#include\\s*<.*emmintrin\\.h.*>', caseInsensitive: true },
      { source: '#include\\s*<.*pmmintrin\\.h.*>', caseInsensitive: true },
      { source: '#include\\s*<.*immintrin\\.h.*>', caseInsensitive: true },
      { source: '_mm_\\w+', caseInsensitive: true },
      { source: '_mm\\d+_\\w+', caseInsensitive: true },
    ],
  },
  // Case-sensitive: the planner rewrites by exact macro name.
  architecture_check: {
    severity: 'medium',
    suggestion: 'Add ARM architecture checks or use runtime detection',
    patterns: [
      { source: '#ifdef\\s+_M_X64', caseInsensitive: false },
      { source: '#ifdef\\s+__x86_64__', caseInsensitive: false },
      { source: '#ifdef\\s+_M_IX86', caseInsensitive: false },
      { source: '#ifdef\\s+__i386__', caseInsensitive: false },
      { source: '#ifdef\\s+__amd64__', caseInsensitive: false },
      { source: '#ifdef\\s+_M_AMD64', caseInsensitive: false },
    ],
  },
  platform_specific_api: {
    severity: 'medium',
    suggestion: 'Use cross-platform alternatives or add ARM-specific implementations',
    patterns: [
      { source: 'GetSystemInfo', caseInsensitive: true },
      { source: 'IsWow64Process', caseInsensitive: true },
      { source: 'SYSTEM_INFO', caseInsensitive: true },
    ],
  },
};
