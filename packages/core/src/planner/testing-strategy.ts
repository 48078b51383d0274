// packages/core/src/planner/testing-strategy.ts

import type { TestingStrategy } from '../types/plan.js';

/** Fixed checklist; independent of scan findings. */
export function testingStrategyFor(targetArchitecture: string): TestingStrategy {
  return {
    unitTests: {
      required: true,
      platforms: [targetArchitecture, 'x86_64'],
      focusAreas: ['math operations', 'memory access', 'SIMD code'],
    },
    integrationTests: {
      required: true,
      environments: ['native_arm', 'emulated_arm', 'cross_platform'],
    },
    performanceTests: {
      required: true,
      metrics: ['execution_time', 'memory_usage', 'power_consumption'],
      comparisonBaseline: 'x86_64',
    },
    compatibilityTests: {
      required: true,
      dataFormats: ['endianness', 'struct_packing', 'floating_point'],
    },
  };
}
