// packages/core/src/planner/checklists.ts - Per-build-system review checklists

import type { BuildSystem } from '../types/scan.js';

export const BUILD_SYSTEM_CHECKLISTS: Readonly<Record<BuildSystem, readonly string[]>> = {
  cmake: [
    'Add ARM64 target support',
    'Set CMAKE_SYSTEM_PROCESSOR for cross-compilation',
    'Add ARM-specific compiler flags',
    'Update architecture detection logic',
  ],
  make: [
    'Add ARM64 target to Makefile',
    'Set CC and CXX for cross-compilation',
    'Update CFLAGS/CXXFLAGS for ARM',
    'Add architecture-specific build rules',
  ],
  npm: [
    'Add ARM64 to supported architectures',
    'Update build scripts for cross-compilation',
    'Check native dependencies for ARM support',
  ],
  gradle: [
    'Add arm64-v8a to native ABI filters',
    'Check JNI libraries for ARM64 builds',
  ],
  maven: [
    'Check native classifiers for an aarch64 variant',
    'Add an ARM64 build profile',
  ],
  cargo: [
    'Add aarch64 target triples to the build matrix',
    'Review cfg(target_arch) blocks',
    'Check crates with native build scripts',
  ],
  go_modules: [
    'Add GOARCH=arm64 to release builds',
    'Review architecture-specific files and build tags',
    'Check cgo dependencies for ARM support',
  ],
  qmake: [
    'Add ARM64 to QMAKE_APPLE_DEVICE_ARCHS or the target mkspec',
    'Review architecture-specific CONFIG and DEFINES',
  ],
};
