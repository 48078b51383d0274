import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  sourcemap: true,
  clean: true,
  target: 'node20',
  // Workspace core is consumed as TypeScript source, so it is bundled in
  noExternal: ['@armport/core'],
  banner: { js: '#!/usr/bin/env node' },
});
