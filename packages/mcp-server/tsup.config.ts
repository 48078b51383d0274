import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  sourcemap: true,
  clean: true,
  target: 'node20',
  // Runs as a stdio subprocess of an MCP client; core ships as TypeScript source
  noExternal: ['@armport/core'],
  banner: { js: '#!/usr/bin/env node' },
});
