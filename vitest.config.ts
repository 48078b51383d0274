import { defineConfig } from 'vitest/config';

const pkg = (name: string) => ({
  test: {
    name,
    root: `packages/${name}`,
    include: ['tests/**/*.test.ts'],
  },
});

export default defineConfig({
  test: {
    projects: [pkg('core'), pkg('cli'), pkg('mcp-server')],
  },
});
