import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/cli.ts'],
  format: ['esm'],
  outDir: 'dist',
  clean: true,
  dts: false,
  sourcemap: true,
  target: 'node20',
  // Workspace package exports TypeScript sources, so it has to be bundled in
  noExternal: ['@ruff-claude-hook/shared'],
  banner: {
    js: '#!/usr/bin/env node',
  },
});
