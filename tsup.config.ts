import { defineConfig } from 'tsup';

export default defineConfig([
  {
    entry: { index: 'src/index.ts' },
    format: ['esm', 'cjs'],
    splitting: false,
    sourcemap: true,
    clean: true,
    shims: true,
    target: 'node20',
    outDir: 'dist',
  },
  {
    entry: { cli: 'src/cli/index.ts' },
    format: ['esm'],
    splitting: false,
    sourcemap: true,
    shims: true,
    target: 'node20',
    outDir: 'dist',
    // Only the CLI entry point gets a shebang
    banner: {
      js: '#!/usr/bin/env node',
    },
  },
]);
