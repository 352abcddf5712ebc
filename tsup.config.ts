import { defineConfig } from 'tsup';

export default defineConfig([
  // Library entry
  {
    entry: ['src/index.ts'],
    format: ['esm'],
    dts: true,
    sourcemap: true,
    clean: true,
    splitting: false,
    treeshake: true,
    minify: false,
  },
  // CLI entry (separate to add shebang)
  {
    entry: { 'cli/index': 'src/cli/index.ts' },
    format: ['esm'],
    dts: false,
    sourcemap: false,
    splitting: false,
    treeshake: true,
    minify: false,
    banner: {
      js: '#!/usr/bin/env node',
    },
    // Skip clean so the library build is kept
    clean: false,
  },
]);
