import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    'cli/index': 'src/cli/index.ts',
    'domain/types/index': 'src/domain/types/index.ts',
  },
  format: ['esm'],
  dts: true,
  sourcemap: true,
  clean: true,
  target: 'node20',
  splitting: true,
  banner: {
    // Shebang for the CLI entry point
    js: '#!/usr/bin/env node',
  },
});
