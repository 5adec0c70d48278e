import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/bin.ts', 'src/index.ts'],
  format: ['esm'],
  target: 'node20',
  sourcemap: true,
  dts: false,
  clean: true,
  splitting: false,
  banner: {
    js: '#!/usr/bin/env node',
  },
  external: ['@commit-warden/contracts', '@commit-warden/core'],
});
