import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/analyzer/index.ts', 'src/generator/index.ts', 'src/rules/index.ts'],
  format: ['esm'],
  target: 'node20',
  sourcemap: true,
  dts: false,
  clean: true,
  external: ['@commit-warden/contracts'],
});
