import { defineConfig } from 'tsup';

export default defineConfig({
  entry: { te: 'bin/te.ts' },
  format: ['esm'],
  target: 'node20',
  outDir: 'dist',
  clean: true,
});
