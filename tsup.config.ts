import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/lib.ts'],
  format: ['esm'],
  dts: true,
  clean: true,
  sourcemap: true,
  target: 'es2022',
  outDir: 'dist',
  splitting: false,
  external: [
    // Dependencies stay external for the CLI
    'chalk',
    'commander',
    'fast-glob',
    'micromatch',
    'strip-ansi',
    'typescript',
    'zod'
  ]
});
