import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/cli.ts'],
  format: ['esm'],
  target: 'node20',
  outDir: 'dist',
  clean: true,
  dts: true,
  sourcemap: 'inline',
  splitting: true,
  treeshake: true,
  external: ['chalk', 'commander', 'ora', 'ts-pattern', 'zod'],
});
