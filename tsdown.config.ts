import { defineConfig } from 'tsdown';

export default defineConfig({
  entry: ['src/index.ts', 'src/bin.ts'],
  format: ['esm'],
  dts: true,
  clean: true,
  outDir: 'dist',
  platform: 'node',
  target: 'node20',
  treeshake: true,
  sourcemap: true,
  external: ['chalk', 'commander', 'zod'],
});
