import { defineConfig } from 'tsup';

export default defineConfig({
  format: ['esm'],
  entry: { index: 'src/index.ts', testing: 'src/testing/index.ts' },
  dts: true,
  sourcemap: true,
  clean: true,
  target: 'es2022',
  tsconfig: 'tsconfig.json',
});
