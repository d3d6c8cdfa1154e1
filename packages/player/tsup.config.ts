import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  dts: true,
  splitting: false,
  sourcemap: true,
  clean: true,
  target: 'node20',
  platform: 'node',
  outDir: 'dist',
  treeshake: true,
  esbuildOptions(options) {
    options.banner = {
      js: '/* @turntable/player v0.1.0 | MIT License */',
    };
  },
  // Runtime dependencies stay external; music-metadata ships ESM only
  external: ['music-metadata', 'pino', 'pino-pretty', 'zod'],
});
