import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['monitor-server.ts'],
  format: ['esm'],
  target: 'node20',
  outDir: 'dist/server',
  sourcemap: true,
  clean: true,
  minify: false,
  bundle: true,
  // Keep dependencies external (they'll be in node_modules)
  external: ['express', 'ws', 'pino', 'pino-pretty', 'got', 'opossum', 'chokidar'],
  splitting: false,
  treeshake: true,
  dts: false,
});
