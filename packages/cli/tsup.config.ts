import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  sourcemap: true,
  clean: true,
  target: 'node20',
  // Workspace packages ship TypeScript sources, so they are compiled in
  noExternal: [/^@vigil\//],
  external: ['better-sqlite3'],
  banner: { js: '#!/usr/bin/env node' },
});
