import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  sourcemap: true,
  clean: true,
  target: 'node20',
  // Workspace packages export TypeScript sources, so they are bundled in
  noExternal: [/^@kindred\//],
});
