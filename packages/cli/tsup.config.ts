import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  dts: false,
  splitting: false,
  sourcemap: true,
  clean: true,
  // Workspace packages export TypeScript sources, so they are bundled in;
  // registry dependencies stay external and resolve from node_modules
  noExternal: [/^@critique\//],
  external: ['chalk', 'commander', 'ora', 'yaml', 'zod'],
});
