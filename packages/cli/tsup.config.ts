import { defineConfig } from 'tsup'

export default defineConfig({
  entry: ['src/bin.ts'],
  format: ['esm'],
  sourcemap: true,
  clean: true,
  // The library package exports TypeScript sources, so it is bundled in.
  noExternal: ['secretfile'],
  banner: {
    js: '#!/usr/bin/env node',
  },
})
