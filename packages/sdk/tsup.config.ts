import { defineConfig } from 'tsup'

export default defineConfig({
  entry: ['src/index.ts'],

  format: ['esm'],
  outDir: 'dist',
  clean: true,
  sourcemap: true,
  bundle: true,
  splitting: false,

  minify: process.env.NODE_ENV === 'production',
  treeshake: true,

  target: ['es2022', 'node20'],
  platform: 'node',

  // The shared package is bundled, zod stays a runtime dependency
  noExternal: ['@media-relay/shared'],
  external: ['zod'],

  onSuccess: async () => {
    console.log('✅ SDK build completed')
  },
})
