import { defineConfig } from 'tsup'

export default defineConfig({
  // Multiple entry points for sub-path exports
  entry: {
    'errors/index': 'src/errors/index.ts',
    'types/index': 'src/types/index.ts',
    'logger/index': 'src/logger/index.ts',
  },

  format: ['esm'],
  outDir: 'dist',
  clean: true,
  sourcemap: false,
  splitting: false,
  treeshake: true,

  target: ['es2022', 'node20'],
  platform: 'node',

  onSuccess: async () => {
    console.log('✅ Shared package built successfully')
  },
})
