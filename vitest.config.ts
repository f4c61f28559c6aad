import { defineConfig } from 'vitest/config'
import { resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { config as loadEnv } from 'dotenv'
import { existsSync } from 'node:fs'

const rootDir = fileURLToPath(new URL('.', import.meta.url))

// Optional local overrides, e.g. LOG_LEVEL=debug while debugging a test
const envPath = resolve(rootDir, '.env')
if (existsSync(envPath)) {
  loadEnv({ path: envPath, override: true })
}

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '**/*.d.ts'],
    testTimeout: 10000,
    hookTimeout: 10000,
  },
})
