import { config as loadEnv } from 'dotenv'
import { defineConfig } from 'vitest/config'

// Placeholder MYWEBLOG_* credentials for tests that read the environment
loadEnv({ path: '.env.test' })

export default defineConfig({
  test: {
    name: 'myweblog-node',
    environment: 'node',
    globals: false,
    isolate: true,
    include: ['tests/unit/**/*.test.ts', 'tests/integration/**/*.test.ts'],
    unstubEnvs: true,
    testTimeout: 10000,
    coverage: {
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts', 'src/types/**'],
    },
  },
})
