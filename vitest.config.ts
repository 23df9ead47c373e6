import { defineConfig } from 'vitest/config'
import { loadEnv } from 'vite'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    env: {
      ...loadEnv('test', process.cwd(), ''),
      LLM_MODE: 'dry_run',
      LOG_LEVEL: 'silent',
    },
  },
})
