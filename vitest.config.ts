import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const root = fileURLToPath(new URL('.', import.meta.url))

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/unit/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
      PRDASH_LOG_FILE: join(tmpdir(), 'prdash-test.jsonl'),
    },
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      '@tests': join(root, 'tests'),
      '@': join(root, 'src'),
    },
  },
})
