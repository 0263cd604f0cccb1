/**
 * Vitest config for drivepath (Node.js environment)
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['core/**/*.test.ts', 'storage/**/*.test.ts', 'cli/**/*.test.ts', 'utils/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    environment: 'node',
    env: {
      DRIVEPATH_LOG_LEVEL: 'silent',
    },
  },
})
