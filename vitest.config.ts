/**
 * @fileoverview Vitest configuration for every workspace
 *
 * @description
 * One run covers packages/* and apps/*. Every test opens its own in-memory
 * store.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    testTimeout: 30000,
    hookTimeout: 30000,
    sequence: {
      concurrent: false,
    },
  },
})
