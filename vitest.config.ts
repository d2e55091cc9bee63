/**
 * @fileoverview Vitest configuration for the server test suites.
 *
 * Tests live in tests/server/ and beside their sources as server/*.test.ts.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts', 'server/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10_000,
  },
});
