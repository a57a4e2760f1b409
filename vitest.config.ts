/**
 * Vitest Configuration
 *
 * Single project covering tests/ (mirrors src/ layout).
 * Test functions are imported explicitly from 'vitest'.
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'cyclebind',
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts'],
    },
  },
});
