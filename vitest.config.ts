import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    // sharp + escritura real en disco: los lotes de prueba tardan más que el default
    testTimeout: 30000,
  },
});
