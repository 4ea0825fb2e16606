import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // Signal listeners need a real process per test file
    pool: 'forks',
    restoreMocks: true,
    unstubEnvs: true,
  },
});
