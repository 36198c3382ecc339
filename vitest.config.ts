import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    // Тесты конфига меняют process.cwd(), что недоступно в worker threads.
    pool: 'forks',
    include: ['src/**/__tests__/**/*.test.ts'],
    testTimeout: 15000,
  },
});
