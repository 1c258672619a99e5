import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],

    // 授權流程測試會寫入暫存檔，保留較寬鬆的逾時
    testTimeout: 10000,
    hookTimeout: 10000,

    slowTestThreshold: 1000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts', 'src/mcp/main.ts', 'src/types/**'],
    },
  },
});
