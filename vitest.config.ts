import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],

    // vi.stubEnv 的環境變數在每個測試後還原
    unstubEnvs: true,

    // 指令測試每次都重新載入整個 CLI 模組樹
    testTimeout: 10000,
    hookTimeout: 10000,
    slowTestThreshold: 1000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts', 'src/lib.ts', 'src/types/**'],
      thresholds: {
        branches: 75,
        functions: 80,
        lines: 80,
        statements: 80,
      },
    },
  },
});
