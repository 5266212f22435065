import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      // cli/index.ts 只负责解析 process.argv
      exclude: ['src/**/*.test.ts', 'src/cli/index.ts'],
      reportsDirectory: './coverage',
      reporter: ['text', 'html'],
    },
  },
});
