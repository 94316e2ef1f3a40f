import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      // 测试文件与纯类型声明不计入覆盖率
      exclude: ['src/**/*.test.ts', 'src/**/__test__/**', 'src/types/**'],
      reportsDirectory: './coverage',
      reporter: ['text', 'html'],
    },
  },
});
