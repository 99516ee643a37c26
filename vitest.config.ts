import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // 测试中关闭日志输出
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
