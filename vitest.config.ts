/**
 * Vitest 配置文件
 *
 * 测试框架配置：
 * - Node 环境（会话核心不依赖 DOM）
 * - 全局设置文件重置 mock
 * - 集成覆盖率报告
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // 测试环境
    environment: 'node',

    // 全局设置文件
    setupFiles: ['./tests/setup.ts'],

    // 测试文件匹配模式
    include: [
      'tests/**/*.test.ts',
      'src/**/*.test.ts',
    ],

    // 排除目录
    exclude: [
      'node_modules',
      'dist',
    ],

    // 全局变量
    globals: true,

    // 覆盖率配置
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: [
        'src/**/*.d.ts',
        'src/index.ts',
      ],
      // 覆盖率阈值
      thresholds: {
        statements: 80,
        branches: 70,
        functions: 80,
        lines: 80,
      },
    },

    // 超时设置
    testTimeout: 10000,

    // 并行执行
    pool: 'threads',
  },
});
