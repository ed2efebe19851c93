import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'cli',
    // テストのタイムアウト設定
    testTimeout: 30000,

    // 出力設定
    reporters: ['default'],

    // テスト環境
    environment: 'node',
  },
});
