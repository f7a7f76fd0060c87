import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // process.exitCodeと環境変数を書き換えるため、テストファイルは1プロセスで順に実行
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },

    reporters: ['default'],
    silent: false,
    environment: 'node',
  },
});
