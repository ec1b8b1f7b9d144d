import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    globals: true,
    pool: 'forks',
    // Filesystem tests share os.tmpdir() naming; keep files sequential
    fileParallelism: false,
  },
});
