import { coverageConfigDefaults, defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['./src/**/*.test.ts'],
    coverage: {
      exclude: ['**/types/**', '**/*types.ts', 'src/testing/**', ...coverageConfigDefaults.exclude],
    },
  },
});
