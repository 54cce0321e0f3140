import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const alias = {
  'enrollment-engine': fileURLToPath(new URL('./src/index.ts', import.meta.url)),
};

export default defineConfig({
  test: {
    projects: [
      {
        resolve: { alias },
        test: {
          name: 'unit',
          include: [
            'tests/unit/**/*.test.ts',
            'registration-app/tests/unit/**/*.test.ts',
            'registration-app/src/**/*.unit.test.ts',
          ],
          testTimeout: 5000,
        },
      },
      {
        resolve: { alias },
        test: {
          name: 'integration',
          include: ['registration-app/tests/integration/**/*.test.ts'],
          testTimeout: 10000,
        },
      },
    ],
  },
});
