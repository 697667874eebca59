// vitest.config.ts
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',

    include: ['test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/.{idea,git,cache,output,temp}/**'],

    // Deterministic file order keeps console output readable
    sequence: {
      concurrent: false,
      shuffle: false,
    },

    // Run everything even after a failure
    bail: 0,

    // Undo spies and env stubs between tests
    restoreMocks: true,
    unstubEnvs: true,
  },
});
