import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const resolvePath = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@makerspace/shared': resolvePath('./packages/shared/src/index.ts')
    }
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: [resolvePath('./tests/setup/setupEnv.ts')],
    isolate: true,
    testTimeout: 20_000,
    reporters: 'default'
  }
});
