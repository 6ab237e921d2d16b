import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const packageEntry = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@formtext/types': packageEntry('types'),
      '@formtext/layout': packageEntry('layout'),
      '@formtext/form-parser': packageEntry('form-parser'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules', 'dist', 'tests'],
    },
  },
});
