import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import tsconfigPaths from 'vite-tsconfig-paths';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    setupFiles: ['tests/setup.ts'],
    environment: 'node',
    globals: true,
    include: [
      'core/**/*.test.ts',
      'api/**/*.test.ts'
    ],
    exclude: [
      'node_modules',
      'dist'
    ],
    alias: {
      '@core': fileURLToPath(new URL('./core', import.meta.url)),
      '@api': fileURLToPath(new URL('./api', import.meta.url)),
      '@tests': fileURLToPath(new URL('./tests', import.meta.url))
    }
  }
});
