import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const WORKSPACE_PACKAGES = ['core', 'translation', 'translator-mock', 'translator-google'];

export default defineConfig({
  resolve: {
    // Load workspace packages from their TypeScript sources, not from dist/.
    alias: WORKSPACE_PACKAGES.map((name) => ({
      find: new RegExp(`^@l10n-autofill/${name}$`),
      replacement: fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url)),
    })),
    conditions: ['source'],
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
    restoreMocks: true,
  },
});
