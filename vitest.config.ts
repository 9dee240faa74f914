import { defineConfig } from 'vitest/config';
import path from 'node:path';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';

const root = path.dirname(fileURLToPath(import.meta.url));
const tsconfigPath = path.join(root, 'tsconfig.json');

// Mirror tsconfig "paths" so workspace packages resolve to their sources.
function loadAliases() {
  const ts = JSON.parse(fs.readFileSync(tsconfigPath, 'utf8'));
  const paths: Record<string, string[]> = ts?.compilerOptions?.paths ?? {};
  return Object.entries(paths).map(([find, [target]]) => ({
    find,
    replacement: path.resolve(root, target),
  }));
}

export default defineConfig({
  resolve: {
    alias: loadAliases(),
  },
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts', 'apps/*/src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    testTimeout: 30000,
  },
});
