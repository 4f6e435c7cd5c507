import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const repoRoot = path.dirname(fileURLToPath(import.meta.url));
const alias = [
  { find: /^@trackwise\/http-core\/testing$/, replacement: path.resolve(repoRoot, 'libs/http-core/src/testing.ts') },
  { find: /^@trackwise\/http-core$/, replacement: path.resolve(repoRoot, 'libs/http-core/src/index.ts') },
  { find: /^@trackwise\/tracker-client$/, replacement: path.resolve(repoRoot, 'libs/tracker-client/src/index.ts') },
  { find: /^@trackwise\/llm-client$/, replacement: path.resolve(repoRoot, 'libs/llm-client/src/index.ts') },
];

export default defineConfig({
  test: {
    environment: 'node',
    include: ['libs/*/src/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
