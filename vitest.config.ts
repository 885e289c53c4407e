import { defineConfig } from 'vitest/config'
import { resolve } from 'path'
import { fileURLToPath } from 'url'

const root = fileURLToPath(new URL('.', import.meta.url))

export default defineConfig({
  esbuild: {
    jsx: 'automatic',
  },
  test: {
    environment: 'node',
    globals: true,
    include: ['packages/**/__tests__/**/*.test.{ts,tsx}'],
    // The node preset tests bind a real port.
    pool: 'forks',
    poolOptions: {
      forks: { singleFork: true },
    },
  },
  resolve: {
    alias: [
      {
        find: /^@huddle\/sync$/,
        replacement: resolve(root, 'packages/sync/src/index.ts'),
      },
      {
        find: /^@huddle\/sync-preset-node$/,
        replacement: resolve(root, 'packages/sync-preset-node/src/index.ts'),
      },
      {
        find: /^@huddle\/react-sync$/,
        replacement: resolve(root, 'packages/react-sync/src/index.ts'),
      },
    ],
  },
})
