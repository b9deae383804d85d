import { defineConfig } from 'vitest/config'
import { fileURLToPath } from 'url'

const fromRoot = (path: string): string =>
  fileURLToPath(new URL(path, import.meta.url))

export default defineConfig({
  test: {
    environment: 'node',
    include: [
      'bootstrap-cloud/__tests__/**/*.test.ts',
      'packages/*/__tests__/**/*.test.ts'
    ],
    coverage: {
      provider: 'v8',
      reporter: ['json-summary', 'text', 'lcov'],
      reportsDirectory: './coverage',
      include: ['bootstrap-cloud/src/**', 'packages/*/src/**'],
      exclude: ['**/node_modules/**', '**/dist/**', '**/__tests__/**']
    }
  },
  resolve: {
    alias: [
      {
        find: /^@kube-agent-cloud\/shared\/(.*)$/,
        replacement: fromRoot('./packages/shared/src/$1')
      },
      {
        find: /^@kube-agent-cloud\/k8s-client$/,
        replacement: fromRoot('./packages/k8s-client/src/index.ts')
      },
      {
        find: /^@kubernetes\/client-node$/,
        replacement: fromRoot('./__mocks__/@kubernetes/client-node.ts')
      }
    ]
  }
})
