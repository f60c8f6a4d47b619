import { jsToTsResolver } from './scripts/vite-js-to-ts-resolver.js'

export const sharedConfig = {
  plugins: [jsToTsResolver()],
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
}
