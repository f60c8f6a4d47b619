import fs from 'node:fs'
import path from 'node:path'
import type { Plugin } from 'vite'

const TS_EXTENSIONS = ['.ts', '.mts', '.cts'] as const

const stripQuery = (id: string): string => {
  const index = id.indexOf('?')
  return index === -1 ? id : id.slice(0, index)
}

/**
 * Sources import siblings with a `.js` suffix (NodeNext style), while the tests run straight from
 * the `.ts` files. Resolve `./foo.js` to `./foo.ts` when no emitted `.js` file sits next to it.
 */
export const jsToTsResolver = (): Plugin => ({
  name: 'cache-reconcile:js-to-ts-resolver',
  enforce: 'pre',
  resolveId(source, importer) {
    if (!importer || !source.startsWith('.') || !source.endsWith('.js')) {
      return null
    }

    const resolvedJs = path.resolve(path.dirname(stripQuery(importer)), stripQuery(source))
    if (fs.existsSync(resolvedJs)) {
      return null
    }

    const base = resolvedJs.slice(0, -'.js'.length)
    for (const extension of TS_EXTENSIONS) {
      const candidate = `${base}${extension}`
      if (fs.existsSync(candidate)) {
        return candidate
      }
    }

    return null
  },
})
