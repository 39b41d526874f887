import type { ExtractOptions } from './types.js'
import { openingTags } from './html.js'

export const DEFAULT_EXTRACT_OPTIONS: ExtractOptions = {
  extension: '.bin',
  schemePrefix: 'http',
}

export function isQualifyingLink(href: string, options: ExtractOptions): boolean {
  if (!href.startsWith(options.schemePrefix)) return false
  return href.toLowerCase().endsWith(options.extension.toLowerCase())
}

/**
 * Returns the last `<a href>` in document order whose target starts with the
 * scheme prefix and ends with the artifact extension. Later links override
 * earlier ones, so a page listing releases oldest-first yields the newest.
 */
export function extractArtifactLink(markup: string, options: ExtractOptions = DEFAULT_EXTRACT_OPTIONS): string | undefined {
  let found: string | undefined
  for (const attributes of openingTags(markup, 'a')) {
    for (const attribute of attributes) {
      if (attribute.name !== 'href' || attribute.value === undefined) continue
      const href = attribute.value.trim()
      if (isQualifyingLink(href, options)) {
        found = href
      }
    }
  }
  return found
}
