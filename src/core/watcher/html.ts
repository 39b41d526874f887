const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: '\'',
  nbsp: ' ',
}

function fromCodePoint(value: number): string | undefined {
  if (!Number.isInteger(value) || value < 0 || value > 0x10ffff) return undefined
  return String.fromCodePoint(value)
}

export function decodeEntities(input: string): string {
  return input.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity.startsWith('#x') || entity.startsWith('#X')) {
      return fromCodePoint(parseInt(entity.slice(2), 16)) ?? match
    }
    if (entity.startsWith('#')) {
      return fromCodePoint(parseInt(entity.slice(1), 10)) ?? match
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match
  })
}

// Comments and raw-text elements never contain real tags.
export function stripNonMarkup(input: string): string {
  return input
    .replace(/<!--[\s\S]*?-->/g, ' ')
    .replace(/<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi, ' ')
    .replace(/<style\b[^<]*(?:(?!<\/style>)<[^<]*)*<\/style>/gi, ' ')
}

export interface TagAttribute {
  name: string
  value?: string
}

const ATTRIBUTE_PATTERN = /([^\s"'=<>/]+)(?:\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'=<>`]+)))?/g

export function parseAttributes(source: string): TagAttribute[] {
  const attributes: TagAttribute[] = []
  for (const match of source.matchAll(ATTRIBUTE_PATTERN)) {
    const name = match[1]
    if (!name) continue
    const raw = match[2] ?? match[3] ?? match[4]
    attributes.push({
      name: name.toLowerCase(),
      value: raw === undefined ? undefined : decodeEntities(raw),
    })
  }
  return attributes
}

/** Yields the attribute list of every opening `<tagName>` in document order. */
export function* openingTags(markup: string, tagName: string): Generator<TagAttribute[]> {
  const pattern = new RegExp(`<${tagName}(?=[\\s/>])((?:[^>"']|"[^"]*"|'[^']*')*)>`, 'gi')
  for (const match of stripNonMarkup(markup).matchAll(pattern)) {
    yield parseAttributes(match[1] ?? '')
  }
}
