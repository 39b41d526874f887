import { describe, expect, it } from 'vitest'
import { extractArtifactLink, isQualifyingLink } from './extractor.js'
import { decodeEntities } from './html.js'

const options = { extension: '.bin', schemePrefix: 'http' }

describe('extractArtifactLink', () => {
  it('returns the last qualifying link in document order', () => {
    const markup = `
      <ul>
        <li><a href="http://x/fw1.bin">1.0</a></li>
        <li><a href="http://x/fw2.bin">2.0</a></li>
      </ul>`
    expect(extractArtifactLink(markup, options)).toBe('http://x/fw2.bin')
  })

  it('returns undefined when no link qualifies', () => {
    const markup = '<a href="/relative/fw.bin">rel</a><a href="http://x/notes.txt">notes</a><a>empty</a>'
    expect(extractArtifactLink(markup, options)).toBeUndefined()
  })

  it('matches the extension case-insensitively and accepts https', () => {
    expect(extractArtifactLink('<a href="https://cdn.example/POCKET_V2.BIN">fw</a>', options))
      .toBe('https://cdn.example/POCKET_V2.BIN')
  })

  it('treats tag and attribute names case-insensitively', () => {
    expect(extractArtifactLink('<A HREF=\'http://x/upper.bin\'>fw</A>', options)).toBe('http://x/upper.bin')
  })

  it('reads unquoted attribute values', () => {
    expect(extractArtifactLink('<a class=dl href=http://x/plain.bin>fw</a>', options)).toBe('http://x/plain.bin')
  })

  it('decodes entities inside the href', () => {
    expect(extractArtifactLink('<a href="http://x/a&amp;b.bin">fw</a>', options)).toBe('http://x/a&b.bin')
  })

  it('ignores a later non-qualifying link', () => {
    const markup = '<a href="http://x/fw1.bin">fw</a><a href="http://x/readme.html">readme</a>'
    expect(extractArtifactLink(markup, options)).toBe('http://x/fw1.bin')
  })

  it('does not treat other tags starting with a as anchors', () => {
    expect(extractArtifactLink('<abbr href="http://x/abbr.bin">x</abbr>', options)).toBeUndefined()
  })

  it('skips links inside comments and scripts', () => {
    const markup = `
      <a href="http://x/real.bin">real</a>
      <!-- <a href="http://x/commented.bin">old</a> -->
      <script>document.write('<a href="http://x/scripted.bin">s</a>')</script>`
    expect(extractArtifactLink(markup, options)).toBe('http://x/real.bin')
  })

  it('keeps going past a greater-than sign inside a quoted attribute', () => {
    const markup = '<a title="v1 > v0" href="http://x/quoted.bin">fw</a>'
    expect(extractArtifactLink(markup, options)).toBe('http://x/quoted.bin')
  })

  it('tolerates malformed markup without throwing', () => {
    const markup = '<a href="http://x/ok.bin"><div <a href=<<< <a href="unterminated'
    expect(extractArtifactLink(markup, options)).toBe('http://x/ok.bin')
  })

  it('honours a custom extension and scheme prefix', () => {
    const markup = '<a href="https://x/fw.bin">bin</a><a href="https://x/pkg.zip">zip</a>'
    expect(extractArtifactLink(markup, { extension: '.zip', schemePrefix: 'https://' })).toBe('https://x/pkg.zip')
  })
})

describe('isQualifyingLink', () => {
  it('requires the scheme prefix at the start', () => {
    expect(isQualifyingLink('ftp://x/fw.bin', options)).toBe(false)
    expect(isQualifyingLink('http://x/fw.bin', options)).toBe(true)
  })

  it('requires the extension at the end', () => {
    expect(isQualifyingLink('http://x/fw.bin?download=1', options)).toBe(false)
  })
})

describe('decodeEntities', () => {
  it('decodes named and numeric references once', () => {
    expect(decodeEntities('&lt;a&gt; &#65;&#x42; &amp;lt;')).toBe('<a> AB &lt;')
  })

  it('leaves unknown references alone', () => {
    expect(decodeEntities('&bogus; &#xZZ;')).toBe('&bogus; &#xZZ;')
  })
})
