import fs from 'node:fs/promises'
import path from 'node:path'
import { createLogger } from '../../utils/logger.js'
import { toUnixSeconds } from '../../utils/time.js'
import { TransportError } from '../watcher/errors.js'
import type { ArtifactChangedEvent, Fetcher, PageChangedEvent } from '../watcher/types.js'

const log = createLogger('archive')

export interface ArchiveOptions {
  directory: string
}

export interface ArtifactDownloaderOptions extends ArchiveOptions {
  fetcher: Fetcher
  timeoutMs: number
  extension: string
}

export function filenameFromContentDisposition(header: string | undefined): string | undefined {
  if (!header) return undefined
  const encoded = /filename\*\s*=\s*utf-8''([^;]+)/i.exec(header)?.[1]
  let raw = encoded ? safeDecode(encoded.trim()) : undefined
  raw ??= /filename\s*=\s*"([^"]*)"/i.exec(header)?.[1] ?? /filename\s*=\s*([^;]+)/i.exec(header)?.[1]
  if (!raw) return undefined
  // Only the last path segment; a header must not choose the directory.
  const name = path.basename(raw.trim().replace(/\\/g, '/'))
  if (name === '' || name === '.' || name === '..') return undefined
  return name
}

function safeDecode(value: string): string | undefined {
  try {
    return decodeURIComponent(value)
  }
  catch {
    return undefined
  }
}

export class PageSnapshotArchiver {
  private readonly directory: string

  constructor(options: ArchiveOptions) {
    this.directory = options.directory
  }

  async archive(event: PageChangedEvent): Promise<string> {
    await fs.mkdir(this.directory, { recursive: true })
    const filePath = path.join(this.directory, `page_${toUnixSeconds(event.detectedAt)}.html`)
    await fs.writeFile(filePath, event.content, 'utf8')
    log.info('Page snapshot saved', { path: filePath, fingerprint: event.fingerprint })
    return filePath
  }
}

export class ArtifactDownloader {
  private readonly directory: string
  private readonly fetcher: Fetcher
  private readonly timeoutMs: number
  private readonly extension: string

  constructor(options: ArtifactDownloaderOptions) {
    this.directory = options.directory
    this.fetcher = options.fetcher
    this.timeoutMs = options.timeoutMs
    this.extension = options.extension
  }

  /** Resolves to the written path, or `undefined` when the server did not answer 2xx. */
  async download(event: ArtifactChangedEvent): Promise<string | undefined> {
    const outcome = await this.fetcher.fetch(event.link, { timeoutMs: this.timeoutMs })
    if (!outcome.ok) {
      throw new TransportError(`Artifact download failed: ${outcome.reason}`)
    }
    if (outcome.statusCode < 200 || outcome.statusCode >= 300) {
      log.warn('Artifact download returned non-success status', { link: event.link, status: outcome.statusCode })
      return undefined
    }

    const filename = filenameFromContentDisposition(outcome.headers['content-disposition'])
      ?? `artifact_${toUnixSeconds(event.detectedAt)}${this.extension}`
    await fs.mkdir(this.directory, { recursive: true })
    const filePath = path.join(this.directory, filename)
    await fs.writeFile(filePath, outcome.body)
    log.info('Artifact downloaded', { link: event.link, path: filePath, bytes: outcome.body.byteLength })
    return filePath
  }
}
