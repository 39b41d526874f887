import { createHash } from 'node:crypto'
import pLimit from 'p-limit'
import { createLogger, type Logger } from '../../utils/logger.js'
import { ObserverRegistry, type DispatchReport, type Observer } from './events.js'
import { TransportError } from './errors.js'
import { DEFAULT_EXTRACT_OPTIONS, extractArtifactLink } from './extractor.js'
import type {
  ChangeResult,
  ExtractOptions,
  Fetcher,
  WatchEvents,
  WatcherState,
} from './types.js'

const DEFAULT_TIMEOUT_MS = 30_000

export interface WatcherServiceOptions {
  url: string
  fetcher: Fetcher
  timeoutMs?: number
  extract?: ExtractOptions
  now?: () => Date
  logger?: Logger
}

export function fingerprint(body: Uint8Array): string {
  return createHash('sha256').update(body).digest('hex')
}

function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300
}

export class WatcherService {
  readonly url: string
  private readonly fetcher: Fetcher
  private readonly timeoutMs: number
  private readonly extractOptions: ExtractOptions
  private readonly now: () => Date
  private readonly log: Logger
  private readonly events: ObserverRegistry<WatchEvents>
  private readonly decoder = new TextDecoder('utf-8')
  // Steps from fetch to the last state write run under this single slot.
  private readonly exclusive = pLimit(1)
  private state: WatcherState = {}

  constructor(options: WatcherServiceOptions) {
    this.url = options.url
    this.fetcher = options.fetcher
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.extractOptions = options.extract ?? DEFAULT_EXTRACT_OPTIONS
    this.now = options.now ?? (() => new Date())
    this.log = options.logger ?? createLogger('watcher')
    this.events = new ObserverRegistry<WatchEvents>(this.log)
  }

  on<K extends keyof WatchEvents>(event: K, observer: Observer<WatchEvents[K]>): () => void {
    return this.events.on(event, observer)
  }

  off<K extends keyof WatchEvents>(event: K, observer: Observer<WatchEvents[K]>): boolean {
    return this.events.off(event, observer)
  }

  getState(): Readonly<WatcherState> {
    return { ...this.state }
  }

  isBusy(): boolean {
    return this.exclusive.activeCount + this.exclusive.pendingCount > 0
  }

  checkOnce(): Promise<ChangeResult> {
    return this.exclusive(() => this.runCheck())
  }

  private async runCheck(): Promise<ChangeResult> {
    this.log.debug('Check started', { url: this.url })
    const outcome = await this.fetcher.fetch(this.url, { timeoutMs: this.timeoutMs })

    if (!outcome.ok) {
      const error = new TransportError(outcome.reason)
      this.log.warn('Fetch failed', { url: this.url, reason: outcome.reason })
      return { kind: 'fetchFailed', error }
    }
    if (!isSuccessStatus(outcome.statusCode)) {
      const error = new TransportError(`HTTP ${outcome.statusCode}`, { statusCode: outcome.statusCode })
      this.log.warn('Fetch returned non-success status', { url: this.url, status: outcome.statusCode })
      return { kind: 'fetchFailed', error }
    }

    const hash = fingerprint(outcome.body)
    const checkedAt = this.now()
    this.state.lastCheckedAt = checkedAt

    if (this.state.lastFingerprint === undefined) {
      this.state.lastFingerprint = hash
      const artifactLink = this.extract(outcome.body)
      this.state.lastArtifactLink = artifactLink
      this.log.info('Baseline established', { url: this.url, fingerprint: hash, artifactLink })
      return { kind: 'noBaseline', fingerprint: hash, artifactLink }
    }

    if (hash === this.state.lastFingerprint) {
      this.log.debug('Content unchanged', { fingerprint: hash })
      return { kind: 'unchanged', fingerprint: hash }
    }

    this.state.lastFingerprint = hash
    const content = this.decoder.decode(outcome.body)
    this.log.info('Page changed', { url: this.url, fingerprint: hash, bytes: outcome.body.byteLength })
    this.report(await this.events.emit('pageChanged', {
      url: this.url,
      content,
      fingerprint: hash,
      detectedAt: checkedAt,
    }))

    const previousLink = this.state.lastArtifactLink
    const link = extractArtifactLink(content, this.extractOptions)

    if (link === undefined) {
      // A page without a qualifying link keeps the last known artifact.
      if (previousLink !== undefined) {
        this.log.warn('No artifact link on changed page; keeping previous', { url: this.url, previousLink })
      }
      return { kind: 'pageChangedOnly', fingerprint: hash, content, artifactLink: previousLink }
    }

    this.state.lastArtifactLink = link
    if (link !== previousLink) {
      this.log.info('Artifact changed', { url: this.url, link, previousLink })
      this.report(await this.events.emit('artifactChanged', {
        url: this.url,
        link,
        previousLink,
        detectedAt: checkedAt,
      }))
      return { kind: 'artifactChanged', fingerprint: hash, content, link, previousLink }
    }

    return { kind: 'pageChangedOnly', fingerprint: hash, content, artifactLink: link }
  }

  private extract(body: Uint8Array): string | undefined {
    return extractArtifactLink(this.decoder.decode(body), this.extractOptions)
  }

  private report(dispatch: DispatchReport): void {
    if (dispatch.failures.length === 0) return
    this.log.warn('Some observers failed', {
      event: dispatch.event,
      delivered: dispatch.delivered,
      failed: dispatch.failures.length,
    })
  }
}
