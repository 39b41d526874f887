import type { FetchOptions, FetchOutcome, Fetcher } from '../../core/watcher/types.js'
import { InvalidTargetError, asErrorMessage } from '../../core/watcher/errors.js'
import { logger } from '../../utils/logger.js'

const DEFAULT_USER_AGENT = 'artifact-watch/0.1'
const DEFAULT_ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8'

export interface HttpFetcherOptions {
  userAgent?: string
  accept?: string
}

function parseTarget(url: string): URL {
  try {
    return new URL(url)
  }
  catch (error) {
    throw new InvalidTargetError(url, error)
  }
}

function describeFailure(error: unknown, timeoutMs: number): string {
  if (error instanceof Error && error.name === 'AbortError') {
    return `Request timed out after ${timeoutMs}ms`
  }
  const cause = error instanceof Error ? error.cause : undefined
  const causeMessage = cause instanceof Error ? `: ${cause.message}` : ''
  return `${asErrorMessage(error)}${causeMessage}`
}

function collectHeaders(headers: Headers): Record<string, string> {
  const collected: Record<string, string> = {}
  headers.forEach((value, key) => {
    collected[key] = value
  })
  return collected
}

/**
 * Fetch collaborator over the global `fetch`. Transport failures come back as
 * `{ ok: false }`; only a target that is not a URL at all throws.
 */
export class HttpFetcher implements Fetcher {
  private readonly userAgent: string
  private readonly accept: string

  constructor(options: HttpFetcherOptions = {}) {
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT
    this.accept = options.accept ?? DEFAULT_ACCEPT
  }

  async fetch(url: string, options: FetchOptions): Promise<FetchOutcome> {
    const target = parseTarget(url)
    const controller = new AbortController()
    const timeout = setTimeout(() => controller.abort(), options.timeoutMs)

    logger.debug('HTTP request', { method: 'GET', url: target.toString(), timeoutMs: options.timeoutMs })

    try {
      const response = await fetch(target, {
        method: 'GET',
        headers: {
          accept: this.accept,
          'user-agent': this.userAgent,
        },
        signal: controller.signal,
      })
      const body = new Uint8Array(await response.arrayBuffer())

      logger.debug('HTTP response', {
        url: target.toString(),
        status: response.status,
        bytes: body.byteLength,
      })

      return {
        ok: true,
        statusCode: response.status,
        body,
        headers: collectHeaders(response.headers),
      }
    }
    catch (error) {
      const reason = describeFailure(error, options.timeoutMs)
      logger.debug('HTTP request failed', { url: target.toString(), reason })
      return { ok: false, reason }
    }
    finally {
      clearTimeout(timeout)
    }
  }
}
