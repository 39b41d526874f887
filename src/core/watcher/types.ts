import type { TransportError } from './errors.js'

export interface FetchOptions {
  timeoutMs: number
}

export type FetchOutcome =
  | {
    ok: true
    statusCode: number
    body: Uint8Array
    headers: Record<string, string>
  }
  | {
    ok: false
    reason: string
  }

export interface Fetcher {
  fetch(url: string, options: FetchOptions): Promise<FetchOutcome>
}

export interface WatcherState {
  lastFingerprint?: string
  lastArtifactLink?: string
  lastCheckedAt?: Date
}

export interface ExtractOptions {
  extension: string
  schemePrefix: string
}

export interface WatchEvents {
  pageChanged: PageChangedEvent
  artifactChanged: ArtifactChangedEvent
}

export type WatchEventKind = keyof WatchEvents

export interface PageChangedEvent {
  url: string
  content: string
  fingerprint: string
  detectedAt: Date
}

export interface ArtifactChangedEvent {
  url: string
  link: string
  previousLink?: string
  detectedAt: Date
}

export type ChangeResult =
  | { kind: 'fetchFailed'; error: TransportError }
  | { kind: 'noBaseline'; fingerprint: string; artifactLink?: string }
  | { kind: 'unchanged'; fingerprint: string }
  | { kind: 'pageChangedOnly'; fingerprint: string; content: string; artifactLink?: string }
  | { kind: 'artifactChanged'; fingerprint: string; content: string; link: string; previousLink?: string }

export type ChangeKind = ChangeResult['kind']
