import type { NotificationPayload } from '../notifications/types.js'
import type { ChangeResult, WatcherState } from '../watcher/types.js'

export type CheckReason = 'startup' | 'scheduled' | 'manual'

export type ArtifactChangedResult = Extract<ChangeResult, { kind: 'artifactChanged' }>

export type CycleOutcome =
  | {
    status: 'completed'
    reason: CheckReason
    result: ChangeResult
    startedAt: Date
    finishedAt: Date
  }
  | {
    status: 'failed'
    reason: CheckReason
    error: Error
    fatal: boolean
    startedAt: Date
    finishedAt: Date
  }

export interface Checkable {
  readonly url: string
  checkOnce(): Promise<ChangeResult>
  getState(): Readonly<WatcherState>
}

export interface FailureStreak {
  url: string
  consecutiveFailures: number
  reason: string
  since: Date
}

/** Builds the outbound messages for the transitions worth announcing. */
export interface AnnouncementBuilder {
  artifactChanged(url: string, result: ArtifactChangedResult, timestamp: Date): NotificationPayload
  fetchFailing(streak: FailureStreak, timestamp: Date): NotificationPayload
  recovered(streak: FailureStreak, timestamp: Date): NotificationPayload
  unexpectedError(url: string, error: Error, fatal: boolean, timestamp: Date): NotificationPayload
}

export interface WatchStatus {
  url: string
  state: Readonly<WatcherState>
  consecutiveFailures: number
  lastOutcome?: CycleOutcome
}
