import type { NotificationPayload, Notifier } from '../notifications/types.js'
import { asErrorMessage, isFatalError } from '../watcher/errors.js'
import type { ChangeResult } from '../watcher/types.js'
import { createLogger } from '../../utils/logger.js'
import { plainTextAnnouncements } from './announcements.js'
import type {
  AnnouncementBuilder,
  CheckReason,
  Checkable,
  CycleOutcome,
  FailureStreak,
  WatchStatus,
} from './types.js'

const log = createLogger('cycle')

export interface CheckCycleServiceOptions {
  watcher: Checkable
  notifier?: Notifier
  announcements?: AnnouncementBuilder
  failureAlertThreshold: number
  now?: () => Date
}

function toError(error: unknown): Error {
  if (error instanceof Error) return error
  return new Error(String(error))
}

/**
 * Runs one watcher check and turns its result into announcements: a new
 * artifact is always announced, a failing fetch only once per streak that
 * reaches the alert threshold, and unexpected errors every time they happen
 * outside a manual check.
 */
export class CheckCycleService {
  private readonly watcher: Checkable
  private readonly notifier?: Notifier
  private readonly announcements: AnnouncementBuilder
  private readonly failureAlertThreshold: number
  private readonly now: () => Date
  private consecutiveFailures = 0
  private failureStartedAt: Date | null = null
  private lastFailureReason = ''
  private failureAlerted = false
  private lastOutcome?: CycleOutcome

  constructor(options: CheckCycleServiceOptions) {
    this.watcher = options.watcher
    this.notifier = options.notifier
    this.announcements = options.announcements ?? plainTextAnnouncements
    this.failureAlertThreshold = Math.max(1, options.failureAlertThreshold)
    this.now = options.now ?? (() => new Date())
  }

  getStatus(): WatchStatus {
    return {
      url: this.watcher.url,
      state: this.watcher.getState(),
      consecutiveFailures: this.consecutiveFailures,
      lastOutcome: this.lastOutcome,
    }
  }

  async run(reason: CheckReason): Promise<CycleOutcome> {
    const startedAt = this.now()
    let result: ChangeResult
    try {
      result = await this.watcher.checkOnce()
    }
    catch (caught) {
      const error = toError(caught)
      const fatal = isFatalError(caught)
      log.error('Check failed unexpectedly', { reason, fatal, error })
      if (reason !== 'manual') {
        await this.announce(builder => builder.unexpectedError(this.watcher.url, error, fatal, this.now()))
      }
      return this.remember({ status: 'failed', reason, error, fatal, startedAt, finishedAt: this.now() })
    }

    await this.handleResult(result)
    log.info('Check completed', { reason, result: result.kind })
    return this.remember({ status: 'completed', reason, result, startedAt, finishedAt: this.now() })
  }

  private async handleResult(result: ChangeResult): Promise<void> {
    if (result.kind === 'fetchFailed') {
      await this.recordFailure(result.error.message)
      return
    }

    await this.recordSuccess()

    if (result.kind === 'artifactChanged') {
      log.info('New artifact detected', { link: result.link, previousLink: result.previousLink })
      await this.announce(builder => builder.artifactChanged(this.watcher.url, result, this.now()))
    }
  }

  private async recordFailure(reason: string): Promise<void> {
    this.consecutiveFailures += 1
    this.lastFailureReason = reason
    this.failureStartedAt ??= this.now()
    log.warn('Fetch failed', { consecutiveFailures: this.consecutiveFailures, reason })

    if (this.failureAlerted || this.consecutiveFailures < this.failureAlertThreshold) return
    this.failureAlerted = true
    await this.announce(builder => builder.fetchFailing(this.currentStreak(), this.now()))
  }

  private async recordSuccess(): Promise<void> {
    if (this.consecutiveFailures === 0) return
    const streak = this.currentStreak()
    const alerted = this.failureAlerted
    this.consecutiveFailures = 0
    this.failureStartedAt = null
    this.failureAlerted = false
    log.info('Fetch recovered', { failures: streak.consecutiveFailures })
    if (alerted) {
      await this.announce(builder => builder.recovered(streak, this.now()))
    }
  }

  private currentStreak(): FailureStreak {
    return {
      url: this.watcher.url,
      consecutiveFailures: this.consecutiveFailures,
      reason: this.lastFailureReason,
      since: this.failureStartedAt ?? this.now(),
    }
  }

  private async announce(build: (builder: AnnouncementBuilder) => NotificationPayload): Promise<void> {
    if (!this.notifier) return
    let payload: NotificationPayload
    try {
      payload = build(this.announcements)
    }
    catch (error) {
      log.warn('Announcement formatting failed; sending plain text', { error: asErrorMessage(error) })
      payload = build(plainTextAnnouncements)
    }
    try {
      await this.notifier.send(payload)
    }
    catch (error) {
      log.warn('Announcement failed', { notifier: this.notifier.name, error: asErrorMessage(error) })
    }
  }

  private remember(outcome: CycleOutcome): CycleOutcome {
    this.lastOutcome = outcome
    return outcome
  }
}
