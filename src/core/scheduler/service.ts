import cron from 'node-cron'
import { logger } from '../../utils/logger.js'
import type { CheckReason, CycleOutcome } from '../cycle/types.js'

export interface ScheduledJob {
  stop(): void
}

export type ScheduleFn = (
  expression: string,
  task: () => Promise<void>,
  options: { timezone: string },
) => ScheduledJob

export interface SchedulerOptions {
  cronSchedule: string
  timezone: string
  startupCheck?: boolean
  runCheck: (reason: CheckReason) => Promise<CycleOutcome>
  onFatal?: (outcome: CycleOutcome) => void
  schedule?: ScheduleFn
}

const cronSchedule: ScheduleFn = (expression, task, options) =>
  cron.schedule(expression, task, { timezone: options.timezone })

/**
 * Fires checks on the cron schedule, one at a time. A tick that arrives while a
 * check is still running is skipped; `stop()` prevents further ticks and waits
 * for the running check instead of interrupting it.
 */
export class SchedulerService {
  private readonly cronSchedule: string
  private readonly timezone: string
  private readonly startupCheck: boolean
  private readonly runCheck: (reason: CheckReason) => Promise<CycleOutcome>
  private readonly onFatal?: (outcome: CycleOutcome) => void
  private readonly schedule: ScheduleFn
  private job: ScheduledJob | null = null
  private inFlight: Promise<CycleOutcome> | null = null
  private stopped = false

  constructor(options: SchedulerOptions) {
    this.cronSchedule = options.cronSchedule
    this.timezone = options.timezone
    this.startupCheck = options.startupCheck !== false
    this.runCheck = options.runCheck
    this.onFatal = options.onFatal
    this.schedule = options.schedule ?? cronSchedule
  }

  isRunning(): boolean {
    return this.job !== null && !this.stopped
  }

  isStopped(): boolean {
    return this.stopped
  }

  async start(): Promise<void> {
    logger.info('Scheduler starting', {
      cronSchedule: this.cronSchedule,
      timezone: this.timezone,
      startupCheck: this.startupCheck,
    })

    if (this.startupCheck) {
      logger.info('Startup check triggered')
      await this.tick('startup')
      if (this.stopped) return
    }

    this.job = this.schedule(this.cronSchedule, async () => {
      logger.debug('Scheduled check triggered')
      await this.tick('scheduled')
    }, { timezone: this.timezone })

    logger.info('Scheduler started')
  }

  /** Runs one check unless stopped or another check is in flight. */
  async tick(reason: CheckReason): Promise<CycleOutcome | null> {
    if (this.stopped) return null
    if (this.inFlight) {
      logger.warn('Check skipped; previous check still running', { reason })
      return null
    }

    const running = this.runCheck(reason)
    this.inFlight = running
    let outcome: CycleOutcome
    try {
      outcome = await running
    }
    catch (error) {
      // runCheck reports failures as outcomes; anything reaching here is a bug upstream.
      logger.error('Check runner threw', { reason, error })
      return null
    }
    finally {
      this.inFlight = null
    }

    if (outcome.status === 'failed' && outcome.fatal) {
      logger.error('Fatal check failure; stopping scheduler', { reason, error: outcome.error })
      await this.stop()
      this.onFatal?.(outcome)
    }
    return outcome
  }

  async stop(): Promise<void> {
    if (!this.stopped) {
      this.stopped = true
      this.job?.stop()
      this.job = null
      logger.info('Scheduler stopping')
    }
    if (this.inFlight) {
      await this.inFlight.catch(() => undefined)
    }
  }
}
