import { logger } from '../../utils/logger.js'
import { asErrorMessage } from '../watcher/errors.js'
import type { NotificationPayload, Notifier } from './types.js'

/**
 * Sends to every notifier concurrently. Individual failures are logged; the
 * send only rejects when no notifier delivered.
 */
export class CompositeNotifier implements Notifier {
  readonly name = 'composite'
  private readonly notifiers: Notifier[]

  constructor(notifiers: Notifier[]) {
    this.notifiers = notifiers
  }

  async send(payload: NotificationPayload): Promise<void> {
    if (this.notifiers.length === 0) return

    const results = await Promise.allSettled(
      this.notifiers.map(notifier => notifier.send(payload)),
    )

    const failures: unknown[] = []
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') return
      failures.push(result.reason)
      logger.warn('Notifier delivery failed', {
        notifier: this.notifiers[index]?.name ?? `#${index + 1}`,
        error: asErrorMessage(result.reason),
      })
    })

    if (failures.length === this.notifiers.length) {
      throw new AggregateError(failures, 'All notifiers failed')
    }
  }
}

export function combineNotifiers(notifiers: Notifier[]): Notifier | undefined {
  if (notifiers.length === 0) return undefined
  if (notifiers.length === 1) return notifiers[0]
  return new CompositeNotifier(notifiers)
}
