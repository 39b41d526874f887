import { createLogger, type Logger } from '../../utils/logger.js'
import { ObserverError, asErrorMessage } from './errors.js'

export type Observer<T> = (payload: T) => void | Promise<void>

export interface DispatchReport {
  event: string
  delivered: number
  failures: ObserverError[]
}

/**
 * Ordered callback lists keyed by event kind. Dispatch awaits each callback in
 * registration order; a callback that throws or rejects is logged and reported
 * without affecting the ones after it.
 */
export class ObserverRegistry<Events extends object> {
  private readonly observers: { [K in keyof Events]?: Array<Observer<Events[K]>> } = {}
  private readonly log: Logger

  constructor(log: Logger = createLogger('observers')) {
    this.log = log
  }

  on<K extends keyof Events>(event: K, observer: Observer<Events[K]>): () => void {
    const list: Array<Observer<Events[K]>> = this.observers[event] ?? []
    list.push(observer)
    this.observers[event] = list
    return () => {
      this.off(event, observer)
    }
  }

  /** Removes the first registration of `observer`; returns whether one was found. */
  off<K extends keyof Events>(event: K, observer: Observer<Events[K]>): boolean {
    const list = this.observers[event]
    if (!list) return false
    const index = list.indexOf(observer)
    if (index < 0) return false
    list.splice(index, 1)
    return true
  }

  count<K extends keyof Events>(event: K): number {
    return this.observers[event]?.length ?? 0
  }

  async emit<K extends keyof Events>(event: K, payload: Events[K]): Promise<DispatchReport> {
    const eventName = String(event)
    // Snapshot so registrations made during dispatch apply from the next event.
    const list: Array<Observer<Events[K]>> = [...(this.observers[event] ?? [])]
    const report: DispatchReport = { event: eventName, delivered: 0, failures: [] }

    for (const [index, observer] of list.entries()) {
      try {
        await observer(payload)
        report.delivered += 1
      }
      catch (error) {
        const failure = new ObserverError(eventName, index + 1, error)
        report.failures.push(failure)
        this.log.warn('Observer failed', {
          event: eventName,
          observerIndex: index + 1,
          error: asErrorMessage(error),
        })
      }
    }

    return report
  }
}
