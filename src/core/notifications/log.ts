import { createLogger } from '../../utils/logger.js'
import type { NotificationPayload, Notifier } from './types.js'

const log = createLogger('announce')

/** Used when no outbound channel is configured. */
export class LogNotifier implements Notifier {
  readonly name = 'log'

  async send(payload: NotificationPayload): Promise<void> {
    if (typeof payload === 'string') {
      log.info(payload)
      return
    }
    if (payload.content) {
      log.info(payload.content)
    }
    if (payload.embeds && payload.embeds.length > 0) {
      log.debug('Announcement embeds', { embeds: payload.embeds })
    }
  }
}
