import type { Client } from 'discord.js'
import type { Notifier, NotificationPayload } from '../../core/notifications/types.js'
import type { DiscordMessagePayload } from './types.js'
import { sendDiscordMessage } from './client.js'

type DiscordMessageBody = Exclude<DiscordMessagePayload, string>

export function toDiscordPayload(payload: NotificationPayload): DiscordMessagePayload {
  if (typeof payload === 'string') return payload
  return {
    content: payload.content,
    embeds: payload.embeds as DiscordMessageBody['embeds'],
  }
}

/** Posts announcements into one channel through a logged-in bot client. */
export class DiscordChannelNotifier implements Notifier {
  readonly name = 'discord-channel'
  private readonly client: Client
  private readonly channelId: string

  constructor(client: Client, channelId: string) {
    this.client = client
    this.channelId = channelId
  }

  async send(payload: NotificationPayload): Promise<void> {
    await sendDiscordMessage(this.client, this.channelId, toDiscordPayload(payload))
  }
}
