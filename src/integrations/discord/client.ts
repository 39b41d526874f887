import { Client, Events, GatewayIntentBits, MessageFlags } from 'discord.js'
import type { APIEmbed } from 'discord.js'
import { logger } from '../../utils/logger.js'
import type { DiscordMessagePayload, DiscordStartOptions } from './types.js'

function normalizePayload(payload: DiscordMessagePayload): { content?: string; embeds?: APIEmbed[] } {
  if (typeof payload === 'string') {
    return { content: payload }
  }
  return payload
}

export async function startDiscordBot(options: DiscordStartOptions): Promise<Client> {
  const client = new Client({ intents: [GatewayIntentBits.Guilds] })
  const handlers: Record<string, () => Promise<DiscordMessagePayload>> = {
    status: options.getStatus,
    check: options.runCheck,
  }

  client.once(Events.ClientReady, (ready) => {
    logger.info(`Discord bot ready as ${ready.user.tag}`)
  })

  client.on(Events.InteractionCreate, async (interaction) => {
    if (!interaction.isChatInputCommand()) return
    const handler = handlers[interaction.commandName]
    if (!handler) return

    try {
      await interaction.deferReply({ flags: MessageFlags.Ephemeral })
      const payload = normalizePayload(await handler())
      await interaction.editReply(payload)
    }
    catch (error) {
      logger.warn(`Discord ${interaction.commandName} command failed`, {
        error: error instanceof Error ? error.message : String(error),
      })
    }
  })

  logger.debug('Discord bot login request', { appId: options.appId, guildId: options.guildId })
  await client.login(options.token)
  logger.debug('Discord bot login completed')
  return client
}

export async function ensureTextChannel(client: Client, channelId: string): Promise<void> {
  const channel = await client.channels.fetch(channelId)
  if (!channel || !channel.isTextBased()) {
    throw new Error(`Discord channel ${channelId} not found or not text-based`)
  }
}

export async function sendDiscordMessage(client: Client, channelId: string, message: DiscordMessagePayload): Promise<void> {
  logger.debug('Discord channel send request', {
    channelId,
    messageType: typeof message === 'string' ? 'text' : 'payload',
  })
  if (!client.isReady()) {
    throw new Error('Discord client is not connected')
  }
  const channel = await client.channels.fetch(channelId)
  if (!channel || !channel.isSendable()) {
    throw new Error(`Discord channel ${channelId} is not sendable`)
  }
  await channel.send(normalizePayload(message))
  logger.debug('Discord channel send completed', { channelId })
}
