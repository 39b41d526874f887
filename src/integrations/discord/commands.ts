import { REST, Routes } from 'discord.js'
import { logger } from '../../utils/logger.js'

export const WATCH_COMMANDS = [
  {
    name: 'status',
    description: 'Show what the watcher last saw',
  },
  {
    name: 'check',
    description: 'Check the watched page now',
  },
]

export async function registerCommands(token: string, appId: string, guildId: string): Promise<void> {
  const rest = new REST({ version: '10' }).setToken(token)
  logger.debug('Discord command registration request', {
    appId,
    guildId,
    count: WATCH_COMMANDS.length,
  })
  try {
    await rest.put(Routes.applicationGuildCommands(appId, guildId), { body: WATCH_COMMANDS })
  }
  catch (error) {
    logger.error('Discord command registration failed', { appId, guildId, error })
    throw error
  }
  logger.debug('Discord command registration completed', { appId, guildId })
}
