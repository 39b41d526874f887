import type { CheckCycleService } from '../core/cycle/service.js'
import type { SchedulerService } from '../core/scheduler/service.js'
import { buildCheckResultEmbed, buildStatusEmbed } from '../integrations/discord/format.js'
import type { DiscordMessagePayload } from '../integrations/discord/types.js'

export const STARTING_REPLY = 'Watcher is still starting. Please try again shortly.'
export const BUSY_REPLY = 'A check is already running; try again in a moment.'
export const STOPPED_REPLY = 'Watcher has stopped; no further checks will run.'

export interface CommandSources {
  getCycle: () => Pick<CheckCycleService, 'getStatus'> | null
  getScheduler: () => Pick<SchedulerService, 'tick' | 'isStopped'> | null
}

export interface CommandHandlers {
  getStatus: () => Promise<DiscordMessagePayload>
  runCheck: () => Promise<DiscordMessagePayload>
}

/** Replies for `/status` and `/check`; sources are read lazily since the bot starts before them. */
export function createCommandHandlers(sources: CommandSources): CommandHandlers {
  return {
    getStatus: async () => {
      const cycle = sources.getCycle()
      if (!cycle) return STARTING_REPLY
      return { embeds: [buildStatusEmbed(cycle.getStatus())] }
    },
    runCheck: async () => {
      const scheduler = sources.getScheduler()
      if (!scheduler) return STARTING_REPLY
      if (scheduler.isStopped()) return STOPPED_REPLY
      const outcome = await scheduler.tick('manual')
      if (outcome) return { embeds: [buildCheckResultEmbed(outcome)] }
      return scheduler.isStopped() ? STOPPED_REPLY : BUSY_REPLY
    },
  }
}
