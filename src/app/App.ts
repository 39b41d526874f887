import type { Client } from 'discord.js'
import { loadConfig, type AppConfig } from '../config/index.js'
import { ArtifactDownloader, PageSnapshotArchiver } from '../core/archive/service.js'
import { CheckCycleService } from '../core/cycle/service.js'
import { combineNotifiers } from '../core/notifications/composite.js'
import { LogNotifier } from '../core/notifications/log.js'
import type { Notifier } from '../core/notifications/types.js'
import { SchedulerService } from '../core/scheduler/service.js'
import { WatcherService } from '../core/watcher/service.js'
import { registerCommands } from '../integrations/discord/commands.js'
import { ensureTextChannel, startDiscordBot } from '../integrations/discord/client.js'
import { buildStartupEmbed, discordAnnouncements } from '../integrations/discord/format.js'
import { DiscordChannelNotifier } from '../integrations/discord/notifier.js'
import { DiscordWebhookNotifier } from '../integrations/discord/webhook.js'
import { HttpFetcher } from '../integrations/http/client.js'
import { closeLogger, configureLogger, logger } from '../utils/logger.js'
import { createCommandHandlers } from './commands.js'

export class App {
  private scheduler: SchedulerService | null = null
  private discordClient: Client | null = null
  private shuttingDown = false

  async start(): Promise<void> {
    const config = loadConfig()
    await configureLogger({
      level: config.LOG_LEVEL,
      summaryPath: config.logSummaryPath,
      detailPath: config.logDetailPath,
    })
    logger.info('App starting')
    logger.debug('App config', {
      watchUrl: config.WATCH_URL,
      cronSchedule: config.CHECK_CRON,
      timezone: config.timezone,
      artifactExtension: config.ARTIFACT_EXTENSION,
      artifactScheme: config.ARTIFACT_SCHEME,
      fetchTimeoutMs: config.FETCH_TIMEOUT_MS,
      failureAlertThreshold: config.FETCH_FAILURE_ALERT_THRESHOLD,
      downloadEnabled: config.DOWNLOAD_ENABLED,
      snapshotEnabled: config.SNAPSHOT_ENABLED,
      downloadPath: config.downloadPath,
      logLevel: config.LOG_LEVEL,
    })

    const fetcher = new HttpFetcher({ userAgent: config.USER_AGENT })
    const watcher = new WatcherService({
      url: config.WATCH_URL,
      fetcher,
      timeoutMs: config.FETCH_TIMEOUT_MS,
      extract: {
        extension: config.ARTIFACT_EXTENSION,
        schemePrefix: config.ARTIFACT_SCHEME,
      },
    })
    this.registerObservers(watcher, fetcher, config)

    let cycle: CheckCycleService | null = null
    if (config.DISCORD_BOT_TOKEN && config.DISCORD_CHANNEL_ID) {
      if (config.DISCORD_APP_ID && config.DISCORD_GUILD_ID) {
        await registerCommands(config.DISCORD_BOT_TOKEN, config.DISCORD_APP_ID, config.DISCORD_GUILD_ID)
      }
      this.discordClient = await startDiscordBot({
        token: config.DISCORD_BOT_TOKEN,
        appId: config.DISCORD_APP_ID,
        guildId: config.DISCORD_GUILD_ID,
        ...createCommandHandlers({
          getCycle: () => cycle,
          getScheduler: () => this.scheduler,
        }),
      })
      await ensureTextChannel(this.discordClient, config.DISCORD_CHANNEL_ID)
    }
    else if (config.DISCORD_BOT_TOKEN) {
      logger.warn('Discord bot token provided without channel ID; bot not started')
    }

    const notifier = this.createNotifier(config)
    cycle = new CheckCycleService({
      watcher,
      notifier,
      announcements: discordAnnouncements,
      failureAlertThreshold: config.FETCH_FAILURE_ALERT_THRESHOLD,
    })
    const activeCycle = cycle

    if (config.STARTUP_ANNOUNCEMENT) {
      try {
        await notifier.send({ embeds: [buildStartupEmbed(config.WATCH_URL, config.CHECK_CRON)] })
      }
      catch (error) {
        logger.warn('Startup announcement failed', { error })
      }
    }

    this.scheduler = new SchedulerService({
      cronSchedule: config.CHECK_CRON,
      timezone: config.timezone,
      runCheck: reason => activeCycle.run(reason),
      onFatal: () => {
        process.exitCode = 1
        this.shutdown('fatal check failure').catch((error) => {
          logger.error('Shutdown failed', { error })
        })
      },
    })
    this.installSignalHandlers()

    await this.scheduler.start()
    logger.info('App started')
  }

  async shutdown(reason: string): Promise<void> {
    if (this.shuttingDown) return
    this.shuttingDown = true
    logger.info('App shutting down', { reason })
    await this.scheduler?.stop()
    if (this.discordClient) {
      await this.discordClient.destroy()
      this.discordClient = null
    }
    logger.info('App stopped')
    await closeLogger()
  }

  private registerObservers(watcher: WatcherService, fetcher: HttpFetcher, config: AppConfig): void {
    if (config.SNAPSHOT_ENABLED) {
      const archiver = new PageSnapshotArchiver({ directory: config.downloadPath })
      watcher.on('pageChanged', async (event) => {
        await archiver.archive(event)
      })
    }
    if (config.DOWNLOAD_ENABLED) {
      const downloader = new ArtifactDownloader({
        directory: config.downloadPath,
        fetcher,
        timeoutMs: config.FETCH_TIMEOUT_MS,
        extension: config.ARTIFACT_EXTENSION,
      })
      watcher.on('artifactChanged', async (event) => {
        await downloader.download(event)
      })
    }
  }

  private createNotifier(config: AppConfig): Notifier {
    const notifiers: Notifier[] = []
    if (config.DISCORD_WEBHOOK_URL) {
      notifiers.push(new DiscordWebhookNotifier(config.DISCORD_WEBHOOK_URL))
      logger.info('Discord notifier configured', { mode: 'webhook' })
    }
    if (this.discordClient && config.DISCORD_CHANNEL_ID) {
      notifiers.push(new DiscordChannelNotifier(this.discordClient, config.DISCORD_CHANNEL_ID))
      logger.info('Discord notifier configured', { mode: 'bot' })
    }
    const combined = combineNotifiers(notifiers)
    if (combined) return combined
    logger.info('Discord notifier not configured; announcements go to the log')
    return new LogNotifier()
  }

  private installSignalHandlers(): void {
    const handle = (signal: NodeJS.Signals) => {
      this.shutdown(signal).catch((error) => {
        logger.error('Shutdown failed', { error })
        process.exitCode = 1
      })
    }
    process.once('SIGINT', handle)
    process.once('SIGTERM', handle)
  }
}
