import { EmbedBuilder } from 'discord.js'
import type { APIEmbed } from 'discord.js'
import type {
  AnnouncementBuilder,
  ArtifactChangedResult,
  CheckReason,
  CycleOutcome,
  FailureStreak,
  WatchStatus,
} from '../../core/cycle/types.js'
import type { ChangeResult } from '../../core/watcher/types.js'
import { toUnixSeconds } from '../../utils/time.js'

const COLOR_SUCCESS = 0x2f9e44
const COLOR_WARN = 0xf08c00
const COLOR_ERROR = 0xe03131
const COLOR_INFO = 0x4c6ef5
const WEBHOOK_USERNAME = 'Artifact Watch'
const FIELD_LIMIT = 1024

export function getWebhookIdentity(): { username: string } {
  return { username: WEBHOOK_USERNAME }
}

function asDiscordTime(value: Date | undefined): string {
  if (!value) return 'Never'
  const timestamp = toUnixSeconds(value)
  if (!Number.isFinite(timestamp) || timestamp <= 0) return 'Unknown'
  return `<t:${timestamp}:f>`
}

function truncate(value: string, limit = FIELD_LIMIT): string {
  if (value.length <= limit) return value
  return `${value.slice(0, limit - 3)}...`
}

function formatReason(reason: CheckReason): string {
  switch (reason) {
    case 'startup':
      return 'Startup check'
    case 'scheduled':
      return 'Scheduled check'
    case 'manual':
      return 'Manual check'
    default:
      return 'Check'
  }
}

export function describeResult(result: ChangeResult): string {
  switch (result.kind) {
    case 'fetchFailed':
      return `Fetch failed: ${result.error.message}`
    case 'noBaseline':
      return 'Baseline recorded'
    case 'unchanged':
      return 'No change'
    case 'pageChangedOnly':
      return 'Page changed, artifact unchanged'
    case 'artifactChanged':
      return 'New artifact'
  }
}

// Embed URLs must be absolute http(s); qualifying links only need the configured prefix.
function isEmbeddableUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value)
    return protocol === 'http:' || protocol === 'https:'
  }
  catch {
    return false
  }
}

export function buildArtifactEmbed(url: string, result: ArtifactChangedResult, timestamp = new Date()): APIEmbed {
  const embed = new EmbedBuilder()
    .setTitle('New artifact available')
    .setColor(COLOR_SUCCESS)
    .addFields(
      { name: 'Download', value: truncate(result.link), inline: false },
      { name: 'Previous', value: truncate(result.previousLink ?? 'None'), inline: false },
      { name: 'Page', value: truncate(url), inline: false },
    )
    .setFooter({ text: 'Artifact watch' })
    .setTimestamp(timestamp)
  if (isEmbeddableUrl(result.link)) {
    embed.setURL(result.link)
  }
  return embed.toJSON()
}

export function buildFetchFailingEmbed(streak: FailureStreak, timestamp = new Date()): APIEmbed {
  return new EmbedBuilder()
    .setTitle('Watched page unreachable')
    .setColor(COLOR_WARN)
    .addFields(
      { name: 'Page', value: truncate(streak.url), inline: false },
      { name: 'Failures', value: String(streak.consecutiveFailures), inline: true },
      { name: 'Failing Since', value: asDiscordTime(streak.since), inline: true },
      { name: 'Last Error', value: truncate(streak.reason || 'Unknown'), inline: false },
    )
    .setFooter({ text: 'Fetch failure alert' })
    .setTimestamp(timestamp)
    .toJSON()
}

export function buildRecoveredEmbed(streak: FailureStreak, timestamp = new Date()): APIEmbed {
  return new EmbedBuilder()
    .setTitle('Watched page reachable again')
    .setColor(COLOR_INFO)
    .addFields(
      { name: 'Page', value: truncate(streak.url), inline: false },
      { name: 'Failed Attempts', value: String(streak.consecutiveFailures), inline: true },
      { name: 'Failing Since', value: asDiscordTime(streak.since), inline: true },
    )
    .setFooter({ text: 'Fetch recovered' })
    .setTimestamp(timestamp)
    .toJSON()
}

export function buildErrorEmbed(url: string, error: Error, fatal: boolean, timestamp = new Date()): APIEmbed {
  return new EmbedBuilder()
    .setTitle(fatal ? 'Watcher stopped' : 'Unhandled error while checking')
    .setColor(COLOR_ERROR)
    .addFields(
      { name: 'Page', value: truncate(url), inline: false },
      { name: 'Error', value: truncate(`${error.name}: ${error.message}`), inline: false },
    )
    .setFooter({ text: fatal ? 'Fatal error' : 'Checks continue on schedule' })
    .setTimestamp(timestamp)
    .toJSON()
}

export function buildStartupEmbed(url: string, cronSchedule: string, timestamp = new Date()): APIEmbed {
  return new EmbedBuilder()
    .setTitle('Artifact watch online')
    .setDescription('Watching for new artifacts.')
    .setColor(COLOR_INFO)
    .addFields(
      { name: 'Page', value: truncate(url), inline: false },
      { name: 'Schedule', value: `\`${cronSchedule}\``, inline: true },
    )
    .setFooter({ text: 'Startup' })
    .setTimestamp(timestamp)
    .toJSON()
}

export function buildStatusEmbed(status: WatchStatus, timestamp = new Date()): APIEmbed {
  const { state } = status
  const lastResult = status.lastOutcome
    ? formatOutcome(status.lastOutcome)
    : 'No checks yet'

  return new EmbedBuilder()
    .setTitle('Artifact watch status')
    .setColor(status.consecutiveFailures > 0 ? COLOR_WARN : COLOR_INFO)
    .addFields(
      { name: 'Page', value: truncate(status.url), inline: false },
      { name: 'Current Artifact', value: truncate(state.lastArtifactLink ?? 'None'), inline: false },
      { name: 'Last Checked', value: asDiscordTime(state.lastCheckedAt), inline: true },
      { name: 'Fingerprint', value: state.lastFingerprint ? `\`${state.lastFingerprint.slice(0, 12)}\`` : 'None', inline: true },
      { name: 'Failures', value: String(status.consecutiveFailures), inline: true },
      { name: 'Last Result', value: truncate(lastResult), inline: false },
    )
    .setFooter({ text: 'Status' })
    .setTimestamp(timestamp)
    .toJSON()
}

function formatOutcome(outcome: CycleOutcome): string {
  if (outcome.status === 'failed') {
    return `${formatReason(outcome.reason)}: error - ${outcome.error.message}`
  }
  return `${formatReason(outcome.reason)}: ${describeResult(outcome.result)}`
}

export function buildCheckResultEmbed(outcome: CycleOutcome, timestamp = new Date()): APIEmbed {
  const failed = outcome.status === 'failed' || outcome.result.kind === 'fetchFailed'
  const embed = new EmbedBuilder()
    .setTitle('Check result')
    .setColor(failed ? COLOR_ERROR : COLOR_INFO)
    .setDescription(formatOutcome(outcome))
    .setFooter({ text: formatReason(outcome.reason) })
    .setTimestamp(timestamp)

  if (outcome.status === 'completed' && outcome.result.kind === 'artifactChanged') {
    embed.addFields({ name: 'Download', value: truncate(outcome.result.link), inline: false })
  }

  return embed.toJSON()
}

export const discordAnnouncements: AnnouncementBuilder = {
  artifactChanged: (url, result, timestamp) => ({
    content: `New artifact available: ${result.link}`,
    embeds: [buildArtifactEmbed(url, result, timestamp)],
  }),
  fetchFailing: (streak, timestamp) => ({ embeds: [buildFetchFailingEmbed(streak, timestamp)] }),
  recovered: (streak, timestamp) => ({ embeds: [buildRecoveredEmbed(streak, timestamp)] }),
  unexpectedError: (url, error, fatal, timestamp) => ({ embeds: [buildErrorEmbed(url, error, fatal, timestamp)] }),
}
