import path from 'node:path'
import dotenv from 'dotenv'
import cron from 'node-cron'
import { z } from 'zod'

dotenv.config()

const DEFAULT_WATCH_URL = 'https://www.analogue.co/support/pocket'

const optionalString = z.preprocess((value) => {
  if (typeof value === 'string' && value.trim().length === 0) return undefined
  return value
}, z.string().optional())

const boolSchema = (defaultValue: boolean) => z.preprocess((value) => {
  if (typeof value === 'boolean') return value
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase()
    if (normalized === '') return undefined
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false
  }
  return value
}, z.boolean().default(defaultValue))

const integerSchema = (defaultValue: number, minValue: number) => z.preprocess((value) => {
  if (typeof value === 'string') {
    if (value.trim().length === 0) return undefined
    const parsed = Number(value)
    return Number.isFinite(parsed) ? parsed : value
  }
  return value
}, z.number().int().min(minValue).default(defaultValue))

const logLevelSchema = z.preprocess((value) => {
  if (typeof value === 'string') return value.toLowerCase()
  return value
}, z.enum(['debug', 'info', 'warn', 'error']).default('info'))

const cronSchema = (defaultValue: string) => z.string()
  .default(defaultValue)
  .refine(value => cron.validate(value), { message: 'Invalid cron expression' })

const envSchema = z.object({
  WATCH_URL: z.string().url().default(DEFAULT_WATCH_URL),
  CHECK_CRON: cronSchema('*/3 * * * *'),
  TZ: optionalString,
  ARTIFACT_EXTENSION: z.string().trim().min(1).default('.bin'),
  ARTIFACT_SCHEME: z.string().trim().min(1).default('http'),
  FETCH_TIMEOUT_MS: integerSchema(30_000, 1000),
  FETCH_FAILURE_ALERT_THRESHOLD: integerSchema(5, 1),
  USER_AGENT: z.string().default('artifact-watch/0.1'),
  DOWNLOAD_ENABLED: boolSchema(true),
  SNAPSHOT_ENABLED: boolSchema(true),
  STARTUP_ANNOUNCEMENT: boolSchema(true),
  DATA_PATH: z.string().default('.data'),
  DOWNLOAD_PATH: optionalString,
  LOG_LEVEL: logLevelSchema,
  LOG_SUMMARY_PATH: optionalString,
  LOG_DETAIL_PATH: optionalString,
  DISCORD_BOT_TOKEN: optionalString,
  DISCORD_APP_ID: optionalString,
  DISCORD_GUILD_ID: optionalString,
  DISCORD_CHANNEL_ID: optionalString,
  DISCORD_WEBHOOK_URL: optionalString,
})

export type AppConfig = z.infer<typeof envSchema> & {
  timezone: string
  downloadPath: string
  logSummaryPath: string
  logDetailPath: string
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env)
  const dataPath = parsed.DATA_PATH
  const downloadPath = parsed.DOWNLOAD_PATH
    ? parsed.DOWNLOAD_PATH
    : path.join(dataPath, 'download')
  const logsPath = path.join(dataPath, 'logs')
  const logSummaryPath = parsed.LOG_SUMMARY_PATH
    ? parsed.LOG_SUMMARY_PATH
    : path.join(logsPath, 'summary.log')
  const logDetailPath = parsed.LOG_DETAIL_PATH
    ? parsed.LOG_DETAIL_PATH
    : path.join(logsPath, 'detail.log')

  return {
    ...parsed,
    timezone: parsed.TZ ?? 'UTC',
    downloadPath,
    logSummaryPath,
    logDetailPath,
  }
}
