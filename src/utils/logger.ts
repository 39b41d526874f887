import fs from 'node:fs'
import path from 'node:path'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'
export type LogMeta = Record<string, unknown> | undefined

export interface Logger {
  debug(message: string, meta?: LogMeta): void
  info(message: string, meta?: LogMeta): void
  warn(message: string, meta?: LogMeta): void
  error(message: string, meta?: LogMeta): void
}

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

let currentLevel: LogLevel = 'info'
let summaryStream: fs.WriteStream | null = null
let detailStream: fs.WriteStream | null = null

export interface LoggerOptions {
  level: LogLevel
  summaryPath: string
  detailPath: string
}

export async function configureLogger(options: LoggerOptions): Promise<void> {
  currentLevel = options.level

  await fs.promises.mkdir(path.dirname(options.summaryPath), { recursive: true })
  await fs.promises.mkdir(path.dirname(options.detailPath), { recursive: true })

  await closeLogger()

  summaryStream = fs.createWriteStream(options.summaryPath, { flags: 'a' })
  detailStream = fs.createWriteStream(options.detailPath, { flags: 'a' })
}

function endStream(stream: fs.WriteStream): Promise<void> {
  return new Promise(resolve => stream.end(() => resolve()))
}

export async function closeLogger(): Promise<void> {
  const streams = [summaryStream, detailStream].filter((stream): stream is fs.WriteStream => stream !== null)
  summaryStream = null
  detailStream = null
  await Promise.all(streams.map(endStream))
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

function shouldLog(level: LogLevel): boolean {
  return levelOrder[level] >= levelOrder[currentLevel]
}

function timestamp(): string {
  return new Date().toISOString()
}

function serializeError(error: Error): Record<string, unknown> {
  const cause = error.cause
  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
    cause: cause instanceof Error ? serializeError(cause) : cause,
  }
}

function toSerializable(value: unknown): unknown {
  if (value instanceof Error) return serializeError(value)
  if (value instanceof Map) return Object.fromEntries(value.entries())
  if (value instanceof Set) return Array.from(value.values())
  if (value instanceof Uint8Array) return `<${value.byteLength} bytes>`
  if (typeof value === 'bigint') return value.toString()
  return value
}

function safeJson(value: unknown, pretty: boolean): string {
  const seen = new WeakSet<object>()
  const replacer = (_key: string, val: unknown) => {
    const next = toSerializable(val)
    if (typeof next === 'object' && next !== null) {
      if (seen.has(next)) return '[Circular]'
      seen.add(next)
    }
    return next
  }
  return JSON.stringify(value, replacer, pretty ? 2 : 0)
}

function formatMeta(meta: LogMeta, detail: boolean): string | null {
  if (!meta) return null
  const compact = safeJson(meta, false)
  if (!detail) return compact
  if (compact.length > 200 || compact.includes('\\n')) {
    return safeJson(meta, true)
  }
  return compact
}

function indentLines(value: string, prefix = '  '): string {
  return value
    .split('\n')
    .map(line => `${prefix}${line}`)
    .join('\n')
}

export function formatLine(level: LogLevel, message: string, meta: LogMeta, detail: boolean, at = timestamp()): string {
  const base = `[${at}] [${level}] ${message}`
  const metaText = formatMeta(meta, detail)
  if (!metaText) return base
  if (!metaText.includes('\n')) return `${base} | ${metaText}`
  return `${base}\n${indentLines(metaText)}`
}

function writeSummary(line: string, level: LogLevel): void {
  if (level === 'error') {
    console.error(line)
  }
  else if (level === 'warn') {
    console.warn(line)
  }
  else {
    console.log(line)
  }

  summaryStream?.write(`${line}\n`)
}

function writeDetail(line: string): void {
  detailStream?.write(`${line}\n`)
}

function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (!shouldLog(level)) return
  const at = timestamp()
  writeSummary(formatLine(level, message, meta, false, at), level)
  writeDetail(formatLine(level, message, meta, true, at))
}

export const logger: Logger = {
  debug: (message, meta) => log('debug', message, meta),
  info: (message, meta) => log('info', message, meta),
  warn: (message, meta) => log('warn', message, meta),
  error: (message, meta) => log('error', message, meta),
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`
  return {
    debug: (message, meta) => log('debug', `${prefix} ${message}`, meta),
    info: (message, meta) => log('info', `${prefix} ${message}`, meta),
    warn: (message, meta) => log('warn', `${prefix} ${message}`, meta),
    error: (message, meta) => log('error', `${prefix} ${message}`, meta),
  }
}
