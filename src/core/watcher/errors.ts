export interface WatchErrorOptions {
  cause?: unknown
  fatal?: boolean
}

export class WatchError extends Error {
  readonly fatal: boolean

  constructor(message: string, options: WatchErrorOptions = {}) {
    super(message, { cause: options.cause })
    this.name = 'WatchError'
    this.fatal = options.fatal === true
  }
}

/** Fetch did not complete, or completed with a non-success status. */
export class TransportError extends WatchError {
  readonly statusCode?: number

  constructor(message: string, options: WatchErrorOptions & { statusCode?: number } = {}) {
    super(message, options)
    this.name = 'TransportError'
    this.statusCode = options.statusCode
  }
}

export class InvalidTargetError extends WatchError {
  readonly target: string

  constructor(target: string, cause?: unknown) {
    super(`Invalid watch target: ${target}`, { cause, fatal: true })
    this.name = 'InvalidTargetError'
    this.target = target
  }
}

export class ObserverError extends WatchError {
  readonly event: string
  readonly observerIndex: number

  constructor(event: string, observerIndex: number, cause: unknown) {
    super(`Observer ${observerIndex} for ${event} failed: ${asErrorMessage(cause)}`, { cause })
    this.name = 'ObserverError'
    this.event = event
    this.observerIndex = observerIndex
  }
}

export function asErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}

export function isFatalError(error: unknown): boolean {
  return error instanceof WatchError && error.fatal
}
