// src/shared/logger.ts — Console logger with component prefixes and level filtering.
// Components take a Logger by injection; the default writes "[wfm:<component>] message {data}".

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void
  info(message: string, data?: Record<string, unknown>): void
  warn(message: string, data?: Record<string, unknown>): void
  error(message: string, data?: Record<string, unknown>): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const v = (value ?? "info").trim().toLowerCase()
  const match = LOG_LEVELS.find((level) => level === v)
  if (!match) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")} (got "${value}")`)
  }
  return match
}

export interface ConsoleLoggerOptions {
  level?: LogLevel
  /** Defaults to "wfm". */
  prefix?: string
}

export class ConsoleLogger implements Logger {
  private readonly level: LogLevel
  private readonly tag: string

  constructor(component: string, options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? "info"
    this.tag = `[${options.prefix ?? "wfm"}:${component}]`
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.enabled("debug")) console.debug(this.format(message, data))
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.enabled("info")) console.log(this.format(message, data))
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.enabled("warn")) console.warn(this.format(message, data))
  }

  error(message: string, data?: Record<string, unknown>): void {
    if (this.enabled("error")) console.error(this.format(message, data))
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level]
  }

  private format(message: string, data?: Record<string, unknown>): string {
    if (!data || Object.keys(data).length === 0) return `${this.tag} ${message}`
    return `${this.tag} ${message} ${JSON.stringify(data)}`
  }
}

/** Factory handing each component its own prefixed logger. */
export type LoggerFactory = (component: string) => Logger

export function consoleLoggerFactory(level: LogLevel = "info"): LoggerFactory {
  return (component) => new ConsoleLogger(component, { level })
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
}
