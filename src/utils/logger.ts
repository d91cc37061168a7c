import chalk from 'chalk'

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel
  quiet: boolean
  /** Log lines go here so stdout stays free for installer output */
  stream: { write(chunk: string): unknown }
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
}

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red
}

let config: LoggerConfig = {
  level: 'info',
  quiet: false,
  stream: process.stderr
}

/**
 * Configure the logger
 */
export function configureLogger(options: Partial<LoggerConfig>): void {
  config = { ...config, ...options }
}

/**
 * Check if a log level should be displayed
 */
function shouldLog(level: LogLevel): boolean {
  if (config.quiet && level !== 'error') {
    return false
  }
  return LOG_LEVELS[level] >= LOG_LEVELS[config.level]
}

/**
 * Format a log message with timestamp
 */
function formatMessage(level: LogLevel, message: string): string {
  const timestamp = new Date().toISOString()
  return `[${timestamp}] [${level.toUpperCase()}] ${message}`
}

function write(level: LogLevel, message: string): void {
  if (shouldLog(level)) {
    config.stream.write(`${LEVEL_COLORS[level](formatMessage(level, message))}\n`)
  }
}

export function debug(message: string): void {
  write('debug', message)
}

export function info(message: string): void {
  write('info', message)
}

export function warn(message: string): void {
  write('warn', message)
}

export function error(message: string): void {
  write('error', message)
}

/**
 * Logger interface for named loggers
 */
export interface Logger {
  debug: (message: string) => void
  info: (message: string) => void
  warn: (message: string) => void
  error: (message: string) => void
}

/**
 * Create a named logger instance
 */
export function createLogger(name: string): Logger {
  const prefix = (msg: string) => `[${name}] ${msg}`

  return {
    debug: message => debug(prefix(message)),
    info: message => info(prefix(message)),
    warn: message => warn(prefix(message)),
    error: message => error(prefix(message))
  }
}
