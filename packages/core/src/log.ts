export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const satisfies readonly LogLevel[]

export interface Logger {
  debug(message: string, ...details: unknown[]): void
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
}

export type LogSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 }

/**
 * Console logger with a `[scope]` prefix. Lines below `level` are dropped.
 */
export function createLogger(scope: string, level: LogLevel = 'info', sink: LogSink = console): Logger {
  const prefix = `[${scope}]`
  const enabled = (at: Exclude<LogLevel, 'silent'>) => RANK[at] >= RANK[level]
  return {
    debug: (message, ...details) => {
      if (enabled('debug')) sink.debug(prefix, message, ...details)
    },
    info: (message, ...details) => {
      if (enabled('info')) sink.info(prefix, message, ...details)
    },
    warn: (message, ...details) => {
      if (enabled('warn')) sink.warn(prefix, message, ...details)
    },
    error: (message, ...details) => {
      if (enabled('error')) sink.error(prefix, message, ...details)
    },
  }
}

export const silentLogger: Logger = createLogger('silent', 'silent')
