import pino from 'pino'

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

export type Logger = pino.Logger

/**
 * Root logger. stdout carries protocol lines only, so logs always go to fd 2.
 * The destination is synchronous so nothing is lost when the process exits on EOF.
 */
export function createRootLogger(level: LogLevel, destination: pino.DestinationStream = pino.destination({ dest: 2, sync: true })): Logger {
  return pino(
    {
      name: 'stdio-acp-agent',
      level,
      base: { pid: process.pid }
    },
    destination
  )
}

export function createChildLogger(parent: Logger, name: string): Logger {
  return parent.child({ name })
}

/** Logger for tests and embedders that want no output. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' })
}
