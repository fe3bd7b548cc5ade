/**
 * Logging
 *
 * One pino root logger per process; modules take a child carrying a
 * `module` binding so every line can be traced back to its component.
 * Level and format come from LOG_LEVEL and LOG_PRETTY, read at first use.
 */

import { pino, type Logger, type LoggerOptions } from 'pino'

export type { Logger } from 'pino'

function isTruthy(value: string | undefined): boolean {
  return value !== undefined && ['1', 'true', 'yes'].includes(value.trim().toLowerCase())
}

/**
 * Options shared by the root logger and the HTTP server's logger.
 */
export function loggerOptions(): LoggerOptions {
  // Tests stay quiet unless a level is asked for explicitly
  const level = process.env.LOG_LEVEL || (process.env.VITEST ? 'silent' : 'info')

  if (isTruthy(process.env.LOG_PRETTY)) {
    return {
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    }
  }

  return { level }
}

let root: Logger | null = null

function getRootLogger(): Logger {
  if (!root) {
    root = pino(loggerOptions())
  }
  return root
}

/**
 * Child logger for one component, e.g. `createLogger('scheduler')`.
 */
export function createLogger(module: string): Logger {
  return getRootLogger().child({ module })
}
