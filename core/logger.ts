/**
 * Shared logger
 *
 * Level comes from LOG_LEVEL (default `info`). Outside production the
 * console transport prints `level: message`; in production each entry is
 * one JSON line. All levels go to stderr so command output stays clean.
 *
 * @module core/logger
 */

import winston, { format } from 'winston'

const defaultLogLevel = process.env.LOG_LEVEL || 'info'

const ALL_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']

const logger = winston.createLogger({
  level: defaultLogLevel,
  format: format.json(),
  transports: [],
})

if (process.env.NODE_ENV !== 'production') {
  logger.add(
    new winston.transports.Console({
      stderrLevels: ALL_LEVELS,
      format: format.combine(
        format.colorize(),
        format.timestamp(),
        format.printf(({ level, message, ...meta }) => {
          const text = typeof message === 'object' ? JSON.stringify(message, null, 2) : String(message)
          const extra = Object.keys(meta).filter((k) => k !== 'timestamp')
          if (extra.length === 0) {
            return `${level}: ${text}`
          }
          const rest: Record<string, unknown> = {}
          for (const key of extra) {
            rest[key] = meta[key]
          }
          return `${level}: ${text} ${JSON.stringify(rest)}`
        })
      ),
    })
  )
} else {
  logger.add(new winston.transports.Console({ stderrLevels: ALL_LEVELS }))
}

export function setLogLevel(level: string): void {
  logger.level = level
}

/**
 * Silence every transport (tests, `--quiet`)
 */
export function silenceLogger(silent = true): void {
  logger.silent = silent
}

export type Logger = winston.Logger
export { logger }
