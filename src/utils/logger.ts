/**
 * Logger utility for storyloom
 * Uses pino for structured JSON logging with pretty printing in development
 *
 * Components do not log through these loggers directly: they receive the
 * InvocationContext logger, a child bound to the invocation's correlation id.
 */

import pino from 'pino'
import { PINO_REDACT_PATHS } from '../cli/utils/masking.js'

export interface LoggerOptions {
  /** Overrides LOG_LEVEL (cli.log_level) */
  level?: string
}

/** LOG_LEVEL, else by NODE_ENV; plain CLI use only shows warnings */
export function defaultLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  if (env.LOG_LEVEL) return env.LOG_LEVEL
  if (env.NODE_ENV === 'production') return 'info'
  if (env.NODE_ENV === 'development') return 'debug'
  return 'warn'
}

function isPrettyMode(env: NodeJS.ProcessEnv = process.env): boolean {
  if (env.LOG_PRETTY !== undefined) return env.LOG_PRETTY === 'true'
  return env.NODE_ENV === 'development'
}

/** Options shared by every storyloom logger, whatever it writes to */
export function loggerOptions(name: string, level: string): pino.LoggerOptions {
  return {
    name,
    level,
    redact: PINO_REDACT_PATHS,
    formatters: {
      level(label) {
        return { level: label }
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { pid: process.pid },
  }
}

/** stderr; stdout is reserved for command output */
export function logDestination(): ReturnType<typeof pino.destination> {
  return pino.destination(2)
}

/**
 * Create a named logger
 * @param name - Module identifier, logged as `name`
 */
export function createLogger(name: string, options: LoggerOptions = {}): pino.Logger {
  const base = loggerOptions(name, options.level ?? defaultLogLevel())

  if (isPrettyMode()) {
    // pino-pretty is a devDependency
    return pino({
      ...base,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    })
  }

  return pino(base, logDestination())
}

/** Root application logger */
export const logger = createLogger('storyloom')

/** Create a child logger with additional context */
export function childLogger(parent: pino.Logger, bindings: Record<string, unknown>): pino.Logger {
  return parent.child(bindings)
}
