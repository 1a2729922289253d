/**
 * Logging
 *
 * Root pino logger plus per-module children. Log lines emitted inside
 * withSessionLogging() carry the chat id automatically.
 */

import { AsyncLocalStorage } from 'async_hooks'
import pino, { type Logger, type LoggerOptions } from 'pino'

interface SessionLogContext {
  chatId: string
  requestId?: string
}

const sessionContext = new AsyncLocalStorage<SessionLogContext>()

function buildOptions(): LoggerOptions {
  const options: LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    base: { pid: process.pid },
    mixin() {
      const ctx = sessionContext.getStore()
      return ctx ? { ...ctx } : {}
    },
  }

  if (process.env.LOG_PRETTY === '1') {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:HH:MM:ss.l', ignore: 'pid,hostname' },
    }
  }

  return options
}

export const logger: Logger = pino(buildOptions())

export function createLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings)
}

/**
 * Run fn with chatId (and optionally requestId) bound to every log line
 */
export function withSessionLogging<T>(ctx: SessionLogContext, fn: () => T): T {
  return sessionContext.run(ctx, fn)
}
