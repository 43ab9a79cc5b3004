import { AsyncLocalStorage } from 'node:async_hooks'
import { logger as defaultLogger, type Logger } from './logger.js'

const loggerStorage = new AsyncLocalStorage<Logger>()

/**
 * Logger for the current async context, or the default console logger
 */
export function getLogger(): Logger {
  return loggerStorage.getStore() ?? defaultLogger
}

/**
 * Run fn with the given logger as the context logger, including its async continuations
 */
export function withLogger<T>(logger: Logger, fn: () => T): T {
  return loggerStorage.run(logger, fn)
}
