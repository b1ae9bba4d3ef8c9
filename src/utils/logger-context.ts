import { AsyncLocalStorage } from 'node:async_hooks'
import { logger as defaultLogger, type Logger } from './logger.js'

const loggerStorage = new AsyncLocalStorage<Logger>()

/**
 * Logger of the current context, or the default logger outside of `withLogger`
 */
export function getLogger(): Logger {
	return loggerStorage.getStore() ?? defaultLogger
}

/**
 * Run `fn` with `logger` as the context logger, including its async continuations
 */
export function withLogger<T>(logger: Logger, fn: () => T | Promise<T>): T | Promise<T> {
	return loggerStorage.run(logger, fn)
}
