/**
 * Structured JSON logging for the pipeline.
 *
 * Every component takes a `Logger` and derives a child carrying its own
 * context (`component`, `source`, ...), so a single log line can be traced
 * back to the worker that wrote it.
 */

/**
 * Log levels supported by the logger
 * 'silent' disables all logging
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug'

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
	silent: -1,
	error: 0,
	warn: 1,
	info: 2,
	debug: 3,
}

/**
 * Logger interface for structured logging
 */
export interface Logger {
	error(message: string, context?: Record<string, unknown>): void
	warn(message: string, context?: Record<string, unknown>): void
	info(message: string, context?: Record<string, unknown>): void
	debug(message: string, context?: Record<string, unknown>): void

	/**
	 * Create a child logger with additional default context
	 */
	child(defaultContext: Record<string, unknown>): Logger
}

/**
 * Errors do not survive JSON.stringify, so they are flattened first.
 */
function serializeValue(value: unknown): unknown {
	if (value instanceof Error) {
		const serialized: Record<string, unknown> = { name: value.name, message: value.message }
		if (value.cause !== undefined) {
			serialized.cause = serializeValue(value.cause)
		}
		return serialized
	}
	return value
}

function serializeContext(context: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = {}
	for (const [key, value] of Object.entries(context)) {
		result[key] = serializeValue(value)
	}
	return result
}

class JsonLogger implements Logger {
	private readonly level: LogLevel
	private readonly defaultContext: Record<string, unknown>

	constructor(level: LogLevel = 'info', defaultContext: Record<string, unknown> = {}) {
		this.level = level
		this.defaultContext = defaultContext
	}

	private shouldLog(level: LogLevel): boolean {
		return LOG_LEVEL_VALUES[level] <= LOG_LEVEL_VALUES[this.level]
	}

	private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
		if (!this.shouldLog(level)) {
			return
		}

		const entry = {
			level,
			message,
			timestamp: new Date().toISOString(),
			...this.defaultContext,
			...(context ? serializeContext(context) : {}),
		}

		const output = JSON.stringify(entry)

		if (level === 'error' || level === 'warn') {
			console.error(output)
		} else {
			console.log(output)
		}
	}

	error(message: string, context?: Record<string, unknown>): void {
		this.log('error', message, context)
	}

	warn(message: string, context?: Record<string, unknown>): void {
		this.log('warn', message, context)
	}

	info(message: string, context?: Record<string, unknown>): void {
		this.log('info', message, context)
	}

	debug(message: string, context?: Record<string, unknown>): void {
		this.log('debug', message, context)
	}

	child(defaultContext: Record<string, unknown>): Logger {
		return new JsonLogger(this.level, { ...this.defaultContext, ...defaultContext })
	}
}

class NoopLogger implements Logger {
	error(): void {
		// no-op
	}

	warn(): void {
		// no-op
	}

	info(): void {
		// no-op
	}

	debug(): void {
		// no-op
	}

	child(): Logger {
		return this
	}
}

/**
 * Create a JSON console logger. Warnings and errors go to stderr.
 *
 * @example
 * ```typescript
 * const logger = createLogger('debug', { service: 'storefront-enrichment' })
 * logger.child({ component: 'join-engine' }).info('view finalized', { viewId })
 * ```
 */
export function createLogger(level: LogLevel = 'info', defaultContext: Record<string, unknown> = {}): Logger {
	return new JsonLogger(level, defaultContext)
}

export const noopLogger: Logger = new NoopLogger()
