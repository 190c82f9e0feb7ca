import { z } from 'zod'
import { isDurationString, parseDuration } from './duration.js'
import { ConfigurationError } from './errors.js'
import type { LogLevel } from './logger.js'
import { SOURCE_NAMES, type SourceName } from './source.js'

const durationSchema = z
	.union([
		z.number().nonnegative(),
		z.string().refine(isDurationString, { message: 'Expected a duration such as 500ms, 30s or 5m' }),
	])
	.transform(value => parseDuration(value))

const unboundedDurationSchema = z
	.union([z.literal('unbounded'), durationSchema])
	.transform(value => (value === 'unbounded' ? Infinity : value))

const idleTimeoutSchema = z
	.union([z.literal('never'), durationSchema])
	.transform(value => (value === 'never' ? undefined : value))

const countSchema = z.number().int().positive()

const sourceSchema = z.object({
	allowedLateness: unboundedDurationSchema.optional(),
	idleTimeout: idleTimeoutSchema.optional(),
})

const configSchema = z.object({
	sources: z
		.object({
			products: sourceSchema.optional(),
			users: sourceSchema.optional(),
			sales: sourceSchema.optional(),
			views: sourceSchema.optional(),
		})
		.strict()
		.optional(),
	joinLateness: durationSchema.optional(),
	matchWindow: unboundedDurationSchema.optional(),
	finalization: z.enum(['eager', 'deadline']).optional(),
	saleMatch: z.enum(['product', 'product-and-customer']).optional(),
	stallTimeout: durationSchema.optional(),
	maxPendingViews: countSchema.optional(),
	maxBufferedSales: countSchema.optional(),
	overflowPolicy: z.enum(['fail', 'force-finalize']).optional(),
	ingestQueueCapacity: countSchema.optional(),
	outputQueueCapacity: countSchema.optional(),
	checkpoint: z
		.object({
			interval: durationSchema.optional(),
			location: z.string().min(1).optional(),
			retain: countSchema.optional(),
			maxAttempts: countSchema.optional(),
		})
		.strict()
		.optional(),
	sink: z
		.object({
			index: z.string().min(1).optional(),
			batchSize: countSchema.optional(),
			batchInterval: durationSchema.optional(),
			maxRetryAttempts: countSchema.optional(),
			maxDeadLetters: z.number().int().nonnegative().optional(),
		})
		.strict()
		.optional(),
	shutdownGrace: durationSchema.optional(),
	logLevel: z.enum(['silent', 'error', 'warn', 'info', 'debug']).optional(),
})

/**
 * Pipeline options as written by a user. Durations are milliseconds or
 * strings such as `30s`.
 */
export type PipelineConfigInput = z.input<typeof configSchema>

export type FinalizationPolicy = 'eager' | 'deadline'
export type SaleMatchPolicy = 'product' | 'product-and-customer'
export type OverflowPolicy = 'fail' | 'force-finalize'

export interface SourceConfig {
	/** Infinity when unbounded */
	allowedLatenessMs: number
	/** undefined when the source never goes idle */
	idleTimeoutMs: number | undefined
}

/**
 * Fully resolved configuration; every duration in milliseconds.
 */
export interface PipelineConfig {
	sources: Record<SourceName, SourceConfig>
	joinLatenessMs: number
	/** Infinity when unbounded */
	matchWindowMs: number
	finalization: FinalizationPolicy
	saleMatch: SaleMatchPolicy
	stallTimeoutMs: number
	maxPendingViews: number
	maxBufferedSales: number
	overflowPolicy: OverflowPolicy
	ingestQueueCapacity: number
	outputQueueCapacity: number
	checkpoint: {
		intervalMs: number
		/** Directory of the file checkpoint store */
		location: string | undefined
		retain: number
		maxAttempts: number
	}
	sink: {
		index: string
		batchSize: number
		batchIntervalMs: number
		maxRetryAttempts: number
		maxDeadLetters: number
	}
	shutdownGraceMs: number
	logLevel: LogLevel
}

export const DEFAULT_MAX_PENDING_VIEWS = 100_000
export const DEFAULT_MAX_BUFFERED_SALES = 1_000_000

const SOURCE_DEFAULTS: Record<SourceName, SourceConfig> = {
	products: { allowedLatenessMs: Infinity, idleTimeoutMs: 5_000 },
	users: { allowedLatenessMs: Infinity, idleTimeoutMs: 5_000 },
	sales: { allowedLatenessMs: 30_000, idleTimeoutMs: undefined },
	views: { allowedLatenessMs: 30_000, idleTimeoutMs: undefined },
}

function formatIssues(error: z.ZodError): string[] {
	return error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
}

type ParsedOptions = z.output<typeof configSchema>

function parseOptions(input: unknown): ParsedOptions {
	const result = configSchema.safeParse(input)
	if (!result.success) {
		throw new ConfigurationError(formatIssues(result.error))
	}
	return result.data
}

function resolveOptions(options: ParsedOptions): PipelineConfig {
	const resolveSource = (name: SourceName): SourceConfig => {
		const configured = options.sources?.[name]
		const defaults = SOURCE_DEFAULTS[name]
		return {
			allowedLatenessMs: configured?.allowedLateness ?? defaults.allowedLatenessMs,
			// An explicit 'never' parses to undefined, which must not fall back to the default
			idleTimeoutMs: configured && 'idleTimeout' in configured ? configured.idleTimeout : defaults.idleTimeoutMs,
		}
	}
	const sources: Record<SourceName, SourceConfig> = {
		products: resolveSource('products'),
		users: resolveSource('users'),
		sales: resolveSource('sales'),
		views: resolveSource('views'),
	}

	const salesLateness = sources.sales.allowedLatenessMs
	const joinLatenessMs = options.joinLateness ?? (Number.isFinite(salesLateness) ? salesLateness : 30_000)

	return {
		sources,
		joinLatenessMs,
		matchWindowMs: options.matchWindow ?? Infinity,
		finalization: options.finalization ?? 'deadline',
		saleMatch: options.saleMatch ?? 'product',
		stallTimeoutMs: options.stallTimeout ?? 60_000,
		maxPendingViews: options.maxPendingViews ?? DEFAULT_MAX_PENDING_VIEWS,
		maxBufferedSales: options.maxBufferedSales ?? DEFAULT_MAX_BUFFERED_SALES,
		overflowPolicy: options.overflowPolicy ?? 'fail',
		ingestQueueCapacity: options.ingestQueueCapacity ?? 64,
		outputQueueCapacity: options.outputQueueCapacity ?? 10_000,
		checkpoint: {
			intervalMs: options.checkpoint?.interval ?? 30_000,
			location: options.checkpoint?.location,
			retain: options.checkpoint?.retain ?? 3,
			maxAttempts: options.checkpoint?.maxAttempts ?? 5,
		},
		sink: {
			index: options.sink?.index ?? 'enriched-views',
			batchSize: options.sink?.batchSize ?? 500,
			batchIntervalMs: options.sink?.batchInterval ?? 1_000,
			maxRetryAttempts: options.sink?.maxRetryAttempts ?? 5,
			maxDeadLetters: options.sink?.maxDeadLetters ?? 10_000,
		},
		shutdownGraceMs: options.shutdownGrace ?? 10_000,
		logLevel: options.logLevel ?? 'info',
	}
}

/**
 * Validate user options and fill in defaults.
 *
 * @throws ConfigurationError naming every invalid field
 */
export function resolvePipelineConfig(input: PipelineConfigInput = {}): PipelineConfig {
	return resolveOptions(parseOptions(input))
}

function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
	const value = env[`JOINSTREAM_${name}`]?.trim()
	return value === undefined || value === '' ? undefined : value
}

/**
 * For durations and counts a bare integer means milliseconds or a count.
 */
function envNumeric(env: NodeJS.ProcessEnv, name: string): string | number | undefined {
	const value = envValue(env, name)
	return value !== undefined && /^\d+$/.test(value) ? Number(value) : value
}

/**
 * Read pipeline options from `JOINSTREAM_*` environment variables, e.g.
 * `JOINSTREAM_ALLOWED_LATENESS_VIEWS=45s`, `JOINSTREAM_CHECKPOINT_INTERVAL=1m`,
 * `JOINSTREAM_SINK_BATCH_SIZE=1000`.
 *
 * @throws ConfigurationError naming every invalid variable's field
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
	const read = (name: string) => envValue(env, name)
	const readNumeric = (name: string) => envNumeric(env, name)

	const sources: Record<string, unknown> = {}
	for (const name of SOURCE_NAMES) {
		const suffix = name.toUpperCase()
		const allowedLateness = readNumeric(`ALLOWED_LATENESS_${suffix}`)
		const idleTimeout = readNumeric(`IDLE_TIMEOUT_${suffix}`)
		if (allowedLateness !== undefined || idleTimeout !== undefined) {
			sources[name] = {
				...(allowedLateness !== undefined && { allowedLateness }),
				...(idleTimeout !== undefined && { idleTimeout }),
			}
		}
	}

	const raw: Record<string, unknown> = {
		sources,
		joinLateness: readNumeric('JOIN_LATENESS'),
		matchWindow: readNumeric('MATCH_WINDOW'),
		finalization: read('FINALIZATION'),
		saleMatch: read('SALE_MATCH'),
		stallTimeout: readNumeric('STALL_TIMEOUT'),
		maxPendingViews: readNumeric('MAX_PENDING_VIEWS'),
		maxBufferedSales: readNumeric('MAX_BUFFERED_SALES'),
		overflowPolicy: read('OVERFLOW_POLICY'),
		ingestQueueCapacity: readNumeric('INGEST_QUEUE_CAPACITY'),
		outputQueueCapacity: readNumeric('OUTPUT_QUEUE_CAPACITY'),
		checkpoint: {
			interval: readNumeric('CHECKPOINT_INTERVAL'),
			location: read('CHECKPOINT_STORE_LOCATION'),
			retain: readNumeric('CHECKPOINT_RETAIN'),
		},
		sink: {
			index: read('SINK_INDEX'),
			batchSize: readNumeric('SINK_BATCH_SIZE'),
			batchInterval: readNumeric('SINK_BATCH_INTERVAL'),
			maxRetryAttempts: readNumeric('MAX_SINK_RETRY_ATTEMPTS'),
			maxDeadLetters: readNumeric('MAX_DEAD_LETTERS'),
		},
		shutdownGrace: readNumeric('SHUTDOWN_GRACE'),
		logLevel: read('LOG_LEVEL'),
	}

	return resolveOptions(parseOptions(raw))
}
