import type { Codec } from './codec.js'
import { RecordDecodeError, SourceUnavailableError } from './errors.js'
import type { Logger } from './logger.js'
import { noopLogger } from './logger.js'
import type { PartitionedSource, PartitionOffsets, SourceMessage, SourceName } from './source.js'
import { BackoffStrategy } from './utils/backoff.js'
import type { BoundedQueue } from './utils/bounded-queue.js'
import { sleep } from './utils/sleep.js'

/**
 * A decoded record waiting to be applied to join state.
 */
export interface IngestRecord {
	eventTime: number
	partition: number
	offset: number
	apply(): Promise<void>
}

export interface IngestBatch {
	kind: 'batch'
	source: SourceName
	/** In per-partition order; empty when only the idle flag changed */
	records: IngestRecord[]
	/** Next offset per partition once this batch is applied, rejected records included */
	positions: PartitionOffsets
	rejected: number
	idle: boolean
}

export interface IngestStatus {
	kind: 'status'
	source: SourceName
	available: boolean
	error?: SourceUnavailableError
}

export type IngestMessage = IngestBatch | IngestStatus

export interface SourceAdapterOptions<T> {
	name: SourceName
	source: PartitionedSource
	codec: Codec<T>
	/** Event time of a decoded record, in epoch milliseconds */
	eventTime: (record: T, message: SourceMessage) => number
	/** Applies a record to join state; called by the join loop, never by the adapter */
	handle: (record: T) => Promise<void>
	/** Empty polls for this long report the source idle; undefined never does */
	idleTimeoutMs?: number
	/** Longest a single poll waits (default: 500ms) */
	pollWaitMs?: number
	/** First delay after a failed poll (default: 100ms) */
	initialRetryDelayMs?: number
	/** Default: 30s */
	maxRetryDelayMs?: number
	logger?: Logger
	now?: () => number
}

/**
 * Polls one source and turns raw records into ingest batches.
 *
 * Failed polls are retried with backoff forever; the first failure and the
 * recovery are reported to the join loop as status messages. Records that
 * fail to decode are logged, counted and skipped, and their offsets still
 * advance.
 */
export class SourceAdapter<T> {
	readonly name: SourceName
	private readonly source: PartitionedSource
	private readonly codec: Codec<T>
	private readonly eventTime: (record: T, message: SourceMessage) => number
	private readonly handle: (record: T) => Promise<void>
	private readonly idleTimeoutMs: number | undefined
	private readonly pollWaitMs: number
	private readonly initialRetryDelayMs: number
	private readonly maxRetryDelayMs: number
	private readonly logger: Logger
	private readonly now: () => number

	private rejectedTotal = 0
	private available = true

	constructor(options: SourceAdapterOptions<T>) {
		this.name = options.name
		this.source = options.source
		this.codec = options.codec
		this.eventTime = options.eventTime
		this.handle = options.handle
		this.idleTimeoutMs = options.idleTimeoutMs
		this.pollWaitMs = options.pollWaitMs ?? 500
		this.initialRetryDelayMs = options.initialRetryDelayMs ?? 100
		this.maxRetryDelayMs = options.maxRetryDelayMs ?? 30_000
		this.logger = (options.logger ?? noopLogger).child({ component: 'source', source: options.name })
		this.now = options.now ?? Date.now
	}

	get rejected(): number {
		return this.rejectedTotal
	}

	get isAvailable(): boolean {
		return this.available
	}

	async start(positions: PartitionOffsets): Promise<void> {
		await this.source.start(positions)
	}

	/**
	 * Poll until `signal` aborts, pushing batches into `queue`. A full queue
	 * pauses polling.
	 */
	async run(queue: BoundedQueue<IngestMessage>, signal: AbortSignal): Promise<void> {
		const backoff = new BackoffStrategy({
			initialDelayMs: this.initialRetryDelayMs,
			maxDelayMs: this.maxRetryDelayMs,
		})
		let idle = false
		let lastDataAt = this.now()

		while (!signal.aborted) {
			let messages: SourceMessage[]
			try {
				messages = await this.source.poll({ maxWaitMs: this.pollWaitMs, signal })
			} catch (cause) {
				if (signal.aborted) {
					return
				}
				const error = new SourceUnavailableError(this.name, cause)
				const delayMs = backoff.nextDelay()
				backoff.recordFailure()
				if (this.available) {
					this.available = false
					this.logger.warn('source unavailable, retrying', { error, delayMs })
					await queue.push({ kind: 'status', source: this.name, available: false, error }, signal)
				} else {
					this.logger.debug('source still unavailable', { attempt: backoff.failureCount, delayMs })
				}
				await sleep(delayMs, { signal, resolveOnAbort: true })
				continue
			}

			backoff.recordSuccess()
			if (!this.available) {
				this.available = true
				lastDataAt = this.now()
				this.logger.info('source recovered')
				await queue.push({ kind: 'status', source: this.name, available: true }, signal)
			}

			if (messages.length === 0) {
				if (!idle && this.idleTimeoutMs !== undefined && this.now() - lastDataAt >= this.idleTimeoutMs) {
					idle = true
					await queue.push(
						{ kind: 'batch', source: this.name, records: [], positions: {}, rejected: 0, idle },
						signal
					)
				}
				continue
			}

			idle = false
			lastDataAt = this.now()
			await queue.push(this.toBatch(messages), signal)
		}
	}

	async close(): Promise<void> {
		await this.source.close()
	}

	private toBatch(messages: SourceMessage[]): IngestBatch {
		const records: IngestRecord[] = []
		const positions: PartitionOffsets = {}
		let rejected = 0

		for (const message of messages) {
			positions[message.partition] = Math.max(positions[message.partition] ?? 0, message.offset + 1)
			const record = this.decode(message)
			if (record === undefined) {
				rejected++
				continue
			}
			records.push({
				eventTime: this.eventTime(record, message),
				partition: message.partition,
				offset: message.offset,
				apply: () => this.handle(record),
			})
		}

		this.rejectedTotal += rejected
		return { kind: 'batch', source: this.name, records, positions, rejected, idle: false }
	}

	private decode(message: SourceMessage): T | undefined {
		const location = { partition: message.partition, offset: message.offset }
		if (message.value === null) {
			this.logger.warn('rejected record without a value', location)
			return undefined
		}
		try {
			return this.codec.decode(message.value)
		} catch (cause) {
			const error = cause instanceof RecordDecodeError ? cause : new RecordDecodeError('Record could not be decoded', cause)
			this.logger.warn('rejected record', { ...location, error })
			return undefined
		}
	}
}
