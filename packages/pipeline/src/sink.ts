import { PipelineClosedError, SinkUnreachableError, SinkWriteFailedError } from './errors.js'
import type { Logger } from './logger.js'
import { noopLogger } from './logger.js'
import { enrichedRecordId, type EnrichedRecord } from './records.js'
import { BackoffStrategy } from './utils/backoff.js'
import { BoundedQueue } from './utils/bounded-queue.js'
import { sleep } from './utils/sleep.js'

export interface UpsertDocument {
	id: string
	document: EnrichedRecord
}

export type UpsertResult = { ok: true } | { ok: false; retriable: boolean; reason: string }

/**
 * A keyed document store written by idempotent upserts.
 */
export interface UpsertSink {
	readonly name: string

	/**
	 * Upsert documents by id.
	 *
	 * @returns one result per document, in the same order
	 * @throws if the whole request failed; every document is then retried
	 */
	upsert(documents: UpsertDocument[]): Promise<UpsertResult[]>

	close(): Promise<void>
}

export interface DeadLetterEntry {
	id: string
	document: EnrichedRecord
	reason: string
	attempts: number
	/** ISO-8601 */
	failedAt: string
}

/**
 * Where rows go when the sink will not take them.
 */
export interface DeadLetterQueue {
	readonly name: string
	write(entries: DeadLetterEntry[]): Promise<void>
	close(): Promise<void>
}

export interface SinkWriterOptions {
	sink: UpsertSink
	deadLetter: DeadLetterQueue
	/** Default: 500 */
	batchSize?: number
	/** Longest a row waits for its batch to fill (default: 1s) */
	batchIntervalMs?: number
	/** Attempts per document before it is dead-lettered (default: 5) */
	maxRetryAttempts?: number
	/** Default: 100ms */
	initialRetryDelayMs?: number
	/** Default: 5s */
	maxRetryDelayMs?: number
	/** More dead letters than this is fatal (default: Infinity) */
	maxDeadLetters?: number
	/** Rows buffered before `enqueue` waits (default: 10000) */
	queueCapacity?: number
	/** Called once when the writer fails for good */
	onFatal?: (error: Error) => void
	logger?: Logger
}

export interface SinkWriterStats {
	enqueued: number
	/** Highest mark settled by upsert or dead letter */
	delivered: number
	upserted: number
	retried: number
	deadLettered: number
	queued: number
}

interface QueuedRow {
	mark: number
	record: EnrichedRecord
}

interface DeliveryWaiter {
	mark: number
	resolve: () => void
	reject: (error: Error) => void
}

/**
 * Batches finalized rows into upserts.
 *
 * Every enqueued row receives a sequence mark. A row is settled once the sink
 * accepted it or it was dead-lettered; marks settle in order, so
 * `deliveredThrough(mark)` tells a checkpoint when all rows it covers are
 * out. A row is never dropped: if neither the sink nor the dead-letter queue
 * takes it, the writer fails with SinkUnreachableError.
 */
export class SinkWriter {
	private readonly sink: UpsertSink
	private readonly deadLetter: DeadLetterQueue
	private readonly batchSize: number
	private readonly batchIntervalMs: number
	private readonly maxRetryAttempts: number
	private readonly initialRetryDelayMs: number
	private readonly maxRetryDelayMs: number
	private readonly maxDeadLetters: number
	private readonly onFatal: ((error: Error) => void) | undefined
	private readonly logger: Logger

	private readonly queue: BoundedQueue<QueuedRow>
	private readonly stop = new AbortController()
	private readonly waiters: DeliveryWaiter[] = []
	private wake: AbortController | undefined
	private loop: Promise<void> | undefined

	private enqueued = 0
	private delivered = 0
	private flushUpTo = 0
	private upserted = 0
	private retried = 0
	private deadLettered = 0
	private fatalError: Error | undefined
	private closed = false

	constructor(options: SinkWriterOptions) {
		this.sink = options.sink
		this.deadLetter = options.deadLetter
		this.batchSize = options.batchSize ?? 500
		this.batchIntervalMs = options.batchIntervalMs ?? 1_000
		this.maxRetryAttempts = Math.max(1, options.maxRetryAttempts ?? 5)
		this.initialRetryDelayMs = options.initialRetryDelayMs ?? 100
		this.maxRetryDelayMs = options.maxRetryDelayMs ?? 5_000
		this.maxDeadLetters = options.maxDeadLetters ?? Infinity
		this.queue = new BoundedQueue(options.queueCapacity ?? 10_000)
		this.onFatal = options.onFatal
		this.logger = (options.logger ?? noopLogger).child({ component: 'sink-writer', sink: options.sink.name })
	}

	start(): void {
		if (this.loop) {
			return
		}
		this.loop = this.run().catch((error: unknown) => {
			this.fail(error instanceof Error ? error : new Error(String(error)))
		})
	}

	/**
	 * Queue a row, waiting while the queue is full.
	 *
	 * @returns the row's sequence mark
	 */
	async enqueue(record: EnrichedRecord, signal?: AbortSignal): Promise<number> {
		this.throwIfUnusable()
		const mark = ++this.enqueued
		const pushed = await this.queue.push({ mark, record }, signal)
		if (!pushed) {
			this.throwIfUnusable()
			throw new PipelineClosedError('Sink writer stopped before the row was queued')
		}
		return mark
	}

	/** Mark of the most recently enqueued row */
	get lastMark(): number {
		return this.enqueued
	}

	/**
	 * Resolves once every row up to and including `mark` is settled.
	 */
	deliveredThrough(mark: number): Promise<void> {
		if (this.fatalError) {
			return Promise.reject(this.fatalError)
		}
		if (this.delivered >= mark) {
			return Promise.resolve()
		}
		if (this.stop.signal.aborted) {
			return Promise.reject(new PipelineClosedError('Sink writer was abandoned'))
		}
		return new Promise<void>((resolve, reject) => {
			this.waiters.push({ mark, resolve, reject })
			this.requestFlush(mark)
		})
	}

	/**
	 * Write the current batch now and wait for every row enqueued so far.
	 */
	flush(): Promise<void> {
		return this.deliveredThrough(this.enqueued)
	}

	/**
	 * Deliver everything queued, then stop.
	 */
	async close(): Promise<void> {
		if (this.closed) {
			return
		}
		this.closed = true
		this.queue.close()
		this.requestFlush(this.enqueued)
		await this.loop
		if (this.fatalError) {
			throw this.fatalError
		}
	}

	/**
	 * Stop at once, leaving queued and in-flight rows undelivered. Used when
	 * the shutdown grace period runs out.
	 */
	abandon(): void {
		if (this.stop.signal.aborted) {
			return
		}
		const undelivered = this.enqueued - this.delivered
		if (undelivered > 0) {
			this.logger.warn('abandoning undelivered rows', { undelivered })
		}
		this.closed = true
		this.stop.abort()
		this.wake?.abort()
		this.queue.close()
		this.rejectWaiters(new PipelineClosedError('Sink writer was abandoned'))
	}

	stats(): SinkWriterStats {
		return {
			enqueued: this.enqueued,
			delivered: this.delivered,
			upserted: this.upserted,
			retried: this.retried,
			deadLettered: this.deadLettered,
			queued: this.queue.size,
		}
	}

	private async run(): Promise<void> {
		while (!this.fatalError && !this.stop.signal.aborted) {
			const first = await this.queue.take({ signal: this.stop.signal })
			if (!first || this.stop.signal.aborted) {
				return
			}
			const batch = await this.collect(first)
			await this.deliver(batch)
			if (this.stop.signal.aborted) {
				return
			}
			this.settle(batch[batch.length - 1]?.mark ?? this.delivered)
		}
	}

	/**
	 * Fill a batch until it is full, the interval passes, or a flush is
	 * requested.
	 */
	private async collect(first: QueuedRow): Promise<QueuedRow[]> {
		const batch = [first]
		const deadline = Date.now() + this.batchIntervalMs

		while (batch.length < this.batchSize && !this.stop.signal.aborted) {
			if (this.flushUpTo > this.delivered || this.queue.isClosed) {
				batch.push(...this.queue.drain(this.batchSize - batch.length))
				break
			}
			const remaining = deadline - Date.now()
			if (remaining <= 0) {
				break
			}

			const wake = new AbortController()
			this.wake = wake
			const next = await this.queue.take({ signal: wake.signal, timeoutMs: remaining })
			this.wake = undefined
			if (next) {
				batch.push(next)
			}
		}
		return batch
	}

	private async deliver(batch: QueuedRow[]): Promise<void> {
		let pending: UpsertDocument[] = batch.map(({ record }) => ({ id: enrichedRecordId(record), document: record }))
		const backoff = new BackoffStrategy({
			maxAttempts: this.maxRetryAttempts,
			initialDelayMs: this.initialRetryDelayMs,
			maxDelayMs: this.maxRetryDelayMs,
		})

		for (let attempt = 1; pending.length > 0; attempt++) {
			const { retry, rejected } = await this.attempt(pending)
			if (rejected.length > 0) {
				await this.toDeadLetter(rejected, attempt)
			}
			this.upserted += pending.length - retry.length - rejected.length

			if (retry.length === 0) {
				return
			}
			const delayMs = backoff.nextDelay()
			backoff.recordFailure()
			if (!backoff.canAttempt()) {
				this.logger.error('retries exhausted, dead-lettering documents', {
					error: new SinkWriteFailedError(
						this.sink.name,
						retry.map(({ document }) => document.id)
					),
					attempts: attempt,
				})
				await this.toDeadLetter(retry, attempt)
				return
			}

			this.retried += retry.length
			this.logger.warn('sink write failed, retrying', { failed: retry.length, attempt, delayMs })
			await sleep(delayMs, { signal: this.stop.signal, resolveOnAbort: true })
			if (this.stop.signal.aborted) {
				return
			}
			pending = retry.map(({ document }) => document)
		}
	}

	private async attempt(documents: UpsertDocument[]): Promise<{
		retry: Array<{ document: UpsertDocument; reason: string }>
		rejected: Array<{ document: UpsertDocument; reason: string }>
	}> {
		const retry: Array<{ document: UpsertDocument; reason: string }> = []
		const rejected: Array<{ document: UpsertDocument; reason: string }> = []

		let results: UpsertResult[]
		try {
			results = await this.sink.upsert(documents)
		} catch (error) {
			const reason = error instanceof Error ? error.message : String(error)
			return { retry: documents.map(document => ({ document, reason })), rejected }
		}

		documents.forEach((document, i) => {
			const result = results[i]
			if (!result) {
				retry.push({ document, reason: 'sink returned no result' })
			} else if (!result.ok && result.retriable) {
				retry.push({ document, reason: result.reason })
			} else if (!result.ok) {
				rejected.push({ document, reason: result.reason })
			}
		})
		return { retry, rejected }
	}

	private async toDeadLetter(
		failed: Array<{ document: UpsertDocument; reason: string }>,
		attempts: number
	): Promise<void> {
		const failedAt = new Date().toISOString()
		const entries: DeadLetterEntry[] = failed.map(({ document, reason }) => ({
			id: document.id,
			document: document.document,
			reason,
			attempts,
			failedAt,
		}))

		try {
			await this.deadLetter.write(entries)
		} catch (error) {
			throw new SinkUnreachableError(
				`Dead-letter queue "${this.deadLetter.name}" rejected ${entries.length} row(s)`,
				error
			)
		}
		this.deadLettered += entries.length
		this.logger.warn('rows dead-lettered', { count: entries.length, total: this.deadLettered })

		if (this.deadLettered > this.maxDeadLetters) {
			throw new SinkUnreachableError(
				`Dead-lettered ${this.deadLettered} rows, more than the limit of ${this.maxDeadLetters}`
			)
		}
	}

	private requestFlush(mark: number): void {
		this.flushUpTo = Math.max(this.flushUpTo, mark)
		this.wake?.abort()
	}

	private settle(mark: number): void {
		this.delivered = Math.max(this.delivered, mark)
		for (let i = this.waiters.length - 1; i >= 0; i--) {
			const waiter = this.waiters[i]
			if (waiter && waiter.mark <= this.delivered) {
				this.waiters.splice(i, 1)
				waiter.resolve()
			}
		}
	}

	private rejectWaiters(error: Error): void {
		for (const waiter of this.waiters.splice(0)) {
			waiter.reject(error)
		}
	}

	private fail(error: Error): void {
		if (this.fatalError) {
			return
		}
		this.fatalError = error
		this.logger.error('sink writer failed', { error })
		this.stop.abort()
		this.queue.close()
		this.rejectWaiters(error)
		this.onFatal?.(error)
	}

	private throwIfUnusable(): void {
		if (this.fatalError) {
			throw this.fatalError
		}
		if (this.closed) {
			throw new PipelineClosedError('Sink writer is closed')
		}
	}
}
