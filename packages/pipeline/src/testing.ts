/**
 * In-process stand-ins for the pipeline's external systems.
 *
 * @example
 * ```typescript
 * import { InMemoryPartitionedSource, InMemoryUpsertSink } from '@joinstream/pipeline/testing'
 *
 * const views = new InMemoryPartitionedSource('views')
 * views.append({ product_id: 'P1', user_id: 'U1', view_time: 78, event_time: 1_000 })
 *
 * const sink = new InMemoryUpsertSink()
 * // ... run a pipeline, then
 * expect(sink.documents.get('P1|U1|78')?.order_id).toBe(1000)
 * ```
 */

import type { EnrichedRecord } from './records.js'
import type { UpsertDocument, UpsertResult, UpsertSink } from './sink.js'
import type { PartitionedSource, PartitionOffsets, SourceMessage } from './source.js'

export interface AppendOptions {
	partition?: number
	/** Transport timestamp (default: 0) */
	timestamp?: number
	key?: string | null
}

/**
 * A partitioned log held in memory. Records persist across `close()` and
 * `start()`, so one instance can serve a run and a restart after it.
 */
export class InMemoryPartitionedSource implements PartitionedSource {
	private readonly partitions = new Map<number, SourceMessage[]>()
	private cursors = new Map<number, number>()
	private readonly waiters = new Set<() => void>()
	private pollFailures = 0
	private running = false

	/** Positions passed to each `start()` call */
	readonly starts: PartitionOffsets[] = []

	constructor(
		readonly name: string,
		private readonly maxBatchSize = 100
	) {}

	/**
	 * Append a JSON record.
	 * @returns its offset
	 */
	append(value: unknown, options: AppendOptions = {}): number {
		return this.appendRaw(Buffer.from(JSON.stringify(value), 'utf-8'), options)
	}

	/**
	 * Append raw bytes, or null for a record without a value.
	 * @returns its offset
	 */
	appendRaw(value: Buffer | null, options: AppendOptions = {}): number {
		const partition = options.partition ?? 0
		const log = this.partitions.get(partition) ?? []
		this.partitions.set(partition, log)
		const offset = log.length
		log.push({
			partition,
			offset,
			key: options.key ? Buffer.from(options.key, 'utf-8') : null,
			value,
			timestamp: options.timestamp ?? 0,
		})
		for (const wake of this.waiters) {
			wake()
		}
		return offset
	}

	/**
	 * Make the next `count` polls throw.
	 */
	failPolls(count: number): void {
		this.pollFailures = count
	}

	/** Records not yet handed out by `poll` */
	get unread(): number {
		let unread = 0
		for (const [partition, log] of this.partitions) {
			unread += log.length - (this.cursors.get(partition) ?? 0)
		}
		return unread
	}

	start(positions: PartitionOffsets): Promise<void> {
		this.starts.push({ ...positions })
		this.cursors = new Map()
		for (const [partition, offset] of Object.entries(positions)) {
			this.cursors.set(Number(partition), offset)
		}
		this.running = true
		return Promise.resolve()
	}

	async poll(options: { maxWaitMs: number; signal?: AbortSignal }): Promise<SourceMessage[]> {
		if (!this.running) {
			throw new Error(`Source "${this.name}" is not started`)
		}
		if (this.pollFailures > 0) {
			this.pollFailures--
			throw new Error(`Injected poll failure on "${this.name}"`)
		}

		let messages = this.take()
		if (messages.length === 0 && !options.signal?.aborted) {
			await this.waitForAppend(options.maxWaitMs, options.signal)
			messages = this.take()
		}
		return messages
	}

	close(): Promise<void> {
		this.running = false
		for (const wake of this.waiters) {
			wake()
		}
		return Promise.resolve()
	}

	private take(): SourceMessage[] {
		const messages: SourceMessage[] = []
		const partitions = [...this.partitions.keys()].sort((a, b) => a - b)
		for (const partition of partitions) {
			const log = this.partitions.get(partition) ?? []
			let cursor = this.cursors.get(partition) ?? 0
			while (cursor < log.length && messages.length < this.maxBatchSize) {
				const message = log[cursor]
				if (message) {
					messages.push(message)
				}
				cursor++
			}
			this.cursors.set(partition, cursor)
		}
		return messages
	}

	private waitForAppend(timeoutMs: number, signal?: AbortSignal): Promise<void> {
		return new Promise<void>(resolve => {
			const done = () => {
				clearTimeout(timer)
				this.waiters.delete(done)
				signal?.removeEventListener('abort', done)
				resolve()
			}
			const timer = setTimeout(done, timeoutMs)
			this.waiters.add(done)
			signal?.addEventListener('abort', done)
		})
	}
}

export interface DocumentFailure {
	retriable: boolean
	reason: string
	/** Failures left before the document is accepted (default: Infinity) */
	times: number
}

/**
 * Upsert sink backed by a Map, with failure injection.
 */
export class InMemoryUpsertSink implements UpsertSink {
	readonly name = 'memory'
	readonly documents = new Map<string, EnrichedRecord>()
	/** Every upsert request, in order */
	readonly requests: UpsertDocument[][] = []
	private requestFailures = 0
	private readonly documentFailures = new Map<string, DocumentFailure>()
	closed = false

	/**
	 * Make the next `count` requests fail as a whole.
	 */
	failRequests(count: number): void {
		this.requestFailures = count
	}

	/**
	 * Reject one document id, `times` times or forever.
	 */
	failDocument(id: string, failure: Partial<DocumentFailure> = {}): void {
		this.documentFailures.set(id, {
			retriable: failure.retriable ?? true,
			reason: failure.reason ?? 'injected failure',
			times: failure.times ?? Infinity,
		})
	}

	upsert(documents: UpsertDocument[]): Promise<UpsertResult[]> {
		this.requests.push(documents)
		if (this.requestFailures > 0) {
			this.requestFailures--
			return Promise.reject(new Error('Injected sink request failure'))
		}

		const results = documents.map(({ id, document }): UpsertResult => {
			const failure = this.documentFailures.get(id)
			if (failure && failure.times > 0) {
				failure.times--
				return { ok: false, retriable: failure.retriable, reason: failure.reason }
			}
			this.documents.set(id, document)
			return { ok: true }
		})
		return Promise.resolve(results)
	}

	close(): Promise<void> {
		this.closed = true
		return Promise.resolve()
	}
}
