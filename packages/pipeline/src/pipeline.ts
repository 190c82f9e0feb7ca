import { EventEmitter } from 'node:events'
import { SourceAdapter, type IngestMessage } from './adapter.js'
import { CheckpointManager, type CheckpointData, type CheckpointStore } from './checkpoint.js'
import { FileCheckpointStore } from './checkpoint/file.js'
import { resolvePipelineConfig, type PipelineConfig } from './config.js'
import { ConfigurationError, PipelineClosedError } from './errors.js'
import { JoinEngine, type JoinEngineStats } from './join.js'
import { createLogger, type Logger } from './logger.js'
import { recordCodecs, type EnrichedRecord } from './records.js'
import { SinkWriter, type DeadLetterQueue, type SinkWriterStats, type UpsertSink } from './sink.js'
import { SOURCE_NAMES, type PartitionedSource, type PartitionOffsets, type SourceName } from './source.js'
import type { StateStoreProvider } from './state.js'
import { inMemory } from './state/memory.js'
import { BoundedQueue } from './utils/bounded-queue.js'
import { Mutex } from './utils/mutex.js'
import { sleep } from './utils/sleep.js'
import {
	fromNullableTime,
	SourceWatermark,
	toNullableTime,
	WatermarkCoordinator,
	type SourceWatermarkStatus,
} from './watermark.js'

export type PipelineState = 'CREATED' | 'STARTING' | 'RUNNING' | 'STOPPING' | 'STOPPED' | 'FAILED'

export interface PipelineEvents {
	running: []
	stopped: []
	error: [error: Error]
	/** A checkpoint was published */
	checkpoint: [sequence: number]
	/** A view was finalized and queued for the sink */
	record: [record: EnrichedRecord]
}

export type PipelineSources = Record<SourceName, PartitionedSource>

export interface PipelineOptions {
	sources: PipelineSources
	sink: UpsertSink
	deadLetter: DeadLetterQueue
	/** Defaults to a FileCheckpointStore at `config.checkpoint.location` */
	checkpointStore?: CheckpointStore
	/** Join state backend (default: in memory) */
	stateStoreProvider?: StateStoreProvider
	/** Default: resolvePipelineConfig() */
	config?: PipelineConfig
	/** Default: a JSON logger at `config.logLevel` */
	logger?: Logger
	/** Longest a source poll waits (default: 500ms) */
	pollWaitMs?: number
	now?: () => number
}

export interface SourceHealth extends Omit<SourceWatermarkStatus, 'watermark' | 'maxEventTime'> {
	watermark: number | null
	maxEventTime: number | null
	/** Records behind this source's own watermark when applied */
	lateRecords: number
	/** Records that failed to decode or validate */
	rejectedRecords: number
	/** Next offset per partition covered by applied batches */
	positions: PartitionOffsets
}

export interface PipelineHealth {
	state: PipelineState
	globalWatermark: number | null
	/** Source holding the global watermark back past the stall timeout */
	stalledSource: string | undefined
	sources: Record<SourceName, SourceHealth>
	engine: JoinEngineStats
	sink: SinkWriterStats
	ingestQueued: number
	lastCheckpoint: number | undefined
}

interface IngestWorker {
	readonly name: SourceName
	readonly rejected: number
	start(positions: PartitionOffsets): Promise<void>
	run(queue: BoundedQueue<IngestMessage>, signal: AbortSignal): Promise<void>
	close(): Promise<void>
}

interface DoneWaiter {
	resolve: () => void
	reject: (error: Error) => void
}

function emptyOffsets(): Record<SourceName, PartitionOffsets> {
	return { products: {}, users: {}, sales: {}, views: {} }
}

/**
 * Streaming enrichment of page views.
 *
 * One worker per source polls into a bounded ingest queue; a single join loop
 * applies batches to the join engine under a mutex, advances the global
 * watermark, and hands finalized rows to the sink writer. A periodic task
 * takes the mutex to snapshot state and offsets into a checkpoint.
 *
 * @example
 * ```typescript
 * const app = pipeline({ sources, sink, deadLetter, config: resolvePipelineConfig({ checkpoint: { location: './ckpt' } }) })
 * await app.start()
 * process.on('SIGTERM', () => {
 *   app.close().catch(console.error)
 * })
 * await app.done
 * ```
 */
export class Pipeline extends EventEmitter<PipelineEvents> {
	readonly config: PipelineConfig
	private readonly logger: Logger
	private readonly provider: StateStoreProvider
	private readonly engine: JoinEngine
	private readonly coordinator: WatermarkCoordinator
	private readonly checkpoints: CheckpointManager
	private readonly checkpointStore: CheckpointStore
	private readonly sinkWriter: SinkWriter
	private readonly sink: UpsertSink
	private readonly deadLetter: DeadLetterQueue
	private readonly workers: Record<SourceName, IngestWorker>
	private readonly ingest: BoundedQueue<IngestMessage>
	private readonly mutex = new Mutex()
	private readonly workerAbort = new AbortController()
	/** Interrupts periodic checkpoint retries once shutdown begins */
	private readonly periodicCheckpointAbort = new AbortController()
	/** Interrupts every checkpoint retry when in-flight work is abandoned */
	private readonly checkpointAbort = new AbortController()

	private offsets = emptyOffsets()
	private readonly lateRecords: Record<SourceName, number> = { products: 0, users: 0, sales: 0, views: 0 }
	private currentState: PipelineState = 'CREATED'
	private workerRuns: Promise<void>[] = []
	private joinLoop: Promise<void> | undefined
	private checkpointTimer: ReturnType<typeof setTimeout> | undefined
	private checkpointRun: Promise<void> | undefined
	private closing: Promise<void> | undefined
	private abandoned = false
	private outcome: { error?: Error } | undefined
	private readonly doneWaiters: DoneWaiter[] = []

	constructor(options: PipelineOptions) {
		super()
		this.config = options.config ?? resolvePipelineConfig()
		const baseLogger = options.logger ?? createLogger(this.config.logLevel, { service: 'joinstream' })
		this.logger = baseLogger.child({ component: 'pipeline' })
		const now = options.now ?? Date.now

		this.checkpointStore = options.checkpointStore ?? this.defaultCheckpointStore()
		this.provider = options.stateStoreProvider ?? inMemory()
		this.sink = options.sink
		this.deadLetter = options.deadLetter
		this.ingest = new BoundedQueue(this.config.ingestQueueCapacity)

		this.sinkWriter = new SinkWriter({
			sink: options.sink,
			deadLetter: options.deadLetter,
			batchSize: this.config.sink.batchSize,
			batchIntervalMs: this.config.sink.batchIntervalMs,
			maxRetryAttempts: this.config.sink.maxRetryAttempts,
			maxDeadLetters: this.config.sink.maxDeadLetters,
			queueCapacity: this.config.outputQueueCapacity,
			onFatal: error => this.fail(error),
			logger: baseLogger,
		})

		this.engine = new JoinEngine({
			provider: this.provider,
			emit: async record => {
				await this.sinkWriter.enqueue(record)
				this.emit('record', record)
			},
			joinLatenessMs: this.config.joinLatenessMs,
			matchWindowMs: this.config.matchWindowMs,
			finalization: this.config.finalization,
			redeliveryWindowMs: Number.isFinite(this.config.sources.views.allowedLatenessMs)
				? this.config.sources.views.allowedLatenessMs
				: this.config.joinLatenessMs,
			saleMatch: this.config.saleMatch,
			maxPendingViews: this.config.maxPendingViews,
			maxBufferedSales: this.config.maxBufferedSales,
			overflowPolicy: this.config.overflowPolicy,
			logger: baseLogger,
		})

		this.coordinator = new WatermarkCoordinator(
			SOURCE_NAMES.map(
				name =>
					new SourceWatermark(name, {
						allowedLatenessMs: this.config.sources[name].allowedLatenessMs,
						idleTimeoutMs: this.config.sources[name].idleTimeoutMs,
					})
			),
			{ stallTimeoutMs: this.config.stallTimeoutMs, logger: baseLogger, now }
		)

		this.checkpoints = new CheckpointManager({
			store: this.checkpointStore,
			retain: this.config.checkpoint.retain,
			maxAttempts: this.config.checkpoint.maxAttempts,
			logger: baseLogger,
		})

		const adapterOptions = (name: SourceName) => ({
			name,
			source: options.sources[name],
			idleTimeoutMs: this.config.sources[name].idleTimeoutMs,
			pollWaitMs: options.pollWaitMs,
			logger: baseLogger,
			now,
		})
		this.workers = {
			products: new SourceAdapter({
				...adapterOptions('products'),
				codec: recordCodecs.product(),
				eventTime: (_, message) => message.timestamp,
				handle: product => this.engine.applyProduct(product),
			}),
			users: new SourceAdapter({
				...adapterOptions('users'),
				codec: recordCodecs.user(),
				eventTime: (_, message) => message.timestamp,
				handle: user => this.engine.applyUser(user),
			}),
			sales: new SourceAdapter({
				...adapterOptions('sales'),
				codec: recordCodecs.sale(),
				eventTime: sale => sale.event_time,
				handle: sale => this.engine.applySale(sale),
			}),
			views: new SourceAdapter({
				...adapterOptions('views'),
				codec: recordCodecs.view(),
				eventTime: view => view.event_time,
				handle: view => this.engine.applyView(view),
			}),
		}
	}

	state(): PipelineState {
		return this.currentState
	}

	/**
	 * Resolves when the pipeline has stopped after `close()`, rejects with the
	 * fatal error if it failed.
	 */
	get done(): Promise<void> {
		if (this.outcome) {
			return this.outcome.error ? Promise.reject(this.outcome.error) : Promise.resolve()
		}
		return new Promise<void>((resolve, reject) => {
			this.doneWaiters.push({ resolve, reject })
		})
	}

	/**
	 * Restore the latest checkpoint, position every source and begin
	 * processing.
	 */
	async start(): Promise<void> {
		if (this.currentState !== 'CREATED') {
			throw new PipelineClosedError(`Cannot start a pipeline in state ${this.currentState}`)
		}
		this.currentState = 'STARTING'

		let restoredFrom: number | undefined
		try {
			restoredFrom = await this.restore()
			for (const name of SOURCE_NAMES) {
				await this.workers[name].start({ ...this.offsets[name] })
			}
		} catch (error) {
			this.logger.error('pipeline failed to start', { error })
			this.currentState = 'FAILED'
			this.outcome = { error: error instanceof Error ? error : new Error(String(error)) }
			await this.release()
			this.settle()
			throw error
		}

		this.sinkWriter.start()
		this.workerRuns = SOURCE_NAMES.map(name =>
			this.workers[name].run(this.ingest, this.workerAbort.signal).catch((error: unknown) => this.fail(error))
		)
		this.joinLoop = this.runJoinLoop().catch((error: unknown) => this.fail(error))
		this.scheduleCheckpoint()

		this.currentState = 'RUNNING'
		this.logger.info('pipeline running', {
			restoredFrom,
			globalWatermark: toNullableTime(this.coordinator.global),
		})
		this.emit('running')
	}

	/**
	 * Stop polling, apply what is queued, take a final checkpoint and flush
	 * the sink. Work still in flight after the grace period is abandoned and
	 * recovered from the last checkpoint on the next start.
	 */
	async close(): Promise<void> {
		if (this.currentState === 'CREATED') {
			this.currentState = 'STOPPED'
			this.settle()
			return
		}
		if (this.closing) {
			return this.closing
		}
		this.closing = this.shutdown()
		return this.closing
	}

	/**
	 * Snapshot state and offsets and persist a checkpoint.
	 *
	 * @returns the published sequence, or undefined if the write was abandoned
	 */
	async checkpoint(): Promise<number | undefined> {
		return this.takeCheckpoint(this.checkpointAbort.signal)
	}

	private async takeCheckpoint(signal: AbortSignal): Promise<number | undefined> {
		const { data, mark } = await this.mutex.runExclusive(async () => {
			const offsets: CheckpointData['offsets'] = {}
			for (const name of SOURCE_NAMES) {
				const partitions: Record<string, number> = {}
				for (const [partition, offset] of Object.entries(this.offsets[name])) {
					partitions[partition] = offset
				}
				offsets[name] = partitions
			}
			const snapshot: CheckpointData = {
				offsets,
				watermarks: this.coordinator.snapshot(),
				state: await this.engine.snapshot(),
			}
			return { data: snapshot, mark: this.sinkWriter.lastMark }
		})

		// Rows finalized before the snapshot must be out before the checkpoint claims them
		await this.sinkWriter.deliveredThrough(mark)
		const sequence = await this.checkpoints.save(data, signal)
		if (sequence !== undefined) {
			this.emit('checkpoint', sequence)
		}
		return sequence
	}

	health(): PipelineHealth {
		const status = this.coordinator.status()
		const sourceHealth = (name: SourceName): SourceHealth => {
			const source = status[name]
			return {
				watermark: toNullableTime(source?.watermark ?? -Infinity),
				maxEventTime: toNullableTime(source?.maxEventTime ?? -Infinity),
				idle: source?.idle ?? false,
				available: source?.available ?? true,
				lateRecords: this.lateRecords[name],
				rejectedRecords: this.workers[name].rejected,
				positions: { ...this.offsets[name] },
			}
		}
		return {
			state: this.currentState,
			globalWatermark: toNullableTime(this.coordinator.global),
			stalledSource: this.coordinator.checkStall(),
			sources: {
				products: sourceHealth('products'),
				users: sourceHealth('users'),
				sales: sourceHealth('sales'),
				views: sourceHealth('views'),
			},
			engine: this.engine.stats(),
			sink: this.sinkWriter.stats(),
			ingestQueued: this.ingest.size,
			lastCheckpoint: this.checkpoints.lastPublished,
		}
	}

	/**
	 * @returns the restored checkpoint's sequence, if any
	 */
	private async restore(): Promise<number | undefined> {
		await this.engine.init()
		const checkpoint = await this.checkpoints.load()
		if (!checkpoint) {
			return undefined
		}
		await this.engine.restore(checkpoint.state, fromNullableTime(checkpoint.watermarks.global))
		this.coordinator.restore(checkpoint.watermarks)
		this.offsets = emptyOffsets()
		for (const name of SOURCE_NAMES) {
			for (const [partition, offset] of Object.entries(checkpoint.offsets[name] ?? {})) {
				this.offsets[name][Number(partition)] = offset
			}
		}
		return checkpoint.sequence
	}

	private async runJoinLoop(): Promise<void> {
		for (;;) {
			const message = await this.ingest.take({ timeoutMs: 1_000 })
			if (message === undefined) {
				if (this.ingest.isClosed) {
					return
				}
				this.coordinator.checkStall()
				continue
			}
			await this.mutex.runExclusive(() => this.apply(message))
		}
	}

	private async apply(message: IngestMessage): Promise<void> {
		if (message.kind === 'status') {
			this.coordinator.setAvailable(message.source, message.available)
			return
		}

		const watermark = this.coordinator.source(message.source)
		for (const record of message.records) {
			if (watermark.isLate(record.eventTime)) {
				this.lateRecords[message.source]++
			}
			await record.apply()
			watermark.observe(record.eventTime)
		}

		const positions = this.offsets[message.source]
		for (const [partition, offset] of Object.entries(message.positions)) {
			positions[Number(partition)] = Math.max(positions[Number(partition)] ?? 0, offset)
		}

		this.coordinator.setIdle(message.source, message.idle)
		await this.engine.advanceWatermark(this.coordinator.advance())
		this.coordinator.checkStall()
	}

	private scheduleCheckpoint(): void {
		this.checkpointTimer = setTimeout(() => {
			this.checkpointRun = this.periodicCheckpoint()
		}, this.config.checkpoint.intervalMs)
	}

	private async periodicCheckpoint(): Promise<void> {
		try {
			await this.takeCheckpoint(this.periodicCheckpointAbort.signal)
		} catch (error) {
			this.fail(error)
			return
		}
		if (this.currentState === 'RUNNING') {
			this.scheduleCheckpoint()
		}
	}

	private async shutdown(): Promise<void> {
		this.currentState = 'STOPPING'
		clearTimeout(this.checkpointTimer)
		this.periodicCheckpointAbort.abort()
		this.logger.info('pipeline stopping', { graceMs: this.config.shutdownGraceMs })

		let finished = false
		const graceful = this.drain().then(
			() => {
				finished = true
			},
			(error: unknown) => {
				finished = true
				this.logger.error('graceful shutdown failed', { error })
			}
		)
		const graceTimer = new AbortController()
		await Promise.race([graceful, sleep(this.config.shutdownGraceMs, { signal: graceTimer.signal, resolveOnAbort: true })])
		graceTimer.abort()

		if (!finished) {
			this.logger.warn('shutdown grace period expired, abandoning in-flight work', {
				lastCheckpoint: this.checkpoints.lastPublished,
			})
			// `graceful` settles on its own once abandon() has woken whatever it waits on
			this.abandon()
		}

		await this.release()
		if (this.currentState === 'STOPPING') {
			this.currentState = 'STOPPED'
			this.logger.info('pipeline stopped')
			this.emit('stopped')
		}
		this.settle()
	}

	/**
	 * Graceful part of shutdown: stop the workers, apply everything queued,
	 * checkpoint, and flush the sink.
	 */
	private async drain(): Promise<void> {
		this.workerAbort.abort()
		await Promise.all(this.workerRuns)
		this.ingest.close()
		await this.joinLoop
		await this.checkpointRun
		if (this.outcome?.error || this.abandoned) {
			return
		}
		await this.checkpoint()
		await this.sinkWriter.close()
	}

	private abandon(): void {
		this.abandoned = true
		this.workerAbort.abort()
		this.periodicCheckpointAbort.abort()
		this.checkpointAbort.abort()
		this.ingest.close()
		this.sinkWriter.abandon()
	}

	/**
	 * Close sources, sink and stores. Failures are logged; there is nothing
	 * left to retry them for.
	 */
	private async release(): Promise<void> {
		const resources: Array<{ name: string; close: () => Promise<void> }> = [
			...SOURCE_NAMES.map(name => ({ name: `source:${name}`, close: () => this.workers[name].close() })),
			{ name: 'sink', close: () => this.sink.close() },
			{ name: 'dead-letter', close: () => this.deadLetter.close() },
			{ name: 'checkpoint-store', close: () => this.checkpointStore.close() },
			{ name: 'state', close: () => this.provider.close() },
		]
		for (const resource of resources) {
			try {
				await resource.close()
			} catch (error) {
				this.logger.warn('failed to close resource', { resource: resource.name, error })
			}
		}
	}

	private fail(cause: unknown): void {
		if (this.outcome?.error || this.currentState === 'FAILED') {
			return
		}
		if (this.abandoned && cause instanceof PipelineClosedError) {
			this.logger.debug('work interrupted by shutdown', { error: cause })
			return
		}
		const error = cause instanceof Error ? cause : new Error(String(cause))
		this.outcome = { error }
		this.currentState = 'FAILED'
		clearTimeout(this.checkpointTimer)
		this.logger.error('pipeline failed', { error })
		this.abandon()
		if (this.listenerCount('error') > 0) {
			this.emit('error', error)
		}
		this.closing ??= this.release().then(() => this.settle())
	}

	private settle(): void {
		this.outcome ??= {}
		const { error } = this.outcome
		for (const waiter of this.doneWaiters.splice(0)) {
			if (error) {
				waiter.reject(error)
			} else {
				waiter.resolve()
			}
		}
	}

	private defaultCheckpointStore(): CheckpointStore {
		const location = this.config.checkpoint.location
		if (location === undefined) {
			throw new ConfigurationError(['checkpoint.location: required unless a checkpointStore is given'])
		}
		return new FileCheckpointStore(location)
	}
}

/**
 * Create a pipeline. Nothing runs until `start()`.
 */
export function pipeline(options: PipelineOptions): Pipeline {
	return new Pipeline(options)
}
