import { randomUUID } from 'node:crypto'
import { Kafka, logLevel, type Consumer, type LogEntry } from 'kafkajs'
import type { Logger } from '../logger.js'
import { noopLogger } from '../logger.js'
import type { PartitionedSource, PartitionOffsets, SourceMessage } from '../source.js'
import { BoundedQueue } from '../utils/bounded-queue.js'

/**
 * Route kafkajs's internal logging through a pipeline Logger.
 */
export function kafkaLogCreator(logger: Logger): () => (entry: LogEntry) => void {
	const kafkaLogger = logger.child({ component: 'kafkajs' })
	return () =>
		({ namespace, level, log }) => {
			const { message, ...context } = log
			const fields: Record<string, unknown> = { ...context, namespace, kafkaTimestamp: log.timestamp }
			delete fields.timestamp
			switch (level) {
				case logLevel.ERROR:
					kafkaLogger.error(message, fields)
					break
				case logLevel.WARN:
					kafkaLogger.warn(message, fields)
					break
				case logLevel.INFO:
					kafkaLogger.info(message, fields)
					break
				default:
					kafkaLogger.debug(message, fields)
			}
		}
}

export interface KafkaSourceOptions {
	kafka: Kafka
	/** Source name, e.g. 'views' */
	name: string
	topic: string
	/** Consumer group ids are `<prefix>-<name>-<uuid>`; offsets are never committed */
	groupIdPrefix?: string
	/** Most records returned by one poll (default: 1000) */
	maxBatchSize?: number
	/** Fetched records held before the fetch loop waits (default: 10000) */
	bufferCapacity?: number
	logger?: Logger
}

/**
 * A Kafka topic as a PartitionedSource.
 *
 * kafkajs fetches in the background and hands batches to `eachBatch`, which
 * parks records in a bounded buffer that `poll` drains. A full buffer stalls
 * the fetch loop. Offsets are never committed to Kafka: read positions are
 * owned by checkpoints, so every start seeks explicitly and partitions
 * without a checkpointed position read from the beginning.
 */
export class KafkaPartitionedSource implements PartitionedSource {
	readonly name: string
	private readonly kafka: Kafka
	private readonly topic: string
	private readonly groupIdPrefix: string
	private readonly maxBatchSize: number
	private readonly bufferCapacity: number
	private readonly logger: Logger

	private consumer: Consumer | undefined
	private buffer: BoundedQueue<SourceMessage>
	/** Next offset to hand out, per partition */
	private positions: PartitionOffsets = {}
	private failure: Error | undefined
	private needsRestart = false

	constructor(options: KafkaSourceOptions) {
		this.kafka = options.kafka
		this.name = options.name
		this.topic = options.topic
		this.groupIdPrefix = options.groupIdPrefix ?? 'joinstream'
		this.maxBatchSize = options.maxBatchSize ?? 1_000
		this.bufferCapacity = options.bufferCapacity ?? 10_000
		this.buffer = new BoundedQueue(this.bufferCapacity)
		this.logger = (options.logger ?? noopLogger).child({ component: 'kafka-source', source: options.name })
	}

	async start(positions: PartitionOffsets): Promise<void> {
		this.positions = { ...positions }
		await this.connect()
	}

	/**
	 * @throws the consumer's crash error, once, after the consumer crashed
	 */
	async poll(options: { maxWaitMs: number; signal?: AbortSignal }): Promise<SourceMessage[]> {
		if (this.failure) {
			const failure = this.failure
			this.failure = undefined
			throw failure
		}
		if (this.needsRestart) {
			await this.restart()
			this.needsRestart = false
		}

		const first = await this.buffer.take({ timeoutMs: options.maxWaitMs, signal: options.signal })
		if (!first) {
			return []
		}
		const messages = [first, ...this.buffer.drain(this.maxBatchSize - 1)]
		for (const message of messages) {
			this.positions[message.partition] = message.offset + 1
		}
		return messages
	}

	async close(): Promise<void> {
		this.buffer.close()
		const consumer = this.consumer
		this.consumer = undefined
		await consumer?.disconnect()
	}

	private async connect(): Promise<void> {
		const consumer = this.kafka.consumer({
			groupId: `${this.groupIdPrefix}-${this.name}-${randomUUID()}`,
			readUncommitted: false,
			// restart() resumes from `positions` instead
			retry: { restartOnFailure: () => Promise.resolve(false) },
		})
		this.consumer = consumer

		consumer.on(consumer.events.CRASH, ({ payload }) => {
			this.logger.warn('consumer crashed', { error: payload.error })
			this.failure = payload.error
			this.needsRestart = true
		})
		consumer.on(consumer.events.GROUP_JOIN, ({ payload }) => {
			this.logger.info('partitions assigned', { assignment: payload.memberAssignment })
		})

		await consumer.connect()
		await consumer.subscribe({ topic: this.topic, fromBeginning: true })
		await consumer.run({
			autoCommit: false,
			eachBatchAutoResolve: false,
			eachBatch: async ({ batch, resolveOffset, heartbeat, isRunning, isStale }) => {
				const buffer = this.buffer
				for (const message of batch.messages) {
					if (!isRunning() || isStale()) {
						break
					}
					const pushed = await buffer.push({
						partition: batch.partition,
						offset: Number(message.offset),
						key: message.key,
						value: message.value,
						timestamp: Number(message.timestamp),
					})
					if (!pushed) {
						break
					}
					resolveOffset(message.offset)
					await heartbeat()
				}
			},
		})

		for (const [partition, offset] of Object.entries(this.positions)) {
			consumer.seek({ topic: this.topic, partition: Number(partition), offset: String(offset) })
		}
		this.logger.info('consumer started', { topic: this.topic, positions: this.positions })
	}

	/**
	 * Replace a consumer that stopped for good, resuming after the last
	 * record handed out. Buffered records not yet polled are fetched again.
	 */
	private async restart(): Promise<void> {
		const previous = this.consumer
		this.consumer = undefined
		this.buffer.close()
		this.buffer = new BoundedQueue(this.bufferCapacity)
		await previous?.disconnect()
		await this.connect()
	}
}

export interface KafkaConnectionOptions {
	brokers: string[]
	clientId?: string
	logger?: Logger
}

/**
 * Create a kafkajs client that logs through the pipeline logger.
 */
export function createKafka(options: KafkaConnectionOptions): Kafka {
	return new Kafka({
		clientId: options.clientId ?? 'joinstream',
		brokers: options.brokers,
		logLevel: logLevel.INFO,
		logCreator: kafkaLogCreator(options.logger ?? noopLogger),
	})
}
