/**
 * The four input streams joined by the pipeline.
 */
export const SOURCE_NAMES = ['products', 'users', 'sales', 'views'] as const

export type SourceName = (typeof SOURCE_NAMES)[number]

/**
 * A raw record read from one partition of a log.
 */
export interface SourceMessage {
	partition: number
	offset: number
	key: Buffer | null
	value: Buffer | null
	/** Transport timestamp in epoch milliseconds */
	timestamp: number
}

/**
 * Next offset to read, per partition.
 */
export type PartitionOffsets = Record<number, number>

/**
 * A partitioned, offset-addressable log with at-least-once delivery in
 * per-partition order.
 *
 * Implementations are polled by a single worker; `poll` never needs to be
 * reentrant.
 */
export interface PartitionedSource {
	readonly name: string

	/**
	 * Connect and position every partition: at the given next offset where
	 * one is known, at the earliest offset otherwise.
	 */
	start(positions: PartitionOffsets): Promise<void>

	/**
	 * Return the records available now, in per-partition order. Resolves with
	 * an empty array if nothing arrives within `maxWaitMs`.
	 *
	 * @throws on a failed partition read; the caller retries with backoff
	 */
	poll(options: { maxWaitMs: number; signal?: AbortSignal }): Promise<SourceMessage[]>

	close(): Promise<void>
}
