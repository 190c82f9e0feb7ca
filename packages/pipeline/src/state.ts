import type { Codec } from './codec.js'

/**
 * Configuration for creating a key-value state store.
 */
export interface KeyValueStoreOptions<K, V> {
	/** Codec for serializing/deserializing keys */
	keyCodec: Codec<K>
	/** Codec for serializing/deserializing values */
	valueCodec: Codec<V>
}

/**
 * A named key-value store backing one table of join state (products, users,
 * buffered sales, pending views).
 *
 * Only the join loop writes to these stores, so implementations need not be
 * safe for concurrent writers.
 */
export interface KeyValueStore<K, V> {
	/** Unique name of this store */
	readonly name: string

	/**
	 * Get the value for a key.
	 * @returns The value, or undefined if not found
	 */
	get(key: K): Promise<V | undefined>

	put(key: K, value: V): Promise<void>

	delete(key: K): Promise<void>

	/**
	 * Iterate over all key-value pairs in the store.
	 */
	all(): AsyncIterable<[K, V]>

	/**
	 * Remove every entry. Used before loading a checkpoint snapshot.
	 */
	clear(): Promise<void>

	/**
	 * Get approximate number of entries in the store.
	 */
	approximateNumEntries(): Promise<number>

	/**
	 * Initialize the store. Called before first use.
	 */
	init(): Promise<void>

	/**
	 * Flush any pending writes to durable storage.
	 */
	flush(): Promise<void>

	close(): Promise<void>
}

/**
 * Factory for state stores.
 *
 * Implementations provide different storage backends (in-memory, LMDB) behind
 * the same interface.
 */
export interface StateStoreProvider {
	/** Provider name for debugging */
	readonly name: string

	createKeyValueStore<K, V>(name: string, options: KeyValueStoreOptions<K, V>): KeyValueStore<K, V>

	/**
	 * Close all stores and release resources.
	 */
	close(): Promise<void>
}
