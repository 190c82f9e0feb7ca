import { open, type Database, type RootDatabase } from 'lmdb'
import type { Codec, KeyValueStore, KeyValueStoreOptions, StateStoreProvider } from '@joinstream/pipeline'

/**
 * LMDB implementation of KeyValueStore.
 *
 * Keys and values are stored in their codec's encoding, so iteration order
 * follows the encoded key bytes.
 */
export class LMDBKeyValueStore<K, V> implements KeyValueStore<K, V> {
	private readonly db: Database<Buffer, Buffer>
	private readonly keyCodec: Codec<K>
	private readonly valueCodec: Codec<V>

	constructor(
		readonly name: string,
		db: Database<Buffer, Buffer>,
		options: KeyValueStoreOptions<K, V>
	) {
		this.db = db
		this.keyCodec = options.keyCodec
		this.valueCodec = options.valueCodec
	}

	get(key: K): Promise<V | undefined> {
		const valueBytes = this.db.get(this.keyCodec.encode(key))
		if (valueBytes === undefined) {
			return Promise.resolve(undefined)
		}
		return Promise.resolve(this.valueCodec.decode(valueBytes))
	}

	async put(key: K, value: V): Promise<void> {
		await this.db.put(this.keyCodec.encode(key), this.valueCodec.encode(value))
	}

	async delete(key: K): Promise<void> {
		await this.db.remove(this.keyCodec.encode(key))
	}

	async *all(): AsyncIterable<[K, V]> {
		await Promise.resolve()
		// Snapshot the range so callers may delete while iterating
		const entries = [...this.db.getRange({})]
		for (const { key, value } of entries) {
			yield [this.keyCodec.decode(key), this.valueCodec.decode(value)]
		}
	}

	async clear(): Promise<void> {
		await this.db.clearAsync()
	}

	approximateNumEntries(): Promise<number> {
		return Promise.resolve(this.db.getKeysCount())
	}

	init(): Promise<void> {
		// Opened by the provider
		return Promise.resolve()
	}

	async flush(): Promise<void> {
		await this.db.flushed
	}

	close(): Promise<void> {
		// Closed with the provider's root database
		return Promise.resolve()
	}
}

export interface LMDBProviderOptions {
	/** Directory for LMDB database files */
	stateDir: string
	/** Maximum database size in bytes (default: 1GB) */
	mapSize?: number
	/** Maximum number of named databases (default: 16) */
	maxDbs?: number
}

/**
 * LMDB state store provider.
 *
 * Join state lives in memory-mapped files under `stateDir` instead of the
 * heap, which suits large dimension tables. Contents left from an earlier
 * run are replaced when a checkpoint is restored.
 */
export class LMDBStateStoreProvider implements StateStoreProvider {
	readonly name = 'lmdb'
	private readonly rootDb: RootDatabase<Buffer, Buffer>
	private readonly stores = new Map<string, Database<Buffer, Buffer>>()

	constructor(options: LMDBProviderOptions) {
		this.rootDb = open<Buffer, Buffer>({
			path: options.stateDir,
			mapSize: options.mapSize ?? 1024 * 1024 * 1024,
			maxDbs: options.maxDbs ?? 16,
			keyEncoding: 'binary',
			encoding: 'binary',
		})
	}

	private getOrCreateDb(name: string): Database<Buffer, Buffer> {
		let db = this.stores.get(name)
		if (!db) {
			db = this.rootDb.openDB<Buffer, Buffer>(name, {
				keyEncoding: 'binary',
				encoding: 'binary',
			})
			this.stores.set(name, db)
		}
		return db
	}

	createKeyValueStore<K, V>(name: string, options: KeyValueStoreOptions<K, V>): KeyValueStore<K, V> {
		return new LMDBKeyValueStore(name, this.getOrCreateDb(name), options)
	}

	async close(): Promise<void> {
		await this.rootDb.close()
		this.stores.clear()
	}
}

/**
 * Create an LMDB state store provider.
 */
export function lmdb(options: LMDBProviderOptions): StateStoreProvider {
	return new LMDBStateStoreProvider(options)
}
