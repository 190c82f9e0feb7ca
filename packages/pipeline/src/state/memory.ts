import type { Codec } from '../codec.js'
import type { KeyValueStore, KeyValueStoreOptions, StateStoreProvider } from '../state.js'

/**
 * In-memory implementation of KeyValueStore.
 *
 * Values are held encoded, so every read returns a fresh copy and callers
 * cannot mutate stored state by accident. Keys are compared in serialized
 * form.
 */
export class InMemoryKeyValueStore<K, V> implements KeyValueStore<K, V> {
	private readonly store = new Map<string, { keyBytes: Buffer; valueBytes: Buffer }>()
	private readonly keyCodec: Codec<K>
	private readonly valueCodec: Codec<V>

	constructor(
		readonly name: string,
		options: KeyValueStoreOptions<K, V>
	) {
		this.keyCodec = options.keyCodec
		this.valueCodec = options.valueCodec
	}

	get(key: K): Promise<V | undefined> {
		const entry = this.store.get(this.keyId(this.keyCodec.encode(key)))
		if (!entry) {
			return Promise.resolve(undefined)
		}
		return Promise.resolve(this.valueCodec.decode(entry.valueBytes))
	}

	put(key: K, value: V): Promise<void> {
		const keyBytes = this.keyCodec.encode(key)
		const valueBytes = this.valueCodec.encode(value)
		this.store.set(this.keyId(keyBytes), { keyBytes, valueBytes })
		return Promise.resolve()
	}

	delete(key: K): Promise<void> {
		this.store.delete(this.keyId(this.keyCodec.encode(key)))
		return Promise.resolve()
	}

	async *all(): AsyncIterable<[K, V]> {
		await Promise.resolve()
		// Copy first so callers may delete while iterating
		for (const entry of [...this.store.values()]) {
			yield [this.keyCodec.decode(entry.keyBytes), this.valueCodec.decode(entry.valueBytes)]
		}
	}

	clear(): Promise<void> {
		this.store.clear()
		return Promise.resolve()
	}

	approximateNumEntries(): Promise<number> {
		return Promise.resolve(this.store.size)
	}

	init(): Promise<void> {
		return Promise.resolve()
	}

	flush(): Promise<void> {
		return Promise.resolve()
	}

	close(): Promise<void> {
		this.store.clear()
		return Promise.resolve()
	}

	private keyId(keyBytes: Buffer): string {
		return keyBytes.toString('base64')
	}
}

/**
 * In-memory state store provider.
 *
 * State lives only as long as the process; durability comes from
 * checkpoints.
 */
export class InMemoryStateStoreProvider implements StateStoreProvider {
	readonly name = 'in-memory'
	private readonly stores: Array<{ close(): Promise<void> }> = []

	createKeyValueStore<K, V>(name: string, options: KeyValueStoreOptions<K, V>): KeyValueStore<K, V> {
		const store = new InMemoryKeyValueStore(name, options)
		this.stores.push(store)
		return store
	}

	async close(): Promise<void> {
		await Promise.all(this.stores.map(store => store.close()))
		this.stores.length = 0
	}
}

export function inMemory(): StateStoreProvider {
	return new InMemoryStateStoreProvider()
}
