import { open, type Database, type RootDatabase } from 'lmdb'
import { CheckpointCorruptError, type CheckpointStore } from '@joinstream/pipeline'

const POINTER_KEY = 'latest'

export interface LMDBCheckpointStoreOptions {
	/** Directory for the checkpoint database */
	path: string
	/** Maximum database size in bytes (default: 4GB) */
	mapSize?: number
}

/**
 * Checkpoints in an LMDB environment.
 *
 * Payloads are keyed by sequence and written only if absent; the pointer is
 * a separate single-key database. Each write is its own LMDB transaction,
 * so a reader sees either the old or the new pointer.
 */
export class LMDBCheckpointStore implements CheckpointStore {
	readonly name = 'lmdb'
	private readonly rootDb: RootDatabase
	private readonly payloads: Database<Buffer, number>
	private readonly pointer: Database<unknown, string>

	constructor(options: LMDBCheckpointStoreOptions) {
		this.rootDb = open({
			path: options.path,
			mapSize: options.mapSize ?? 4 * 1024 * 1024 * 1024,
			maxDbs: 2,
		})
		this.payloads = this.rootDb.openDB<Buffer, number>('checkpoint-payloads', {
			keyEncoding: 'uint32',
			encoding: 'binary',
		})
		this.pointer = this.rootDb.openDB<unknown, string>('checkpoint-pointer', { encoding: 'json' })
	}

	async putPayload(sequence: number, payload: Buffer): Promise<void> {
		const written = await this.payloads.transaction(() => {
			if (this.payloads.doesExist(sequence)) {
				return false
			}
			this.payloads.putSync(sequence, payload)
			return true
		})
		if (!written) {
			throw new Error(`Checkpoint ${sequence} already exists`)
		}
		await this.payloads.flushed
	}

	async publish(sequence: number): Promise<void> {
		await this.pointer.put(POINTER_KEY, sequence)
		await this.pointer.flushed
	}

	readPointer(): Promise<number | undefined> {
		const value = this.pointer.get(POINTER_KEY)
		if (value === undefined) {
			return Promise.resolve(undefined)
		}
		if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
			return Promise.reject(new CheckpointCorruptError(0, `unreadable pointer ${JSON.stringify(value)}`))
		}
		return Promise.resolve(value)
	}

	readPayload(sequence: number): Promise<Buffer | undefined> {
		return Promise.resolve(this.payloads.get(sequence))
	}

	listPayloads(): Promise<number[]> {
		return Promise.resolve([...this.payloads.getKeys({})])
	}

	async deletePayload(sequence: number): Promise<void> {
		await this.payloads.remove(sequence)
	}

	async close(): Promise<void> {
		await this.rootDb.close()
	}
}
