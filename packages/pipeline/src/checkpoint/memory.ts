import type { CheckpointStore } from '../checkpoint.js'

/**
 * In-memory CheckpointStore for tests. Can be told to fail writes, and
 * exposes its payloads so tests can damage them.
 */
export class InMemoryCheckpointStore implements CheckpointStore {
	readonly name = 'memory'
	readonly payloads = new Map<number, Buffer>()
	pointer: number | undefined
	private failuresLeft = 0

	/**
	 * Make the next `count` payload writes or publishes throw.
	 */
	failWrites(count: number): void {
		this.failuresLeft = count
	}

	putPayload(sequence: number, payload: Buffer): Promise<void> {
		if (this.consumeFailure()) {
			return Promise.reject(new Error('Injected checkpoint write failure'))
		}
		if (this.payloads.has(sequence)) {
			return Promise.reject(new Error(`Checkpoint ${sequence} already exists`))
		}
		this.payloads.set(sequence, Buffer.from(payload))
		return Promise.resolve()
	}

	publish(sequence: number): Promise<void> {
		if (this.consumeFailure()) {
			return Promise.reject(new Error('Injected checkpoint publish failure'))
		}
		this.pointer = sequence
		return Promise.resolve()
	}

	readPointer(): Promise<number | undefined> {
		return Promise.resolve(this.pointer)
	}

	readPayload(sequence: number): Promise<Buffer | undefined> {
		return Promise.resolve(this.payloads.get(sequence))
	}

	listPayloads(): Promise<number[]> {
		return Promise.resolve([...this.payloads.keys()].sort((a, b) => a - b))
	}

	deletePayload(sequence: number): Promise<void> {
		this.payloads.delete(sequence)
		return Promise.resolve()
	}

	close(): Promise<void> {
		return Promise.resolve()
	}

	private consumeFailure(): boolean {
		if (this.failuresLeft <= 0) {
			return false
		}
		this.failuresLeft--
		return true
	}
}
