/**
 * Single-permit async lock. The join loop holds it while it applies a batch;
 * the checkpoint task takes it to snapshot state between batches.
 */
export class Mutex {
	private locked = false
	private readonly waiting: Array<() => void> = []

	async acquire(): Promise<void> {
		if (!this.locked) {
			this.locked = true
			return
		}

		return new Promise<void>(resolve => {
			this.waiting.push(resolve)
		})
	}

	release(): void {
		const next = this.waiting.shift()
		if (next) {
			next()
			return
		}
		this.locked = false
	}

	async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
		await this.acquire()
		try {
			return await fn()
		} finally {
			this.release()
		}
	}

	get isLocked(): boolean {
		return this.locked
	}
}
