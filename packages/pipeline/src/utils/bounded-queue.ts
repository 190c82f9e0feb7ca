interface Waiter {
	resolve: () => void
}

export interface TakeOptions {
	signal?: AbortSignal
	/** Give up waiting after this many milliseconds */
	timeoutMs?: number
}

/**
 * Bounded FIFO channel between async tasks.
 *
 * `push` waits while the queue is full and `take` waits while it is empty,
 * which is how backpressure travels from the sink writer back to the source
 * workers. Closing the queue wakes every waiter; items already queued can
 * still be taken.
 */
export class BoundedQueue<T> {
	private readonly items: T[] = []
	private readonly notFull: Waiter[] = []
	private readonly notEmpty: Waiter[] = []
	private closed = false

	constructor(readonly capacity: number) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`)
		}
	}

	get size(): number {
		return this.items.length
	}

	get isClosed(): boolean {
		return this.closed
	}

	/**
	 * Append an item, waiting for room if the queue is full.
	 * @returns false if the queue was closed or the signal aborted first
	 */
	async push(item: T, signal?: AbortSignal): Promise<boolean> {
		while (this.items.length >= this.capacity) {
			if (this.closed || signal?.aborted) {
				return false
			}
			await this.wait(this.notFull, signal)
		}
		if (this.closed) {
			return false
		}

		this.items.push(item)
		this.wakeOne(this.notEmpty)
		return true
	}

	/**
	 * Remove the oldest item, waiting for one if the queue is empty.
	 * @returns undefined if the queue is closed and drained, the signal
	 * aborted, or the timeout elapsed
	 */
	async take(options: TakeOptions = {}): Promise<T | undefined> {
		const deadline = options.timeoutMs !== undefined ? Date.now() + options.timeoutMs : undefined

		while (this.items.length === 0) {
			if (this.closed || options.signal?.aborted) {
				return undefined
			}
			const remaining = deadline !== undefined ? deadline - Date.now() : undefined
			if (remaining !== undefined && remaining <= 0) {
				return undefined
			}
			await this.wait(this.notEmpty, options.signal, remaining)
		}

		const item = this.items.shift()
		this.wakeOne(this.notFull)
		return item
	}

	/**
	 * Remove up to `max` items without waiting.
	 */
	drain(max = Infinity): T[] {
		const count = Math.min(max, this.items.length)
		const taken = this.items.splice(0, count)
		for (let i = 0; i < taken.length; i++) {
			this.wakeOne(this.notFull)
		}
		return taken
	}

	close(): void {
		if (this.closed) {
			return
		}
		this.closed = true
		this.wakeAll(this.notFull)
		this.wakeAll(this.notEmpty)
	}

	private wait(list: Waiter[], signal?: AbortSignal, timeoutMs?: number): Promise<void> {
		return new Promise<void>(resolve => {
			let timer: ReturnType<typeof setTimeout> | undefined

			const waiter: Waiter = {
				resolve: () => {
					if (timer !== undefined) {
						clearTimeout(timer)
					}
					signal?.removeEventListener('abort', onAbort)
					resolve()
				},
			}

			const onAbort = () => {
				const idx = list.indexOf(waiter)
				if (idx !== -1) {
					list.splice(idx, 1)
				}
				waiter.resolve()
			}

			list.push(waiter)

			if (timeoutMs !== undefined) {
				timer = setTimeout(onAbort, timeoutMs)
			}
			if (signal) {
				if (signal.aborted) {
					onAbort()
					return
				}
				signal.addEventListener('abort', onAbort)
			}
		})
	}

	private wakeOne(list: Waiter[]): void {
		list.shift()?.resolve()
	}

	private wakeAll(list: Waiter[]): void {
		for (const waiter of list.splice(0)) {
			waiter.resolve()
		}
	}
}
