export interface SleepOptions {
	/**
	 * AbortSignal to cancel the sleep early
	 */
	signal?: AbortSignal
	/**
	 * If true, resolves instead of rejecting when aborted.
	 * Shutdown paths use this so an interrupted backoff is not an error.
	 * @default false
	 */
	resolveOnAbort?: boolean
}

/**
 * Sleep helper that optionally respects an abort signal.
 *
 * @throws Error with message "Aborted" if signal is aborted and resolveOnAbort is false
 *
 * @example
 * // Backoff that ends early on shutdown
 * await sleep(delayMs, { signal: shutdown.signal, resolveOnAbort: true })
 */
export function sleep(ms: number, options?: SleepOptions): Promise<void> {
	const { signal, resolveOnAbort = false } = options ?? {}

	return new Promise((resolve, reject) => {
		if (!signal) {
			setTimeout(resolve, ms)
			return
		}

		const settleAborted = () => {
			if (resolveOnAbort) {
				resolve()
			} else {
				reject(new Error('Aborted'))
			}
		}

		if (signal.aborted) {
			settleAborted()
			return
		}

		const onAbort = () => {
			clearTimeout(timeout)
			signal.removeEventListener('abort', onAbort)
			settleAborted()
		}

		const timeout = setTimeout(() => {
			signal.removeEventListener('abort', onAbort)
			resolve()
		}, ms)

		signal.addEventListener('abort', onAbort)
	})
}
