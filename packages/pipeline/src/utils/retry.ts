import { BackoffStrategy, type BackoffOptions } from './backoff.js'
import { sleep } from './sleep.js'

export type RetryOptions = BackoffOptions & {
	signal?: AbortSignal
	shouldRetry?: (error: unknown) => boolean
	onRetry?: (params: { attempt: number; delayMs: number; error: unknown }) => void | Promise<void>
}

/**
 * Run `fn` until it succeeds, the attempts run out, `shouldRetry` declines the
 * error, or `signal` aborts. The last error is rethrown in every case.
 */
export async function retry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
	const { signal, shouldRetry, onRetry, ...backoffOptions } = options
	const strategy = new BackoffStrategy(backoffOptions)

	for (;;) {
		const attempt = strategy.failureCount + 1
		try {
			return await fn(attempt)
		} catch (error) {
			if (shouldRetry && !shouldRetry(error)) {
				throw error
			}

			const delayMs = strategy.nextDelay()
			strategy.recordFailure()
			if (!strategy.canAttempt() || signal?.aborted) {
				throw error
			}

			await onRetry?.({ attempt, delayMs, error })
			await sleep(delayMs, { signal, resolveOnAbort: true })
			if (signal?.aborted) {
				throw error
			}
		}
	}
}
