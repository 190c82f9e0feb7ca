/**
 * Exponential backoff with jitter for retried reads, writes and checkpoints.
 */

export interface BackoffOptions {
	/** Maximum attempts before giving up (default: Infinity) */
	maxAttempts?: number
	/** Initial backoff delay in ms (default: 100) */
	initialDelayMs?: number
	/** Maximum backoff delay in ms (default: 30000) */
	maxDelayMs?: number
	/** Backoff multiplier (default: 2) */
	multiplier?: number
	/** Jitter factor 0-1 (default: 0.2) */
	jitter?: number
}

/**
 * Backoff formula:
 *   delay = min(initialDelay * multiplier^failures, maxDelay)
 *   jitteredDelay = delay + random(-jitter, +jitter) * delay
 */
export class BackoffStrategy {
	private readonly maxAttempts: number
	private readonly initialDelayMs: number
	private readonly maxDelayMs: number
	private readonly multiplier: number
	private readonly jitter: number

	private failures = 0

	constructor(options: BackoffOptions = {}) {
		this.maxAttempts = options.maxAttempts ?? Infinity
		this.initialDelayMs = options.initialDelayMs ?? 100
		this.maxDelayMs = options.maxDelayMs ?? 30000
		this.multiplier = options.multiplier ?? 2
		this.jitter = Math.min(1, Math.max(0, options.jitter ?? 0.2))
	}

	/**
	 * Whether another attempt is allowed.
	 */
	canAttempt(): boolean {
		return this.failures < this.maxAttempts
	}

	nextDelay(): number {
		const exponentialDelay = this.initialDelayMs * Math.pow(this.multiplier, this.failures)
		const cappedDelay = Math.min(exponentialDelay, this.maxDelayMs)

		const jitterRange = cappedDelay * this.jitter
		const jitterValue = (Math.random() * 2 - 1) * jitterRange

		return Math.max(0, Math.round(cappedDelay + jitterValue))
	}

	recordFailure(): void {
		this.failures++
	}

	recordSuccess(): void {
		this.failures = 0
	}

	get failureCount(): number {
		return this.failures
	}
}
