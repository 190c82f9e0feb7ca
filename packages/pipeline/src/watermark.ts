import type { Logger } from './logger.js'
import { noopLogger } from './logger.js'

export interface SourceWatermarkOptions {
	/** How far behind its newest event a source's watermark trails; Infinity when unbounded */
	allowedLatenessMs: number
	/** Polls returning nothing for this long mark the source idle; undefined never does */
	idleTimeoutMs?: number
}

/**
 * Event-time progress of one source: `max(event_time seen) - allowed_lateness`.
 * A source with unbounded lateness contributes its newest event time and
 * never classifies a record as late.
 */
export class SourceWatermark {
	readonly allowedLatenessMs: number
	readonly idleTimeoutMs: number | undefined
	private maxEventTimeSeen = -Infinity

	constructor(
		readonly name: string,
		options: SourceWatermarkOptions
	) {
		this.allowedLatenessMs = options.allowedLatenessMs
		this.idleTimeoutMs = options.idleTimeoutMs
	}

	get maxEventTime(): number {
		return this.maxEventTimeSeen
	}

	get bounded(): boolean {
		return Number.isFinite(this.allowedLatenessMs)
	}

	observe(eventTime: number): void {
		if (eventTime > this.maxEventTimeSeen) {
			this.maxEventTimeSeen = eventTime
		}
	}

	current(): number {
		return this.bounded ? this.maxEventTimeSeen - this.allowedLatenessMs : this.maxEventTimeSeen
	}

	/**
	 * True if the event is already behind this source's watermark.
	 */
	isLate(eventTime: number): boolean {
		return this.bounded && eventTime < this.current()
	}

	restore(maxEventTime: number): void {
		this.maxEventTimeSeen = Math.max(this.maxEventTimeSeen, maxEventTime)
	}
}

export interface WatermarkSnapshot {
	/** null while the watermark is still at its initial -Infinity */
	global: number | null
	maxEventTimes: Record<string, number | null>
}

export interface SourceWatermarkStatus {
	watermark: number
	maxEventTime: number
	idle: boolean
	available: boolean
}

export interface WatermarkCoordinatorOptions {
	/** How long one source may hold the global watermark back before it is flagged stalled */
	stallTimeoutMs?: number
	logger?: Logger
	now?: () => number
}

interface SourceState {
	watermark: SourceWatermark
	idle: boolean
	available: boolean
}

export function toNullableTime(time: number): number | null {
	return Number.isFinite(time) ? time : null
}

export function fromNullableTime(time: number | null): number {
	return time ?? -Infinity
}

/**
 * Combines per-source watermarks into the global watermark.
 *
 * The global watermark is the minimum over sources that are not idle; an
 * unavailable source always counts, so an outage freezes progress rather
 * than letting views finalize without data that is merely delayed. The
 * value never decreases.
 */
export class WatermarkCoordinator {
	private readonly sources = new Map<string, SourceState>()
	private readonly stallTimeoutMs: number
	private readonly logger: Logger
	private readonly now: () => number

	private globalWatermark = -Infinity
	private lastAdvanceAt: number
	private stalled: string | undefined

	constructor(watermarks: SourceWatermark[], options: WatermarkCoordinatorOptions = {}) {
		for (const watermark of watermarks) {
			this.sources.set(watermark.name, { watermark, idle: false, available: true })
		}
		this.stallTimeoutMs = options.stallTimeoutMs ?? 60_000
		this.logger = (options.logger ?? noopLogger).child({ component: 'watermark' })
		this.now = options.now ?? Date.now
		this.lastAdvanceAt = this.now()
	}

	get global(): number {
		return this.globalWatermark
	}

	/** Name of the source currently flagged as stalling the pipeline */
	get stalledSource(): string | undefined {
		return this.stalled
	}

	source(name: string): SourceWatermark {
		return this.state(name).watermark
	}

	observe(name: string, eventTime: number): void {
		this.state(name).watermark.observe(eventTime)
	}

	setIdle(name: string, idle: boolean): void {
		const state = this.state(name)
		if (state.idle !== idle) {
			this.logger.debug(idle ? 'source idle' : 'source active', { source: name })
			state.idle = idle
		}
	}

	setAvailable(name: string, available: boolean): void {
		this.state(name).available = available
	}

	/**
	 * Recompute the global watermark from the current per-source values.
	 * @returns the (possibly unchanged) global watermark
	 */
	advance(): number {
		const holder = this.holder()
		if (holder && holder.value > this.globalWatermark) {
			this.globalWatermark = holder.value
			this.lastAdvanceAt = this.now()
			if (this.stalled !== undefined) {
				this.logger.info('source no longer stalled', { source: this.stalled })
				this.stalled = undefined
			}
		}
		return this.globalWatermark
	}

	/**
	 * Flag the source holding the global watermark back if it has done so for
	 * longer than the stall timeout while other sources moved ahead. Logged
	 * once per stall.
	 */
	checkStall(): string | undefined {
		if (this.stalled !== undefined || this.now() - this.lastAdvanceAt < this.stallTimeoutMs) {
			return this.stalled
		}
		const holder = this.holder()
		if (!holder) {
			return undefined
		}
		const aheadOfHolder = [...this.sources.values()].some(state => state.watermark.current() > holder.value)
		if (aheadOfHolder) {
			this.stalled = holder.name
			this.logger.warn('source is stalling the global watermark', {
				source: holder.name,
				globalWatermark: toNullableTime(this.globalWatermark),
				heldForMs: this.now() - this.lastAdvanceAt,
			})
		}
		return this.stalled
	}

	status(): Record<string, SourceWatermarkStatus> {
		const result: Record<string, SourceWatermarkStatus> = {}
		for (const [name, state] of this.sources) {
			result[name] = {
				watermark: state.watermark.current(),
				maxEventTime: state.watermark.maxEventTime,
				idle: state.idle,
				available: state.available,
			}
		}
		return result
	}

	snapshot(): WatermarkSnapshot {
		const maxEventTimes: Record<string, number | null> = {}
		for (const [name, state] of this.sources) {
			maxEventTimes[name] = toNullableTime(state.watermark.maxEventTime)
		}
		return { global: toNullableTime(this.globalWatermark), maxEventTimes }
	}

	restore(snapshot: WatermarkSnapshot): void {
		for (const [name, maxEventTime] of Object.entries(snapshot.maxEventTimes)) {
			this.sources.get(name)?.watermark.restore(fromNullableTime(maxEventTime))
		}
		this.globalWatermark = Math.max(this.globalWatermark, fromNullableTime(snapshot.global))
		this.lastAdvanceAt = this.now()
	}

	/**
	 * The counted source with the lowest watermark, or undefined if every
	 * source is idle.
	 */
	private holder(): { name: string; value: number } | undefined {
		let holder: { name: string; value: number } | undefined
		for (const [name, state] of this.sources) {
			if (state.idle && state.available) {
				continue
			}
			const value = state.watermark.current()
			if (!holder || value < holder.value) {
				holder = { name, value }
			}
		}
		return holder
	}

	private state(name: string): SourceState {
		const state = this.sources.get(name)
		if (!state) {
			throw new Error(`Unknown source "${name}"`)
		}
		return state
	}
}
