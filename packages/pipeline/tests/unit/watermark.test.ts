import { describe, expect, it, vi } from 'vitest'
import { SourceWatermark, WatermarkCoordinator } from '../../src/watermark.js'
import type { Logger } from '../../src/logger.js'

function recordingLogger() {
	const warn = vi.fn()
	const logger: Logger = { error: vi.fn(), warn, info: vi.fn(), debug: vi.fn(), child: () => logger }
	return { logger, warn }
}

describe('SourceWatermark', () => {
	it('trails the newest event by the allowed lateness', () => {
		const watermark = new SourceWatermark('views', { allowedLatenessMs: 1_000 })
		expect(watermark.current()).toBe(-Infinity)

		watermark.observe(10_000)
		watermark.observe(4_000)

		expect(watermark.maxEventTime).toBe(10_000)
		expect(watermark.current()).toBe(9_000)
		expect(watermark.isLate(8_999)).toBe(true)
		expect(watermark.isLate(9_000)).toBe(false)
	})

	it('contributes its newest event when lateness is unbounded', () => {
		const watermark = new SourceWatermark('products', { allowedLatenessMs: Infinity })
		watermark.observe(500)
		expect(watermark.bounded).toBe(false)
		expect(watermark.current()).toBe(500)
		expect(watermark.isLate(0)).toBe(false)
	})

	it('never moves backwards on restore', () => {
		const watermark = new SourceWatermark('sales', { allowedLatenessMs: 0 })
		watermark.observe(2_000)
		watermark.restore(1_000)
		expect(watermark.maxEventTime).toBe(2_000)
	})
})

describe('WatermarkCoordinator', () => {
	function setup(now: () => number = () => 0) {
		const { logger, warn } = recordingLogger()
		const coordinator = new WatermarkCoordinator(
			[
				new SourceWatermark('products', { allowedLatenessMs: Infinity, idleTimeoutMs: 5_000 }),
				new SourceWatermark('views', { allowedLatenessMs: 1_000 }),
			],
			{ stallTimeoutMs: 60_000, logger, now }
		)
		return { coordinator, warn }
	}

	it('takes the minimum over active sources', () => {
		const { coordinator } = setup()
		expect(coordinator.advance()).toBe(-Infinity)

		coordinator.observe('products', 500)
		coordinator.observe('views', 10_000)

		expect(coordinator.advance()).toBe(500)
	})

	it('skips idle sources and never decreases', () => {
		const { coordinator } = setup()
		coordinator.observe('products', 500)
		coordinator.observe('views', 10_000)

		coordinator.setIdle('products', true)
		expect(coordinator.advance()).toBe(9_000)

		coordinator.setIdle('products', false)
		expect(coordinator.advance()).toBe(9_000)
	})

	it('holds the watermark while a source is unavailable, even if idle', () => {
		const { coordinator } = setup()
		coordinator.observe('products', 500)
		coordinator.observe('views', 10_000)
		coordinator.setIdle('products', true)
		coordinator.setAvailable('products', false)

		coordinator.observe('views', 20_000)
		expect(coordinator.advance()).toBe(500)

		coordinator.setAvailable('products', true)
		expect(coordinator.advance()).toBe(19_000)
	})

	it('holds when every source is idle', () => {
		const { coordinator } = setup()
		coordinator.observe('products', 500)
		coordinator.observe('views', 10_000)
		coordinator.advance()
		coordinator.setIdle('products', true)
		coordinator.setIdle('views', true)
		expect(coordinator.advance()).toBe(500)
	})

	it('flags a stalling source once', () => {
		let now = 0
		const { coordinator, warn } = setup(() => now)
		coordinator.observe('products', 1_000)
		coordinator.observe('views', 50_000)
		coordinator.advance()

		now = 59_999
		expect(coordinator.checkStall()).toBeUndefined()

		now = 60_000
		expect(coordinator.checkStall()).toBe('products')
		expect(coordinator.checkStall()).toBe('products')
		expect(coordinator.stalledSource).toBe('products')
		expect(warn).toHaveBeenCalledTimes(1)
		expect(warn).toHaveBeenCalledWith(
			'source is stalling the global watermark',
			expect.objectContaining({ source: 'products', globalWatermark: 1_000 })
		)

		coordinator.observe('products', 2_000)
		coordinator.advance()
		expect(coordinator.stalledSource).toBeUndefined()
	})

	it('does not flag a stall when no source is ahead', () => {
		let now = 0
		const { coordinator } = setup(() => now)
		coordinator.observe('products', 1_000)
		coordinator.observe('views', 2_000)
		coordinator.advance()

		now = 120_000
		expect(coordinator.checkStall()).toBeUndefined()
	})

	it('round-trips through a snapshot', () => {
		const { coordinator } = setup()
		expect(coordinator.snapshot()).toEqual({ global: null, maxEventTimes: { products: null, views: null } })

		coordinator.observe('products', 1_000)
		coordinator.observe('views', 5_000)
		coordinator.advance()
		const snapshot = coordinator.snapshot()
		expect(snapshot).toEqual({ global: 1_000, maxEventTimes: { products: 1_000, views: 5_000 } })

		const restored = setup().coordinator
		restored.restore(snapshot)
		expect(restored.global).toBe(1_000)
		expect(restored.source('views').current()).toBe(4_000)
	})

	it('rejects unknown sources', () => {
		const { coordinator } = setup()
		expect(() => coordinator.observe('clicks', 1)).toThrow('Unknown source "clicks"')
	})
})
