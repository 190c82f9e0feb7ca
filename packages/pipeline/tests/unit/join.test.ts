import { describe, expect, it } from 'vitest'
import {
	inMemory,
	JoinEngine,
	StateStoreCapacityExceededError,
	createSaleMatcher,
	type EnrichedRecord,
	type JoinEngineOptions,
	type ProductRecord,
	type SaleEvent,
	type UserRecord,
	type ViewEvent,
} from '../../src/index.js'

const product: ProductRecord = { id: 'P1', name: 'Trail Shoe', brand: 'Acme', sale_price: 89.5, rating: 4.2 }
const user: UserRecord = { id: 'U1', first_name: 'Ada', last_name: 'Lovelace', city: 'London' }

function view(overrides: Partial<ViewEvent> = {}): ViewEvent {
	return { product_id: 'P1', user_id: 'U1', view_time: 78, event_time: 10_000, ...overrides }
}

function sale(orderId: number, eventTime: number, overrides: Partial<SaleEvent> = {}): SaleEvent {
	return { order_id: orderId, product_id: 'P1', customer_id: 'U1', event_time: eventTime, ...overrides }
}

async function setup(options: Partial<JoinEngineOptions> = {}) {
	const emitted: EnrichedRecord[] = []
	const engine = new JoinEngine({
		provider: inMemory(),
		emit: record => {
			emitted.push(record)
			return Promise.resolve()
		},
		joinLatenessMs: 30_000,
		...options,
	})
	await engine.init()
	return { engine, emitted }
}

describe('JoinEngine', () => {
	it('joins a sale that arrives before the deadline', async () => {
		const { engine, emitted } = await setup()
		await engine.applyProduct(product)
		await engine.applyUser(user)
		await engine.applyView(view())
		expect(emitted).toHaveLength(0)

		await engine.applySale(sale(1000, 9_995))
		expect(emitted).toHaveLength(0)

		await engine.advanceWatermark(40_000)

		expect(emitted).toEqual([
			{
				product_id: 'P1',
				user_id: 'U1',
				first_name: 'Ada',
				last_name: 'Lovelace',
				product_name: 'Trail Shoe',
				brand: 'Acme',
				order_id: 1000,
				order_date: '1970-01-01T00:00:09.995Z',
				view_time: 78,
			},
		])
	})

	it('emits a null order once the watermark passes the deadline', async () => {
		const { engine, emitted } = await setup()
		await engine.applyProduct(product)
		await engine.applyUser(user)
		await engine.applyView(view())

		await engine.advanceWatermark(39_999)
		expect(emitted).toHaveLength(0)

		await engine.advanceWatermark(40_000)
		await engine.applySale(sale(1000, 9_995))

		expect(emitted).toHaveLength(1)
		expect(emitted[0]).toMatchObject({ product_name: 'Trail Shoe', first_name: 'Ada', order_id: null, order_date: null })
	})

	it('picks the most recent of several eligible sales', async () => {
		const { engine, emitted } = await setup()
		await engine.applyProduct(product)
		await engine.applyUser(user)
		await engine.applySale(sale(1, 9_000))
		await engine.applySale(sale(2, 9_500))

		await engine.applyView(view())
		await engine.advanceWatermark(40_000)

		expect(emitted.map(record => record.order_id)).toEqual([2])
	})

	it('picks the most recent sale when it arrives after the view', async () => {
		for (const finalization of ['deadline', 'eager'] as const) {
			const { engine, emitted } = await setup({ finalization })
			await engine.applyProduct(product)
			await engine.applyUser(user)
			await engine.applySale(sale(1, 9_000))
			await engine.applyView(view())
			await engine.applySale(sale(2, 9_500))
			expect(emitted).toHaveLength(0)

			await engine.advanceWatermark(50_000)

			expect(emitted.map(record => record.order_id)).toEqual([2])
		}
	})

	it('gives the same result for any arrival order under deadline finalization', async () => {
		const events = [
			(engine: JoinEngine) => engine.applyProduct(product),
			(engine: JoinEngine) => engine.applyUser(user),
			(engine: JoinEngine) => engine.applySale(sale(1, 9_000)),
			(engine: JoinEngine) => engine.applySale(sale(2, 9_500)),
			(engine: JoinEngine) => engine.applyView(view()),
		]

		const outputs: EnrichedRecord[][] = []
		for (const order of [events, [...events].reverse()]) {
			const { engine, emitted } = await setup({ finalization: 'deadline' })
			for (const apply of order) {
				await apply(engine)
			}
			expect(emitted).toHaveLength(0)
			await engine.advanceWatermark(100_000)
			outputs.push(emitted)
		}

		expect(outputs[0]).toEqual(outputs[1])
		expect(outputs[0]?.[0]?.order_id).toBe(2)
	})

	it('fills nulls for everything not found', async () => {
		const { engine, emitted } = await setup()
		await engine.applyView(view({ product_id: 'P9', user_id: 'U9', view_time: 5 }))
		await engine.advanceWatermark(40_000)

		expect(emitted).toEqual([
			{
				product_id: 'P9',
				user_id: 'U9',
				first_name: null,
				last_name: null,
				product_name: null,
				brand: null,
				order_id: null,
				order_date: null,
				view_time: 5,
			},
		])
		expect(engine.stats()).toMatchObject({ viewsFinalized: 1, viewsUnmatched: 1, viewsMatched: 0 })
	})

	it('finalizes a view whose deadline has already passed on arrival', async () => {
		const { engine, emitted } = await setup()
		await engine.advanceWatermark(50_000)

		await engine.applyView(view())

		expect(emitted).toHaveLength(1)
		expect(engine.stats()).toMatchObject({ lateViews: 1, pendingViews: 0 })
	})

	it('ignores a view that is already pending', async () => {
		const { engine, emitted } = await setup()
		await engine.applyView(view())
		await engine.applyView(view())

		expect(engine.stats()).toMatchObject({ viewsArrived: 2, duplicateViews: 1, pendingViews: 1 })

		await engine.advanceWatermark(40_000)
		expect(emitted).toHaveLength(1)
	})

	it('finalizes early under eager only once the match window has closed', async () => {
		const { engine, emitted } = await setup({ finalization: 'eager', matchWindowMs: 1_000 })
		await engine.applyProduct(product)
		await engine.applyUser(user)
		await engine.applySale(sale(1, 9_000))
		await engine.applyView(view())
		await engine.applySale(sale(2, 9_500))
		await engine.advanceWatermark(11_000)
		expect(emitted).toHaveLength(0)

		await engine.advanceWatermark(11_001)

		expect(emitted.map(record => record.order_id)).toEqual([2])
		expect(engine.stats().pendingViews).toBe(0)
	})

	it('drops a view redelivered after it was finalized', async () => {
		const { engine, emitted } = await setup()
		await engine.applyProduct(product)
		await engine.applyUser(user)
		await engine.applyView(view())
		await engine.advanceWatermark(50_000)

		await engine.applySale(sale(1000, 9_995))
		await engine.applyView(view())

		expect(emitted.map(record => record.order_id)).toEqual([null])
		expect(engine.stats()).toMatchObject({ viewsArrived: 2, viewsFinalized: 1, duplicateViews: 1, lateViews: 0 })
	})

	it('forgets finalized views once their redelivery window has passed', async () => {
		const { engine, emitted } = await setup({ redeliveryWindowMs: 10_000 })
		await engine.applyView(view())
		await engine.advanceWatermark(40_000)
		expect((await engine.snapshot()).finalizedViews).toEqual([{ id: 'P1|U1|78', expiresAt: 50_000 }])

		await engine.advanceWatermark(49_999)
		expect((await engine.snapshot()).finalizedViews).toHaveLength(1)

		await engine.advanceWatermark(50_000)
		expect((await engine.snapshot()).finalizedViews).toEqual([])

		await engine.applyView(view())
		expect(emitted).toHaveLength(2)
		expect(engine.stats()).toMatchObject({ lateViews: 1, duplicateViews: 0 })
	})

	it('completes a settled view under eager when its missing user arrives', async () => {
		const { engine, emitted } = await setup({ finalization: 'eager', matchWindowMs: 0 })
		await engine.applyProduct(product)
		await engine.applySale(sale(1000, 9_000))
		await engine.applyView(view())
		await engine.advanceWatermark(10_001)
		expect(emitted).toHaveLength(0)

		await engine.applyUser(user)

		expect(emitted).toHaveLength(1)
		expect(emitted[0]).toMatchObject({ first_name: 'Ada', order_id: 1000 })
	})

	it('ignores later watermarks that do not advance', async () => {
		const { engine } = await setup()
		await engine.advanceWatermark(10)
		await engine.advanceWatermark(5)
		expect(engine.currentWatermark).toBe(10)
	})

	it('respects the match window', async () => {
		const bounded = await setup({ finalization: 'deadline', matchWindowMs: 0 })
		const unbounded = await setup({ finalization: 'deadline' })
		for (const { engine } of [bounded, unbounded]) {
			await engine.applySale(sale(7, 10_005))
			await engine.applyView(view())
			await engine.advanceWatermark(40_000)
		}

		expect(bounded.emitted[0]?.order_id).toBeNull()
		expect(unbounded.emitted[0]?.order_id).toBe(7)
	})

	it('can require the sale to come from the viewing customer', async () => {
		const { engine, emitted } = await setup({ saleMatch: 'product-and-customer' })
		await engine.applyProduct(product)
		await engine.applyUser(user)
		await engine.applySale(sale(1, 9_000))
		await engine.applySale(sale(2, 9_500, { customer_id: 'U2' }))

		await engine.applyView(view())
		await engine.advanceWatermark(40_000)

		expect(emitted.map(record => record.order_id)).toEqual([1])
	})

	it('replaces a sale redelivered with the same order id', async () => {
		const { engine } = await setup()
		await engine.applySale(sale(1, 9_000))
		await engine.applySale(sale(1, 9_000))
		expect(engine.stats().bufferedSales).toBe(1)
	})

	it('evicts sales superseded for every future view', async () => {
		const { engine } = await setup({ finalization: 'deadline' })
		await engine.applySale(sale(1, 1_000))
		await engine.applySale(sale(2, 2_000))
		await engine.applySale(sale(3, 3_000))

		await engine.advanceWatermark(5_000)

		expect(engine.stats()).toMatchObject({ salesEvicted: 2, bufferedSales: 1 })
		expect((await engine.store.salesFor('P1')).map(s => s.order_id)).toEqual([3])
	})

	it('keeps a sale a pending view still selects', async () => {
		const { engine, emitted } = await setup({ finalization: 'deadline', matchWindowMs: 0 })
		await engine.applySale(sale(1, 1_000))
		await engine.applyView(view({ event_time: 1_500 }))
		await engine.applySale(sale(2, 2_000))

		await engine.advanceWatermark(5_000)
		expect((await engine.store.salesFor('P1')).map(s => s.order_id)).toEqual([1, 2])

		await engine.advanceWatermark(31_500)
		expect(emitted.map(record => record.order_id)).toEqual([1])

		await engine.advanceWatermark(31_501)
		expect((await engine.store.salesFor('P1')).map(s => s.order_id)).toEqual([2])
	})

	describe('capacity', () => {
		it('fails when pending views exceed the bound', async () => {
			const { engine } = await setup({ maxPendingViews: 1 })
			await engine.applyView(view({ view_time: 1 }))
			await expect(engine.applyView(view({ view_time: 2 }))).rejects.toBeInstanceOf(
				StateStoreCapacityExceededError
			)
		})

		it('force-finalizes the oldest pending view', async () => {
			const { engine, emitted } = await setup({ maxPendingViews: 1, overflowPolicy: 'force-finalize' })
			await engine.applyView(view({ view_time: 1, event_time: 10_000 }))
			await engine.applyView(view({ view_time: 2, event_time: 20_000 }))

			expect(emitted.map(record => record.view_time)).toEqual([1])
			expect(engine.stats()).toMatchObject({ forcedFinalizations: 1, pendingViews: 1 })
		})

		it('fails when buffered sales exceed the bound', async () => {
			const { engine } = await setup({ maxBufferedSales: 1 })
			await engine.applySale(sale(1, 1_000))
			const error = await engine.applySale(sale(2, 2_000)).catch((e: unknown) => e)
			expect(error).toBeInstanceOf(StateStoreCapacityExceededError)
			expect(error instanceof StateStoreCapacityExceededError && error.buffer).toBe('sales')
		})

		it('drops superseded sales before failing under force-finalize', async () => {
			const { engine } = await setup({ maxBufferedSales: 1, overflowPolicy: 'force-finalize' })
			await engine.applySale(sale(1, 1_000))
			await engine.applySale(sale(2, 2_000))
			expect(engine.stats()).toMatchObject({ bufferedSales: 1, salesEvicted: 1 })
		})
	})

	it('keeps dropping redelivered views after a restore', async () => {
		const first = await setup()
		await first.engine.applyView(view())
		await first.engine.advanceWatermark(40_000)
		const snapshot = await first.engine.snapshot()

		const second = await setup()
		await second.engine.restore(snapshot, 40_000)
		await second.engine.applyView(view())

		expect(second.emitted).toHaveLength(0)
		expect(second.engine.stats()).toMatchObject({ duplicateViews: 1, lateViews: 0 })
	})

	it('restores pending views and resumes joining them', async () => {
		const first = await setup()
		await first.engine.applyProduct(product)
		await first.engine.applyView(view())
		await first.engine.advanceWatermark(5_000)
		const snapshot = await first.engine.snapshot()

		const second = await setup()
		await second.engine.restore(snapshot, 5_000)
		expect(second.engine.currentWatermark).toBe(5_000)
		expect(second.engine.stats().pendingViews).toBe(1)

		await second.engine.applyUser(user)
		await second.engine.applySale(sale(1000, 9_995))
		await second.engine.advanceWatermark(40_000)

		expect(second.emitted).toHaveLength(1)
		expect(second.emitted[0]).toMatchObject({ product_name: 'Trail Shoe', first_name: 'Ada', order_id: 1000 })
	})
})

describe('createSaleMatcher', () => {
	it('prefers the sale buffered last among equal event times', () => {
		const matcher = createSaleMatcher({ matchWindowMs: Infinity, saleMatch: 'product' })
		const selected = matcher.select(view(), [sale(1, 9_000), sale(2, 9_000)])
		expect(selected?.order_id).toBe(2)
	})

	it('ignores sales of other products', () => {
		const matcher = createSaleMatcher({ matchWindowMs: Infinity, saleMatch: 'product' })
		expect(matcher.select(view(), [sale(1, 9_000, { product_id: 'P2' })])).toBeUndefined()
	})
})
