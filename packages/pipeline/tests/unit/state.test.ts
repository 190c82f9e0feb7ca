import { beforeEach, describe, expect, it } from 'vitest'
import {
	createSaleMatcher,
	inMemory,
	InMemoryKeyValueStore,
	json,
	KeyedStateStore,
	string,
	type PendingView,
	type SaleEvent,
} from '../../src/index.js'

function sale(orderId: number, productId: string, eventTime: number): SaleEvent {
	return { order_id: orderId, product_id: productId, customer_id: 'U1', event_time: eventTime }
}

function pendingView(productId: string, viewTime: number, deadline: number, sequence: number): PendingView {
	return {
		id: `${productId}|U1|${viewTime}`,
		view: { product_id: productId, user_id: 'U1', view_time: viewTime, event_time: deadline - 1_000 },
		deadline,
		sequence,
	}
}

describe('InMemoryKeyValueStore', () => {
	let store: InMemoryKeyValueStore<string, { count: number }>

	beforeEach(() => {
		store = new InMemoryKeyValueStore('counters', { keyCodec: string(), valueCodec: json<{ count: number }>() })
	})

	it('hands out copies of stored values', async () => {
		await store.put('a', { count: 1 })
		const value = await store.get('a')
		if (value) {
			value.count = 99
		}
		expect(await store.get('a')).toEqual({ count: 1 })
		expect(await store.get('missing')).toBeUndefined()
	})

	it('lets callers delete while iterating', async () => {
		await store.put('a', { count: 1 })
		await store.put('b', { count: 2 })

		const seen: string[] = []
		for await (const [key] of store.all()) {
			seen.push(key)
			await store.delete(key)
		}

		expect(seen).toEqual(['a', 'b'])
		expect(await store.approximateNumEntries()).toBe(0)
	})

	it('clears every entry', async () => {
		await store.put('a', { count: 1 })
		await store.clear()
		expect(await store.get('a')).toBeUndefined()
	})
})

describe('KeyedStateStore', () => {
	let store: KeyedStateStore

	async function createStore(): Promise<KeyedStateStore> {
		const created = new KeyedStateStore(inMemory(), createSaleMatcher({ matchWindowMs: Infinity, saleMatch: 'product' }))
		await created.init()
		return created
	}

	beforeEach(async () => {
		store = await createStore()
	})

	it('keeps sales in event-time order and replaces a redelivered order', async () => {
		expect(await store.bufferFact({ type: 'sale', key: 'P1', event: sale(1, 'P1', 300) })).toBe(true)
		await store.bufferFact({ type: 'sale', key: 'P1', event: sale(2, 'P1', 100) })
		await store.bufferFact({ type: 'sale', key: 'P1', event: sale(3, 'P1', 200) })
		expect(await store.bufferFact({ type: 'sale', key: 'P1', event: sale(1, 'P1', 50) })).toBe(false)

		expect((await store.salesFor('P1')).map(s => [s.order_id, s.event_time])).toEqual([
			[1, 50],
			[2, 100],
			[3, 200],
		])
		expect(store.bufferedSaleCount).toBe(3)
		expect(await store.salesFor('P9')).toEqual([])
	})

	it('leaves a pending view in place when it is buffered again', async () => {
		const first = pendingView('P1', 1, 2_000, 0)
		expect(await store.bufferFact({ type: 'view', key: first.id, event: first })).toBe(true)
		expect(
			await store.bufferFact({ type: 'view', key: first.id, event: { ...first, deadline: 9_000, sequence: 1 } })
		).toBe(false)

		expect(store.isPending('P1|U1|1')).toBe(true)
		expect(store.pendingViewCount).toBe(1)
		expect(await store.takeOldestPending(1)).toEqual([first])
	})

	it('drains the views pending on an entity, oldest deadline first', async () => {
		const later = pendingView('P1', 1, 3_000, 0)
		const earlier = pendingView('P1', 2, 2_000, 1)
		const other = pendingView('P2', 3, 1_000, 2)
		for (const view of [later, earlier, other]) {
			await store.bufferFact({ type: 'view', key: view.id, event: view })
		}

		expect(await store.drainMatchingFacts('product', 'P1')).toEqual([earlier, later])
		expect(await store.drainMatchingFacts('product', 'P1')).toEqual([])
		expect(store.isPending(later.id)).toBe(false)
		expect(store.pendingViewCount).toBe(1)
		expect(await store.drainMatchingFacts('user', 'U1')).toEqual([other])
	})

	it('takes the views with the earliest deadlines', async () => {
		const views = [pendingView('P1', 1, 3_000, 0), pendingView('P1', 2, 1_000, 1), pendingView('P1', 3, 1_000, 2)]
		for (const view of views) {
			await store.bufferFact({ type: 'view', key: view.id, event: view })
		}

		expect((await store.takeOldestPending(2)).map(view => view.id)).toEqual(['P1|U1|2', 'P1|U1|3'])
		expect(store.pendingViewCount).toBe(1)
	})

	it('expires views at the watermark and drops superseded sales', async () => {
		for (const view of [pendingView('P2', 1, 100, 0), pendingView('P2', 2, 200, 1), pendingView('P2', 3, 300, 2)]) {
			await store.bufferFact({ type: 'view', key: view.id, event: view })
		}
		for (const event of [sale(1, 'P1', 50), sale(2, 'P1', 100), sale(3, 'P1', 200)]) {
			await store.bufferFact({ type: 'sale', key: 'P1', event })
		}

		const { expired, evictedSales } = await store.evictOlderThan(200)

		expect(expired.map(view => view.id)).toEqual(['P2|U1|1', 'P2|U1|2'])
		expect(evictedSales).toBe(2)
		expect((await store.salesFor('P1')).map(s => s.order_id)).toEqual([3])
		expect(store.pendingViewCount).toBe(1)
		expect(store.bufferedSaleCount).toBe(1)
	})

	it('restores a snapshot and rebuilds its indexes', async () => {
		await store.upsertDimension('product', 'P1', { id: 'P1', name: 'Trail Shoe', brand: 'Acme' })
		await store.upsertDimension('user', 'U1', { id: 'U1', first_name: 'Ada' })
		await store.bufferFact({ type: 'sale', key: 'P1', event: sale(1, 'P1', 100) })
		await store.bufferFact({ type: 'sale', key: 'P1', event: sale(2, 'P1', 200) })
		const slow = pendingView('P1', 1, 2_000, 0)
		const fast = pendingView('P2', 2, 1_000, 5)
		await store.bufferFact({ type: 'view', key: slow.id, event: slow })
		await store.bufferFact({ type: 'view', key: fast.id, event: fast })

		const snapshot = await store.snapshot()
		expect(snapshot.pendingViews).toEqual([fast, slow])
		expect(snapshot.sales.map(s => s.order_id)).toEqual([1, 2])

		const restored = await createStore()
		await restored.restore(snapshot)

		expect(await restored.getDimension('product', 'P1')).toEqual({ id: 'P1', name: 'Trail Shoe', brand: 'Acme' })
		expect(await restored.getDimension('user', 'U1')).toEqual({ id: 'U1', first_name: 'Ada' })
		expect(restored.isPending(slow.id)).toBe(true)
		expect(restored.bufferedSaleCount).toBe(2)
		expect(restored.allocateSequence()).toBe(6)
		expect(await restored.drainMatchingFacts('product', 'P2')).toEqual([fast])
		expect(await restored.stats()).toEqual({
			pendingViews: 1,
			bufferedSales: 2,
			finalizedViews: 0,
			products: 1,
			users: 1,
		})
	})

	it('remembers finalized views until the watermark reaches their expiry', async () => {
		await store.markFinalized('a', 300)
		await store.markFinalized('b', 100)
		await store.markFinalized('c', 200)
		await store.markFinalized('a', 999)

		const snapshot = await store.snapshot()
		expect(snapshot.finalizedViews).toEqual([
			{ id: 'b', expiresAt: 100 },
			{ id: 'c', expiresAt: 200 },
			{ id: 'a', expiresAt: 300 },
		])

		const { forgottenViews } = await store.evictOlderThan(200)
		expect(forgottenViews).toBe(2)
		expect(store.isFinalized('b')).toBe(false)
		expect(store.isFinalized('c')).toBe(false)
		expect(store.isFinalized('a')).toBe(true)

		const restored = await createStore()
		await restored.restore(snapshot)
		expect(restored.isFinalized('b')).toBe(true)
		expect((await restored.stats()).finalizedViews).toBe(3)
	})
})
