import { json, string } from '../codec.js'
import type { DimensionRecords, EntityType, ProductRecord, SaleEvent, UserRecord, ViewEvent } from '../records.js'
import type { KeyValueStore, StateStoreProvider } from '../state.js'

/**
 * A view held back until its join completes or its deadline passes.
 */
export interface PendingView {
	/** `product_id|user_id|view_time` */
	id: string
	view: ViewEvent
	/** Event time at which the view is finalized whatever it has found */
	deadline: number
	/** Arrival order; breaks deadline ties deterministically */
	sequence: number
}

export type BufferedFact = { type: 'sale'; key: string; event: SaleEvent } | { type: 'view'; key: string; event: PendingView }

/**
 * Decides which buffered sale a view joins with. The store consults it to
 * know which sales may still be selected and which are superseded.
 */
export interface SaleMatcher {
	/** Upper bound on `sale.event_time - view.event_time`; Infinity when unbounded */
	readonly matchWindowMs: number
	/** Sales in different groups never supersede each other */
	groupOf(sale: SaleEvent): string
	select(view: ViewEvent, sales: readonly SaleEvent[]): SaleEvent | undefined
}

/**
 * A view already emitted. A redelivery of its id is dropped until the
 * watermark reaches `expiresAt`.
 */
export interface FinalizedView {
	id: string
	expiresAt: number
}

export interface StateSnapshot {
	products: ProductRecord[]
	users: UserRecord[]
	/** Grouped by product, each group in event-time order */
	sales: SaleEvent[]
	pendingViews: PendingView[]
	/** In expiry order */
	finalizedViews: FinalizedView[]
}

export interface EvictionResult {
	/** Views whose deadline is at or behind the watermark, oldest first */
	expired: PendingView[]
	evictedSales: number
	/** Finalized view ids no longer remembered */
	forgottenViews: number
}

export interface KeyedStateStoreStats {
	pendingViews: number
	bufferedSales: number
	finalizedViews: number
	products: number
	users: number
}

interface PendingRef {
	productId: string
	userId: string
	deadline: number
	sequence: number
}

interface DeadlineEntry {
	deadline: number
	sequence: number
	id: string
}

function compareDeadline(a: { deadline: number; sequence: number }, b: { deadline: number; sequence: number }): number {
	return a.deadline - b.deadline || a.sequence - b.sequence
}

function addToIndex(index: Map<string, Set<string>>, key: string, id: string): void {
	let ids = index.get(key)
	if (!ids) {
		ids = new Set()
		index.set(key, ids)
	}
	ids.add(id)
}

function removeFromIndex(index: Map<string, Set<string>>, key: string, id: string): void {
	const ids = index.get(key)
	if (!ids) {
		return
	}
	ids.delete(id)
	if (ids.size === 0) {
		index.delete(key)
	}
}

/**
 * Join state keyed by entity id.
 *
 * Dimension tables (latest product and user per id) and fact buffers (sales
 * per product, pending views) live in named key-value stores from a
 * `StateStoreProvider`. Secondary indexes (pending views by product and by
 * user, pending views by deadline) are kept in memory and rebuilt from the
 * pending-view store on `init()` and `restore()`. Ids of finalized views are
 * kept until the watermark passes their expiry so redeliveries are dropped.
 *
 * Memory is bounded by active key cardinality plus what is in flight inside
 * the lateness window: expired views leave on `evictOlderThan`, and sales are
 * dropped as soon as a more recent sale supersedes them for every view that
 * could still arrive.
 */
export class KeyedStateStore {
	private readonly dimensions: { [E in EntityType]: KeyValueStore<string, DimensionRecords[E]> }
	private readonly sales: KeyValueStore<string, SaleEvent[]>
	private readonly pending: KeyValueStore<string, PendingView>
	private readonly finalized: KeyValueStore<string, number>

	private readonly pendingRefs = new Map<string, PendingRef>()
	private readonly pendingByEntity: { [E in EntityType]: Map<string, Set<string>> } = {
		product: new Map(),
		user: new Map(),
	}
	private readonly deadlines: DeadlineEntry[] = []
	private readonly finalizedIds = new Set<string>()
	private readonly expiries: FinalizedView[] = []
	/** Products holding more than one sale; only these can have superseded sales */
	private readonly compactionCandidates = new Set<string>()
	private saleCount = 0
	private nextSequence = 0

	constructor(
		provider: StateStoreProvider,
		private readonly matcher: SaleMatcher
	) {
		this.dimensions = {
			product: provider.createKeyValueStore('products', { keyCodec: string(), valueCodec: json<ProductRecord>() }),
			user: provider.createKeyValueStore('users', { keyCodec: string(), valueCodec: json<UserRecord>() }),
		}
		this.sales = provider.createKeyValueStore('sales', { keyCodec: string(), valueCodec: json<SaleEvent[]>() })
		this.pending = provider.createKeyValueStore('pending-views', {
			keyCodec: string(),
			valueCodec: json<PendingView>(),
		})
		this.finalized = provider.createKeyValueStore('finalized-views', { keyCodec: string(), valueCodec: json<number>() })
	}

	async init(): Promise<void> {
		await Promise.all([
			this.dimensions.product.init(),
			this.dimensions.user.init(),
			this.sales.init(),
			this.pending.init(),
			this.finalized.init(),
		])
		await this.rebuildIndexes()
	}

	// ==================== Dimensions ====================

	async upsertDimension<E extends EntityType>(entity: E, key: string, record: DimensionRecords[E]): Promise<void> {
		await this.dimensions[entity].put(key, record)
	}

	async getDimension<E extends EntityType>(entity: E, key: string): Promise<DimensionRecords[E] | undefined> {
		return this.dimensions[entity].get(key)
	}

	// ==================== Facts ====================

	/**
	 * Buffer a sale under its product id, or a view under its id.
	 *
	 * A sale whose `order_id` is already buffered replaces the earlier copy.
	 * A view that is already pending is left as it is.
	 *
	 * @returns false if the fact was a duplicate
	 */
	async bufferFact(fact: BufferedFact): Promise<boolean> {
		if (fact.type === 'sale') {
			return this.bufferSale(fact.key, fact.event)
		}
		return this.bufferView(fact.key, fact.event)
	}

	/**
	 * Buffered sales of a product in event-time order.
	 */
	async salesFor(productId: string): Promise<SaleEvent[]> {
		return (await this.sales.get(productId)) ?? []
	}

	isPending(viewId: string): boolean {
		return this.pendingRefs.has(viewId)
	}

	isFinalized(viewId: string): boolean {
		return this.finalizedIds.has(viewId)
	}

	/**
	 * Remember that a view was emitted until the watermark reaches `expiresAt`.
	 */
	async markFinalized(viewId: string, expiresAt: number): Promise<void> {
		if (this.finalizedIds.has(viewId)) {
			return
		}
		await this.finalized.put(viewId, expiresAt)
		this.trackFinalized({ id: viewId, expiresAt })
	}

	/**
	 * Remove and return every view pending on the given product or user,
	 * oldest deadline first. The caller re-buffers those that stay pending.
	 */
	async drainMatchingFacts(entity: EntityType, key: string): Promise<PendingView[]> {
		const ids = this.pendingByEntity[entity].get(key)
		if (!ids || ids.size === 0) {
			return []
		}
		return this.removePending([...ids])
	}

	/**
	 * Remove up to `count` pending views with the earliest deadlines.
	 */
	async takeOldestPending(count: number): Promise<PendingView[]> {
		const ids = this.deadlines.slice(0, count).map(entry => entry.id)
		return this.removePending(ids)
	}

	/**
	 * Remove pending views whose deadline is before `deadline`, oldest first.
	 */
	async takePendingBefore(deadline: number): Promise<PendingView[]> {
		let count = 0
		while (count < this.deadlines.length && (this.deadlines[count]?.deadline ?? Infinity) < deadline) {
			count++
		}
		return this.removePending(this.deadlines.slice(0, count).map(entry => entry.id))
	}

	/**
	 * Expire pending views whose deadline the watermark has reached, drop
	 * sales that no view at or after the watermark can select any more, and
	 * forget finalized views whose expiry the watermark has reached.
	 */
	async evictOlderThan(watermark: number): Promise<EvictionResult> {
		let expiredCount = 0
		while (expiredCount < this.deadlines.length && (this.deadlines[expiredCount]?.deadline ?? Infinity) <= watermark) {
			expiredCount++
		}
		const expired = await this.removePending(this.deadlines.slice(0, expiredCount).map(entry => entry.id))
		const evictedSales = await this.compactSales(watermark, expired)
		const forgottenViews = await this.forgetFinalized(watermark)
		return { expired, evictedSales, forgottenViews }
	}

	/**
	 * Drop superseded sales as of `watermark`. With `Infinity` every sale but
	 * the latest of each group (and those pending views select) goes; this is
	 * what the force-finalize overflow policy uses.
	 *
	 * @param retained views about to be finalized whose selections must survive
	 * @returns number of sales dropped
	 */
	async compactSales(watermark: number, retained: readonly PendingView[] = []): Promise<number> {
		const retainedByProduct = new Map<string, ViewEvent[]>()
		for (const pendingView of retained) {
			const views = retainedByProduct.get(pendingView.view.product_id) ?? []
			views.push(pendingView.view)
			retainedByProduct.set(pendingView.view.product_id, views)
		}

		let dropped = 0
		for (const productId of [...this.compactionCandidates]) {
			const sales = await this.salesFor(productId)
			const views = [...(retainedByProduct.get(productId) ?? []), ...(await this.pendingViewsOf('product', productId))]
			const kept = this.supersededFiltered(sales, watermark, views)

			if (kept.length < sales.length) {
				dropped += sales.length - kept.length
				this.saleCount -= sales.length - kept.length
				await this.sales.put(productId, kept)
			}
			if (kept.length <= 1) {
				this.compactionCandidates.delete(productId)
			}
		}
		return dropped
	}

	// ==================== Snapshots ====================

	/**
	 * Copy the full contents of the store. The join loop is paused by the
	 * caller for the duration, so the copy is consistent.
	 */
	async snapshot(): Promise<StateSnapshot> {
		const snapshot: StateSnapshot = { products: [], users: [], sales: [], pendingViews: [], finalizedViews: [] }
		for await (const [, record] of this.dimensions.product.all()) {
			snapshot.products.push(record)
		}
		for await (const [, record] of this.dimensions.user.all()) {
			snapshot.users.push(record)
		}
		for await (const [, sales] of this.sales.all()) {
			snapshot.sales.push(...sales)
		}
		for await (const [, pendingView] of this.pending.all()) {
			snapshot.pendingViews.push(pendingView)
		}
		snapshot.pendingViews.sort(compareDeadline)
		snapshot.finalizedViews = this.expiries.map(entry => ({ ...entry }))
		return snapshot
	}

	/**
	 * Replace the store's contents with a snapshot.
	 */
	async restore(snapshot: StateSnapshot): Promise<void> {
		await Promise.all([
			this.dimensions.product.clear(),
			this.dimensions.user.clear(),
			this.sales.clear(),
			this.pending.clear(),
			this.finalized.clear(),
		])

		for (const record of snapshot.products) {
			await this.dimensions.product.put(record.id, record)
		}
		for (const record of snapshot.users) {
			await this.dimensions.user.put(record.id, record)
		}

		const salesByProduct = new Map<string, SaleEvent[]>()
		for (const sale of snapshot.sales) {
			const group = salesByProduct.get(sale.product_id) ?? []
			group.push(sale)
			salesByProduct.set(sale.product_id, group)
		}
		for (const [productId, sales] of salesByProduct) {
			await this.sales.put(productId, sales)
		}

		for (const pendingView of snapshot.pendingViews) {
			await this.pending.put(pendingView.id, pendingView)
		}
		for (const { id, expiresAt } of snapshot.finalizedViews) {
			await this.finalized.put(id, expiresAt)
		}

		await this.rebuildIndexes()
	}

	async stats(): Promise<KeyedStateStoreStats> {
		const [products, users] = await Promise.all([
			this.dimensions.product.approximateNumEntries(),
			this.dimensions.user.approximateNumEntries(),
		])
		return {
			pendingViews: this.pendingRefs.size,
			bufferedSales: this.saleCount,
			finalizedViews: this.finalizedIds.size,
			products,
			users,
		}
	}

	get pendingViewCount(): number {
		return this.pendingRefs.size
	}

	get bufferedSaleCount(): number {
		return this.saleCount
	}

	async flush(): Promise<void> {
		await Promise.all([
			this.dimensions.product.flush(),
			this.dimensions.user.flush(),
			this.sales.flush(),
			this.pending.flush(),
			this.finalized.flush(),
		])
	}

	async close(): Promise<void> {
		await Promise.all([
			this.dimensions.product.close(),
			this.dimensions.user.close(),
			this.sales.close(),
			this.pending.close(),
			this.finalized.close(),
		])
	}

	// ==================== Internals ====================

	private async bufferSale(productId: string, sale: SaleEvent): Promise<boolean> {
		const sales = await this.salesFor(productId)
		const existing = sales.findIndex(s => s.order_id === sale.order_id)
		const duplicate = existing !== -1
		if (duplicate) {
			sales.splice(existing, 1)
		}

		// Insert after every sale with the same or earlier event time
		let at = sales.length
		while (at > 0 && (sales[at - 1]?.event_time ?? -Infinity) > sale.event_time) {
			at--
		}
		sales.splice(at, 0, sale)
		await this.sales.put(productId, sales)

		if (!duplicate) {
			this.saleCount++
		}
		if (sales.length > 1) {
			this.compactionCandidates.add(productId)
		}
		return !duplicate
	}

	private async bufferView(id: string, pendingView: PendingView): Promise<boolean> {
		if (this.pendingRefs.has(id)) {
			return false
		}
		await this.pending.put(id, pendingView)
		this.index(id, pendingView)
		if (pendingView.sequence >= this.nextSequence) {
			this.nextSequence = pendingView.sequence + 1
		}
		return true
	}

	/**
	 * Sequence number for a view that has not been buffered before.
	 */
	allocateSequence(): number {
		return this.nextSequence++
	}

	private supersededFiltered(sales: SaleEvent[], watermark: number, views: readonly ViewEvent[]): SaleEvent[] {
		const { matchWindowMs } = this.matcher
		// Every view at or after the watermark can select any sale up to this time
		const horizon = matchWindowMs === Infinity ? Infinity : watermark + matchWindowMs

		const latestEligible = new Map<string, SaleEvent>()
		for (const sale of sales) {
			if (sale.event_time <= horizon) {
				latestEligible.set(this.matcher.groupOf(sale), sale)
			}
		}

		const keep = new Set<SaleEvent>(latestEligible.values())
		for (const sale of sales) {
			if (sale.event_time > horizon) {
				keep.add(sale)
			}
		}
		for (const view of views) {
			const selected = this.matcher.select(view, sales)
			if (selected) {
				keep.add(selected)
			}
		}

		return sales.filter(sale => keep.has(sale))
	}

	private async pendingViewsOf(entity: EntityType, key: string): Promise<ViewEvent[]> {
		const ids = this.pendingByEntity[entity].get(key)
		if (!ids) {
			return []
		}
		const views: ViewEvent[] = []
		for (const id of ids) {
			const pendingView = await this.pending.get(id)
			if (pendingView) {
				views.push(pendingView.view)
			}
		}
		return views
	}

	private async removePending(ids: readonly string[]): Promise<PendingView[]> {
		const removed: PendingView[] = []
		for (const id of ids) {
			const pendingView = await this.pending.get(id)
			this.unindex(id)
			if (pendingView) {
				await this.pending.delete(id)
				removed.push(pendingView)
			}
		}
		return removed.sort(compareDeadline)
	}

	private async forgetFinalized(watermark: number): Promise<number> {
		let count = 0
		while (count < this.expiries.length && (this.expiries[count]?.expiresAt ?? Infinity) <= watermark) {
			count++
		}
		for (const { id } of this.expiries.splice(0, count)) {
			this.finalizedIds.delete(id)
			await this.finalized.delete(id)
		}
		return count
	}

	private trackFinalized(entry: FinalizedView): void {
		this.finalizedIds.add(entry.id)
		// Insert after every entry with the same or earlier expiry
		let at = this.expiries.length
		while (at > 0 && (this.expiries[at - 1]?.expiresAt ?? -Infinity) > entry.expiresAt) {
			at--
		}
		this.expiries.splice(at, 0, entry)
	}

	private index(id: string, pendingView: PendingView): void {
		const ref: PendingRef = {
			productId: pendingView.view.product_id,
			userId: pendingView.view.user_id,
			deadline: pendingView.deadline,
			sequence: pendingView.sequence,
		}
		this.pendingRefs.set(id, ref)
		addToIndex(this.pendingByEntity.product, ref.productId, id)
		addToIndex(this.pendingByEntity.user, ref.userId, id)

		const entry: DeadlineEntry = { deadline: ref.deadline, sequence: ref.sequence, id }
		this.deadlines.splice(this.deadlinePosition(entry), 0, entry)
	}

	private unindex(id: string): void {
		const ref = this.pendingRefs.get(id)
		if (!ref) {
			return
		}
		this.pendingRefs.delete(id)
		removeFromIndex(this.pendingByEntity.product, ref.productId, id)
		removeFromIndex(this.pendingByEntity.user, ref.userId, id)

		const at = this.deadlinePosition(ref)
		if (this.deadlines[at]?.id === id) {
			this.deadlines.splice(at, 1)
		}
	}

	/**
	 * Binary search for the first entry not ordered before `target`.
	 */
	private deadlinePosition(target: { deadline: number; sequence: number }): number {
		let low = 0
		let high = this.deadlines.length
		while (low < high) {
			const mid = (low + high) >>> 1
			const entry = this.deadlines[mid]
			if (entry && compareDeadline(entry, target) < 0) {
				low = mid + 1
			} else {
				high = mid
			}
		}
		return low
	}

	private async rebuildIndexes(): Promise<void> {
		this.pendingRefs.clear()
		this.pendingByEntity.product.clear()
		this.pendingByEntity.user.clear()
		this.deadlines.length = 0
		this.finalizedIds.clear()
		this.expiries.length = 0
		this.compactionCandidates.clear()
		this.saleCount = 0
		this.nextSequence = 0

		for await (const [id, pendingView] of this.pending.all()) {
			this.index(id, pendingView)
			this.nextSequence = Math.max(this.nextSequence, pendingView.sequence + 1)
		}
		for await (const [id, expiresAt] of this.finalized.all()) {
			this.trackFinalized({ id, expiresAt })
		}
		for await (const [productId, sales] of this.sales.all()) {
			this.saleCount += sales.length
			if (sales.length > 1) {
				this.compactionCandidates.add(productId)
			}
		}
	}
}
