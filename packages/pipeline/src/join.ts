import {
	DEFAULT_MAX_BUFFERED_SALES,
	DEFAULT_MAX_PENDING_VIEWS,
	type FinalizationPolicy,
	type OverflowPolicy,
	type SaleMatchPolicy,
} from './config.js'
import { StateStoreCapacityExceededError } from './errors.js'
import type { Logger } from './logger.js'
import { noopLogger } from './logger.js'
import {
	viewId,
	type EnrichedRecord,
	type EntityType,
	type ProductRecord,
	type SaleEvent,
	type UserRecord,
	type ViewEvent,
} from './records.js'
import type { StateStoreProvider } from './state.js'
import { KeyedStateStore, type PendingView, type SaleMatcher, type StateSnapshot } from './state/keyed-store.js'

export interface SaleMatcherOptions {
	matchWindowMs: number
	saleMatch: SaleMatchPolicy
}

/**
 * The most recent sale of the viewed product with
 * `event_time <= view.event_time + matchWindow`. Among sales with the same
 * event time the one buffered last wins.
 */
export function createSaleMatcher({ matchWindowMs, saleMatch }: SaleMatcherOptions): SaleMatcher {
	const byCustomer = saleMatch === 'product-and-customer'
	return {
		matchWindowMs,
		groupOf: sale => (byCustomer ? sale.customer_id : ''),
		select(view, sales) {
			const limit = view.event_time + matchWindowMs
			let selected: SaleEvent | undefined
			for (const sale of sales) {
				if (sale.product_id !== view.product_id || (byCustomer && sale.customer_id !== view.user_id)) {
					continue
				}
				if (sale.event_time <= limit && (!selected || sale.event_time >= selected.event_time)) {
					selected = sale
				}
			}
			return selected
		},
	}
}

export interface JoinEngineOptions {
	provider: StateStoreProvider
	/** Receives every finalized row, in finalization order; awaited */
	emit: (record: EnrichedRecord) => Promise<void>
	/** Event time a view may wait for its sale (default: 30s) */
	joinLatenessMs?: number
	/** Default: Infinity */
	matchWindowMs?: number
	/** Default: 'deadline' */
	finalization?: FinalizationPolicy
	/**
	 * How long past its deadline a finalized view's id is remembered, so a
	 * redelivery is dropped instead of emitted again (default: joinLatenessMs)
	 */
	redeliveryWindowMs?: number
	/** Default: 'product' */
	saleMatch?: SaleMatchPolicy
	/** Default: 100 000; Infinity for no bound */
	maxPendingViews?: number
	/** Default: 1 000 000; Infinity for no bound */
	maxBufferedSales?: number
	/** Default: 'fail' */
	overflowPolicy?: OverflowPolicy
	logger?: Logger
}

export interface JoinEngineStats {
	viewsArrived: number
	viewsFinalized: number
	/** Finalized with a sale */
	viewsMatched: number
	/** Finalized without a sale */
	viewsUnmatched: number
	/** Views whose deadline had passed when they arrived */
	lateViews: number
	/** Redelivered views that were pending or already finalized */
	duplicateViews: number
	forcedFinalizations: number
	salesEvicted: number
	pendingViews: number
	bufferedSales: number
}

/**
 * Joins views with the latest product, user and matching sale.
 *
 * A view is finalized exactly once, when the global watermark reaches its
 * deadline. The eager policy may finalize a complete join earlier, once the
 * watermark has passed the end of the view's match window and no sale still
 * to come could be selected; with an unbounded match window it behaves like
 * the deadline policy. Finalization emits an EnrichedRecord with nulls for
 * whatever was not found. The engine is driven by a single caller and is not
 * reentrant.
 */
export class JoinEngine {
	readonly store: KeyedStateStore

	private readonly emit: (record: EnrichedRecord) => Promise<void>
	private readonly matcher: SaleMatcher
	private readonly joinLatenessMs: number
	private readonly finalization: FinalizationPolicy
	private readonly redeliveryWindowMs: number
	private readonly maxPendingViews: number
	private readonly maxBufferedSales: number
	private readonly overflowPolicy: OverflowPolicy
	private readonly logger: Logger

	private watermark = -Infinity
	private readonly counters = {
		viewsArrived: 0,
		viewsFinalized: 0,
		viewsMatched: 0,
		viewsUnmatched: 0,
		lateViews: 0,
		duplicateViews: 0,
		forcedFinalizations: 0,
		salesEvicted: 0,
	}

	constructor(options: JoinEngineOptions) {
		this.matcher = createSaleMatcher({
			matchWindowMs: options.matchWindowMs ?? Infinity,
			saleMatch: options.saleMatch ?? 'product',
		})
		this.store = new KeyedStateStore(options.provider, this.matcher)
		this.emit = options.emit
		this.joinLatenessMs = options.joinLatenessMs ?? 30_000
		this.finalization = options.finalization ?? 'deadline'
		this.redeliveryWindowMs = options.redeliveryWindowMs ?? this.joinLatenessMs
		this.maxPendingViews = options.maxPendingViews ?? DEFAULT_MAX_PENDING_VIEWS
		this.maxBufferedSales = options.maxBufferedSales ?? DEFAULT_MAX_BUFFERED_SALES
		this.overflowPolicy = options.overflowPolicy ?? 'fail'
		this.logger = (options.logger ?? noopLogger).child({ component: 'join-engine' })
	}

	async init(): Promise<void> {
		await this.store.init()
	}

	get currentWatermark(): number {
		return this.watermark
	}

	async applyProduct(product: ProductRecord): Promise<void> {
		await this.store.upsertDimension('product', product.id, product)
		await this.reevaluate('product', product.id)
	}

	async applyUser(user: UserRecord): Promise<void> {
		await this.store.upsertDimension('user', user.id, user)
		await this.reevaluate('user', user.id)
	}

	async applySale(sale: SaleEvent): Promise<void> {
		await this.store.bufferFact({ type: 'sale', key: sale.product_id, event: sale })
		await this.reevaluate('product', sale.product_id)
		await this.enforceSaleCapacity()
	}

	async applyView(view: ViewEvent): Promise<void> {
		this.counters.viewsArrived++
		const id = viewId(view)
		if (this.store.isPending(id) || this.store.isFinalized(id)) {
			this.counters.duplicateViews++
			this.logger.debug('duplicate view ignored', { viewId: id, pending: this.store.isPending(id) })
			return
		}

		const pendingView: PendingView = {
			id,
			view,
			deadline: view.event_time + this.joinLatenessMs,
			sequence: this.store.allocateSequence(),
		}

		if (pendingView.deadline <= this.watermark) {
			this.counters.lateViews++
			this.logger.debug('late view finalized on arrival', { viewId: id, deadline: pendingView.deadline })
			await this.finalize(pendingView)
			return
		}

		if (this.settled(view)) {
			const join = await this.lookup(view)
			if (join.product && join.user && join.sale) {
				await this.finalize(pendingView, join)
				return
			}
		}

		await this.store.bufferFact({ type: 'view', key: id, event: pendingView })
		await this.enforcePendingCapacity()
	}

	/**
	 * Finalize every view whose deadline the watermark has reached, evict
	 * superseded sales and forget finalized views past their redelivery
	 * window. Watermarks that do not advance are ignored.
	 */
	async advanceWatermark(watermark: number): Promise<void> {
		if (watermark <= this.watermark) {
			return
		}
		this.watermark = watermark

		const { expired, evictedSales, forgottenViews } = await this.store.evictOlderThan(watermark)
		this.counters.salesEvicted += evictedSales
		for (const pendingView of expired) {
			await this.finalize(pendingView)
		}

		const { matchWindowMs } = this.matcher
		if (this.finalization === 'eager' && Number.isFinite(matchWindowMs)) {
			// Deadlines are event_time + joinLateness; these views have event_time + matchWindow < watermark
			const settled = await this.store.takePendingBefore(watermark - matchWindowMs + this.joinLatenessMs)
			await this.finalizeComplete(settled)
		}

		if (expired.length > 0 || evictedSales > 0 || forgottenViews > 0) {
			this.logger.debug('watermark advanced', { watermark, finalized: expired.length, evictedSales, forgottenViews })
		}
	}

	async snapshot(): Promise<StateSnapshot> {
		return this.store.snapshot()
	}

	async restore(snapshot: StateSnapshot, watermark: number): Promise<void> {
		await this.store.restore(snapshot)
		this.watermark = watermark
	}

	stats(): JoinEngineStats {
		return {
			...this.counters,
			pendingViews: this.store.pendingViewCount,
			bufferedSales: this.store.bufferedSaleCount,
		}
	}

	async close(): Promise<void> {
		await this.store.close()
	}

	/**
	 * Re-run the join for views pending on an entity that just changed.
	 * Only the eager policy can finalize a view before its deadline.
	 */
	private async reevaluate(entity: EntityType, key: string): Promise<void> {
		if (this.finalization !== 'eager') {
			return
		}
		await this.finalizeComplete(await this.store.drainMatchingFacts(entity, key))
	}

	/**
	 * Finalize the drained views that are settled and complete; buffer the
	 * rest again.
	 */
	private async finalizeComplete(pending: readonly PendingView[]): Promise<void> {
		for (const pendingView of pending) {
			if (this.settled(pendingView.view)) {
				const join = await this.lookup(pendingView.view)
				if (join.product && join.user && join.sale) {
					await this.finalize(pendingView, join)
					continue
				}
			}
			await this.store.bufferFact({ type: 'view', key: pendingView.id, event: pendingView })
		}
	}

	/**
	 * Under the eager policy: every sale that could still be selected has
	 * arrived, since the watermark is past the end of the match window.
	 */
	private settled(view: ViewEvent): boolean {
		return this.finalization === 'eager' && view.event_time + this.matcher.matchWindowMs < this.watermark
	}

	private async lookup(
		view: ViewEvent
	): Promise<{ product?: ProductRecord; user?: UserRecord; sale?: SaleEvent }> {
		const [product, user, sales] = await Promise.all([
			this.store.getDimension('product', view.product_id),
			this.store.getDimension('user', view.user_id),
			this.store.salesFor(view.product_id),
		])
		return { product, user, sale: this.matcher.select(view, sales) }
	}

	private async finalize(
		pendingView: PendingView,
		join?: { product?: ProductRecord; user?: UserRecord; sale?: SaleEvent }
	): Promise<void> {
		const { view } = pendingView
		const { product, user, sale } = join ?? (await this.lookup(view))

		const record: EnrichedRecord = {
			product_id: view.product_id,
			user_id: view.user_id,
			first_name: user?.first_name ?? null,
			last_name: user?.last_name ?? null,
			product_name: product?.name ?? null,
			brand: product?.brand ?? null,
			order_id: sale?.order_id ?? null,
			order_date: sale ? new Date(sale.event_time).toISOString() : null,
			view_time: view.view_time,
		}

		await this.store.markFinalized(pendingView.id, pendingView.deadline + this.redeliveryWindowMs)
		this.counters.viewsFinalized++
		if (sale) {
			this.counters.viewsMatched++
		} else {
			this.counters.viewsUnmatched++
		}
		await this.emit(record)
	}

	private async enforcePendingCapacity(): Promise<void> {
		const excess = this.store.pendingViewCount - this.maxPendingViews
		if (excess <= 0) {
			return
		}
		if (this.overflowPolicy === 'fail') {
			throw new StateStoreCapacityExceededError('pending-views', this.maxPendingViews)
		}

		const forced = await this.store.takeOldestPending(excess)
		this.logger.warn('pending views over capacity, finalizing oldest', {
			count: forced.length,
			limit: this.maxPendingViews,
		})
		for (const pendingView of forced) {
			this.counters.forcedFinalizations++
			await this.finalize(pendingView)
		}
	}

	private async enforceSaleCapacity(): Promise<void> {
		if (this.store.bufferedSaleCount <= this.maxBufferedSales) {
			return
		}
		if (this.overflowPolicy === 'force-finalize') {
			const evicted = await this.store.compactSales(Infinity)
			this.counters.salesEvicted += evicted
			this.logger.warn('buffered sales over capacity, dropped superseded sales', {
				evicted,
				limit: this.maxBufferedSales,
			})
		}
		if (this.store.bufferedSaleCount > this.maxBufferedSales) {
			throw new StateStoreCapacityExceededError('sales', this.maxBufferedSales)
		}
	}
}
