import { z } from 'zod'
import { zodCodec, type Codec } from './codec.js'

const entityId = z.string().min(1)
const timestamp = z.number().int().nonnegative()

export const productRecordSchema = z.object({
	id: entityId,
	brand: z.string().nullable().optional(),
	name: z.string().nullable().optional(),
	sale_price: z.number().nullable().optional(),
	rating: z.number().nullable().optional(),
})

export const userRecordSchema = z.object({
	id: entityId,
	first_name: z.string().nullable().optional(),
	last_name: z.string().nullable().optional(),
	email: z.string().nullable().optional(),
	phone: z.string().nullable().optional(),
	street: z.string().nullable().optional(),
	city: z.string().nullable().optional(),
	state: z.string().nullable().optional(),
	zip: z.string().nullable().optional(),
})

export const saleEventSchema = z.object({
	order_id: z.union([z.number().int(), z.string().min(1)]),
	product_id: entityId,
	customer_id: entityId,
	event_time: timestamp,
})

export const viewEventSchema = z.object({
	product_id: entityId,
	user_id: entityId,
	view_time: z.number(),
	page_url: z.string().nullable().optional(),
	ip: z.string().nullable().optional(),
	event_time: timestamp,
})

export const enrichedRecordSchema = z.object({
	product_id: entityId,
	user_id: entityId,
	first_name: z.string().nullable(),
	last_name: z.string().nullable(),
	product_name: z.string().nullable(),
	brand: z.string().nullable(),
	order_id: z.union([z.number().int(), z.string()]).nullable(),
	order_date: z.string().nullable(),
	view_time: z.number(),
})

/** Catalog entry; the latest record per `id` wins. */
export type ProductRecord = z.infer<typeof productRecordSchema>

/** Customer profile; the latest record per `id` wins. */
export type UserRecord = z.infer<typeof userRecordSchema>

/** A purchase. Immutable, one per `order_id`. */
export type SaleEvent = z.infer<typeof saleEventSchema>

/** A page view. Every view yields exactly one EnrichedRecord. */
export type ViewEvent = z.infer<typeof viewEventSchema>

export type EnrichedRecord = z.infer<typeof enrichedRecordSchema>

export type EntityType = 'product' | 'user'

export interface DimensionRecords {
	product: ProductRecord
	user: UserRecord
}

/**
 * Identity shared by a view and the record it produces: the sink upserts on
 * it, so a re-emitted record overwrites rather than duplicates.
 */
export function enrichedRecordId(record: Pick<EnrichedRecord, 'product_id' | 'user_id' | 'view_time'>): string {
	return `${record.product_id}|${record.user_id}|${record.view_time}`
}

export const viewId: (view: ViewEvent) => string = enrichedRecordId

export const recordCodecs = {
	product: (): Codec<ProductRecord> => zodCodec(productRecordSchema),
	user: (): Codec<UserRecord> => zodCodec(userRecordSchema),
	sale: (): Codec<SaleEvent> => zodCodec(saleEventSchema),
	view: (): Codec<ViewEvent> => zodCodec(viewEventSchema),
	enriched: (): Codec<EnrichedRecord> => zodCodec(enrichedRecordSchema),
}
