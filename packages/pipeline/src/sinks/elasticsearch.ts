import { Client, type ClientOptions } from '@elastic/elasticsearch'
import type { UpsertDocument, UpsertResult, UpsertSink } from '../sink.js'

export interface BulkItemResult {
	status: number
	error?: { type: string; reason?: string | null }
}

export interface BulkIndexResponse {
	errors: boolean
	items: Array<Partial<Record<string, BulkItemResult>>>
}

/**
 * The slice of the Elasticsearch client the sink uses.
 */
export interface BulkIndexClient {
	bulk(request: { operations: Array<Record<string, unknown>>; refresh?: boolean }): Promise<BulkIndexResponse>
	close(): Promise<void>
}

export interface ElasticsearchSinkOptions {
	client: BulkIndexClient
	index: string
}

function classify(item: BulkItemResult | undefined): UpsertResult {
	if (!item) {
		return { ok: false, retriable: true, reason: 'missing bulk item in response' }
	}
	if (item.status >= 200 && item.status < 300) {
		return { ok: true }
	}
	const reason = item.error ? `${item.error.type}: ${item.error.reason ?? 'no reason given'}` : `status ${item.status}`
	// Back-pressure and server errors clear up; mapping and validation errors do not
	const retriable = item.status === 429 || item.status >= 500
	return { ok: false, retriable, reason }
}

/**
 * Upserts rows with `index` bulk actions keyed by document id, so writing a
 * row twice leaves one document.
 */
export class ElasticsearchUpsertSink implements UpsertSink {
	readonly name = 'elasticsearch'
	private readonly client: BulkIndexClient
	private readonly index: string

	constructor(options: ElasticsearchSinkOptions) {
		this.client = options.client
		this.index = options.index
	}

	async upsert(documents: UpsertDocument[]): Promise<UpsertResult[]> {
		const operations: Array<Record<string, unknown>> = []
		for (const { id, document } of documents) {
			operations.push({ index: { _index: this.index, _id: id } }, document)
		}

		const response = await this.client.bulk({ operations, refresh: false })
		return documents.map((_, i) => classify(response.items[i]?.index))
	}

	async close(): Promise<void> {
		await this.client.close()
	}
}

export interface ElasticsearchConnectionOptions {
	/** e.g. `http://localhost:9200` */
	node: string
	index: string
	auth?: ClientOptions['auth']
	requestTimeoutMs?: number
}

/**
 * Connect to Elasticsearch and return an upsert sink for one index.
 */
export function elasticsearchSink(options: ElasticsearchConnectionOptions): ElasticsearchUpsertSink {
	const client = new Client({
		node: options.node,
		auth: options.auth,
		requestTimeout: options.requestTimeoutMs ?? 30_000,
	})
	return new ElasticsearchUpsertSink({
		index: options.index,
		client: {
			bulk: request => client.bulk(request),
			close: () => client.close(),
		},
	})
}
