import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import {
	ElasticsearchUpsertSink,
	FileDeadLetterQueue,
	InMemoryDeadLetterQueue,
	PipelineClosedError,
	SinkUnreachableError,
	SinkWriter,
	type BulkIndexClient,
	type BulkIndexResponse,
	type EnrichedRecord,
	type SinkWriterOptions,
} from '../../src/index.js'
import { InMemoryUpsertSink } from '../../src/testing.js'

function row(viewTime: number): EnrichedRecord {
	return {
		product_id: 'P1',
		user_id: 'U1',
		first_name: 'Ada',
		last_name: 'Lovelace',
		product_name: 'Trail Shoe',
		brand: 'Acme',
		order_id: null,
		order_date: null,
		view_time: viewTime,
	}
}

describe('SinkWriter', () => {
	let sink: InMemoryUpsertSink
	let deadLetter: InMemoryDeadLetterQueue
	let writer: SinkWriter

	function createWriter(options: Partial<SinkWriterOptions> = {}): SinkWriter {
		writer = new SinkWriter({ sink, deadLetter, initialRetryDelayMs: 1, batchIntervalMs: 60_000, ...options })
		writer.start()
		return writer
	}

	beforeEach(() => {
		sink = new InMemoryUpsertSink()
		deadLetter = new InMemoryDeadLetterQueue()
	})

	afterEach(() => {
		writer.abandon()
	})

	it('upserts rows under their view id in batches', async () => {
		createWriter({ batchSize: 2 })
		for (const viewTime of [1, 2, 3]) {
			await writer.enqueue(row(viewTime))
		}
		await writer.flush()

		expect([...sink.documents.keys()].sort()).toEqual(['P1|U1|1', 'P1|U1|2', 'P1|U1|3'])
		expect(sink.requests.every(request => request.length <= 2)).toBe(true)
		expect(writer.stats()).toMatchObject({ enqueued: 3, delivered: 3, upserted: 3, deadLettered: 0 })
	})

	it('writes a partial batch once the interval passes', async () => {
		createWriter({ batchSize: 100, batchIntervalMs: 20 })
		await writer.enqueue(row(1))
		await vi.waitFor(() => {
			expect(sink.documents.size).toBe(1)
		})
	})

	it('retries a failed request', async () => {
		sink.failRequests(2)
		createWriter()
		await writer.enqueue(row(1))
		await writer.flush()

		expect(sink.requests).toHaveLength(3)
		expect(sink.documents.has('P1|U1|1')).toBe(true)
		expect(writer.stats()).toMatchObject({ retried: 2, upserted: 1 })
	})

	it('dead-letters a rejected document at once and upserts the rest', async () => {
		sink.failDocument('P1|U1|1', { retriable: false, reason: 'mapper_parsing_exception' })
		createWriter()
		await writer.enqueue(row(1))
		await writer.enqueue(row(2))
		await writer.flush()

		expect(deadLetter.entries).toHaveLength(1)
		expect(deadLetter.entries[0]).toMatchObject({
			id: 'P1|U1|1',
			reason: 'mapper_parsing_exception',
			attempts: 1,
			document: row(1),
		})
		expect([...sink.documents.keys()]).toEqual(['P1|U1|2'])
	})

	it('dead-letters a document after its retries run out', async () => {
		sink.failDocument('P1|U1|1', { reason: 'es_rejected_execution_exception' })
		createWriter({ maxRetryAttempts: 3 })
		await writer.enqueue(row(1))
		await writer.flush()

		expect(sink.requests).toHaveLength(3)
		expect(deadLetter.entries.map(entry => entry.attempts)).toEqual([3])
		expect(writer.stats()).toMatchObject({ retried: 2, deadLettered: 1, delivered: 1 })
	})

	it('fails for good when the dead-letter queue rejects rows', async () => {
		const onFatal = vi.fn()
		sink.failDocument('P1|U1|1', { retriable: false })
		deadLetter.failWrites(1)
		createWriter({ onFatal })
		await writer.enqueue(row(1))

		const error = await writer.flush().catch((e: unknown) => e)
		expect(error).toBeInstanceOf(SinkUnreachableError)
		expect(onFatal).toHaveBeenCalledWith(error)
		await expect(writer.enqueue(row(2))).rejects.toBe(error)
	})

	it('fails once dead letters exceed the limit', async () => {
		sink.failDocument('P1|U1|1', { retriable: false })
		createWriter({ maxDeadLetters: 0 })
		await writer.enqueue(row(1))

		await expect(writer.flush()).rejects.toThrow('Dead-lettered 1 rows, more than the limit of 0')
	})

	it('reports delivery through a mark', async () => {
		createWriter()
		const first = await writer.enqueue(row(1))
		const second = await writer.enqueue(row(2))
		expect([first, second]).toEqual([1, 2])
		expect(writer.lastMark).toBe(2)

		await writer.deliveredThrough(first)
		expect(writer.stats().delivered).toBeGreaterThanOrEqual(1)
	})

	it('delivers everything queued on close', async () => {
		createWriter()
		await writer.enqueue(row(1))
		await writer.enqueue(row(2))
		await writer.close()

		expect(sink.documents.size).toBe(2)
		await expect(writer.enqueue(row(3))).rejects.toBeInstanceOf(PipelineClosedError)
	})

	it('rejects waiting checkpoints when abandoned', async () => {
		writer = new SinkWriter({ sink, deadLetter })
		const mark = await writer.enqueue(row(1))
		const delivered = writer.deliveredThrough(mark)

		writer.abandon()

		await expect(delivered).rejects.toBeInstanceOf(PipelineClosedError)
		expect(sink.requests).toHaveLength(0)
	})
})

describe('ElasticsearchUpsertSink', () => {
	function fakeClient(response: BulkIndexResponse) {
		const requests: Parameters<BulkIndexClient['bulk']>[0][] = []
		const client: BulkIndexClient = {
			bulk: request => {
				requests.push(request)
				return Promise.resolve(response)
			},
			close: vi.fn(() => Promise.resolve()),
		}
		return { client, requests }
	}

	it('sends index actions keyed by document id', async () => {
		const { client, requests } = fakeClient({ errors: false, items: [{ index: { status: 201 } }] })
		const sink = new ElasticsearchUpsertSink({ client, index: 'enriched-views' })

		expect(await sink.upsert([{ id: 'P1|U1|1', document: row(1) }])).toEqual([{ ok: true }])
		expect(requests).toEqual([
			{ operations: [{ index: { _index: 'enriched-views', _id: 'P1|U1|1' } }, row(1)], refresh: false },
		])
	})

	it('classifies item failures', async () => {
		const { client } = fakeClient({
			errors: true,
			items: [
				{ index: { status: 429, error: { type: 'es_rejected_execution_exception', reason: 'queue full' } } },
				{ index: { status: 400, error: { type: 'mapper_parsing_exception', reason: 'failed to parse' } } },
				{ index: { status: 503 } },
			],
		})
		const sink = new ElasticsearchUpsertSink({ client, index: 'enriched-views' })
		const documents = [1, 2, 3, 4].map(viewTime => ({ id: `P1|U1|${viewTime}`, document: row(viewTime) }))

		expect(await sink.upsert(documents)).toEqual([
			{ ok: false, retriable: true, reason: 'es_rejected_execution_exception: queue full' },
			{ ok: false, retriable: false, reason: 'mapper_parsing_exception: failed to parse' },
			{ ok: false, retriable: true, reason: 'status 503' },
			{ ok: false, retriable: true, reason: 'missing bulk item in response' },
		])
	})

	it('closes the client', async () => {
		const { client } = fakeClient({ errors: false, items: [] })
		await new ElasticsearchUpsertSink({ client, index: 'enriched-views' }).close()
		expect(client.close).toHaveBeenCalledTimes(1)
	})
})

describe('FileDeadLetterQueue', () => {
	let directory: string

	beforeEach(async () => {
		directory = await mkdtemp(join(tmpdir(), 'joinstream-dead-letter-'))
	})

	afterEach(async () => {
		await rm(directory, { recursive: true, force: true })
	})

	it('appends one JSON line per entry', async () => {
		const path = join(directory, 'out', 'dead-letters.jsonl')
		const queue = new FileDeadLetterQueue(path)
		const entry = { id: 'P1|U1|1', document: row(1), reason: 'rejected', attempts: 1, failedAt: '2026-01-01T00:00:00.000Z' }

		await queue.write([entry])
		await queue.write([{ ...entry, id: 'P1|U1|2', document: row(2) }])

		const lines = (await readFile(path, 'utf-8')).trimEnd().split('\n')
		expect(lines.map(line => JSON.parse(line))).toEqual([entry, { ...entry, id: 'P1|U1|2', document: row(2) }])
	})
})
