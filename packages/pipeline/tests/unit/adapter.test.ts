import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest'
import {
	BoundedQueue,
	SourceAdapter,
	SourceUnavailableError,
	recordCodecs,
	type IngestMessage,
	type SourceAdapterOptions,
	type ViewEvent,
} from '../../src/index.js'
import { InMemoryPartitionedSource } from '../../src/testing.js'

function view(viewTime: number, eventTime: number): ViewEvent {
	return { product_id: 'P1', user_id: 'U1', view_time: viewTime, event_time: eventTime }
}

describe('SourceAdapter', () => {
	let source: InMemoryPartitionedSource
	let queue: BoundedQueue<IngestMessage>
	let stop: AbortController
	let running: Promise<void> | undefined
	let handle: Mock<(record: ViewEvent) => Promise<void>>

	beforeEach(() => {
		source = new InMemoryPartitionedSource('views')
		queue = new BoundedQueue(16)
		stop = new AbortController()
		handle = vi.fn((_record: ViewEvent) => Promise.resolve())
	})

	afterEach(async () => {
		stop.abort()
		await running
	})

	async function run(options: Partial<SourceAdapterOptions<ViewEvent>> = {}) {
		const adapter = new SourceAdapter({
			name: 'views',
			source,
			codec: recordCodecs.view(),
			eventTime: record => record.event_time,
			handle,
			pollWaitMs: 5,
			initialRetryDelayMs: 1,
			...options,
		})
		await adapter.start({})
		running = adapter.run(queue, stop.signal)
		return adapter
	}

	async function next(): Promise<IngestMessage> {
		const message = await queue.take({ timeoutMs: 2_000 })
		if (!message) {
			throw new Error('no message from the adapter')
		}
		return message
	}

	it('decodes records into a batch and skips the ones it cannot decode', async () => {
		source.append(view(1, 1_000))
		source.appendRaw(Buffer.from('{not json'))
		source.appendRaw(null)
		source.append(view(2, 2_000), { partition: 1 })
		const adapter = await run()

		const message = await next()
		if (message.kind !== 'batch') {
			throw new Error(`expected a batch, got ${message.kind}`)
		}
		expect(message.records.map(({ eventTime, partition, offset }) => ({ eventTime, partition, offset }))).toEqual([
			{ eventTime: 1_000, partition: 0, offset: 0 },
			{ eventTime: 2_000, partition: 1, offset: 0 },
		])
		expect(message.positions).toEqual({ 0: 3, 1: 1 })
		expect(message.rejected).toBe(2)
		expect(message.idle).toBe(false)
		expect(adapter.rejected).toBe(2)

		await message.records[0]?.apply()
		expect(handle).toHaveBeenCalledWith(view(1, 1_000))
	})

	it('reports the source idle after the idle timeout, and active again on data', async () => {
		let clock = 0
		await run({ idleTimeoutMs: 1_000, now: () => clock })
		clock = 1_000

		expect(await next()).toEqual({
			kind: 'batch',
			source: 'views',
			records: [],
			positions: {},
			rejected: 0,
			idle: true,
		})

		source.append(view(1, 1_000))
		const message = await next()
		expect(message.kind === 'batch' && message.idle).toBe(false)
	})

	it('reports an outage and the recovery', async () => {
		source.failPolls(2)
		const adapter = await run()

		const down = await next()
		expect(down).toMatchObject({ kind: 'status', source: 'views', available: false })
		expect(down.kind === 'status' && down.error).toBeInstanceOf(SourceUnavailableError)

		expect(await next()).toEqual({ kind: 'status', source: 'views', available: true })
		expect(adapter.isAvailable).toBe(true)
	})
})
