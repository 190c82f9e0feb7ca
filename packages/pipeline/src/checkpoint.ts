import { createHash } from 'node:crypto'
import { z } from 'zod'
import { CheckpointCorruptError, CheckpointWriteFailedError } from './errors.js'
import type { Logger } from './logger.js'
import { noopLogger } from './logger.js'
import { productRecordSchema, saleEventSchema, userRecordSchema, viewEventSchema } from './records.js'
import { retry } from './utils/retry.js'

export const CHECKPOINT_FORMAT = 'joinstream-checkpoint'
export const CHECKPOINT_VERSION = 1

const headerSchema = z.object({
	format: z.string(),
	version: z.number().int(),
	sequence: z.number().int().nonnegative(),
	checksum: z.string().regex(/^[0-9a-f]{64}$/),
	length: z.number().int().nonnegative(),
})

const nullableTime = z.number().nullable()

const checkpointSchema = z.object({
	version: z.literal(CHECKPOINT_VERSION),
	sequence: z.number().int().nonnegative(),
	createdAt: z.string(),
	/** source -> partition -> next offset to read */
	offsets: z.record(z.string(), z.record(z.string().regex(/^\d+$/), z.number().int().nonnegative())),
	watermarks: z.object({
		global: nullableTime,
		maxEventTimes: z.record(z.string(), nullableTime),
	}),
	state: z.object({
		products: z.array(productRecordSchema),
		users: z.array(userRecordSchema),
		sales: z.array(saleEventSchema),
		pendingViews: z.array(
			z.object({
				id: z.string(),
				view: viewEventSchema,
				deadline: z.number(),
				sequence: z.number().int().nonnegative(),
			})
		),
		finalizedViews: z.array(z.object({ id: z.string(), expiresAt: z.number() })),
	}),
})

/**
 * Everything needed to resume: read positions, watermarks and the full join
 * state including pending views.
 */
export type Checkpoint = z.infer<typeof checkpointSchema>

export type CheckpointData = Omit<Checkpoint, 'version' | 'sequence' | 'createdAt'>

function sha256(data: Buffer): string {
	return createHash('sha256').update(data).digest('hex')
}

/**
 * Serialize a checkpoint as a one-line JSON header followed by the JSON body.
 * The header records the body's length and SHA-256 so truncated or damaged
 * payloads are detected on load.
 */
export function encodeCheckpoint(checkpoint: Checkpoint): Buffer {
	const body = Buffer.from(JSON.stringify(checkpoint), 'utf-8')
	const header = {
		format: CHECKPOINT_FORMAT,
		version: CHECKPOINT_VERSION,
		sequence: checkpoint.sequence,
		checksum: sha256(body),
		length: body.length,
	}
	return Buffer.concat([Buffer.from(`${JSON.stringify(header)}\n`, 'utf-8'), body])
}

/**
 * @throws CheckpointCorruptError if the payload is incomplete, damaged, or
 * not the checkpoint it claims to be
 */
export function decodeCheckpoint(sequence: number, payload: Buffer): Checkpoint {
	const newline = payload.indexOf(0x0a)
	if (newline === -1) {
		throw new CheckpointCorruptError(sequence, 'missing header')
	}

	let rawHeader: unknown
	try {
		rawHeader = JSON.parse(payload.subarray(0, newline).toString('utf-8'))
	} catch (error) {
		throw new CheckpointCorruptError(sequence, 'header is not valid JSON', error)
	}
	const header = headerSchema.safeParse(rawHeader)
	if (!header.success) {
		throw new CheckpointCorruptError(sequence, 'malformed header', header.error)
	}
	if (header.data.format !== CHECKPOINT_FORMAT) {
		throw new CheckpointCorruptError(sequence, `unknown format "${header.data.format}"`)
	}
	if (header.data.version !== CHECKPOINT_VERSION) {
		throw new CheckpointCorruptError(sequence, `unsupported version ${header.data.version}`)
	}
	if (header.data.sequence !== sequence) {
		throw new CheckpointCorruptError(sequence, `header names sequence ${header.data.sequence}`)
	}

	const body = payload.subarray(newline + 1)
	if (body.length !== header.data.length) {
		throw new CheckpointCorruptError(sequence, `body is ${body.length} bytes, expected ${header.data.length}`)
	}
	if (sha256(body) !== header.data.checksum) {
		throw new CheckpointCorruptError(sequence, 'checksum mismatch')
	}

	let rawBody: unknown
	try {
		rawBody = JSON.parse(body.toString('utf-8'))
	} catch (error) {
		throw new CheckpointCorruptError(sequence, 'body is not valid JSON', error)
	}
	const parsed = checkpointSchema.safeParse(rawBody)
	if (!parsed.success) {
		throw new CheckpointCorruptError(sequence, 'body failed validation', parsed.error)
	}
	if (parsed.data.sequence !== sequence) {
		throw new CheckpointCorruptError(sequence, `body names sequence ${parsed.data.sequence}`)
	}
	return parsed.data
}

/**
 * Durable storage for checkpoints: immutable payloads addressed by sequence
 * number and a single pointer to the latest published one.
 */
export interface CheckpointStore {
	readonly name: string

	/**
	 * Durably store a payload. Fails if the sequence already exists.
	 */
	putPayload(sequence: number, payload: Buffer): Promise<void>

	/**
	 * Atomically point "latest" at a stored payload.
	 */
	publish(sequence: number): Promise<void>

	/**
	 * @returns the published sequence, or undefined if nothing was published
	 * @throws CheckpointCorruptError if the pointer is unreadable
	 */
	readPointer(): Promise<number | undefined>

	readPayload(sequence: number): Promise<Buffer | undefined>

	/**
	 * Stored sequences in ascending order.
	 */
	listPayloads(): Promise<number[]>

	deletePayload(sequence: number): Promise<void>

	close(): Promise<void>
}

export interface CheckpointManagerOptions {
	store: CheckpointStore
	/** Payloads kept for fallback (default: 3) */
	retain?: number
	/** Write attempts before a checkpoint is abandoned (default: 5) */
	maxAttempts?: number
	/** First retry delay (default: 200ms) */
	initialRetryDelayMs?: number
	logger?: Logger
}

/**
 * Writes and restores versioned checkpoints.
 *
 * A checkpoint becomes authoritative only once its payload is durable and the
 * latest pointer names it. A write that keeps failing is logged and dropped;
 * the previous checkpoint stays in effect.
 */
export class CheckpointManager {
	private readonly store: CheckpointStore
	private readonly retain: number
	private readonly maxAttempts: number
	private readonly initialRetryDelayMs: number
	private readonly logger: Logger

	private nextSequence = 1
	private published: number | undefined

	constructor(options: CheckpointManagerOptions) {
		this.store = options.store
		this.retain = Math.max(1, options.retain ?? 3)
		this.maxAttempts = options.maxAttempts ?? 5
		this.initialRetryDelayMs = options.initialRetryDelayMs ?? 200
		this.logger = (options.logger ?? noopLogger).child({ component: 'checkpoint', store: options.store.name })
	}

	/** Sequence of the checkpoint currently in effect */
	get lastPublished(): number | undefined {
		return this.published
	}

	/**
	 * Load the latest valid checkpoint, falling back to older ones when the
	 * latest is missing or corrupt.
	 *
	 * @returns undefined for a cold start
	 */
	async load(): Promise<Checkpoint | undefined> {
		const stored = await this.store.listPayloads()
		const pointer = await this.readPointer()

		const highest = Math.max(0, pointer ?? 0, ...stored)
		this.nextSequence = highest + 1

		if (pointer === undefined && stored.length === 0) {
			this.logger.info('no checkpoint found, starting from the earliest offsets')
			return undefined
		}

		const older = stored.filter(sequence => pointer === undefined || sequence < pointer).reverse()
		const candidates = pointer === undefined ? older : [pointer, ...older]

		for (const sequence of candidates) {
			const checkpoint = await this.tryRead(sequence)
			if (!checkpoint) {
				continue
			}
			if (sequence !== pointer) {
				this.logger.warn('restored an older checkpoint', { sequence, latest: pointer })
			} else {
				this.logger.info('restored checkpoint', { sequence, createdAt: checkpoint.createdAt })
			}
			this.published = sequence
			return checkpoint
		}

		this.logger.warn('no valid checkpoint; starting cold, state since the last checkpoint is lost', {
			tried: candidates,
		})
		return undefined
	}

	/**
	 * Persist a checkpoint, retrying with backoff.
	 *
	 * @returns the published sequence, or undefined if every attempt failed
	 */
	async save(data: CheckpointData, signal?: AbortSignal): Promise<number | undefined> {
		const sequence = this.nextSequence++
		const payload = encodeCheckpoint({
			version: CHECKPOINT_VERSION,
			sequence,
			createdAt: new Date().toISOString(),
			...data,
		})

		try {
			await this.withRetry(sequence, () => this.store.putPayload(sequence, payload), signal)
			await this.withRetry(sequence, () => this.store.publish(sequence), signal)
		} catch (error) {
			this.logger.error('checkpoint abandoned, previous checkpoint remains in effect', {
				error: new CheckpointWriteFailedError(sequence, error),
				previous: this.published,
			})
			return undefined
		}

		this.published = sequence
		this.logger.debug('checkpoint published', { sequence, bytes: payload.length })
		await this.prune(sequence)
		return sequence
	}

	private async withRetry(sequence: number, fn: () => Promise<void>, signal?: AbortSignal): Promise<void> {
		await retry(fn, {
			signal,
			maxAttempts: this.maxAttempts,
			initialDelayMs: this.initialRetryDelayMs,
			maxDelayMs: 5_000,
			onRetry: ({ attempt, delayMs, error }) => {
				this.logger.warn('checkpoint write failed, retrying', { sequence, attempt, delayMs, error })
			},
		})
	}

	private async readPointer(): Promise<number | undefined> {
		try {
			return await this.store.readPointer()
		} catch (error) {
			if (!(error instanceof CheckpointCorruptError)) {
				throw error
			}
			this.logger.warn('latest checkpoint pointer is unreadable', { error })
			return undefined
		}
	}

	private async tryRead(sequence: number): Promise<Checkpoint | undefined> {
		const payload = await this.store.readPayload(sequence)
		if (!payload) {
			this.logger.warn('checkpoint payload missing', { sequence })
			return undefined
		}
		try {
			return decodeCheckpoint(sequence, payload)
		} catch (error) {
			if (!(error instanceof CheckpointCorruptError)) {
				throw error
			}
			this.logger.warn('skipping corrupt checkpoint', { sequence, error })
			return undefined
		}
	}

	/**
	 * Keep the newest `retain` payloads. A failed delete only leaves an extra
	 * payload behind.
	 */
	private async prune(published: number): Promise<void> {
		try {
			const stored = await this.store.listPayloads()
			const excess = Math.max(0, stored.length - this.retain)
			for (const sequence of stored.filter(s => s < published).slice(0, excess)) {
				await this.store.deletePayload(sequence)
			}
		} catch (error) {
			this.logger.warn('failed to prune old checkpoints', { error })
		}
	}
}
