/**
 * Pipeline error hierarchy
 *
 * Every error carries a stable `code` and a `retriable` flag. Retry helpers
 * consult the flag; the pipeline runtime treats non-retriable errors raised
 * outside a recovery path as fatal.
 */

export type PipelineErrorCode =
	| 'SOURCE_UNAVAILABLE'
	| 'SINK_WRITE_FAILED'
	| 'SINK_UNREACHABLE'
	| 'CHECKPOINT_WRITE_FAILED'
	| 'CHECKPOINT_CORRUPT'
	| 'STATE_STORE_CAPACITY_EXCEEDED'
	| 'RECORD_DECODE_FAILED'
	| 'CONFIGURATION_INVALID'
	| 'PIPELINE_CLOSED'

/**
 * Base class for all pipeline errors
 */
export class PipelineError extends Error {
	readonly code: PipelineErrorCode
	readonly retriable: boolean

	constructor(message: string, code: PipelineErrorCode, retriable: boolean, cause?: unknown) {
		super(message, cause === undefined ? undefined : { cause })
		this.name = 'PipelineError'
		this.code = code
		this.retriable = retriable

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor)
		}
	}
}

/**
 * A partition of an input stream could not be read. Retried with backoff;
 * the other sources keep polling.
 */
export class SourceUnavailableError extends PipelineError {
	readonly source: string

	constructor(source: string, cause?: unknown) {
		const causeStr = cause instanceof Error ? `: ${cause.message}` : ''
		super(`Source "${source}" is unavailable${causeStr}`, 'SOURCE_UNAVAILABLE', true, cause)
		this.name = 'SourceUnavailableError'
		this.source = source
	}
}

/**
 * A batch (or some documents of it) could not be written to the sink.
 */
export class SinkWriteFailedError extends PipelineError {
	readonly sink: string
	readonly failedIds: string[]

	constructor(sink: string, failedIds: string[], cause?: unknown) {
		super(
			`Sink "${sink}" rejected ${failedIds.length} document(s)`,
			'SINK_WRITE_FAILED',
			true,
			cause
		)
		this.name = 'SinkWriteFailedError'
		this.sink = sink
		this.failedIds = failedIds
	}
}

/**
 * The sink cannot take records and the dead-letter output cannot either.
 * Requires operator intervention.
 */
export class SinkUnreachableError extends PipelineError {
	constructor(message: string, cause?: unknown) {
		super(message, 'SINK_UNREACHABLE', false, cause)
		this.name = 'SinkUnreachableError'
	}
}

export class CheckpointWriteFailedError extends PipelineError {
	readonly sequence: number

	constructor(sequence: number, cause?: unknown) {
		const causeStr = cause instanceof Error ? `: ${cause.message}` : ''
		super(`Failed to write checkpoint ${sequence}${causeStr}`, 'CHECKPOINT_WRITE_FAILED', true, cause)
		this.name = 'CheckpointWriteFailedError'
		this.sequence = sequence
	}
}

export class CheckpointCorruptError extends PipelineError {
	readonly sequence: number

	constructor(sequence: number, reason: string, cause?: unknown) {
		super(`Checkpoint ${sequence} is corrupt: ${reason}`, 'CHECKPOINT_CORRUPT', false, cause)
		this.name = 'CheckpointCorruptError'
		this.sequence = sequence
	}
}

/**
 * Pending-view or sale buffers outgrew their configured bound, usually because
 * a stalled source froze the watermark.
 */
export class StateStoreCapacityExceededError extends PipelineError {
	readonly buffer: 'pending-views' | 'sales'
	readonly limit: number

	constructor(buffer: 'pending-views' | 'sales', limit: number) {
		super(
			`State store capacity exceeded: ${buffer} reached its limit of ${limit} entries`,
			'STATE_STORE_CAPACITY_EXCEEDED',
			false
		)
		this.name = 'StateStoreCapacityExceededError'
		this.buffer = buffer
		this.limit = limit
	}
}

export class RecordDecodeError extends PipelineError {
	constructor(message: string, cause?: unknown) {
		super(message, 'RECORD_DECODE_FAILED', false, cause)
		this.name = 'RecordDecodeError'
	}
}

export class ConfigurationError extends PipelineError {
	readonly issues: string[]

	constructor(issues: string[]) {
		super(`Invalid pipeline configuration: ${issues.join('; ')}`, 'CONFIGURATION_INVALID', false)
		this.name = 'ConfigurationError'
		this.issues = issues
	}
}

export class PipelineClosedError extends PipelineError {
	constructor(message = 'Pipeline is closed') {
		super(message, 'PIPELINE_CLOSED', false)
		this.name = 'PipelineClosedError'
	}
}

export function isPipelineError(error: unknown): error is PipelineError {
	return error instanceof PipelineError
}

/**
 * Pipeline errors answer for themselves; anything else (a socket reset, a
 * rejected HTTP call) is assumed transient.
 */
export function isRetriable(error: unknown): boolean {
	if (isPipelineError(error)) {
		return error.retriable
	}
	return true
}
