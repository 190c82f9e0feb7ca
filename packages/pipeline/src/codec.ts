import type { ZodType, ZodTypeDef } from 'zod'
import { RecordDecodeError } from './errors.js'

export interface Codec<T> {
	encode(value: T): Buffer
	decode(buffer: Buffer): T
}

export function string(): Codec<string> {
	return {
		encode: value => Buffer.from(value, 'utf-8'),
		decode: buffer => buffer.toString('utf-8'),
	}
}

export function json<T>(): Codec<T> {
	return {
		encode: value => Buffer.from(JSON.stringify(value), 'utf-8'),
		decode: buffer => JSON.parse(buffer.toString('utf-8')) as T,
	}
}

export function buffer(): Codec<Buffer> {
	return {
		encode: value => value,
		decode: value => value,
	}
}

export interface ZodCodecOptions {
	encode?: (value: unknown) => Buffer
	decode?: (buffer: Buffer) => unknown
}

/**
 * JSON codec validated by a zod schema in both directions.
 *
 * Decoding failures (malformed JSON or a schema mismatch) surface as
 * `RecordDecodeError` so the source adapter can reject the record.
 */
export function zodCodec<T>(schema: ZodType<T, ZodTypeDef, unknown>, options: ZodCodecOptions = {}): Codec<T> {
	const encodeValue = options.encode ?? ((value: unknown) => Buffer.from(JSON.stringify(value), 'utf-8'))
	const decodeValue = options.decode ?? ((buf: Buffer): unknown => JSON.parse(buf.toString('utf-8')))

	return {
		encode: value => encodeValue(schema.parse(value)),
		decode: buf => {
			let raw: unknown
			try {
				raw = decodeValue(buf)
			} catch (error) {
				throw new RecordDecodeError('Record is not valid JSON', error)
			}
			const result = schema.safeParse(raw)
			if (!result.success) {
				const issues = result.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
				throw new RecordDecodeError(`Record failed validation (${issues.join('; ')})`, result.error)
			}
			return result.data
		},
	}
}

export const codec = {
	string,
	json,
	buffer,
	zod: zodCodec,
}
