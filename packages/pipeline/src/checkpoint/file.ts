import { randomBytes } from 'node:crypto'
import { link, mkdir, open, readdir, readFile, rename, rm, unlink } from 'node:fs/promises'
import { join } from 'node:path'
import type { CheckpointStore } from '../checkpoint.js'
import { CheckpointCorruptError } from '../errors.js'

const PAYLOAD_PATTERN = /^checkpoint-(\d+)\.ckpt$/
const POINTER_FILE = 'LATEST'

function isErrnoCode(error: unknown, code: string): boolean {
	return error instanceof Error && 'code' in error && error.code === code
}

function payloadFile(sequence: number): string {
	return `checkpoint-${String(sequence).padStart(10, '0')}.ckpt`
}

/**
 * Checkpoints as files in one directory.
 *
 * Payloads are written to a temporary file, synced, then hard-linked into
 * place (which fails if the name exists). The `LATEST` pointer is replaced
 * by rename, so readers see either the old or the new pointer.
 */
export class FileCheckpointStore implements CheckpointStore {
	readonly name = 'file'

	constructor(readonly directory: string) {}

	async putPayload(sequence: number, payload: Buffer): Promise<void> {
		await mkdir(this.directory, { recursive: true })
		const target = join(this.directory, payloadFile(sequence))
		const temp = await this.writeTemp(payload)
		try {
			await link(temp, target)
		} catch (error) {
			if (isErrnoCode(error, 'EEXIST')) {
				throw new Error(`Checkpoint ${sequence} already exists`, { cause: error })
			}
			throw error
		} finally {
			await unlink(temp)
		}
		await this.syncDirectory()
	}

	async publish(sequence: number): Promise<void> {
		await mkdir(this.directory, { recursive: true })
		const temp = await this.writeTemp(Buffer.from(`${sequence}\n`, 'utf-8'))
		await rename(temp, join(this.directory, POINTER_FILE))
		await this.syncDirectory()
	}

	async readPointer(): Promise<number | undefined> {
		let content: string
		try {
			content = await readFile(join(this.directory, POINTER_FILE), 'utf-8')
		} catch (error) {
			if (isErrnoCode(error, 'ENOENT')) {
				return undefined
			}
			throw error
		}
		const trimmed = content.trim()
		if (!/^\d+$/.test(trimmed)) {
			throw new CheckpointCorruptError(0, `pointer file holds "${trimmed.slice(0, 32)}"`)
		}
		return Number(trimmed)
	}

	async readPayload(sequence: number): Promise<Buffer | undefined> {
		try {
			return await readFile(join(this.directory, payloadFile(sequence)))
		} catch (error) {
			if (isErrnoCode(error, 'ENOENT')) {
				return undefined
			}
			throw error
		}
	}

	async listPayloads(): Promise<number[]> {
		let entries: string[]
		try {
			entries = await readdir(this.directory)
		} catch (error) {
			if (isErrnoCode(error, 'ENOENT')) {
				return []
			}
			throw error
		}
		const sequences: number[] = []
		for (const entry of entries) {
			const match = PAYLOAD_PATTERN.exec(entry)
			if (match?.[1] !== undefined) {
				sequences.push(Number(match[1]))
			}
		}
		return sequences.sort((a, b) => a - b)
	}

	async deletePayload(sequence: number): Promise<void> {
		await rm(join(this.directory, payloadFile(sequence)), { force: true })
	}

	close(): Promise<void> {
		// Nothing held open between calls
		return Promise.resolve()
	}

	private async writeTemp(data: Buffer): Promise<string> {
		const path = join(this.directory, `.tmp-${process.pid}-${randomBytes(6).toString('hex')}`)
		const handle = await open(path, 'wx')
		try {
			await handle.writeFile(data)
			await handle.sync()
		} finally {
			await handle.close()
		}
		return path
	}

	private async syncDirectory(): Promise<void> {
		const handle = await open(this.directory, 'r')
		try {
			await handle.sync()
		} finally {
			await handle.close()
		}
	}
}
