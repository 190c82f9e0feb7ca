import { appendFile, mkdir } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { DeadLetterEntry, DeadLetterQueue } from '../sink.js'

/**
 * Appends dead letters to a JSON-lines file, one entry per line.
 */
export class FileDeadLetterQueue implements DeadLetterQueue {
	readonly name = 'file'
	private ready: Promise<string | undefined> | undefined

	constructor(readonly path: string) {}

	async write(entries: DeadLetterEntry[]): Promise<void> {
		if (entries.length === 0) {
			return
		}
		this.ready ??= mkdir(dirname(this.path), { recursive: true })
		await this.ready
		await appendFile(this.path, entries.map(entry => `${JSON.stringify(entry)}\n`).join(''), 'utf-8')
	}

	close(): Promise<void> {
		// Each write opens and closes the file
		return Promise.resolve()
	}
}

/**
 * Keeps dead letters in memory. `failWrites` makes the next writes throw.
 */
export class InMemoryDeadLetterQueue implements DeadLetterQueue {
	readonly name = 'memory'
	readonly entries: DeadLetterEntry[] = []
	private failuresLeft = 0

	failWrites(count: number): void {
		this.failuresLeft = count
	}

	write(entries: DeadLetterEntry[]): Promise<void> {
		if (this.failuresLeft > 0) {
			this.failuresLeft--
			return Promise.reject(new Error('Injected dead-letter write failure'))
		}
		this.entries.push(...entries)
		return Promise.resolve()
	}

	close(): Promise<void> {
		return Promise.resolve()
	}
}
