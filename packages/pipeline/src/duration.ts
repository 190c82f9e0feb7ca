/**
 * A span of time, either milliseconds or a string such as `500ms`, `30s`, `5m`.
 */
export type Duration = number | `${number}ms` | `${number}s` | `${number}m` | `${number}h` | `${number}d`

const DURATION_PATTERN = /^(\d+)(ms|s|m|h|d)$/

export function isDurationString(value: string): value is Extract<Duration, string> {
	return DURATION_PATTERN.test(value)
}

/**
 * Parse a Duration to milliseconds.
 */
export function parseDuration(duration: Duration | string): number {
	if (typeof duration === 'number') {
		if (!Number.isFinite(duration) || duration < 0) {
			throw new Error(`Invalid duration: ${duration}`)
		}
		return duration
	}
	const match = DURATION_PATTERN.exec(duration)
	if (!match) {
		throw new Error(`Invalid duration: ${duration}`)
	}
	const value = parseInt(match[1] ?? '', 10)
	const unit = match[2]
	switch (unit) {
		case 'ms':
			return value
		case 's':
			return value * 1000
		case 'm':
			return value * 60 * 1000
		case 'h':
			return value * 60 * 60 * 1000
		case 'd':
			return value * 24 * 60 * 60 * 1000
		default:
			throw new Error(`Unknown time unit: ${unit}`)
	}
}
