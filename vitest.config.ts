import os from 'node:os'
import { defineConfig } from 'vitest/config'

const maxWorkersFromEnv = Number(process.env.VITEST_MAX_WORKERS)
const defaultWorkers = Math.min(8, Math.max(2, os.cpus().length))
const maxWorkers = Number.isFinite(maxWorkersFromEnv) && maxWorkersFromEnv > 0 ? maxWorkersFromEnv : defaultWorkers

export default defineConfig({
	test: {
		include: ['packages/*/tests/**/*.test.ts'],
		maxWorkers,
		testTimeout: 20_000,
		hookTimeout: 20_000,
	},
})
