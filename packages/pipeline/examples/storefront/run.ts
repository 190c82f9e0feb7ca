/**
 * Storefront enrichment - Main Entry Point
 *
 * Run with: npm run example:storefront
 *
 * Joins product views with the product catalog, user profiles and the most
 * recent sale, and upserts the result into Elasticsearch. Join settings come
 * from JOINSTREAM_* variables (see configFromEnv); connection settings below.
 */

import { z } from 'zod'
import {
	configFromEnv,
	createKafka,
	createLogger,
	elasticsearchSink,
	FileDeadLetterQueue,
	KafkaPartitionedSource,
	pipeline,
	SOURCE_NAMES,
	type PipelineSources,
} from '../../src/index.js'

const connectionSchema = z.object({
	JOINSTREAM_KAFKA_BROKERS: z.string().default('localhost:9092'),
	JOINSTREAM_TOPIC_PRODUCTS: z.string().default('products'),
	JOINSTREAM_TOPIC_USERS: z.string().default('users'),
	JOINSTREAM_TOPIC_SALES: z.string().default('sales'),
	JOINSTREAM_TOPIC_VIEWS: z.string().default('views'),
	JOINSTREAM_ELASTICSEARCH_URL: z.string().url().default('http://localhost:9200'),
	JOINSTREAM_DEAD_LETTER_PATH: z.string().default('./data/dead-letters.jsonl'),
})

async function main(): Promise<void> {
	const config = configFromEnv({ JOINSTREAM_CHECKPOINT_STORE_LOCATION: './data/checkpoints', ...process.env })
	const env = connectionSchema.parse(process.env)
	const logger = createLogger(config.logLevel, { service: 'storefront' })

	const kafka = createKafka({ brokers: env.JOINSTREAM_KAFKA_BROKERS.split(','), clientId: 'storefront', logger })
	const topics = {
		products: env.JOINSTREAM_TOPIC_PRODUCTS,
		users: env.JOINSTREAM_TOPIC_USERS,
		sales: env.JOINSTREAM_TOPIC_SALES,
		views: env.JOINSTREAM_TOPIC_VIEWS,
	}
	const source = (name: keyof PipelineSources) =>
		new KafkaPartitionedSource({ kafka, name, topic: topics[name], logger })
	const sources: PipelineSources = {
		products: source('products'),
		users: source('users'),
		sales: source('sales'),
		views: source('views'),
	}

	const app = pipeline({
		sources,
		sink: elasticsearchSink({ node: env.JOINSTREAM_ELASTICSEARCH_URL, index: config.sink.index }),
		deadLetter: new FileDeadLetterQueue(env.JOINSTREAM_DEAD_LETTER_PATH),
		config,
		logger,
	})

	app.on('checkpoint', sequence => {
		const health = app.health()
		logger.info('checkpoint published', {
			sequence,
			globalWatermark: health.globalWatermark,
			pendingViews: health.engine.pendingViews,
			positions: Object.fromEntries(SOURCE_NAMES.map(name => [name, health.sources[name].positions])),
		})
	})

	const shutdown = () => {
		app.close().catch((error: unknown) => logger.error('shutdown failed', { error }))
	}
	process.once('SIGINT', shutdown)
	process.once('SIGTERM', shutdown)

	await app.start()
	await app.done
}

main().catch((error: unknown) => {
	console.error('Fatal error:', error)
	process.exit(1)
})
