export const pipelineVersion = '0.1.0'

// Pipeline
export { pipeline, Pipeline } from './pipeline.js'
export type {
	PipelineOptions,
	PipelineEvents,
	PipelineHealth,
	PipelineSources,
	PipelineState,
	SourceHealth,
} from './pipeline.js'

// Configuration
export {
	resolvePipelineConfig,
	configFromEnv,
	DEFAULT_MAX_PENDING_VIEWS,
	DEFAULT_MAX_BUFFERED_SALES,
} from './config.js'
export type {
	PipelineConfig,
	PipelineConfigInput,
	SourceConfig,
	FinalizationPolicy,
	SaleMatchPolicy,
	OverflowPolicy,
} from './config.js'
export { parseDuration, isDurationString } from './duration.js'
export type { Duration } from './duration.js'

// Records
export {
	productRecordSchema,
	userRecordSchema,
	saleEventSchema,
	viewEventSchema,
	enrichedRecordSchema,
	enrichedRecordId,
	viewId,
	recordCodecs,
} from './records.js'
export type {
	ProductRecord,
	UserRecord,
	SaleEvent,
	ViewEvent,
	EnrichedRecord,
	EntityType,
	DimensionRecords,
} from './records.js'

// Codecs
export { codec, string, json, buffer, zodCodec } from './codec.js'
export type { Codec, ZodCodecOptions } from './codec.js'

// Join
export { JoinEngine, createSaleMatcher } from './join.js'
export type { JoinEngineOptions, JoinEngineStats, SaleMatcherOptions } from './join.js'
export { WatermarkCoordinator, SourceWatermark } from './watermark.js'
export type {
	WatermarkSnapshot,
	SourceWatermarkOptions,
	SourceWatermarkStatus,
	WatermarkCoordinatorOptions,
} from './watermark.js'

// Sources
export { SOURCE_NAMES } from './source.js'
export type { SourceName, SourceMessage, PartitionOffsets, PartitionedSource } from './source.js'
export { SourceAdapter } from './adapter.js'
export type { SourceAdapterOptions, IngestMessage, IngestBatch, IngestRecord, IngestStatus } from './adapter.js'
export { KafkaPartitionedSource, createKafka, kafkaLogCreator } from './sources/kafka.js'
export type { KafkaSourceOptions, KafkaConnectionOptions } from './sources/kafka.js'

// Sinks
export { SinkWriter } from './sink.js'
export type {
	UpsertSink,
	UpsertDocument,
	UpsertResult,
	DeadLetterQueue,
	DeadLetterEntry,
	SinkWriterOptions,
	SinkWriterStats,
} from './sink.js'
export { ElasticsearchUpsertSink, elasticsearchSink } from './sinks/elasticsearch.js'
export type {
	BulkIndexClient,
	BulkIndexResponse,
	BulkItemResult,
	ElasticsearchSinkOptions,
	ElasticsearchConnectionOptions,
} from './sinks/elasticsearch.js'
export { FileDeadLetterQueue, InMemoryDeadLetterQueue } from './sinks/dead-letter.js'

// Checkpoints
export { CheckpointManager, encodeCheckpoint, decodeCheckpoint, CHECKPOINT_FORMAT, CHECKPOINT_VERSION } from './checkpoint.js'
export type { Checkpoint, CheckpointData, CheckpointStore, CheckpointManagerOptions } from './checkpoint.js'
export { FileCheckpointStore } from './checkpoint/file.js'
export { InMemoryCheckpointStore } from './checkpoint/memory.js'

// State stores
export { inMemory, InMemoryStateStoreProvider, InMemoryKeyValueStore } from './state/memory.js'
export { KeyedStateStore } from './state/keyed-store.js'
export type {
	PendingView,
	FinalizedView,
	BufferedFact,
	SaleMatcher,
	StateSnapshot,
	EvictionResult,
	KeyedStateStoreStats,
} from './state/keyed-store.js'
export type { StateStoreProvider, KeyValueStore, KeyValueStoreOptions } from './state.js'

// Errors
export {
	PipelineError,
	SourceUnavailableError,
	SinkWriteFailedError,
	SinkUnreachableError,
	CheckpointWriteFailedError,
	CheckpointCorruptError,
	StateStoreCapacityExceededError,
	RecordDecodeError,
	ConfigurationError,
	PipelineClosedError,
	isPipelineError,
	isRetriable,
} from './errors.js'
export type { PipelineErrorCode } from './errors.js'

// Logging
export { createLogger, noopLogger } from './logger.js'
export type { Logger, LogLevel } from './logger.js'

// Utilities
export { retry } from './utils/retry.js'
export type { RetryOptions } from './utils/retry.js'
export { BackoffStrategy } from './utils/backoff.js'
export type { BackoffOptions } from './utils/backoff.js'
export { sleep } from './utils/sleep.js'
export type { SleepOptions } from './utils/sleep.js'
export { Mutex } from './utils/mutex.js'
export { BoundedQueue } from './utils/bounded-queue.js'
export type { TakeOptions } from './utils/bounded-queue.js'
