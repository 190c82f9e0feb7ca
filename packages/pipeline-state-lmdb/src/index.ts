export { lmdb, LMDBStateStoreProvider, LMDBKeyValueStore } from './lmdb.js'
export type { LMDBProviderOptions } from './lmdb.js'
export { LMDBCheckpointStore } from './checkpoint-store.js'
export type { LMDBCheckpointStoreOptions } from './checkpoint-store.js'
