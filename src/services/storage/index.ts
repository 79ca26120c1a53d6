/**
 * Persistence backends
 */

export { MemoryKeyValueStorage, STORAGE_KEYS } from './kv-storage.js';
export type { KeyValueStorage, StorageChange, StorageKey } from './kv-storage.js';
export { SqliteKeyValueStorage, createDatabase, initializeSchema, SCHEMA_VERSION } from './sqlite.js';
export { loadBlob, persist, unreadableKeyError } from './blob.js';
export type { LoadedBlob } from './blob.js';
