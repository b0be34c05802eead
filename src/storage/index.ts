/**
 * Storage module for Groundline
 * Provides persistent storage via SQLite, or an in-process store
 */

export { SqliteStorage, type SqliteStorageOptions } from './sqlite-storage.js';
export { MemoryStorage } from './memory-storage.js';
export type { StorageInterface, AuditQueryOptions } from './storage-interface.js';
