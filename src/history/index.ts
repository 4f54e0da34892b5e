/**
 * History Store
 *
 * @module history
 */

export type { HistoryStore, HistoryStoreOptions } from './store'
export { normalizeTimestamp } from './store'
export { SqliteHistoryStore } from './sqlite-store'
export { MemoryHistoryStore } from './memory-store'
