export * from './types.js';
export { InMemoryRecordStore } from './memory-store.js';
export { SQLiteRecordStore } from './sqlite-store.js';
