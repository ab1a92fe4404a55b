export * from './schema.js';
export { createDatabase, closeDatabase } from './client.js';
export type { Database } from './client.js';
export { createRecordStore } from './record-store.js';
