export * from './schema.js';
export { createDatabase, wrapClient, getDatabase, closeDatabase } from './client.js';
export type { Database, DatabaseHandle, DatabaseOptions } from './client.js';
