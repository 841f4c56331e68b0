export * from './coin.schema.js';
export * from './ownership.schema.js';
export * from './group.schema.js';
