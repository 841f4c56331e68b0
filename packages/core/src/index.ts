/**
 * @eurocoin/core - Domain logic for the euro coin collection tracker
 *
 * Catalog, ownership ledger, group directory, group-scoped views and bulk
 * import/export. Services take their repositories and the shared query cache
 * by constructor injection and are consumed by the API layer.
 */

export * from './shared/index.js';
export * from './cache/index.js';
export * from './catalog/index.js';
export * from './ownership/index.js';
export * from './groups/index.js';
export * from './group-views/index.js';
export * from './imports/index.js';
