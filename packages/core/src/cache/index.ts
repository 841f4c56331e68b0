export { QueryCache, CachedQuery, buildCacheKey, DEFAULT_CACHE_TTL_MS } from './query-cache.js';
export type {
  CacheEntryInfo,
  CacheLookup,
  CacheParams,
  CacheParamValue,
  CachePredicate,
  QueryCacheOptions,
} from './query-cache.js';
export {
  CATALOG_TAG,
  OWNERSHIP_TAG,
  GROUP_TAG,
  GROUP_VIEW_TAG,
  coinTag,
  ownerTag,
  groupTag,
} from './cache-tags.js';
