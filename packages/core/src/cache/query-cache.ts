/**
 * Query Cache
 *
 * Process-wide TTL cache in front of the store adapter. All read paths go through it;
 * every write path invalidates the entries it could have affected.
 *
 * Entries are grouped into typed regions (one per query), share one TTL and one
 * invalidation surface, and carry structured dependency tags such as `coin:<id>`,
 * `owner:<name>` or `group`.
 */

import { logger as rootLogger, type Logger } from '@eurocoin/observability';

export const DEFAULT_CACHE_TTL_MS = 5 * 60 * 1000;

export type CacheParamValue =
  | string
  | number
  | boolean
  | Date
  | null
  | undefined
  | readonly (string | number)[];

export type CacheParams = Readonly<Record<string, CacheParamValue>>;

export interface CacheLookup {
  params?: CacheParams;
  tags?: readonly string[];
}

/** What invalidation predicates see of an entry */
export interface CacheEntryInfo {
  key: string;
  tags: ReadonlySet<string>;
  cachedAt: number;
}

export type CachePredicate = (entry: CacheEntryInfo) => boolean;

export interface QueryCacheOptions {
  ttlMs?: number;
  now?: () => number;
  logger?: Logger;
}

interface CacheEntry<T> extends CacheEntryInfo {
  value: T;
}

interface CacheContext {
  readonly ttlMs: number;
  readonly log: Logger;
  now(): number;
  generation(): number;
  accepts(generation: number): boolean;
  /** Called before every store so expired entries of idle keys get dropped */
  beforeStore(): void;
}

interface CacheRegion {
  readonly size: number;
  sweep(predicate: CachePredicate): number;
  clear(): number;
}

function serializeParam(value: CacheParamValue): string {
  return JSON.stringify(value instanceof Date ? value.toISOString() : value);
}

/**
 * Deterministic cache key: the query id followed by its parameters sorted by name.
 * Undefined parameters are left out so `{ a: 1 }` and `{ a: 1, b: undefined }` share a key.
 */
export function buildCacheKey(query: string, params: CacheParams = {}): string {
  const pairs = Object.keys(params)
    .filter((name) => params[name] !== undefined)
    .sort()
    .map((name) => `${name}=${serializeParam(params[name])}`);

  return pairs.length > 0 ? `${query}?${pairs.join('&')}` : query;
}

/**
 * Typed handle for one cached query
 */
export class CachedQuery<T> implements CacheRegion {
  private readonly entries = new Map<string, CacheEntry<T>>();

  constructor(
    private readonly context: CacheContext,
    readonly query: string
  ) {}

  get size(): number {
    return this.entries.size;
  }

  /**
   * Return the cached value for these parameters, or compute and store it
   *
   * A failed compute is never cached. A compute that overlapped an invalidation
   * still returns its value but does not store it.
   */
  async getOrCompute(lookup: CacheLookup, compute: () => Promise<T>): Promise<T> {
    const key = buildCacheKey(this.query, lookup.params);
    const hit = this.entries.get(key);

    if (hit) {
      if (this.context.now() - hit.cachedAt < this.context.ttlMs) {
        this.context.log.debug({ key }, 'Cache hit');
        return hit.value;
      }
      this.entries.delete(key);
    }

    const generation = this.context.generation();
    const value = await compute();

    if (this.context.accepts(generation)) {
      this.context.beforeStore();
      this.entries.set(key, {
        key,
        tags: new Set(lookup.tags ?? []),
        cachedAt: this.context.now(),
        value,
      });
    }

    return value;
  }

  sweep(predicate: CachePredicate): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (predicate(entry)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): number {
    const removed = this.entries.size;
    this.entries.clear();
    return removed;
  }
}

export class QueryCache {
  readonly ttlMs: number;
  private readonly now: () => number;
  private readonly log: Logger;
  private readonly regions = new Set<CacheRegion>();
  private generation = 0;
  private closed = false;
  private lastPurgeAt = Number.NEGATIVE_INFINITY;

  constructor(options: QueryCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
    this.log = (options.logger ?? rootLogger).child({ module: 'query-cache' });
  }

  /**
   * Create a typed region for one query id
   *
   * @example
   * ```ts
   * const stats = cache.region<CatalogStats>('catalog.stats');
   * const value = await stats.getOrCompute({ tags: ['catalog'] }, () => repo.getStats());
   * ```
   */
  region<T>(query: string): CachedQuery<T> {
    const region = new CachedQuery<T>(
      {
        ttlMs: this.ttlMs,
        log: this.log,
        now: () => this.now(),
        generation: () => this.generation,
        accepts: (generation) => !this.closed && generation === this.generation,
        beforeStore: () => this.purgeExpired(),
      },
      query
    );
    this.regions.add(region);
    return region;
  }

  get size(): number {
    let total = 0;
    for (const region of this.regions) {
      total += region.size;
    }
    return total;
  }

  /**
   * Drop entries whose TTL has elapsed, at most once per TTL window.
   * Expired entries can never be served, so the generation is left alone.
   *
   * @returns Number of entries removed
   */
  purgeExpired(): number {
    const now = this.now();
    if (now - this.lastPurgeAt < this.ttlMs) {
      return 0;
    }
    this.lastPurgeAt = now;

    let removed = 0;
    for (const region of this.regions) {
      removed += region.sweep((entry) => now - entry.cachedAt >= this.ttlMs);
    }
    if (removed > 0) {
      this.log.debug({ removed }, 'Expired cache entries purged');
    }
    return removed;
  }

  /**
   * Remove every entry matching the predicate
   *
   * @returns Number of entries removed
   */
  invalidate(predicate: CachePredicate): number {
    this.generation++;
    let removed = 0;
    for (const region of this.regions) {
      removed += region.sweep(predicate);
    }
    this.log.info({ removed }, 'Cache invalidated');
    return removed;
  }

  /**
   * Remove every entry carrying at least one of the tags
   */
  invalidateTags(tags: readonly string[]): number {
    const targets = new Set(tags);
    return this.invalidate((entry) => {
      for (const tag of entry.tags) {
        if (targets.has(tag)) {
          return true;
        }
      }
      return false;
    });
  }

  clear(): number {
    this.generation++;
    let removed = 0;
    for (const region of this.regions) {
      removed += region.clear();
    }
    this.log.info({ removed }, 'Cache cleared');
    return removed;
  }

  /**
   * End of lifecycle: drop everything and stop storing new entries.
   * Reads keep working and go straight to the store.
   */
  close(): void {
    this.clear();
    this.closed = true;
  }
}
